import { describe, it, expect } from 'vitest'
import { calendarEventSchema } from '@/api/calendar'
import { noteSchema } from '@/api/notes'
import type { CalendarEvent, ChatMessage, DirectoryConfig, FileSearchResult, Note, Project, SearchStatistics } from '@/domain/types'
import { calendarEventMapper } from '@/mappers/calendar-mapper'
import { chatMessageMapper, chatSessionMapper } from '@/mappers/chat-mapper'
import { directoryConfigMapper, fileSearchResultMapper, searchStatisticsMapper } from '@/mappers/file-search-mapper'
import { noteMapper } from '@/mappers/note-mapper'
import { projectMapper } from '@/mappers/project-mapper'
import { translatorConfigMapper } from '@/mappers/translator-mapper'

const created = new Date('2025-01-01T09:00:00.000Z')
const updated = new Date('2025-01-02T09:30:15.250Z')

describe('round trip toEntity(fromEntity(e))', () => {
  it('note', () => {
    const note: Note = {
      id: 'n-1',
      title: 'Title',
      content: 'Body',
      tags: ['a', 'b'],
      projectId: 'p-1',
      createdAt: created,
      updatedAt: updated,
    }
    expect(noteMapper.toEntity(noteMapper.fromEntity(note))).toEqual(note)
  })

  it('unsaved note keeps its null timestamps', () => {
    const draft: Note = { id: '', title: 'Draft', content: '', tags: [], projectId: null, createdAt: null, updatedAt: null }
    expect(noteMapper.toEntity(noteMapper.fromEntity(draft))).toEqual(draft)
  })

  it('project', () => {
    const project: Project = {
      id: 'p-1',
      name: 'Website',
      description: 'Relaunch',
      status: 'archived',
      color: '#fff',
      icon: 'globe',
      parentProjectId: null,
      tags: ['client'],
      metadata: { budget: 10 },
      createdAt: created,
      updatedAt: updated,
      completedAt: null,
      archivedAt: updated,
    }
    expect(projectMapper.toEntity(projectMapper.fromEntity(project))).toEqual(project)
  })

  it('calendar event keeps its calendar day', () => {
    const event: CalendarEvent = {
      id: 'e-1',
      title: 'Planning',
      description: '',
      eventType: 'meeting',
      status: 'in_progress',
      eventDate: new Date(2025, 0, 15),
      startTime: new Date('2025-01-15T10:00:00.000Z'),
      endTime: new Date('2025-01-15T11:00:00.000Z'),
      allDay: false,
      location: 'Room 4',
      participants: ['sam@example.com'],
      projectId: null,
      chatSessionId: 's-1',
      recurrencePattern: 'weekly',
      recurrenceRule: null,
      reminderMinutesBefore: 15,
      reminderSent: false,
      tags: [],
      notes: null,
      color: null,
      metadata: null,
      createdAt: created,
      updatedAt: updated,
      completedAt: null,
    }
    const dto = calendarEventMapper.fromEntity(event)
    expect(dto.eventDate).toBe('2025-01-15')
    expect(calendarEventMapper.toEntity(dto)).toEqual(event)
  })

  it('chat message and session', () => {
    const message: ChatMessage = {
      id: 'm-1',
      sessionId: 's-1',
      role: 'user',
      content: 'hi',
      timestamp: created,
      toolCalls: [{ name: 'search', args: { q: 'x' } }],
    }
    expect(chatMessageMapper.toEntity(chatMessageMapper.fromEntity(message))).toEqual(message)

    const session = { id: 's-1', title: 'Planning', createdAt: created, updatedAt: null, messageCount: 3 }
    expect(chatSessionMapper.toEntity(chatSessionMapper.fromEntity(session))).toEqual(session)
  })

  it('translator config', () => {
    const config = { defaultLanguage: 'python', availableLanguages: ['python', 'go'], modelSettings: null }
    expect(translatorConfigMapper.toEntity(translatorConfigMapper.fromEntity(config))).toEqual(config)
  })

  it('file search entities', () => {
    const result: FileSearchResult = {
      path: '/docs/a.md',
      name: 'a.md',
      fileType: 'md',
      size: 10,
      lastModified: null,
      score: 0.5,
      matchedKeywords: ['a'],
      content: null,
      metadata: { lines: 3 },
    }
    const directory: DirectoryConfig = {
      path: '/docs',
      includeSubdirectories: true,
      fileExtensions: [],
      isWatched: true,
      lastIndexed: updated,
      indexedFileCount: 4,
    }
    const stats: SearchStatistics = {
      totalFiles: 10,
      indexedFiles: 7,
      indexedDirectories: 2,
      lastIndexTime: null,
      fileTypeDistribution: { md: 7 },
    }
    expect(fileSearchResultMapper.toEntity(fileSearchResultMapper.fromEntity(result))).toEqual(result)
    expect(directoryConfigMapper.toEntity(directoryConfigMapper.fromEntity(directory))).toEqual(directory)
    expect(searchStatisticsMapper.toEntity(searchStatisticsMapper.fromEntity(stats))).toEqual(stats)
  })
})

describe('toEntity', () => {
  it('never fabricates a timestamp the payload lacks', () => {
    const note = noteMapper.toEntity(noteSchema.parse({ id: 'n-1', title: 't' }))
    expect(note.createdAt).toBeNull()
    expect(note.updatedAt).toBeNull()
  })

  it('clamps an update that precedes creation', () => {
    const note = noteMapper.toEntity(
      noteSchema.parse({ id: 'n-1', title: 't', created_at: '2025-01-02T00:00:00Z', updated_at: '2025-01-01T00:00:00Z' }),
    )
    expect(note.updatedAt).toEqual(note.createdAt)
  })

  it('reads a date-only event day as local midnight', () => {
    const event = calendarEventMapper.toEntity(calendarEventSchema.parse({ id: 'e-1', title: 't', event_date: '2025-03-30' }))
    expect([event.eventDate.getFullYear(), event.eventDate.getMonth(), event.eventDate.getDate(), event.eventDate.getHours()]).toEqual([
      2025, 2, 30, 0,
    ])
  })
})
