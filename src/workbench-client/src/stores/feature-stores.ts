import type { CalendarEvent, ChatMessage, ChatSession, Note, Project, ProjectQuery } from '@/domain/types'
import type { CalendarRepository } from '@/repositories/calendar-repository'
import type { ChatRepository } from '@/repositories/chat-repository'
import type { HealthOverview, HealthRepository } from '@/repositories/health-repository'
import type { NotesRepository } from '@/repositories/notes-repository'
import type { ProjectsRepository } from '@/repositories/projects-repository'
import type { TranslatorRepository } from '@/repositories/translator-repository'
import { toDateOnly } from '@/mappers/mapper'
import { ResourceStore } from './resource-store'

export interface DateRange {
  start: Date
  end: Date
}

export function createNotesStore(notes: NotesRepository) {
  return new ResourceStore<Note[]>(() => notes.listNotes(), { name: 'notes' })
}

export function createNoteStore(notes: NotesRepository) {
  return new ResourceStore<Note, string>((id) => notes.getNote(id), { name: 'note', key: (id) => id })
}

export function createProjectsStore(projects: ProjectsRepository) {
  return new ResourceStore<Project[], ProjectQuery>((query) => projects.listProjects(query), { name: 'projects' })
}

export function createCalendarStore(calendar: CalendarRepository) {
  return new ResourceStore<CalendarEvent[], DateRange>(
    (range) => calendar.listEventsByDateRange(range.start, range.end),
    { name: 'calendar', key: (range) => `${toDateOnly(range.start)}/${toDateOnly(range.end)}` },
  )
}

export function createChatHistoryStore(chat: ChatRepository) {
  return new ResourceStore<ChatMessage[], string>((sessionId) => chat.getChatHistory(sessionId), {
    name: 'chat-history',
    key: (sessionId) => sessionId,
  })
}

export function createChatSessionsStore(chat: ChatRepository) {
  return new ResourceStore<ChatSession[]>(() => chat.getChatSessions(), { name: 'chat-sessions' })
}

export function createLanguagesStore(translator: TranslatorRepository) {
  return new ResourceStore<string[]>(() => translator.getSupportedLanguages(), { name: 'translator-languages' })
}

export function createHealthStore(health: HealthRepository) {
  return new ResourceStore<HealthOverview>(() => health.getHealthOverview(), { name: 'health' })
}
