import { z } from 'zod'
import type { ApiClient } from './client'
import { decode, optionalId, stringList, timestamp, wireId, wireList, wireObject } from './decode'
import { endpoints } from './endpoints'

export const noteSchema = wireObject({
  id: wireId,
  title: z.string(),
  content: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  tags: stringList,
  projectId: optionalId,
  createdAt: timestamp,
  updatedAt: timestamp,
})

export type NoteDto = z.output<typeof noteSchema>

export interface NoteListQuery {
  query?: string
  tags?: string[]
}

const acknowledgementSchema = wireObject({ id: wireId })

function isFullNote(raw: unknown): boolean {
  return typeof raw === 'object' && raw !== null && 'title' in raw
}

function toRequestBody(dto: NoteDto) {
  return {
    title: dto.title,
    content: dto.content,
    tags: dto.tags,
    project_id: dto.projectId,
  }
}

export function createNotesApi(http: ApiClient) {
  async function getNote(id: string): Promise<NoteDto> {
    const raw = await http.get(endpoints.note(id), { fallback: 'Unable to load note' })
    return decode(noteSchema, raw, 'Note')
  }

  return {
    async list(query: NoteListQuery = {}): Promise<NoteDto[]> {
      const raw = await http.get(endpoints.notes, {
        fallback: 'Unable to load notes',
        query: {
          query: query.query?.trim() || undefined,
          tags: query.tags && query.tags.length > 0 ? query.tags.join(',') : undefined,
        },
      })
      return decode(wireList(noteSchema, 'notes'), raw, 'Notes')
    },

    get: getNote,

    /** The backend may answer with the note or with `{ id, message }`; the latter is followed by a fetch. */
    async create(dto: NoteDto): Promise<NoteDto> {
      const raw = await http.post(endpoints.notes, toRequestBody(dto), { fallback: 'Unable to create note' })
      if (isFullNote(raw)) return decode(noteSchema, raw, 'Create note')
      const ack = decode(acknowledgementSchema, raw, 'Create note')
      return getNote(ack.id)
    },

    async update(dto: NoteDto): Promise<NoteDto> {
      const raw = await http.put(endpoints.note(dto.id), toRequestBody(dto), { fallback: 'Unable to update note' })
      if (isFullNote(raw)) return decode(noteSchema, raw, 'Update note')
      return getNote(dto.id)
    },

    async remove(id: string): Promise<void> {
      await http.del(endpoints.note(id), { fallback: 'Unable to delete note' })
    },
  }
}

export type NotesApi = ReturnType<typeof createNotesApi>
