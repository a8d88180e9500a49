import type { NotesApi, NoteDto } from '@/api/notes'
import { validationFailure, type Result } from '@/domain/failure'
import type { Note, NoteInput, NoteQuery } from '@/domain/types'
import { normalizeList } from '@/lib/list'
import { noteMapper } from '@/mappers/note-mapper'
import { CrudRepository, isBlank, rejected } from './repository'

export function newNote(input: NoteInput): Note {
  return {
    id: '',
    title: input.title.trim(),
    content: input.content,
    tags: normalizeList(input.tags ?? []),
    projectId: input.projectId ?? null,
    createdAt: null,
    updatedAt: null,
  }
}

export class NotesRepository extends CrudRepository<NoteDto, Note, NoteQuery> {
  constructor(api: NotesApi) {
    super(api, noteMapper, 'Note')
  }

  listNotes(): Promise<Result<Note[]>> {
    return this.list()
  }

  searchNotes(query: NoteQuery): Promise<Result<Note[]>> {
    return this.list({ query: query.query, tags: query.tags ? normalizeList(query.tags) : undefined })
  }

  getNote(id: string): Promise<Result<Note>> {
    return this.get(id)
  }

  createNote(input: NoteInput): Promise<Result<Note>> {
    if (isBlank(input.title)) return rejected(validationFailure('Note title must not be empty'))
    return this.create(newNote(input))
  }

  updateNote(note: Note): Promise<Result<Note>> {
    if (isBlank(note.title)) return rejected(validationFailure('Note title must not be empty'))
    return this.update(note)
  }

  deleteNote(id: string): Promise<Result<void>> {
    return this.remove(id)
  }
}
