import type { NoteDto } from '@/api/notes'
import type { Note } from '@/domain/types'
import { notBefore, toDate, toIso, type Mapper } from './mapper'

export const noteMapper: Mapper<NoteDto, Note> = {
  toEntity(dto) {
    const createdAt = toDate(dto.createdAt)
    return {
      id: dto.id,
      title: dto.title,
      content: dto.content,
      tags: [...dto.tags],
      projectId: dto.projectId,
      createdAt,
      updatedAt: notBefore(toDate(dto.updatedAt), createdAt),
    }
  },

  fromEntity(note) {
    return {
      id: note.id,
      title: note.title,
      content: note.content,
      tags: [...note.tags],
      projectId: note.projectId,
      createdAt: toIso(note.createdAt),
      updatedAt: toIso(note.updatedAt),
    }
  },
}
