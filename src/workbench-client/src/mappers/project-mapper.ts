import type { ProjectDto } from '@/api/projects'
import type { Project } from '@/domain/types'
import { copyRecord, notBefore, toDate, toIso, type Mapper } from './mapper'

export const projectMapper: Mapper<ProjectDto, Project> = {
  toEntity(dto) {
    const createdAt = toDate(dto.createdAt)
    return {
      id: dto.id,
      name: dto.name,
      description: dto.description,
      status: dto.status,
      color: dto.color,
      icon: dto.icon,
      parentProjectId: dto.parentProjectId,
      tags: [...dto.tags],
      metadata: copyRecord(dto.metadata),
      createdAt,
      updatedAt: notBefore(toDate(dto.updatedAt), createdAt),
      completedAt: toDate(dto.completedAt),
      archivedAt: toDate(dto.archivedAt),
    }
  },

  fromEntity(project) {
    return {
      id: project.id,
      name: project.name,
      description: project.description,
      status: project.status,
      color: project.color,
      icon: project.icon,
      parentProjectId: project.parentProjectId,
      tags: [...project.tags],
      metadata: copyRecord(project.metadata),
      createdAt: toIso(project.createdAt),
      updatedAt: toIso(project.updatedAt),
      completedAt: toIso(project.completedAt),
      archivedAt: toIso(project.archivedAt),
    }
  },
}
