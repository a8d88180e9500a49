import { z } from 'zod'
import type { ApiClient } from './client'
import { decode, metadata, optionalId, optionalText, stringList, timestamp, wireId, wireList, wireObject } from './decode'
import { endpoints } from './endpoints'

export const projectStatusSchema = z.enum(['active', 'completed', 'archived'])

export const projectSchema = wireObject({
  id: wireId,
  name: z.string(),
  description: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  status: projectStatusSchema.nullish().transform((value) => value ?? 'active'),
  color: optionalText,
  icon: optionalText,
  parentProjectId: optionalId,
  tags: stringList,
  metadata,
  createdAt: timestamp,
  updatedAt: timestamp,
  completedAt: timestamp,
  archivedAt: timestamp,
})

export type ProjectDto = z.output<typeof projectSchema>

export interface ProjectListQuery {
  status?: z.output<typeof projectStatusSchema>
  parentId?: string
}

const acknowledgementSchema = wireObject({ id: wireId })

function toRequestBody(dto: ProjectDto, includeMetadata: boolean) {
  const body: Record<string, unknown> = {
    name: dto.name,
    description: dto.description,
    status: dto.status,
    color: dto.color,
    icon: dto.icon,
    parent_project_id: dto.parentProjectId,
    tags: dto.tags,
    metadata: dto.metadata,
  }
  if (includeMetadata) {
    body.id = dto.id
    if (dto.completedAt) body.completed_at = dto.completedAt
    if (dto.archivedAt) body.archived_at = dto.archivedAt
  }
  return body
}

export function createProjectsApi(http: ApiClient) {
  const listSchema = wireList(projectSchema, 'projects')

  async function getProject(id: string): Promise<ProjectDto> {
    const raw = await http.get(endpoints.project(id), { fallback: 'Unable to load project' })
    return decode(projectSchema, raw, 'Project')
  }

  return {
    async list(query: ProjectListQuery = {}): Promise<ProjectDto[]> {
      const raw = await http.get(endpoints.projects, {
        fallback: 'Unable to load projects',
        query: { status_filter: query.status, parent_id: query.parentId },
      })
      return decode(listSchema, raw, 'Projects')
    },

    get: getProject,

    async children(parentId: string): Promise<ProjectDto[]> {
      const raw = await http.get(endpoints.projectChildren(parentId), { fallback: 'Unable to load child projects' })
      return decode(listSchema, raw, 'Child projects')
    },

    /** Create and update answer with an acknowledgement; the project is fetched afterwards. */
    async create(dto: ProjectDto): Promise<ProjectDto> {
      const raw = await http.post(endpoints.projects, toRequestBody(dto, false), {
        fallback: 'Unable to create project',
      })
      const ack = decode(acknowledgementSchema, raw, 'Create project')
      return getProject(ack.id)
    },

    async update(dto: ProjectDto): Promise<ProjectDto> {
      await http.put(endpoints.project(dto.id), toRequestBody(dto, true), { fallback: 'Unable to update project' })
      return getProject(dto.id)
    },

    async remove(id: string): Promise<void> {
      await http.del(endpoints.project(id), { fallback: 'Unable to delete project' })
    },
  }
}

export type ProjectsApi = ReturnType<typeof createProjectsApi>
