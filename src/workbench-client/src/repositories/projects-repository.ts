import type { ProjectDto, ProjectsApi } from '@/api/projects'
import { validationFailure, type Result } from '@/domain/failure'
import type { Project, ProjectInput, ProjectQuery } from '@/domain/types'
import { normalizeList } from '@/lib/list'
import { projectMapper } from '@/mappers/project-mapper'
import { attempt, CrudRepository, isBlank, rejected } from './repository'

export function newProject(input: ProjectInput): Project {
  return {
    id: '',
    name: input.name.trim(),
    description: input.description ?? '',
    status: input.status ?? 'active',
    color: input.color ?? null,
    icon: input.icon ?? null,
    parentProjectId: input.parentProjectId ?? null,
    tags: normalizeList(input.tags ?? []),
    metadata: null,
    createdAt: null,
    updatedAt: null,
    completedAt: null,
    archivedAt: null,
  }
}

export class ProjectsRepository extends CrudRepository<ProjectDto, Project, ProjectQuery> {
  constructor(private readonly api: ProjectsApi) {
    super(api, projectMapper, 'Project')
  }

  listProjects(query: ProjectQuery = {}): Promise<Result<Project[]>> {
    return this.list(query)
  }

  getProject(id: string): Promise<Result<Project>> {
    return this.get(id)
  }

  getChildProjects(parentId: string): Promise<Result<Project[]>> {
    if (isBlank(parentId)) return rejected(validationFailure('Project id must not be empty'))
    return attempt(async () => (await this.api.children(parentId.trim())).map((dto) => projectMapper.toEntity(dto)))
  }

  createProject(input: ProjectInput): Promise<Result<Project>> {
    if (isBlank(input.name)) return rejected(validationFailure('Project name must not be empty'))
    return this.create(newProject(input))
  }

  updateProject(project: Project): Promise<Result<Project>> {
    if (isBlank(project.name)) return rejected(validationFailure('Project name must not be empty'))
    return this.update(project)
  }

  deleteProject(id: string): Promise<Result<void>> {
    return this.remove(id)
  }
}
