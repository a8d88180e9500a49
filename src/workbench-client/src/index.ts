import { createApiClient } from '@/api/client'
import { createCalendarApi } from '@/api/calendar'
import { createChatApi } from '@/api/chat'
import { createFileSearchApi } from '@/api/file-search'
import { createHealthApi } from '@/api/health'
import { createNotesApi } from '@/api/notes'
import { createProjectsApi } from '@/api/projects'
import { createTranslatorApi } from '@/api/translator'
import type { WorkbenchConfig } from '@/config'
import { CalendarRepository } from '@/repositories/calendar-repository'
import { ChatRepository } from '@/repositories/chat-repository'
import { FileSearchRepository } from '@/repositories/file-search-repository'
import { HealthRepository } from '@/repositories/health-repository'
import { NotesRepository } from '@/repositories/notes-repository'
import { ProjectsRepository } from '@/repositories/projects-repository'
import { TranslatorRepository } from '@/repositories/translator-repository'

export function createWorkbenchClient(config: WorkbenchConfig) {
  const http = createApiClient(config)
  return {
    notes: new NotesRepository(createNotesApi(http)),
    projects: new ProjectsRepository(createProjectsApi(http)),
    calendar: new CalendarRepository(createCalendarApi(http)),
    chat: new ChatRepository(createChatApi(http)),
    translator: new TranslatorRepository(createTranslatorApi(http)),
    fileSearch: new FileSearchRepository(createFileSearchApi(http)),
    health: new HealthRepository(createHealthApi(http)),
  }
}

export type WorkbenchClient = ReturnType<typeof createWorkbenchClient>

export { createTokenStore, type TokenStore } from '@/auth'
export { ConfigError, DEFAULT_BASE_URL, loadConfig, type WorkbenchConfig } from '@/config'
export { ApiError, CancelledError, NetworkError, ParsingError, TimeoutError } from '@/api/errors'
export {
  isFailure,
  isUserVisible,
  normalize,
  type BestEffort,
  type Failure,
  type FailureKind,
  type Result,
} from '@/domain/failure'
export type * from '@/domain/types'
export type { HealthOverview } from '@/repositories/health-repository'
export { ResourceStore, type ResourceState } from '@/stores/resource-store'
export { FileSearchStore } from '@/stores/file-search-store'
export * from '@/stores/feature-stores'
export * from '@/lib/format'
export * from '@/lib/statistics'
