export type Metadata = Record<string, unknown>

export interface Note {
  id: string
  title: string
  content: string
  tags: string[]
  projectId: string | null
  createdAt: Date | null
  updatedAt: Date | null
}

export interface NoteInput {
  title: string
  content: string
  tags?: string[]
  projectId?: string | null
}

export interface NoteQuery {
  query?: string
  tags?: string[]
}

export type ProjectStatus = 'active' | 'completed' | 'archived'

export interface Project {
  id: string
  name: string
  description: string
  status: ProjectStatus
  color: string | null
  icon: string | null
  parentProjectId: string | null
  tags: string[]
  metadata: Metadata | null
  createdAt: Date | null
  updatedAt: Date | null
  completedAt: Date | null
  archivedAt: Date | null
}

export interface ProjectInput {
  name: string
  description?: string
  status?: ProjectStatus
  color?: string | null
  icon?: string | null
  parentProjectId?: string | null
  tags?: string[]
}

export interface ProjectQuery {
  status?: ProjectStatus
  parentId?: string
}

/** Open set: meeting, deadline, reminder, task, personal, event and whatever the backend adds. */
export type EventType = string
export type EventStatus = 'scheduled' | 'in_progress' | 'completed' | 'cancelled'

export interface CalendarEvent {
  id: string
  title: string
  description: string
  eventType: EventType
  status: EventStatus
  /** Local midnight of the event's calendar day. */
  eventDate: Date
  startTime: Date | null
  endTime: Date | null
  allDay: boolean
  location: string | null
  participants: string[]
  projectId: string | null
  chatSessionId: string | null
  recurrencePattern: string | null
  recurrenceRule: string | null
  reminderMinutesBefore: number | null
  reminderSent: boolean
  tags: string[]
  notes: string | null
  color: string | null
  metadata: Metadata | null
  createdAt: Date | null
  updatedAt: Date | null
  completedAt: Date | null
}

export type CalendarEventInput = Pick<CalendarEvent, 'title' | 'eventDate'> &
  Partial<Omit<CalendarEvent, 'id' | 'title' | 'eventDate' | 'createdAt' | 'updatedAt' | 'completedAt'>>

export interface CalendarQuery {
  startDate?: Date
  endDate?: Date
  eventType?: EventType
  status?: EventStatus
}

export type ChatRole = 'user' | 'assistant'

export interface ChatMessage {
  id: string
  sessionId: string
  role: ChatRole
  content: string
  timestamp: Date | null
  toolCalls: Metadata[]
}

export interface ChatSession {
  id: string
  title: string
  createdAt: Date | null
  updatedAt: Date | null
  messageCount: number
}

export interface TranslationRequest {
  pseudocode: string
  targetLanguage: string
  options: Metadata | null
}

export interface TranslationResult {
  requestId: string | null
  translatedCode: string
  language: string
  confidence: number
  metadata: Metadata | null
}

export interface TranslatorConfig {
  defaultLanguage: string
  availableLanguages: string[]
  modelSettings: Metadata | null
}

export interface FileSearchResult {
  path: string
  name: string
  fileType: string
  size: number
  lastModified: Date | null
  score: number
  matchedKeywords: string[]
  content: string | null
  metadata: Metadata
}

export interface DirectoryConfig {
  path: string
  includeSubdirectories: boolean
  /** Empty means every file type. */
  fileExtensions: string[]
  isWatched: boolean
  lastIndexed: Date | null
  indexedFileCount: number | null
}

export interface SearchStatistics {
  totalFiles: number
  indexedFiles: number
  indexedDirectories: number
  lastIndexTime: Date | null
  fileTypeDistribution: Record<string, number>
}

export interface SearchParams {
  query: string
  fileTypes?: string[]
  directories?: string[]
  maxResults?: number
}

export interface ServiceStatus {
  name: string
  status: string
  detail: string | null
}

export interface MetricsSummary {
  lineCount: number
  /** First few non-comment lines of the exposition text. */
  sample: string[]
}
