const API = '/api/v1'

export const endpoints = {
  notes: `${API}/notes`,
  note: (id: string) => `${API}/notes/${encodeURIComponent(id)}`,
  projects: `${API}/projects`,
  project: (id: string) => `${API}/projects/${encodeURIComponent(id)}`,
  projectChildren: (id: string) => `${API}/projects/${encodeURIComponent(id)}/children`,
  calendar: `${API}/calendar`,
  calendarEvent: (id: string) => `${API}/calendar/${encodeURIComponent(id)}`,
  chat: `${API}/ai/chat`,
  chatHistory: `${API}/ai/chat/history`,
  chatSession: `${API}/ai/chat/session`,
  chatSessions: `${API}/ai/chat/sessions`,
  translator: `${API}/translator`,
  translatorLanguages: `${API}/translator/languages`,
  translatorConfig: `${API}/translator/config`,
  fileSearch: `${API}/file_search/search`,
  fileInfo: `${API}/file_search/info`,
  fileIndex: `${API}/file_search/index`,
  fileStats: `${API}/file_search/stats`,
  fileDirectories: `${API}/file_search/directories`,
  fileReindex: `${API}/file_search/reindex`,
  health: '/health',
  healthExtended: `${API}/health`,
  metrics: '/metrics',
} as const
