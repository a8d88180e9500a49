import { describe, it, expect } from 'vitest'
import { createCalendarApi } from '@/api/calendar'
import { createChatApi } from '@/api/chat'
import { createHealthApi } from '@/api/health'
import { createProjectsApi } from '@/api/projects'
import { createTranslatorApi } from '@/api/translator'
import { CalendarRepository } from '@/repositories/calendar-repository'
import { ChatRepository } from '@/repositories/chat-repository'
import { HealthRepository } from '@/repositories/health-repository'
import { ProjectsRepository } from '@/repositories/projects-repository'
import { TranslatorRepository } from '@/repositories/translator-repository'
import { calledUrl, hangingFetch, jsonResponse, mockFetch, testClient, textResponse } from '@/test-utils'

describe('ChatRepository', () => {
  it('reports a timeout as a network failure', async () => {
    const chat = new ChatRepository(createChatApi(testClient(hangingFetch(), { timeoutMs: 20 })))

    const result = await chat.sendMessage('Summarise my notes', 's-1')

    expect(result).toEqual({
      ok: false,
      failure: { kind: 'network', message: 'Unable to send message', statusCode: null, reason: 'timeout' },
    })
  })

  it('validates message and session id', async () => {
    const fetchMock = mockFetch()
    const chat = new ChatRepository(createChatApi(testClient(fetchMock)))

    const results = await Promise.all([chat.sendMessage(' '), chat.getChatHistory(''), chat.clearSession('')])

    expect(results.map((r) => (r.ok ? null : r.failure.kind))).toEqual(['validation', 'validation', 'validation'])
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('maps history into messages', async () => {
    const fetchMock = mockFetch(jsonResponse([{ id: 'm-1', role: 'user', message: 'hi', created_at: '2025-01-01T10:00:00Z' }]))
    const chat = new ChatRepository(createChatApi(testClient(fetchMock)))

    await expect(chat.getChatHistory('s-1')).resolves.toEqual({
      ok: true,
      value: [
        {
          id: 'm-1',
          sessionId: 's-1',
          role: 'user',
          content: 'hi',
          timestamp: new Date('2025-01-01T10:00:00Z'),
          toolCalls: [],
        },
      ],
    })
  })
})

describe('CalendarRepository', () => {
  const event = (id: string, title: string, description = '') => ({
    id,
    title,
    description,
    event_type: 'task',
    status: 'scheduled',
    event_date: '2025-01-15',
  })

  it('rejects a range whose start follows its end', async () => {
    const fetchMock = mockFetch()
    const calendar = new CalendarRepository(createCalendarApi(testClient(fetchMock)))

    const result = await calendar.listEventsByDateRange(new Date(2025, 0, 20), new Date(2025, 0, 10))

    expect(result.ok ? null : result.failure.message).toBe('Start date must not be after end date')
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('queries a single day as a one-day window', async () => {
    const fetchMock = mockFetch(jsonResponse([]))
    const calendar = new CalendarRepository(createCalendarApi(testClient(fetchMock)))

    await calendar.listEventsByDate(new Date(2025, 0, 15, 18, 30))

    expect(calledUrl(fetchMock)).toBe('http://api.test/api/v1/calendar?start_date=2025-01-15&end_date=2025-01-15')
  })

  it('searches title and description without regard to case', async () => {
    const fetchMock = mockFetch(
      jsonResponse([event('e-1', 'Dentist'), event('e-2', 'Standup', 'daily SYNC'), event('e-3', 'Lunch')]),
    )
    const calendar = new CalendarRepository(createCalendarApi(testClient(fetchMock)))

    const result = await calendar.searchEvents('sync')

    expect(result.ok && result.value.map((e) => e.id)).toEqual(['e-2'])
  })

  it('filters by type through the query string', async () => {
    const fetchMock = mockFetch(jsonResponse([]))
    const calendar = new CalendarRepository(createCalendarApi(testClient(fetchMock)))

    await calendar.filterByType('meeting')

    expect(calledUrl(fetchMock)).toBe('http://api.test/api/v1/calendar?event_type=meeting')
  })

  it('refuses an event that ends before it starts', async () => {
    const calendar = new CalendarRepository(createCalendarApi(testClient(mockFetch())))

    const result = await calendar.createEvent({
      title: 'Backwards',
      eventDate: new Date(2025, 0, 15),
      startTime: new Date('2025-01-15T11:00:00Z'),
      endTime: new Date('2025-01-15T10:00:00Z'),
    })

    expect(result.ok ? null : result.failure.kind).toBe('validation')
  })
})

describe('ProjectsRepository', () => {
  it('rejects a nameless project', async () => {
    const projects = new ProjectsRepository(createProjectsApi(testClient(mockFetch())))

    const result = await projects.createProject({ name: '' })

    expect(result.ok ? null : result.failure.message).toBe('Project name must not be empty')
  })

  it('maps a permission error', async () => {
    const projects = new ProjectsRepository(createProjectsApi(testClient(mockFetch(jsonResponse({ detail: 'Forbidden' }, 403)))))

    const result = await projects.getChildProjects('p-1')

    expect(result.ok ? null : result.failure).toEqual({ kind: 'permission', message: 'Forbidden', statusCode: 403 })
  })
})

describe('TranslatorRepository', () => {
  it('validates before translating', async () => {
    const fetchMock = mockFetch()
    const translator = new TranslatorRepository(createTranslatorApi(testClient(fetchMock)))

    const empty = await translator.translate({ pseudocode: '', targetLanguage: 'python', options: null })
    const noLanguage = await translator.translate({ pseudocode: 'x', targetLanguage: ' ', options: null })

    expect(empty.ok ? null : empty.failure.message).toBe('Pseudocode must not be empty')
    expect(noLanguage.ok ? null : noLanguage.failure.message).toBe('Target language must not be empty')
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('reports an unparseable translation as a parsing failure', async () => {
    const translator = new TranslatorRepository(createTranslatorApi(testClient(mockFetch(jsonResponse({ language: 'go' })))))

    const result = await translator.translate({ pseudocode: 'x', targetLanguage: 'go', options: null })

    expect(result.ok ? null : result.failure).toEqual({
      kind: 'parsing',
      message: 'Failed to parse Translation response',
      statusCode: null,
    })
  })
})

describe('HealthRepository', () => {
  it('prefers the extended report and keeps metrics best-effort', async () => {
    const fetchMock = mockFetch(
      jsonResponse({ status: 'ok', version: '1.0', database: { status: 'ok' } }),
      textResponse('Not Found', 404),
    )
    const health = new HealthRepository(createHealthApi(testClient(fetchMock)))

    const result = await health.getHealthOverview()

    expect(result).toEqual({
      ok: true,
      value: {
        backendOk: true,
        version: '1.0',
        services: { available: true, value: [{ name: 'Database', status: 'ok', detail: null }] },
        metrics: {
          available: false,
          failure: { kind: 'notFound', message: 'Metrics unavailable', statusCode: 404 },
        },
      },
    })
  })

  it('falls back to /health when the extended probe is missing', async () => {
    const fetchMock = mockFetch(textResponse('Not Found', 404), textResponse('up 1'), textResponse('OK'))
    const health = new HealthRepository(createHealthApi(testClient(fetchMock)))

    const result = await health.getHealthOverview()

    expect(calledUrl(fetchMock, 2)).toBe('http://api.test/health')
    expect(result).toEqual({
      ok: true,
      value: {
        backendOk: true,
        version: null,
        services: {
          available: false,
          failure: { kind: 'notFound', message: 'Extended health check failed', statusCode: 404 },
        },
        metrics: { available: true, value: { lineCount: 1, sample: ['up 1'] } },
      },
    })
  })
})
