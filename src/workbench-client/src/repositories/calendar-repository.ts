import type { CalendarApi, CalendarEventDto, CalendarListQuery } from '@/api/calendar'
import { validationFailure, type Result } from '@/domain/failure'
import type { CalendarEvent, CalendarEventInput, CalendarQuery, EventStatus } from '@/domain/types'
import { normalizeList } from '@/lib/list'
import { calendarEventMapper } from '@/mappers/calendar-mapper'
import { toDateOnly } from '@/mappers/mapper'
import { attempt, CrudRepository, isBlank, rejected } from './repository'

export function newCalendarEvent(input: CalendarEventInput): CalendarEvent {
  return {
    id: '',
    title: input.title.trim(),
    description: input.description ?? '',
    eventType: input.eventType ?? 'event',
    status: input.status ?? 'scheduled',
    eventDate: input.eventDate,
    startTime: input.startTime ?? null,
    endTime: input.endTime ?? null,
    allDay: input.allDay ?? false,
    location: input.location ?? null,
    participants: normalizeList(input.participants ?? []),
    projectId: input.projectId ?? null,
    chatSessionId: input.chatSessionId ?? null,
    recurrencePattern: input.recurrencePattern ?? null,
    recurrenceRule: input.recurrenceRule ?? null,
    reminderMinutesBefore: input.reminderMinutesBefore ?? null,
    reminderSent: input.reminderSent ?? false,
    tags: normalizeList(input.tags ?? []),
    notes: input.notes ?? null,
    color: input.color ?? null,
    metadata: input.metadata ?? null,
    createdAt: null,
    updatedAt: null,
    completedAt: null,
  }
}

function toListQuery(query: CalendarQuery): CalendarListQuery {
  return {
    startDate: query.startDate ? toDateOnly(query.startDate) : undefined,
    endDate: query.endDate ? toDateOnly(query.endDate) : undefined,
    eventType: query.eventType,
    status: query.status,
  }
}

function validateEvent(event: Pick<CalendarEvent, 'title' | 'startTime' | 'endTime'>) {
  if (isBlank(event.title)) return validationFailure('Event title must not be empty')
  if (event.startTime && event.endTime && event.endTime.getTime() < event.startTime.getTime()) {
    return validationFailure('Event end time must not be before its start time')
  }
  return null
}

export class CalendarRepository extends CrudRepository<CalendarEventDto, CalendarEvent, CalendarListQuery> {
  constructor(api: CalendarApi) {
    super(api, calendarEventMapper, 'Event')
  }

  listEvents(query: CalendarQuery = {}): Promise<Result<CalendarEvent[]>> {
    return this.list(toListQuery(query))
  }

  listEventsByDate(date: Date): Promise<Result<CalendarEvent[]>> {
    return this.list(toListQuery({ startDate: date, endDate: date }))
  }

  listEventsByDateRange(startDate: Date, endDate: Date): Promise<Result<CalendarEvent[]>> {
    if (toDateOnly(startDate) > toDateOnly(endDate)) {
      return rejected(validationFailure('Start date must not be after end date'))
    }
    return this.list(toListQuery({ startDate, endDate }))
  }

  getEvent(id: string): Promise<Result<CalendarEvent>> {
    return this.get(id)
  }

  createEvent(input: CalendarEventInput): Promise<Result<CalendarEvent>> {
    const event = newCalendarEvent(input)
    const invalid = validateEvent(event)
    if (invalid) return rejected(invalid)
    return this.create(event)
  }

  updateEvent(event: CalendarEvent): Promise<Result<CalendarEvent>> {
    const invalid = validateEvent(event)
    if (invalid) return rejected(invalid)
    return this.update(event)
  }

  deleteEvent(id: string): Promise<Result<void>> {
    return this.remove(id)
  }

  /** The backend has no text search; matching on title and description happens here. */
  searchEvents(query: string): Promise<Result<CalendarEvent[]>> {
    const needle = query.trim().toLowerCase()
    if (needle === '') return rejected(validationFailure('Search query cannot be empty'))
    return attempt(async () => {
      const events = (await this.source.list({})).map((dto) => this.mapper.toEntity(dto))
      return events.filter(
        (event) => event.title.toLowerCase().includes(needle) || event.description.toLowerCase().includes(needle),
      )
    })
  }

  filterByType(eventType: string): Promise<Result<CalendarEvent[]>> {
    if (isBlank(eventType)) return rejected(validationFailure('Event type must not be empty'))
    return this.list(toListQuery({ eventType: eventType.trim() }))
  }

  filterByStatus(status: EventStatus): Promise<Result<CalendarEvent[]>> {
    return this.list(toListQuery({ status }))
  }
}
