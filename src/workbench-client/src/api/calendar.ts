import { z } from 'zod'
import type { ApiClient } from './client'
import { dateOnly, decode, flag, metadata, optionalId, optionalText, stringList, timestamp, wireId, wireList, wireObject } from './decode'
import { endpoints } from './endpoints'

export const eventStatusSchema = z.enum(['scheduled', 'in_progress', 'completed', 'cancelled'])

export const calendarEventSchema = wireObject({
  id: wireId,
  title: z.string(),
  description: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  eventType: z
    .string()
    .nullish()
    .transform((value) => value || 'event'),
  status: eventStatusSchema.nullish().transform((value) => value ?? 'scheduled'),
  eventDate: dateOnly,
  startTime: timestamp,
  endTime: timestamp,
  allDay: flag,
  location: optionalText,
  participants: stringList,
  projectId: optionalId,
  chatSessionId: optionalId,
  recurrencePattern: optionalText,
  recurrenceRule: optionalText,
  reminderMinutesBefore: z
    .number()
    .int()
    .nonnegative()
    .nullish()
    .transform((value) => value ?? null),
  reminderSent: flag,
  tags: stringList,
  notes: optionalText,
  color: optionalText,
  metadata,
  createdAt: timestamp,
  updatedAt: timestamp,
  completedAt: timestamp,
})

export type CalendarEventDto = z.output<typeof calendarEventSchema>

export interface CalendarListQuery {
  /** `yyyy-MM-dd` */
  startDate?: string
  /** `yyyy-MM-dd` */
  endDate?: string
  eventType?: string
  status?: string
}

function toRequestBody(dto: CalendarEventDto) {
  return {
    title: dto.title,
    description: dto.description,
    event_type: dto.eventType,
    status: dto.status,
    event_date: dto.eventDate,
    start_time: dto.startTime,
    end_time: dto.endTime,
    all_day: dto.allDay,
    location: dto.location,
    participants: dto.participants,
    project_id: dto.projectId,
    chat_session_id: dto.chatSessionId,
    recurrence_pattern: dto.recurrencePattern,
    recurrence_rule: dto.recurrenceRule,
    reminder_minutes_before: dto.reminderMinutesBefore,
    tags: dto.tags,
    notes: dto.notes,
    color: dto.color,
    metadata: dto.metadata,
  }
}

export function createCalendarApi(http: ApiClient) {
  const listSchema = wireList(calendarEventSchema)

  async function getEvent(id: string): Promise<CalendarEventDto> {
    const raw = await http.get(endpoints.calendarEvent(id), { fallback: 'Unable to load event' })
    return decode(calendarEventSchema, raw, 'Calendar event')
  }

  return {
    async list(query: CalendarListQuery = {}): Promise<CalendarEventDto[]> {
      const raw = await http.get(endpoints.calendar, {
        fallback: 'Unable to load events',
        query: {
          start_date: query.startDate,
          end_date: query.endDate,
          event_type: query.eventType,
          status: query.status,
        },
      })
      return decode(listSchema, raw, 'Calendar events')
    },

    get: getEvent,

    async create(dto: CalendarEventDto): Promise<CalendarEventDto> {
      const raw = await http.post(endpoints.calendar, toRequestBody(dto), { fallback: 'Unable to create event' })
      return decode(calendarEventSchema, raw, 'Create event')
    },

    async update(dto: CalendarEventDto): Promise<CalendarEventDto> {
      const raw = await http.put(endpoints.calendarEvent(dto.id), toRequestBody(dto), {
        fallback: 'Unable to update event',
      })
      if (raw === undefined) return getEvent(dto.id)
      return decode(calendarEventSchema, raw, 'Update event')
    },

    async remove(id: string): Promise<void> {
      await http.del(endpoints.calendarEvent(id), { fallback: 'Unable to delete event' })
    },
  }
}

export type CalendarApi = ReturnType<typeof createCalendarApi>
