import type { CalendarEventDto } from '@/api/calendar'
import type { CalendarEvent } from '@/domain/types'
import { copyRecord, fromDateOnly, notBefore, toDate, toDateOnly, toIso, type Mapper } from './mapper'

export const calendarEventMapper: Mapper<CalendarEventDto, CalendarEvent> = {
  toEntity(dto) {
    const createdAt = toDate(dto.createdAt)
    return {
      id: dto.id,
      title: dto.title,
      description: dto.description,
      eventType: dto.eventType,
      status: dto.status,
      eventDate: fromDateOnly(dto.eventDate),
      startTime: toDate(dto.startTime),
      endTime: toDate(dto.endTime),
      allDay: dto.allDay,
      location: dto.location,
      participants: [...dto.participants],
      projectId: dto.projectId,
      chatSessionId: dto.chatSessionId,
      recurrencePattern: dto.recurrencePattern,
      recurrenceRule: dto.recurrenceRule,
      reminderMinutesBefore: dto.reminderMinutesBefore,
      reminderSent: dto.reminderSent,
      tags: [...dto.tags],
      notes: dto.notes,
      color: dto.color,
      metadata: copyRecord(dto.metadata),
      createdAt,
      updatedAt: notBefore(toDate(dto.updatedAt), createdAt),
      completedAt: toDate(dto.completedAt),
    }
  },

  fromEntity(event) {
    return {
      id: event.id,
      title: event.title,
      description: event.description,
      eventType: event.eventType,
      status: event.status,
      eventDate: toDateOnly(event.eventDate),
      startTime: toIso(event.startTime),
      endTime: toIso(event.endTime),
      allDay: event.allDay,
      location: event.location,
      participants: [...event.participants],
      projectId: event.projectId,
      chatSessionId: event.chatSessionId,
      recurrencePattern: event.recurrencePattern,
      recurrenceRule: event.recurrenceRule,
      reminderMinutesBefore: event.reminderMinutesBefore,
      reminderSent: event.reminderSent,
      tags: [...event.tags],
      notes: event.notes,
      color: event.color,
      metadata: copyRecord(event.metadata),
      createdAt: toIso(event.createdAt),
      updatedAt: toIso(event.updatedAt),
      completedAt: toIso(event.completedAt),
    }
  },
}
