import { randomUUID } from 'node:crypto'
import { z } from 'zod'
import type { ApiClient } from './client'
import { ParsingError } from './errors'
import { decode, optionalId, timestamp, wireId, wireList, wireObject } from './decode'
import { endpoints } from './endpoints'

const toolCalls = z
  .array(z.record(z.unknown()))
  .nullish()
  .transform((value) => value ?? [])

const chatMessageWire = wireObject({
  id: optionalId,
  sessionId: optionalId,
  role: z
    .enum(['user', 'assistant'])
    .nullish()
    .transform((value) => value ?? 'assistant'),
  message: z.string().nullish(),
  content: z.string().nullish(),
  toolCalls,
  createdAt: timestamp,
  timestamp,
})

export interface ChatMessageDto {
  id: string
  sessionId: string
  role: 'user' | 'assistant'
  message: string
  toolCalls: Record<string, unknown>[]
  createdAt: string | null
}

export const chatSessionSchema = wireObject({
  id: wireId,
  title: z
    .string()
    .nullish()
    .transform((value) => value ?? ''),
  createdAt: timestamp,
  updatedAt: timestamp,
  messageCount: z
    .number()
    .int()
    .nonnegative()
    .nullish()
    .transform((value) => value ?? 0),
})

export type ChatSessionDto = z.output<typeof chatSessionSchema>

const createdSessionSchema = wireObject({ sessionId: optionalId })

type ChatMessageWire = z.output<typeof chatMessageWire>

/** Messages without a server id get one: a fresh UUID for replies, a positional id in history. */
function toMessageDto(wire: ChatMessageWire, sessionId: string, fallbackId: string): ChatMessageDto {
  return {
    id: wire.id ?? fallbackId,
    sessionId: wire.sessionId ?? sessionId,
    role: wire.role,
    message: wire.message ?? wire.content ?? '',
    toolCalls: wire.toolCalls,
    createdAt: wire.createdAt ?? wire.timestamp,
  }
}

export function createChatApi(http: ApiClient) {
  return {
    async send(message: string, sessionId?: string): Promise<ChatMessageDto> {
      const body: Record<string, unknown> = { message }
      if (sessionId) body.session_id = sessionId
      const raw = await http.post(endpoints.chat, body, { fallback: 'Unable to send message' })
      const wire = decode(chatMessageWire, raw, 'Chat')
      const resolvedSession = wire.sessionId ?? sessionId
      if (!resolvedSession) throw new ParsingError('Chat response carried no session id')
      return toMessageDto(wire, resolvedSession, randomUUID())
    },

    async history(sessionId: string): Promise<ChatMessageDto[]> {
      const raw = await http.get(endpoints.chatHistory, {
        fallback: 'Unable to load chat history',
        query: { session_id: sessionId },
      })
      const items = decode(wireList(chatMessageWire, 'messages'), raw, 'Chat history')
      return items.map((wire, index) => toMessageDto(wire, sessionId, `${sessionId}-${index}`))
    },

    async clearSession(sessionId: string): Promise<void> {
      await http.del(endpoints.chatSession, {
        fallback: 'Unable to clear session',
        query: { session_id: sessionId },
      })
    },

    async sessions(): Promise<ChatSessionDto[]> {
      const raw = await http.get(endpoints.chatSessions, { fallback: 'Unable to load chat sessions' })
      return decode(wireList(chatSessionSchema, 'sessions'), raw, 'Chat sessions')
    },

    async createSession(title?: string): Promise<string> {
      const trimmed = title?.trim()
      const raw = await http.post(endpoints.chatSession, trimmed ? { title: trimmed } : {}, {
        fallback: 'Unable to create session',
      })
      const { sessionId } = decode(createdSessionSchema, raw, 'Create session')
      if (!sessionId) throw new ParsingError('Invalid session ID in response')
      return sessionId
    },
  }
}

export type ChatApi = ReturnType<typeof createChatApi>
