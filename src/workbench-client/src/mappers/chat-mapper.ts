import type { ChatMessageDto, ChatSessionDto } from '@/api/chat'
import type { ChatMessage, ChatSession } from '@/domain/types'
import { notBefore, toDate, toIso, type Mapper } from './mapper'

export const chatMessageMapper: Mapper<ChatMessageDto, ChatMessage> = {
  toEntity(dto) {
    return {
      id: dto.id,
      sessionId: dto.sessionId,
      role: dto.role,
      content: dto.message,
      timestamp: toDate(dto.createdAt),
      toolCalls: dto.toolCalls.map((call) => ({ ...call })),
    }
  },

  fromEntity(message) {
    return {
      id: message.id,
      sessionId: message.sessionId,
      role: message.role,
      message: message.content,
      toolCalls: message.toolCalls.map((call) => ({ ...call })),
      createdAt: toIso(message.timestamp),
    }
  },
}

export const chatSessionMapper: Mapper<ChatSessionDto, ChatSession> = {
  toEntity(dto) {
    const createdAt = toDate(dto.createdAt)
    return {
      id: dto.id,
      title: dto.title,
      createdAt,
      updatedAt: notBefore(toDate(dto.updatedAt), createdAt),
      messageCount: dto.messageCount,
    }
  },

  fromEntity(session) {
    return {
      id: session.id,
      title: session.title,
      createdAt: toIso(session.createdAt),
      updatedAt: toIso(session.updatedAt),
      messageCount: session.messageCount,
    }
  },
}
