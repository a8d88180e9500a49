import type { ChatApi } from '@/api/chat'
import { validationFailure, type Result } from '@/domain/failure'
import type { ChatMessage, ChatSession } from '@/domain/types'
import { chatMessageMapper, chatSessionMapper } from '@/mappers/chat-mapper'
import { attempt, isBlank, rejected } from './repository'

export class ChatRepository {
  constructor(private readonly api: ChatApi) {}

  sendMessage(message: string, sessionId?: string): Promise<Result<ChatMessage>> {
    if (isBlank(message)) return rejected(validationFailure('Message must not be empty'))
    return attempt(async () => chatMessageMapper.toEntity(await this.api.send(message.trim(), sessionId?.trim() || undefined)))
  }

  getChatHistory(sessionId: string): Promise<Result<ChatMessage[]>> {
    if (isBlank(sessionId)) return rejected(validationFailure('Session id must not be empty'))
    return attempt(async () => (await this.api.history(sessionId.trim())).map((dto) => chatMessageMapper.toEntity(dto)))
  }

  clearSession(sessionId: string): Promise<Result<void>> {
    if (isBlank(sessionId)) return rejected(validationFailure('Session id must not be empty'))
    return attempt(() => this.api.clearSession(sessionId.trim()))
  }

  getChatSessions(): Promise<Result<ChatSession[]>> {
    return attempt(async () => (await this.api.sessions()).map((dto) => chatSessionMapper.toEntity(dto)))
  }

  /** Resolves to the id of the new session. */
  createSession(title?: string): Promise<Result<string>> {
    return attempt(() => this.api.createSession(title))
  }
}
