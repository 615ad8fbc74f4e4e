// src/main/core/session/session-manager.ts
import { createLogger } from '../../utils/logger'
import { ChatSession, type ChatSessionOptions } from './chat-session'

const logger = createLogger('SessionManager')

export type NewSessionOptions = Omit<ChatSessionOptions, 'id' | 'onClosed'>

/**
 * Registry of live chat sessions. Closed sessions drop out on their own.
 */
export class SessionManager {
  private sessions = new Map<number, ChatSession>()
  private nextId = 1

  create(options: NewSessionOptions): ChatSession {
    const session = new ChatSession({
      ...options,
      id: this.nextId++,
      onClosed: closed => this.forget(closed),
    })
    this.sessions.set(session.id, session)
    logger.info(`Opened session ${session.id} (${this.sessions.size} live)`)
    return session
  }

  get(id: number): ChatSession | undefined {
    return this.sessions.get(id)
  }

  getAll(): ChatSession[] {
    return Array.from(this.sessions.values())
  }

  get size(): number {
    return this.sessions.size
  }

  closeAll() {
    for (const session of this.getAll()) {
      session.close()
    }
  }

  private forget(session: ChatSession) {
    this.sessions.delete(session.id)
    logger.debug(`Session ${session.id} removed (${this.sessions.size} live)`)
  }
}
