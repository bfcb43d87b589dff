import { rm } from 'node:fs/promises'
import path from 'node:path'
import { nanoid } from 'nanoid'
import { createS3Agent, type AgentResponse, type StorageAgent } from './agents'
import { type AppConfig, applySettings, type SessionSettings } from './config'
import type { Logger } from './logger'

export type AgentFactory = (config: AppConfig) => StorageAgent

export interface Session {
  id: string
  config: AppConfig
  agent: StorageAgent
  busy: boolean
  createdAt: Date
  lastActiveAt: Date
}

export class SessionBusyError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} is still answering the previous message`)
    this.name = 'SessionBusyError'
  }
}

export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} does not exist`)
    this.name = 'SessionNotFoundError'
  }
}

export class SessionLimitError extends Error {
  constructor(readonly limit: number) {
    super(`All ${limit} sessions are busy, try again shortly`)
    this.name = 'SessionLimitError'
  }
}

/**
 * Owns one agent per session. Each session gets its own config copy, storage
 * client, transcript and upload directory; nothing mutable is shared between
 * sessions. Idle sessions expire after `server.sessionIdleTtlMs`, and at
 * `server.maxSessions` the least recently used idle session makes room.
 */
export class SessionManager {
  private readonly sessions = new Map<string, Session>()

  constructor(
    private readonly baseConfig: AppConfig,
    private readonly logger: Logger,
    private readonly agentFactory: AgentFactory = createS3Agent
  ) {}

  async create(settings: SessionSettings = {}): Promise<Session> {
    const config = applySettings(this.baseConfig, settings)
    await this.sweep()
    while (this.sessions.size >= this.baseConfig.server.maxSessions) {
      const oldest = this.leastRecentlyUsedIdleSession()
      if (!oldest) {
        throw new SessionLimitError(this.baseConfig.server.maxSessions)
      }
      await this.discard(oldest, 'evicted at the session limit')
    }

    const now = new Date()
    const session: Session = {
      id: nanoid(),
      config,
      agent: this.agentFactory(config),
      busy: false,
      createdAt: now,
      lastActiveAt: now,
    }
    this.sessions.set(session.id, session)
    this.logger.info(`[SessionManager] Created session ${session.id}`)
    return session
  }

  get(id: string): Session {
    const session = this.sessions.get(id)
    if (!session) {
      throw new SessionNotFoundError(id)
    }
    return session
  }

  /** Where a session's attachments are written; removed with the session. */
  uploadDirFor(id: string): string {
    return path.join(this.baseConfig.server.uploadDir, id)
  }

  /**
   * Reserves the session for `turn`. A second turn while the first is running
   * is rejected before it can touch anything.
   */
  async runTurn<T>(id: string, turn: (session: Session) => Promise<T>): Promise<T> {
    const session = this.get(id)
    if (session.busy) {
      throw new SessionBusyError(id)
    }
    session.busy = true
    session.lastActiveAt = new Date()
    try {
      return await turn(session)
    } finally {
      session.busy = false
      session.lastActiveAt = new Date()
    }
  }

  async generate(id: string, utterance: string): Promise<AgentResponse> {
    return this.runTurn(id, (session) => session.agent.generate(utterance))
  }

  /**
   * Rebuilds the session's agent with the overrides applied. Credentials are
   * fixed for an agent's lifetime, so the transcript starts over.
   */
  updateSettings(id: string, settings: SessionSettings): Session {
    const session = this.get(id)
    if (session.busy) {
      throw new SessionBusyError(id)
    }
    const config = applySettings(this.baseConfig, settings)
    session.config = config
    session.agent = this.agentFactory(config)
    session.lastActiveAt = new Date()
    this.logger.info(`[SessionManager] Rebuilt agent for session ${id}`)
    return session
  }

  async delete(id: string): Promise<void> {
    const session = this.get(id)
    if (session.busy) {
      throw new SessionBusyError(id)
    }
    await this.discard(session, 'deleted')
  }

  /** Discards every idle session past its TTL. Returns how many went. */
  async sweep(now: number = Date.now()): Promise<number> {
    const expired = [...this.sessions.values()].filter(
      (session) =>
        !session.busy &&
        now - session.lastActiveAt.getTime() >=
          this.baseConfig.server.sessionIdleTtlMs
    )
    for (const session of expired) {
      await this.discard(session, 'expired')
    }
    return expired.length
  }

  get size(): number {
    return this.sessions.size
  }

  private leastRecentlyUsedIdleSession(): Session | undefined {
    let oldest: Session | undefined
    for (const session of this.sessions.values()) {
      if (
        !session.busy &&
        (!oldest ||
          session.lastActiveAt.getTime() < oldest.lastActiveAt.getTime())
      ) {
        oldest = session
      }
    }
    return oldest
  }

  private async discard(session: Session, reason: string): Promise<void> {
    this.sessions.delete(session.id)
    await rm(this.uploadDirFor(session.id), { recursive: true, force: true })
    this.logger.info(`[SessionManager] Session ${session.id} ${reason}`)
  }
}
