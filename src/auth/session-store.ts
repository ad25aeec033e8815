import { nanoid } from 'nanoid'
import type { Session } from './types/request-context.ts'

export const SESSION_COOKIE_NAME = 'apple_auth_session'
/** Long enough to cover a trip through Apple's consent screen */
export const SESSION_TTL_MS = 10 * 60 * 1000

interface StoredSession {
  data: Map<string, string>
  expiresAt: number
}

/** A session opened for one request; written back by commit(). */
export interface RequestSession extends Session {
  readonly id: string | undefined
  /**
   * Persist changes. Returns the session id the cookie should carry, or
   * undefined when the session ended up empty and was discarded.
   */
  commit: () => string | undefined
}

export interface SessionStore {
  open: (sessionId: string | undefined) => RequestSession
  size: () => number
}

/**
 * In-memory session store for the handshake values (state, nonce,
 * return_to). Entries expire after the TTL and are pruned on write.
 */
export const createMemorySessionStore = (
  ttlMs: number = SESSION_TTL_MS,
): SessionStore => {
  const sessions = new Map<string, StoredSession>()

  const pruneExpired = (): void => {
    const now = Date.now()
    for (const [key, value] of sessions.entries()) {
      if (value.expiresAt < now) {
        sessions.delete(key)
      }
    }
  }

  const open = (sessionId: string | undefined): RequestSession => {
    const stored = sessionId ? sessions.get(sessionId) : undefined
    const isLive = stored !== undefined && stored.expiresAt >= Date.now()
    const data = new Map<string, string>(isLive ? stored.data : undefined)
    let id = isLive ? sessionId : undefined
    let dirty = false

    return {
      get id() {
        return id
      },
      get: (key) => data.get(key),
      set: (key, value) => {
        data.set(key, value)
        dirty = true
      },
      delete: (key) => {
        const value = data.get(key)
        if (data.delete(key)) {
          dirty = true
        }
        return value
      },
      commit: () => {
        if (!dirty) {
          return id
        }
        pruneExpired()
        if (data.size === 0) {
          if (id) sessions.delete(id)
          id = undefined
          return undefined
        }
        id ??= nanoid(32)
        sessions.set(id, {
          data: new Map(data),
          expiresAt: Date.now() + ttlMs,
        })
        dirty = false
        return id
      },
    }
  }

  return { open, size: () => sessions.size }
}
