/**
 * Server-side sessions.
 *
 * A session only answers "which user is this"; it carries no scopes. The id
 * travels in a signed cookie (see server.ts), so a forged or altered cookie
 * never reaches `validate`.
 */

import type { Db } from '../db.js';
import { AuthError } from '../errors.js';
import { randomToken } from '../utils.js';

export interface Session {
  id: string;
  user_id: string;
  /** Unix ms */
  created_at: number;
  /** Unix ms */
  expires_at: number;
}

export interface SessionStore {
  /**
   * Issue a new session for `userId`. A session the caller already held is
   * destroyed first so a pre-login id can never become authenticated.
   */
  establish(userId: string, previousSessionId?: string): Session;
  /** Returns the owning user id; throws `NoSession` or `SessionExpired`. */
  validate(sessionId: string | undefined): string;
  /** No-op when the session does not exist. */
  destroy(sessionId: string | undefined): void;
  /** Remove expired sessions; returns how many were removed. */
  purgeExpired(): number;
}

export interface SessionStoreOptions {
  ttlMs: number;
  now?: () => number;
}

function newSession(userId: string, ttlMs: number, now: number): Session {
  return {
    id: randomToken(32),
    user_id: userId,
    created_at: now,
    expires_at: now + ttlMs,
  };
}

// ─── SQLite ──────────────────────────────────────────────

export class SqliteSessionStore implements SessionStore {
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(private readonly db: Db, options: SessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  establish(userId: string, previousSessionId?: string): Session {
    const session = newSession(userId, this.ttlMs, this.now());
    const swap = this.db.transaction(() => {
      if (previousSessionId) {
        this.db.prepare('DELETE FROM sessions WHERE id = ?').run(previousSessionId);
      }
      this.db.prepare(`
        INSERT INTO sessions (id, user_id, created_at, expires_at) VALUES (?, ?, ?, ?)
      `).run(session.id, session.user_id, session.created_at, session.expires_at);
    });
    swap();
    return session;
  }

  validate(sessionId: string | undefined): string {
    if (!sessionId) throw new AuthError('NoSession', 'No session');
    const row = this.db.prepare('SELECT * FROM sessions WHERE id = ?').get(sessionId) as Session | undefined;
    if (!row) throw new AuthError('NoSession', 'Session not found');
    if (row.expires_at <= this.now()) {
      this.destroy(sessionId);
      throw new AuthError('SessionExpired', 'Session expired');
    }
    return row.user_id;
  }

  destroy(sessionId: string | undefined): void {
    if (!sessionId) return;
    this.db.prepare('DELETE FROM sessions WHERE id = ?').run(sessionId);
  }

  purgeExpired(): number {
    return this.db.prepare('DELETE FROM sessions WHERE expires_at <= ?').run(this.now()).changes;
  }
}

// ─── In-memory ───────────────────────────────────────────

/** Process-local store; sessions vanish on restart. */
export class MemorySessionStore implements SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: SessionStoreOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  establish(userId: string, previousSessionId?: string): Session {
    if (previousSessionId) this.sessions.delete(previousSessionId);
    const session = newSession(userId, this.ttlMs, this.now());
    this.sessions.set(session.id, session);
    return session;
  }

  validate(sessionId: string | undefined): string {
    if (!sessionId) throw new AuthError('NoSession', 'No session');
    const session = this.sessions.get(sessionId);
    if (!session) throw new AuthError('NoSession', 'Session not found');
    if (session.expires_at <= this.now()) {
      this.sessions.delete(sessionId);
      throw new AuthError('SessionExpired', 'Session expired');
    }
    return session.user_id;
  }

  destroy(sessionId: string | undefined): void {
    if (sessionId) this.sessions.delete(sessionId);
  }

  purgeExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, session] of this.sessions) {
      if (session.expires_at <= now) {
        this.sessions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }
}
