/**
 * Session manager
 *
 * In-memory sessions keyed by a server-issued token. Sessions are cleared on
 * daemon restart. Idle expiry is evaluated lazily, when a token is presented
 * or a new session is created; there is no background sweep.
 */

import * as crypto from 'node:crypto';
import type { Clock, Identity, Session } from '@keyward/ipc';
import { DEFAULT_AUTH_CONFIG, systemClock } from '@keyward/ipc';

export class SessionManager {
  private sessions: Map<string, Session> = new Map();

  constructor(
    private readonly sessionTimeoutMs: number = DEFAULT_AUTH_CONFIG.sessionTimeoutMs,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Generate a secure random token
   */
  private generateToken(): string {
    // 32 bytes = 256 bits of entropy, base64url encoded
    return crypto.randomBytes(32).toString('base64url');
  }

  /**
   * Create a session for an authenticated identity. Sessions already idle
   * past the timeout are dropped first, so abandoned tokens do not pile up.
   */
  createSession(identity: Identity): Session {
    this.dropExpired();
    const now = this.clock.now().getTime();
    const session: Session = {
      token: this.generateToken(),
      username: identity.username,
      role: identity.role,
      displayName: identity.displayName,
      createdAt: now,
      lastActivityAt: now,
    };

    this.sessions.set(session.token, session);
    return session;
  }

  /**
   * True when the session has been idle longer than the timeout.
   */
  isExpired(session: Session, now: Date = this.clock.now()): boolean {
    return now.getTime() - session.lastActivityAt > this.sessionTimeoutMs;
  }

  /**
   * Look up a session token. Expired sessions are destroyed and reported
   * as absent; they are never refreshed.
   */
  validateSession(token: string): Session | undefined {
    const session = this.sessions.get(token);
    if (!session) return undefined;

    if (this.isExpired(session)) {
      this.sessions.delete(token);
      return undefined;
    }

    return session;
  }

  private dropExpired(): void {
    const now = this.clock.now();
    for (const [token, session] of this.sessions.entries()) {
      if (this.isExpired(session, now)) this.sessions.delete(token);
    }
  }

  /**
   * Record activity on a session
   */
  touch(session: Session): void {
    session.lastActivityAt = this.clock.now().getTime();
  }

  /**
   * Destroy a session. Returns false when the token was unknown.
   */
  logout(token: string): boolean {
    return this.sessions.delete(token);
  }

  /**
   * Destroy every session of a user, optionally keeping one token.
   * Returns the number of sessions removed.
   */
  revokeUser(username: string, exceptToken?: string): number {
    let removed = 0;
    for (const [token, session] of this.sessions.entries()) {
      if (session.username === username && token !== exceptToken) {
        this.sessions.delete(token);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Clear all sessions
   */
  clearAllSessions(): void {
    this.sessions.clear();
  }

  /**
   * Get session count, including sessions not yet found to be expired
   */
  getSessionCount(): number {
    return this.sessions.size;
  }
}
