/**
 * Authenticator
 *
 * One pass per login attempt or password re-check: lookup, active check,
 * lockout check, constant-time digest comparison, then counter update. Failures are
 * returned as typed results; unknown users and wrong passwords produce
 * the same result and take the same hashing work.
 */

import { randomUUID } from 'node:crypto';
import type { AuthResult, Clock, Identity, Logger, UserRecord } from '@keyward/ipc';
import { noopLogger, systemClock } from '@keyward/ipc';
import type { Storage } from '@keyward/storage';
import { generateSalt, hashPassword, lockRemainingMs, verifyPassword } from '@keyward/storage';

export function toIdentity(user: Pick<UserRecord, 'username' | 'role' | 'displayName'>): Identity {
  return {
    username: user.username,
    role: user.role,
    displayName: user.displayName ?? user.username,
  };
}

/** What a credential check is for; only logins stamp last_login_at */
type AttemptPurpose = 'login' | 'password_change';

export class Authenticator {
  private readonly dummySalt = generateSalt();
  private readonly dummyHash: string;

  constructor(
    private readonly storage: Storage,
    private readonly clock: Clock = systemClock,
    private readonly logger: Logger = noopLogger,
  ) {
    this.dummyHash = hashPassword(randomUUID(), this.dummySalt);
  }

  authenticate(username: string, password: string): AuthResult {
    return this.attempt(username, password, 'login');
  }

  /**
   * Check the current password of a signed-in user before a password change.
   * Shares the failure counter and lockout with login. A match resets the
   * counter but is not recorded as a login.
   */
  verifyCurrentPassword(username: string, password: string): AuthResult {
    return this.attempt(username, password, 'password_change');
  }

  private attempt(username: string, password: string, purpose: AttemptPurpose): AuthResult {
    const label = purpose === 'login' ? 'Login' : 'Password check';
    const context = purpose === 'login' ? {} : { purpose };

    const user = this.storage.users.find(username);
    if (!user) {
      verifyPassword(password, this.dummySalt, this.dummyHash);
      this.storage.audit.record({ event: 'login_failed', subject: username, meta: { reason: 'unknown_user', ...context } });
      this.logger.info(`[auth] ${label} failed for '${username}'`);
      return { success: false, code: 'INVALID_CREDENTIALS' };
    }

    if (!user.active) {
      this.storage.audit.record({ event: 'login_disabled', subject: username, meta: purpose === 'login' ? undefined : context });
      this.logger.info(`[auth] ${label} refused for disabled account '${username}'`);
      return { success: false, code: 'ACCOUNT_DISABLED' };
    }

    const remainingMs = lockRemainingMs(user, this.clock.now());
    if (remainingMs > 0) {
      this.storage.audit.record({ event: 'login_locked', subject: username, meta: { remainingMs, ...context } });
      this.logger.info(`[auth] ${label} refused for locked account '${username}'`);
      return { success: false, code: 'ACCOUNT_LOCKED', remainingMs };
    }

    const credentials = this.storage.users.getCredentials(username);
    if (!credentials || !verifyPassword(password, credentials.salt, credentials.passwordHash)) {
      const { failedAttempts, lockedUntil } = this.storage.users.recordFailedAttempt(username);
      this.storage.audit.record({ event: 'login_failed', subject: username, meta: { failedAttempts, ...context } });
      if (lockedUntil) {
        this.storage.audit.record({ event: 'account_locked', subject: username, meta: { lockedUntil, ...context } });
        this.logger.warn(`[auth] Account '${username}' locked until ${lockedUntil} after ${failedAttempts} failed attempts`);
      } else {
        this.logger.info(`[auth] ${label} failed for '${username}' (${failedAttempts} consecutive)`);
      }
      return { success: false, code: 'INVALID_CREDENTIALS' };
    }

    if (purpose === 'login') {
      this.storage.users.recordSuccess(username);
      this.storage.audit.record({ event: 'login_ok', actor: username, subject: username });
      this.logger.info(`[auth] Login succeeded for '${username}'`);
    } else if (user.failedAttempts > 0) {
      this.storage.users.unlock(username);
    }
    return { success: true, identity: toIdentity(user) };
  }
}
