/**
 * User model: Row mappers
 */

import type { UserRecord, UserSummary } from '@keyward/ipc';
import { RoleSchema } from '@keyward/ipc';
import type { DbUserRow } from '../../types';

export interface StoredCredentials {
  salt: string;
  /** Decrypted PBKDF2 digest, hex */
  passwordHash: string;
}

export function mapUser(row: DbUserRow): UserRecord {
  return {
    username: row.username,
    displayName: row.display_name ?? undefined,
    email: row.email ?? undefined,
    role: RoleSchema.parse(row.role),
    active: row.active === 1,
    failedAttempts: row.failed_attempts,
    lockedUntil: row.locked_until ?? undefined,
    createdAt: row.created_at,
    lastLoginAt: row.last_login_at ?? undefined,
  };
}

/**
 * Milliseconds of lockout left at `now`; 0 when the account is not locked.
 */
export function lockRemainingMs(user: Pick<UserRecord, 'lockedUntil'>, now: Date): number {
  if (!user.lockedUntil) return 0;
  const remaining = Date.parse(user.lockedUntil) - now.getTime();
  return remaining > 0 ? remaining : 0;
}

export function toSummary(user: UserRecord, now: Date): UserSummary {
  return { ...user, locked: lockRemainingMs(user, now) > 0 };
}
