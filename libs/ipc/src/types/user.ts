/**
 * User record types
 */

import type { Role } from './auth';

/**
 * A credential-store user, without the password hash or salt
 */
export interface UserRecord {
  username: string;
  displayName?: string;
  email?: string;
  role: Role;
  active: boolean;
  failedAttempts: number;
  /** ISO timestamp; login is refused while it lies in the future */
  lockedUntil?: string;
  createdAt: string;
  lastLoginAt?: string;
}

/**
 * Admin-facing view of a user, with the lock state resolved against the clock
 */
export interface UserSummary extends UserRecord {
  locked: boolean;
}

export interface CreateUserRequest {
  username: string;
  password: string;
  role?: Role;
  displayName?: string;
  email?: string;
}

export interface SetRoleRequest {
  role: Role;
}

export interface SetPasswordRequest {
  password: string;
}

export interface SetActiveRequest {
  active: boolean;
}
