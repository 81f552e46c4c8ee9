/**
 * User schemas: Re-exports from IPC + storage-specific types
 */

import { CreateUserSchema, PasswordSchema, RoleSchema, UsernameSchema } from '@keyward/ipc';
import type { CreateUserInput, CreateUserData } from '@keyward/ipc';

/**
 * Lockout parameters applied by recordFailedAttempt
 */
export interface LockoutPolicy {
  maxFailedAttempts: number;
  lockoutDurationMs: number;
}

export interface FailedAttemptResult {
  failedAttempts: number;
  /** Set when this attempt reached the threshold */
  lockedUntil?: string;
}

// Re-export schemas/inputs for convenience
export { CreateUserSchema, PasswordSchema, RoleSchema, UsernameSchema };
export type { CreateUserInput, CreateUserData };
