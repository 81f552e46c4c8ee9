/**
 * Daemon error types
 */

import type { Capability } from '@keyward/ipc';

export class PermissionDeniedError extends Error {
  public readonly code = 'PERMISSION_DENIED';

  constructor(public readonly capability: Capability, public readonly username?: string) {
    super(username ? `User '${username}' lacks the '${capability}' capability` : 'Authentication required');
    this.name = 'PermissionDeniedError';
  }
}

export class AccountLockedError extends Error {
  public readonly code = 'ACCOUNT_LOCKED';
  public readonly retryAfterSeconds: number;

  constructor(public readonly username: string, remainingMs: number) {
    super('Account is temporarily locked');
    this.name = 'AccountLockedError';
    this.retryAfterSeconds = Math.ceil(remainingMs / 1000);
  }
}

export class AccountDisabledError extends Error {
  public readonly code = 'ACCOUNT_DISABLED';

  constructor(public readonly username: string) {
    super('Account is disabled');
    this.name = 'AccountDisabledError';
  }
}
