/**
 * Storage error types
 *
 * Each error carries a stable `code` that the daemon maps onto responses.
 */

export class ValidationError extends Error {
  public readonly code = 'INVALID_INPUT';
  public readonly issues: unknown[];

  constructor(message: string, issues: unknown[] = []) {
    super(message);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class DuplicateUsernameError extends Error {
  public readonly code = 'DUPLICATE_USERNAME';

  constructor(public readonly username: string) {
    super(`User '${username}' already exists`);
    this.name = 'DuplicateUsernameError';
  }
}

export class UserNotFoundError extends Error {
  public readonly code = 'USER_NOT_FOUND';

  constructor(public readonly username: string) {
    super(`User '${username}' not found`);
    this.name = 'UserNotFoundError';
  }
}

/**
 * The encryption key could not be resolved, or does not match the store.
 * Fatal at startup.
 */
export class KeyResolutionError extends Error {
  public readonly code = 'KEY_RESOLUTION_FAILED';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'KeyResolutionError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * The underlying database failed. Reported to the caller, never retried here.
 */
export class StoreUnavailableError extends Error {
  public readonly code = 'STORE_UNAVAILABLE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreUnavailableError';
  }
}

export class DatabaseTamperError extends Error {
  public readonly code = 'DATABASE_TAMPERED';

  constructor(message = 'Database file has an unexpected application_id; it may have been replaced.') {
    super(message);
    this.name = 'DatabaseTamperError';
    Error.captureStackTrace?.(this, this.constructor);
  }
}

export class LastAdminError extends Error {
  public readonly code = 'LAST_ADMIN';

  constructor(public readonly username: string) {
    super(`User '${username}' is the last active admin`);
    this.name = 'LastAdminError';
  }
}

/**
 * Read the `code` property Node and SQLite attach to their errors.
 * Duck-typed: errors raised by Node internals are not `instanceof Error`
 * when the caller runs in another realm (a Jest sandbox, a vm context).
 */
export function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  return String(err);
}
