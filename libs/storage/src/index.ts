/**
 * Keyward Storage Library
 *
 * SQLite credential store with at-rest encryption of password digests,
 * key management, audit log and migrations.
 *
 * @packageDocumentation
 */

// Core
export { Storage } from './storage';
export type { StorageOptions } from './storage';

// Keys
export { KeyManager } from './key-manager';
export type { KeyManagerOptions, KeySource, ResolveKeyOptions } from './key-manager';

// Errors
export {
  ValidationError,
  DuplicateUsernameError,
  UserNotFoundError,
  KeyResolutionError,
  StoreUnavailableError,
  DatabaseTamperError,
  LastAdminError,
  errorCode,
  errorMessage,
} from './errors';

// Constants
export { DB_FILENAME, META_KEYS, APPLICATION_ID, FILE_PERMISSIONS } from './constants';

// Crypto
export { generateSalt, generateKey, encodeKey, decodeKey, hashPassword, verifyPassword, encrypt, decrypt } from './crypto';

// Database
export { openDatabase, closeDatabase } from './database';

// Repositories
export { BaseRepository } from './repositories/base.repository';
export { UserRepository, lockRemainingMs, toSummary } from './repositories/users';
export type { StoredCredentials, LockoutPolicy, FailedAttemptResult } from './repositories/users';
export { AuditRepository, redact } from './repositories/audit';
export type { RecordAuditInput, AuditListOptions } from './repositories/audit';

// Migrations
export { runMigrations, getCurrentVersion, getDbVersion } from './migrations/index';
export type { Migration } from './migrations/types';
