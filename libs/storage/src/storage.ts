/**
 * Storage: Main entry point for the Keyward storage layer
 *
 * Owns the SQLite handle and the resolved encryption key, and exposes the
 * credential store and audit log repositories. Constructed explicitly and
 * passed to its consumers; there is no process-wide instance.
 */

import type Database from 'better-sqlite3';
import * as fs from 'node:fs';
import type { Clock, Logger } from '@keyward/ipc';
import { DEFAULT_AUTH_CONFIG, noopLogger, systemClock } from '@keyward/ipc';
import { openDatabase, closeDatabase } from './database';
import { encrypt, decrypt } from './crypto';
import { runMigrations } from './migrations/index';
import { META_KEYS, KEY_CHECK_PLAINTEXT } from './constants';
import { KeyResolutionError, StoreUnavailableError, errorCode } from './errors';
import type { KeyManager } from './key-manager';
import type { DbMetaRow } from './types';
import { UserRepository } from './repositories/users';
import type { LockoutPolicy } from './repositories/users';
import { AuditRepository } from './repositories/audit';

export interface StorageOptions {
  dbPath: string;
  keyManager: KeyManager;
  clock?: Clock;
  lockout?: LockoutPolicy;
  logger?: Logger;
}

const META = 'meta';

export class Storage {
  private readonly db: Database.Database;
  private readonly encryptionKey: Buffer;

  readonly users: UserRepository;
  readonly audit: AuditRepository;

  private constructor(db: Database.Database, encryptionKey: Buffer, clock: Clock, lockout: LockoutPolicy) {
    this.db = db;
    this.encryptionKey = encryptionKey;

    const getKey = () => this.encryptionKey;

    this.users = new UserRepository(db, getKey, clock, lockout);
    this.audit = new AuditRepository(db, getKey, clock);
  }

  /**
   * Resolve the key, open (or create) the database, run migrations, verify
   * the key against the store and cap the audit log.
   *
   * Throws KeyResolutionError when the key is malformed or belongs to a
   * different store.
   */
  static open(options: StorageOptions): Storage {
    const logger = options.logger ?? noopLogger;
    const clock = options.clock ?? systemClock;
    const lockout = options.lockout ?? {
      maxFailedAttempts: DEFAULT_AUTH_CONFIG.maxFailedAttempts,
      lockoutDurationMs: DEFAULT_AUTH_CONFIG.lockoutDurationMs,
    };

    // A new key is only acceptable for a store that does not exist yet
    const key = options.keyManager.resolveKey({ allowGenerate: !fs.existsSync(options.dbPath) });
    const db = openDatabase(options.dbPath, logger);

    try {
      const applied = runMigrations(db);
      if (applied > 0) logger.info(`[storage] Applied ${applied} migration(s) to ${options.dbPath}`);
      Storage.verifyKey(db, key, clock);

      const storage = new Storage(db, key, clock, lockout);
      const pruned = storage.audit.prune();
      if (pruned > 0) logger.info(`[storage] Pruned ${pruned} old audit event(s)`);
      return storage;
    } catch (err) {
      closeDatabase(db);
      if (errorCode(err)?.startsWith('SQLITE_')) {
        throw new StoreUnavailableError(`Cannot initialise credential store at ${options.dbPath}`, { cause: err });
      }
      throw err;
    }
  }

  /**
   * Check the key against the stored sentinel, or write the sentinel on a
   * fresh store.
   */
  private static verifyKey(db: Database.Database, key: Buffer, clock: Clock): void {
    const row = db
      .prepare<{ key: string }, DbMetaRow>(`SELECT * FROM ${META} WHERE key = @key`)
      .get({ key: META_KEYS.KEY_CHECK });

    if (!row) {
      const insert = db.prepare<{ key: string; value: string }>(
        `INSERT INTO ${META} (key, value) VALUES (@key, @value)`,
      );
      db.transaction(() => {
        insert.run({ key: META_KEYS.KEY_CHECK, value: encrypt(KEY_CHECK_PLAINTEXT, key) });
        insert.run({ key: META_KEYS.CREATED_AT, value: clock.now().toISOString() });
      })();
      return;
    }

    let plaintext: string;
    try {
      plaintext = decrypt(row.value, key);
    } catch (err) {
      throw new KeyResolutionError('Encryption key does not match this credential store', { cause: err });
    }
    if (plaintext !== KEY_CHECK_PLAINTEXT) {
      throw new KeyResolutionError('Encryption key does not match this credential store');
    }
  }

  /**
   * Whether the underlying database handle is open.
   */
  isOpen(): boolean {
    return this.db.open;
  }

  /**
   * Close the database connection.
   */
  close(): void {
    closeDatabase(this.db);
  }
}
