/**
 * Abstract base repository
 *
 * Provides common utilities: DB access, encryption, Zod validation, timestamps
 * and translation of SQLite failures into storage errors.
 */

import type Database from 'better-sqlite3';
import type { Clock } from '@keyward/ipc';
import { z } from 'zod';
import { encrypt, decrypt } from '../crypto';
import { StoreUnavailableError, ValidationError, errorCode } from '../errors';

export abstract class BaseRepository {
  constructor(
    protected readonly db: Database.Database,
    protected readonly getEncryptionKey: () => Buffer,
    protected readonly clock: Clock,
  ) {}

  /**
   * Validate data against a Zod schema. Throws ValidationError on failure.
   */
  protected validate<T>(schema: z.ZodType<T>, data: unknown): T {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new ValidationError(
        `Validation failed: ${result.error.issues.map((i) => i.message).join('; ')}`,
        result.error.issues,
      );
    }
    return result.data;
  }

  protected encrypt(plaintext: string): string {
    return encrypt(plaintext, this.getEncryptionKey());
  }

  protected decrypt(ciphertext: string): string {
    return decrypt(ciphertext, this.getEncryptionKey());
  }

  /**
   * Get current ISO datetime string.
   */
  protected now(): string {
    return this.clock.now().toISOString();
  }

  /**
   * Run a database operation, reporting a closed handle or a SQLite failure
   * as StoreUnavailableError. Other errors pass through unchanged.
   */
  protected guard<T>(operation: string, fn: () => T): T {
    if (!this.db.open) {
      throw new StoreUnavailableError(`Store is closed (${operation})`);
    }
    try {
      return fn();
    } catch (err) {
      if (errorCode(err)?.startsWith('SQLITE_')) {
        throw new StoreUnavailableError(`Store operation '${operation}' failed`, { cause: err });
      }
      throw err;
    }
  }
}
