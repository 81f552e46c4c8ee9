/**
 * Database connection management
 *
 * Wraps better-sqlite3 with pragmas, file permissions, and lifecycle management.
 */

import Database from 'better-sqlite3';
import * as fs from 'node:fs';
import * as path from 'node:path';
import type { Logger } from '@keyward/ipc';
import { noopLogger } from '@keyward/ipc';
import { DB_PRAGMAS, FILE_PERMISSIONS, APPLICATION_ID } from './constants';
import { DatabaseTamperError, StoreUnavailableError, errorMessage } from './errors';

/**
 * Open (or create) a SQLite database with proper pragmas and file permissions.
 */
export function openDatabase(dbPath: string, logger: Logger = noopLogger): Database.Database {
  const dir = path.dirname(dbPath);

  // Ensure parent directory exists with restricted permissions
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: FILE_PERMISSIONS.DB_DIR });
  }

  let db: Database.Database;
  try {
    db = new Database(dbPath);
  } catch (err) {
    throw new StoreUnavailableError(`Cannot open database at ${dbPath}`, { cause: err });
  }

  try {
    db.pragma(`journal_mode = ${DB_PRAGMAS.JOURNAL_MODE}`);
    db.pragma(`foreign_keys = ${DB_PRAGMAS.FOREIGN_KEYS}`);
    db.pragma(`busy_timeout = ${DB_PRAGMAS.BUSY_TIMEOUT}`);
    verifyApplicationId(db);
  } catch (err) {
    db.close();
    if (err instanceof DatabaseTamperError) throw err;
    throw new StoreUnavailableError(`Cannot open database at ${dbPath}: ${errorMessage(err)}`, { cause: err });
  }

  // Restrict file permissions
  try {
    fs.chmodSync(dbPath, FILE_PERMISSIONS.DB_FILE);
  } catch (err) {
    logger.warn(`[storage] Could not restrict permissions on ${dbPath}: ${errorMessage(err)}`);
  }

  return db;
}

/**
 * Verify or set application_id for tamper detection.
 */
function verifyApplicationId(db: Database.Database): void {
  const appId = db.pragma('application_id', { simple: true });
  if (appId === 0) {
    // Fresh database, stamp it
    db.pragma(`application_id = ${APPLICATION_ID}`);
  } else if (appId !== APPLICATION_ID) {
    throw new DatabaseTamperError(
      `Database application_id mismatch: expected 0x${APPLICATION_ID.toString(16).toUpperCase()}, got ${String(appId)}. The file may have been replaced.`
    );
  }
}

/**
 * Close a database connection. Closing twice is a no-op.
 */
export function closeDatabase(db: Database.Database): void {
  if (db.open) db.close();
}
