/**
 * Storage constants
 */

export const DB_FILENAME = 'keyward.db';

export const META_KEYS = {
  /** Sentinel encrypted with the store key, used to detect a key mismatch */
  KEY_CHECK: 'key_check',
  CREATED_AT: 'created_at',
} as const;

export const KEY_CHECK_PLAINTEXT = 'keyward-key-check';

export const DB_PRAGMAS = {
  JOURNAL_MODE: 'WAL',
  FOREIGN_KEYS: 'ON',
  BUSY_TIMEOUT: 5000,
} as const;

export const FILE_PERMISSIONS = {
  DB_FILE: 0o600,
  DB_DIR: 0o700,
  KEY_FILE: 0o600,
} as const;

/** SQLite application_id for tamper detection ("KYWD" in hex). */
export const APPLICATION_ID = 0x4B595744;
