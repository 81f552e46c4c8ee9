/**
 * Data directory and file locations
 */

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { CONFIG_FILE, DATA_DIR, ENV, KEY_FILE } from '@keyward/ipc';
import { DB_FILENAME, FILE_PERMISSIONS } from '@keyward/storage';

export type Env = Record<string, string | undefined>;

/**
 * Get the data directory path.
 * Respects KEYWARD_DATA_DIR for deployments and test isolation.
 */
export function getDataDir(env: Env = process.env): string {
  const override = env[ENV.DATA_DIR];
  if (override) return path.resolve(override);
  return path.join(os.homedir(), DATA_DIR);
}

/**
 * Ensure the data directory exists (creates with 0o700 if missing).
 */
export function ensureDataDir(dataDir: string): void {
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true, mode: FILE_PERMISSIONS.DB_DIR });
  }
}

export function getDbPath(dataDir: string): string {
  return path.join(dataDir, DB_FILENAME);
}

export function getKeyPath(dataDir: string): string {
  return path.join(dataDir, KEY_FILE);
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, CONFIG_FILE);
}
