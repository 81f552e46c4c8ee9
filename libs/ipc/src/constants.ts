/**
 * Constants for Keyward
 */

/** Default HTTP server port */
export const DEFAULT_PORT = 5300;

/** Default HTTP server host - use IPv4 explicitly to avoid IPv6 binding issues */
export const DEFAULT_HOST = '127.0.0.1';

/** Data directory name, relative to the user home directory */
export const DATA_DIR = '.keyward';

/** Optional JSON configuration file inside the data directory */
export const CONFIG_FILE = 'config.json';

/** Persisted encryption key file inside the data directory */
export const KEY_FILE = 'encryption.key';

/** API route prefix */
export const API_PREFIX = '/api';

/** Username of the account created by the default admin bootstrap */
export const DEFAULT_ADMIN_USERNAME = 'admin';

/** Display name of the bootstrapped admin */
export const DEFAULT_ADMIN_DISPLAY_NAME = 'System Administrator';

/**
 * Environment variables read at the configuration boundary.
 */
export const ENV = {
  DATA_DIR: 'KEYWARD_DATA_DIR',
  ENCRYPTION_KEY: 'KEYWARD_ENCRYPTION_KEY',
  ADMIN_PASSWORD: 'KEYWARD_ADMIN_PASSWORD',
  SESSION_TIMEOUT_MINUTES: 'KEYWARD_SESSION_TIMEOUT_MINUTES',
  MAX_LOGIN_ATTEMPTS: 'KEYWARD_MAX_LOGIN_ATTEMPTS',
  LOCKOUT_MINUTES: 'KEYWARD_LOCKOUT_MINUTES',
  PORT: 'KEYWARD_PORT',
  HOST: 'KEYWARD_HOST',
  LOG_LEVEL: 'KEYWARD_LOG_LEVEL',
} as const;
