/**
 * Configuration loader
 *
 * Defaults, overlaid by the optional config.json in the data directory,
 * overlaid by environment variables. Invalid values are rejected rather
 * than ignored.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import type { ConfigFile, KeywardConfig } from '@keyward/ipc';
import { ConfigFileSchema, ENV, LogLevelSchema, getDefaultConfig } from '@keyward/ipc';
import { errorCode, errorMessage } from '@keyward/storage';
import { ConfigError } from './errors';
import { getConfigPath } from './paths';
import type { Env } from './paths';

const MINUTE_MS = 60 * 1000;

const PositiveIntFromEnv = z.coerce.number().int().positive();
const PortFromEnv = z.coerce.number().int().min(1).max(65535);

/**
 * Read and validate config.json. Returns an empty config when the file is absent.
 */
export function readConfigFile(configPath: string): ConfigFile {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return {};
    throw new ConfigError(`Cannot read ${configPath}: ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`${configPath} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const result = ConfigFileSchema.safeParse(json);
  if (!result.success) {
    throw new ConfigError(`Invalid configuration in ${configPath}: ${z.prettifyError(result.error)}`);
  }
  return result.data;
}

function fromEnv<T>(env: Env, name: string, schema: z.ZodType<T>): T | undefined {
  const value = env[name];
  if (value === undefined || value === '') return undefined;

  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ConfigError(`Invalid value for ${name}: '${value}'`);
  }
  return result.data;
}

/**
 * Resolve the effective configuration.
 */
export function loadConfig(dataDir: string, env: Env = process.env): KeywardConfig {
  const config = getDefaultConfig();
  const file = readConfigFile(getConfigPath(dataDir));

  const sessionMinutes = fromEnv(env, ENV.SESSION_TIMEOUT_MINUTES, PositiveIntFromEnv) ?? file.auth?.sessionTimeoutMinutes;
  const maxAttempts = fromEnv(env, ENV.MAX_LOGIN_ATTEMPTS, PositiveIntFromEnv) ?? file.auth?.maxLoginAttempts;
  const lockoutMinutes = fromEnv(env, ENV.LOCKOUT_MINUTES, PositiveIntFromEnv) ?? file.auth?.lockoutDurationMinutes;

  if (sessionMinutes !== undefined) config.auth.sessionTimeoutMs = sessionMinutes * MINUTE_MS;
  if (maxAttempts !== undefined) config.auth.maxFailedAttempts = maxAttempts;
  if (lockoutMinutes !== undefined) config.auth.lockoutDurationMs = lockoutMinutes * MINUTE_MS;

  config.daemon.host = env[ENV.HOST] || file.daemon?.host || config.daemon.host;
  config.daemon.port = fromEnv(env, ENV.PORT, PortFromEnv) ?? file.daemon?.port ?? config.daemon.port;
  config.daemon.logLevel = fromEnv(env, ENV.LOG_LEVEL, LogLevelSchema) ?? file.daemon?.logLevel ?? config.daemon.logLevel;

  return config;
}
