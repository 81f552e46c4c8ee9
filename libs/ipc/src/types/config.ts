/**
 * Configuration types
 */

import type { AuthConfig } from './auth';
import { DEFAULT_AUTH_CONFIG } from './auth';
import { DEFAULT_HOST, DEFAULT_PORT } from '../constants';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface DaemonConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
}

export interface KeywardConfig {
  auth: AuthConfig;
  daemon: DaemonConfig;
}

export const DEFAULT_DAEMON_CONFIG: DaemonConfig = {
  host: DEFAULT_HOST,
  port: DEFAULT_PORT,
  logLevel: 'info',
};

export function getDefaultConfig(): KeywardConfig {
  return {
    auth: { ...DEFAULT_AUTH_CONFIG },
    daemon: { ...DEFAULT_DAEMON_CONFIG },
  };
}
