/**
 * Zod schemas for the optional config.json file
 */

import { z } from 'zod';

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

export const AuthConfigFileSchema = z.object({
  sessionTimeoutMinutes: z.number().int().positive().optional(),
  maxLoginAttempts: z.number().int().positive().optional(),
  lockoutDurationMinutes: z.number().int().positive().optional(),
});

export const DaemonConfigFileSchema = z.object({
  host: z.string().min(1).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  logLevel: LogLevelSchema.optional(),
});

export const ConfigFileSchema = z.object({
  auth: AuthConfigFileSchema.optional(),
  daemon: DaemonConfigFileSchema.optional(),
});

export type ConfigFile = z.output<typeof ConfigFileSchema>;
