/**
 * Shared state for CLI commands
 */

import * as path from 'node:path';
import { getDataDir, loadConfig, openEngine } from '@keyward/daemon';
import type { CredentialEngine, Env } from '@keyward/daemon';

/**
 * Where command output goes. Tests capture it instead of printing.
 */
export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: Output = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

export interface CliContext {
  env: Env;
  out: Output;
}

/** Options defined on the root program */
export type GlobalOptions = {
  dataDir?: string;
};

export function defaultContext(): CliContext {
  return { env: process.env, out: consoleOutput };
}

export function resolveDataDir(ctx: CliContext, options: GlobalOptions): string {
  return options.dataDir ? path.resolve(options.dataDir) : getDataDir(ctx.env);
}

/**
 * Open the engine for the duration of one command.
 */
export function withEngine<T>(ctx: CliContext, options: GlobalOptions, fn: (engine: CredentialEngine) => T): T {
  const dataDir = resolveDataDir(ctx, options);
  const engine = openEngine({ dataDir, config: loadConfig(dataDir, ctx.env), env: ctx.env });
  try {
    return fn(engine);
  } finally {
    engine.close();
  }
}
