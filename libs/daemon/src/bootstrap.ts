/**
 * Engine assembly
 *
 * Resolves the key, opens the store and builds a CredentialEngine from the
 * data directory and environment. Shared by the daemon and the CLI.
 */

import type { KeywardConfig, Logger } from '@keyward/ipc';
import { ENV, noopLogger } from '@keyward/ipc';
import { KeyManager, Storage } from '@keyward/storage';
import { CredentialEngine } from './engine';
import { ensureDataDir, getDbPath, getKeyPath } from './config/paths';
import type { Env } from './config/paths';

export interface OpenEngineOptions {
  dataDir: string;
  config: KeywardConfig;
  env?: Env;
  logger?: Logger;
  /** Create the default admin on an empty store (daemon startup) */
  bootstrap?: boolean;
}

/**
 * Open the engine. Throws KeyResolutionError when the key is unusable; the
 * caller must not serve requests in that case.
 */
export function openEngine(options: OpenEngineOptions): CredentialEngine {
  const env = options.env ?? process.env;
  const logger = options.logger ?? noopLogger;

  ensureDataDir(options.dataDir);

  const keyManager = new KeyManager({
    keyFile: getKeyPath(options.dataDir),
    externalKey: env[ENV.ENCRYPTION_KEY],
    logger,
  });

  const storage = Storage.open({
    dbPath: getDbPath(options.dataDir),
    keyManager,
    lockout: {
      maxFailedAttempts: options.config.auth.maxFailedAttempts,
      lockoutDurationMs: options.config.auth.lockoutDurationMs,
    },
    logger,
  });

  const engine = new CredentialEngine({ storage, auth: options.config.auth, logger });
  if (options.bootstrap) {
    engine.bootstrapAdmin(env[ENV.ADMIN_PASSWORD]);
  }
  return engine;
}
