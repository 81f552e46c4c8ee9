#!/usr/bin/env node
/**
 * Keyward Daemon Entry Point
 */

import { getDataDir, loadConfig } from './config/index';
import { openEngine } from './bootstrap';
import { startServer } from './server';

async function main(): Promise<void> {
  const dataDir = getDataDir();
  const config = loadConfig(dataDir);

  // Key resolution failures abort startup before the port is bound
  const { app } = await startServer(config.daemon, (logger) =>
    openEngine({ dataDir, config, logger, bootstrap: true }),
  );

  const shutdown = (signal: string) => {
    app.log.info(`Received ${signal}, shutting down`);
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('Error during shutdown:', err);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  console.log(`Keyward daemon started on http://${config.daemon.host}:${config.daemon.port}`);
}

main().catch((error: unknown) => {
  console.error('Failed to start daemon:', error);
  process.exit(1);
});
