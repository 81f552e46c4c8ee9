/**
 * Fastify server setup for the Keyward daemon
 */

import Fastify, { type FastifyInstance } from 'fastify';
import type { DaemonConfig, Logger } from '@keyward/ipc';
import type { CredentialEngine } from './engine';
import { registerRoutes } from './routes/index';

export interface DaemonServer {
  app: FastifyInstance;
  engine: CredentialEngine;
}

/**
 * Create and configure the Fastify server.
 * The engine is built with the server's logger and closed with the server.
 */
export async function createServer(
  config: DaemonConfig,
  buildEngine: (logger: Logger) => CredentialEngine,
): Promise<DaemonServer> {
  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  const engine = buildEngine(app.log);
  app.addHook('onClose', async () => {
    engine.close();
  });

  await registerRoutes(app, engine);

  return { app, engine };
}

/**
 * Start the server
 */
export async function startServer(
  config: DaemonConfig,
  buildEngine: (logger: Logger) => CredentialEngine,
): Promise<DaemonServer> {
  const server = await createServer(config, buildEngine);
  await server.app.listen({ port: config.port, host: config.host });
  return server;
}
