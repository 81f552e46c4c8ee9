/**
 * Route registration
 */

import type { FastifyError, FastifyInstance } from 'fastify';
import { API_PREFIX } from '@keyward/ipc';
import type { CredentialEngine } from '../engine';
import { registerAuthContext } from '../auth/middleware';
import { healthRoutes } from './health';
import { authRoutes } from './auth';
import { adminRoutes } from './admin';
import { AccountLockedError } from '../errors';

/**
 * HTTP status for each error code raised by the engine and the store
 */
const STATUS_BY_CODE: Record<string, number> = {
  INVALID_INPUT: 400,
  PERMISSION_DENIED: 403,
  ACCOUNT_DISABLED: 403,
  USER_NOT_FOUND: 404,
  DUPLICATE_USERNAME: 409,
  LAST_ADMIN: 409,
  ACCOUNT_LOCKED: 429,
  STORE_UNAVAILABLE: 503,
};

/**
 * Register all API routes under the /api prefix
 */
export async function registerRoutes(app: FastifyInstance, engine: CredentialEngine): Promise<void> {
  registerAuthContext(app, engine);

  // Error handler: log details and send structured response
  app.setErrorHandler((error: FastifyError, request, reply) => {
    const status = STATUS_BY_CODE[error.code] ?? error.statusCode ?? 500;
    if (status >= 500) {
      request.log.error({ err: error, statusCode: status }, `${request.method} ${request.url}: ${error.message}`);
    } else {
      request.log.info({ code: error.code, statusCode: status }, `${request.method} ${request.url}: ${error.message}`);
    }

    if (error instanceof AccountLockedError) {
      reply.header('retry-after', String(error.retryAfterSeconds));
    }

    const message =
      status === 503 ? 'Credential store unavailable' : status >= 500 ? 'Internal server error' : error.message;
    return reply.status(status).send({ success: false, error: message, code: error.code });
  });

  await app.register(
    async (api) => {
      await api.register(healthRoutes);
      await api.register(authRoutes, { engine });
      await api.register(adminRoutes, { engine });
    },
    { prefix: API_PREFIX },
  );
}
