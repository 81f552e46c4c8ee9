/**
 * Authentication middleware
 *
 * Resolves the bearer token of every request to an identity and protects
 * routes by capability.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { Capability, Identity } from '@keyward/ipc';
import type { CredentialEngine } from '../engine';

declare module 'fastify' {
  interface FastifyRequest {
    /** Identity behind a valid session token, null when unauthenticated */
    identity: Identity | null;
    sessionToken: string | null;
  }
}

/**
 * Extract token from the "Authorization: Bearer <token>" header
 */
export function extractToken(request: FastifyRequest): string | undefined {
  const authHeader = request.headers.authorization;
  if (authHeader?.startsWith('Bearer ')) {
    const token = authHeader.slice(7).trim();
    return token || undefined;
  }
  return undefined;
}

/**
 * Decorate requests with the session identity
 */
export function registerAuthContext(app: FastifyInstance, engine: CredentialEngine): void {
  app.decorateRequest('identity', null);
  app.decorateRequest('sessionToken', null);

  app.addHook('onRequest', async (request) => {
    const token = extractToken(request);
    if (!token) return;

    const identity = engine.currentIdentity(token);
    if (identity) {
      request.identity = identity;
      request.sessionToken = token;
    }
  });
}

/**
 * preHandler that requires a session with the given capability.
 * Missing session → 401; missing capability → PermissionDeniedError (403).
 */
export function requireCapability(engine: CredentialEngine, capability: Capability) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    if (!request.identity) {
      return reply.code(401).send({
        success: false,
        error: 'Authentication required',
        code: 'UNAUTHORIZED',
      });
    }
    engine.authorize(request.identity, capability);
  };
}
