/**
 * Authentication routes
 *
 * Login, logout, session identity and self-service password change.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { ChangeOwnPasswordRequestSchema, LoginRequestSchema } from '@keyward/ipc';
import type {
  ApiResponse,
  AuthFailure,
  Capability,
  ChangeOwnPasswordRequest,
  Identity,
  LoginRequest,
  LoginResponse,
} from '@keyward/ipc';
import { requireCapability } from '../auth/middleware';
import type { RouteOptions } from './types';

function loginFailure(failure: AuthFailure, reply: FastifyReply): LoginResponse {
  switch (failure.code) {
    case 'INVALID_CREDENTIALS':
      reply.code(401);
      return { success: false, error: 'Invalid username or password', code: failure.code };
    case 'ACCOUNT_DISABLED':
      reply.code(403);
      return { success: false, error: 'Account is disabled', code: failure.code };
    case 'ACCOUNT_LOCKED': {
      const retryAfterSeconds = Math.ceil(failure.remainingMs / 1000);
      reply.code(429).header('retry-after', String(retryAfterSeconds));
      return { success: false, error: 'Account is temporarily locked', code: failure.code, retryAfterSeconds };
    }
  }
}

/**
 * Register authentication routes
 */
export async function authRoutes(app: FastifyInstance, { engine }: RouteOptions): Promise<void> {
  /**
   * POST /auth/login - Authenticate with username and password
   */
  app.post<{ Body: LoginRequest }>(
    '/auth/login',
    async (request: FastifyRequest<{ Body: LoginRequest }>, reply: FastifyReply): Promise<LoginResponse> => {
      // Only presence is checked; the password policy is not revealed here
      const parseResult = LoginRequestSchema.safeParse(request.body);
      if (!parseResult.success) {
        reply.code(400);
        return { success: false, error: 'Username and password are required', code: 'INVALID_INPUT' };
      }

      const { username, password } = parseResult.data;
      const result = engine.login(username, password);
      if (!result.success) return loginFailure(result, reply);

      return { success: true, token: result.token, user: result.identity };
    },
  );

  /**
   * POST /auth/logout - Invalidate the current session
   */
  app.post(
    '/auth/logout',
    { preHandler: requireCapability(engine, 'read') },
    async (request): Promise<ApiResponse<{ loggedOut: boolean }>> => {
      const loggedOut = request.sessionToken ? engine.logout(request.sessionToken) : false;
      return { success: true, data: { loggedOut } };
    },
  );

  /**
   * GET /auth/me - Identity and capabilities behind the current session
   */
  app.get(
    '/auth/me',
    { preHandler: requireCapability(engine, 'read') },
    async (request): Promise<ApiResponse<Identity & { capabilities: Capability[] }>> => {
      const identity = engine.authorize(request.identity, 'read');
      return { success: true, data: { ...identity, capabilities: engine.capabilities(identity) } };
    },
  );

  /**
   * POST /auth/change-password - Change own password
   */
  app.post<{ Body: ChangeOwnPasswordRequest }>(
    '/auth/change-password',
    { preHandler: requireCapability(engine, 'read') },
    async (request, reply): Promise<ApiResponse<{ changed: true }>> => {
      const parseResult = ChangeOwnPasswordRequestSchema.safeParse(request.body);
      if (!parseResult.success) {
        reply.code(400);
        return {
          success: false,
          error: 'Invalid request: ' + parseResult.error.issues.map((i) => i.message).join('; '),
          code: 'INVALID_INPUT',
        };
      }

      const token = request.sessionToken ?? '';
      engine.changeOwnPassword(token, parseResult.data.currentPassword, parseResult.data.newPassword);
      return { success: true, data: { changed: true } };
    },
  );
}
