/**
 * User administration routes (admin capability)
 *
 * Engine errors propagate to the error handler, which maps their codes to
 * HTTP statuses.
 */

import type { FastifyInstance, FastifyReply } from 'fastify';
import {
  AuditQuerySchema,
  CreateUserSchema,
  SetActiveRequestSchema,
  SetPasswordRequestSchema,
  SetRoleRequestSchema,
} from '@keyward/ipc';
import type {
  ApiFailure,
  ApiResponse,
  AuditEvent,
  CreateUserRequest,
  Identity,
  SetActiveRequest,
  SetPasswordRequest,
  SetRoleRequest,
  UserRecord,
  UserSummary,
} from '@keyward/ipc';
import { requireCapability } from '../auth/middleware';
import type { RouteOptions } from './types';

type UserParams = { Params: { username: string } };

interface SchemaIssues {
  issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>;
}

function invalid(reply: FastifyReply, error: SchemaIssues): ApiFailure {
  reply.code(400);
  return {
    success: false,
    error: 'Invalid request: ' + error.issues.map((i) => `${i.path.map(String).join('.') || 'body'}: ${i.message}`).join('; '),
    code: 'INVALID_INPUT',
  };
}

export async function adminRoutes(app: FastifyInstance, { engine }: RouteOptions): Promise<void> {
  app.addHook('preHandler', requireCapability(engine, 'admin'));

  // Caller identity; the preHandler has already admitted only admins
  const actor = (identity: Identity | null): Identity => engine.authorize(identity, 'admin');

  app.get('/admin/users', async (request): Promise<ApiResponse<UserSummary[]>> => {
    return { success: true, data: engine.listUsers(actor(request.identity)) };
  });

  app.get<UserParams>('/admin/users/:username', async (request): Promise<ApiResponse<UserSummary>> => {
    return { success: true, data: engine.getUser(actor(request.identity), request.params.username) };
  });

  app.post<{ Body: CreateUserRequest }>(
    '/admin/users',
    async (request, reply): Promise<ApiResponse<UserRecord>> => {
      const parsed = CreateUserSchema.safeParse(request.body);
      if (!parsed.success) return invalid(reply, parsed.error);

      const user = engine.createUser(actor(request.identity), parsed.data);
      reply.code(201);
      return { success: true, data: user };
    },
  );

  app.put<UserParams & { Body: SetRoleRequest }>(
    '/admin/users/:username/role',
    async (request, reply): Promise<ApiResponse<UserSummary>> => {
      const parsed = SetRoleRequestSchema.safeParse(request.body);
      if (!parsed.success) return invalid(reply, parsed.error);

      const admin = actor(request.identity);
      engine.changeRole(admin, request.params.username, parsed.data.role);
      return { success: true, data: engine.getUser(admin, request.params.username) };
    },
  );

  app.put<UserParams & { Body: SetPasswordRequest }>(
    '/admin/users/:username/password',
    async (request, reply): Promise<ApiResponse<{ changed: true }>> => {
      const parsed = SetPasswordRequestSchema.safeParse(request.body);
      if (!parsed.success) return invalid(reply, parsed.error);

      engine.changePassword(actor(request.identity), request.params.username, parsed.data.password);
      return { success: true, data: { changed: true } };
    },
  );

  app.put<UserParams & { Body: SetActiveRequest }>(
    '/admin/users/:username/active',
    async (request, reply): Promise<ApiResponse<UserSummary>> => {
      const parsed = SetActiveRequestSchema.safeParse(request.body);
      if (!parsed.success) return invalid(reply, parsed.error);

      const admin = actor(request.identity);
      if (parsed.data.active) {
        engine.activate(admin, request.params.username);
      } else {
        engine.deactivate(admin, request.params.username);
      }
      return { success: true, data: engine.getUser(admin, request.params.username) };
    },
  );

  app.post<UserParams>('/admin/users/:username/unlock', async (request): Promise<ApiResponse<UserSummary>> => {
    const admin = actor(request.identity);
    engine.unlock(admin, request.params.username);
    return { success: true, data: engine.getUser(admin, request.params.username) };
  });

  app.delete<UserParams>('/admin/users/:username', async (request): Promise<ApiResponse<{ deleted: string }>> => {
    engine.deleteUser(actor(request.identity), request.params.username);
    return { success: true, data: { deleted: request.params.username } };
  });

  app.get<{ Querystring: { limit?: string; subject?: string } }>(
    '/admin/audit',
    async (request, reply): Promise<ApiResponse<AuditEvent[]>> => {
      const parsed = AuditQuerySchema.safeParse(request.query);
      if (!parsed.success) return invalid(reply, parsed.error);

      return { success: true, data: engine.listAudit(actor(request.identity), parsed.data.limit, parsed.data.subject) };
    },
  );
}
