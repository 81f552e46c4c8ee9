/**
 * Zod schemas for user management
 */

import { z } from 'zod';
import { UsernameSchema, PasswordSchema, RoleSchema } from './auth.schema';

export const DisplayNameSchema = z.string().min(1).max(128);

export const CreateUserSchema = z.object({
  username: UsernameSchema,
  password: PasswordSchema,
  role: RoleSchema.default('user'),
  displayName: DisplayNameSchema.optional(),
  email: z.email().optional(),
});
export type CreateUserInput = z.input<typeof CreateUserSchema>;
export type CreateUserData = z.output<typeof CreateUserSchema>;

export const SetRoleRequestSchema = z.object({
  role: RoleSchema,
});

export const SetPasswordRequestSchema = z.object({
  password: PasswordSchema,
});

export const SetActiveRequestSchema = z.object({
  active: z.boolean(),
});

export const UsernameParamsSchema = z.object({
  username: UsernameSchema,
});

export const AuditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(200),
  subject: UsernameSchema.optional(),
});
