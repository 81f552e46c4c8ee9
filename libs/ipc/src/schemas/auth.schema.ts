/**
 * Zod schemas for authentication validation
 */

import { z } from 'zod';

/**
 * Username - case-preserving, no surrounding whitespace, no control characters
 */
export const UsernameSchema = z
  .string()
  .min(1, 'Username must not be empty')
  .max(64, 'Username must be at most 64 characters')
  .refine((value) => value.trim() === value, 'Username must not start or end with whitespace')
  .refine((value) => !/[\u0000-\u001f\u007f]/.test(value), 'Username must not contain control characters');

/**
 * Password policy for new and changed passwords
 */
export const PasswordSchema = z
  .string()
  .min(8, 'Password must be at least 8 characters')
  .max(256, 'Password must be at most 256 characters');

export const RoleSchema = z.enum(['admin', 'user']);

export const CapabilitySchema = z.enum(['read', 'write', 'admin']);

/**
 * Login request schema. Only presence is checked here so the login form
 * never reveals the password policy.
 */
export const LoginRequestSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

export const ChangeOwnPasswordRequestSchema = z.object({
  currentPassword: z.string().min(1),
  newPassword: PasswordSchema,
});

// Inferred types from schemas
export type LoginRequestInput = z.input<typeof LoginRequestSchema>;
export type ChangeOwnPasswordRequestInput = z.input<typeof ChangeOwnPasswordRequestSchema>;
