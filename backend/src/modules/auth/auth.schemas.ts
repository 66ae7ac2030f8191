/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Emails are taken as given (no lowercasing): lookups are exact.
 * - refresh_token is optional here; the controller falls back to the cookie and
 *   reports MISSING_TOKEN when neither is present.
 */

import { z } from 'zod';

export const registerSchema = z.object({
  name: z.string().min(1, 'Name is required').max(200),
  email: z.string().email('Invalid email address'),
  password: z.string().min(8, 'Password must be at least 8 characters').max(128),
});

export type RegisterInput = z.infer<typeof registerSchema>;

export const loginSchema = z.object({
  email: z.string().email('Invalid email address'),
  password: z.string().min(1, 'Password is required'),
});

export type LoginInput = z.infer<typeof loginSchema>;

export const refreshSchema = z
  .object({
    refresh_token: z.string().optional(),
  })
  .nullish();

export type RefreshInput = z.infer<typeof refreshSchema>;
