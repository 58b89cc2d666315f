/**
 * src/modules/auth/auth.schemas.ts
 *
 * WHY:
 * - Centralizes request validation for the Auth module.
 * - Prevents invalid payloads from reaching services.
 *
 * RULES:
 * - Use Zod for runtime validation.
 * - Case normalization happens in flows, not here.
 * - Codes are only length-checked; the store decides whether they exist.
 */

import { z } from 'zod';
import { PASSWORD_MAX_LENGTH, PASSWORD_MIN_LENGTH } from './auth.constants';

export const loginSchema = z.object({
  identifier: z.string().trim().min(1, 'Username or email is required').max(254),
  password: z.string().min(1, 'Password is required').max(PASSWORD_MAX_LENGTH),
});

export type LoginInput = z.infer<typeof loginSchema>;

/** Letters, digits and @ . + - _ only. */
const USERNAME_PATTERN = /^[A-Za-z0-9@.+_-]+$/;

export const signupSchema = z.object({
  code: z.string().trim().min(1, 'Invitation code is required').max(64),
  email: z.string().trim().email('Invalid email address'),
  username: z
    .string()
    .trim()
    .min(3, 'Username must be at least 3 characters')
    .max(150)
    .regex(USERNAME_PATTERN, 'Username may only contain letters, digits and @ . + - _'),
  password: z
    .string()
    .min(PASSWORD_MIN_LENGTH, `Password must be at least ${PASSWORD_MIN_LENGTH} characters`)
    .max(PASSWORD_MAX_LENGTH),
  firstName: z.string().trim().max(150).default(''),
  lastName: z.string().trim().max(150).default(''),
});

export type SignupInput = z.infer<typeof signupSchema>;
