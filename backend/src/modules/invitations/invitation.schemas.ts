/**
 * backend/src/modules/invitations/invitation.schemas.ts
 *
 * WHY:
 * - Request validation for the Invitations module.
 *
 * RULES:
 * - Codes travel in POST bodies only, never in query strings or paths.
 */

import { z } from 'zod';

const optionalName = z.string().trim().max(150).default('');

export const validateInvitationSchema = z.object({
  code: z.string().trim().min(1).max(64),
  email: z.string().trim().email(),
});

export const createInvitationSchema = z.object({
  email: z.string().trim().email().max(254),
  firstName: optionalName,
  lastName: optionalName,
  memberNumber: z
    .string()
    .trim()
    .min(1)
    .max(32)
    .nullish()
    .transform((v) => v ?? null),
  /** Omit for the configured default; null for a code that never expires. */
  expiresAt: z
    .string()
    .datetime({ offset: true })
    .transform((v) => new Date(v))
    .nullable()
    .optional(),
  notes: z.string().max(2000).default(''),
  sendEmail: z.boolean().default(true),
});

export const listInvitationsQuerySchema = z.object({
  state: z.enum(['active', 'used', 'expired', 'all']).default('all'),
});

export const invitationParamsSchema = z.object({
  invitationId: z.string().uuid(),
});

export type ValidateInvitationInput = z.infer<typeof validateInvitationSchema>;
export type CreateInvitationInput = z.infer<typeof createInvitationSchema>;
