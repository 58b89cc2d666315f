/**
 * backend/src/modules/invitations/invitation.errors.ts
 *
 * WHY:
 * - Invitations module owns its domain semantics.
 * - Each failure carries a stable `reason` so the signup form can show a
 *   specific message (used vs expired vs wrong email).
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include raw codes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const INVITATION_FAILURE_REASONS = [
  'INVALID_CODE',
  'CODE_ALREADY_USED',
  'CODE_EXPIRED',
  'EMAIL_MISMATCH',
] as const;

export type InvitationFailureReason = (typeof INVITATION_FAILURE_REASONS)[number];

export const InvitationErrors = {
  invalidCode(meta?: AppErrorMeta) {
    return AppError.notFound('Invalid invitation code.', meta, 'INVALID_CODE');
  },

  codeAlreadyUsed(meta?: AppErrorMeta) {
    return AppError.conflict(
      'This invitation code has already been used.',
      meta,
      'CODE_ALREADY_USED',
    );
  },

  codeExpired(meta?: AppErrorMeta) {
    return AppError.conflict('This invitation code has expired.', meta, 'CODE_EXPIRED');
  },

  emailMismatch(meta?: AppErrorMeta) {
    return AppError.validationError(
      'Email does not match the invitation.',
      meta,
      'EMAIL_MISMATCH',
    );
  },

  invitationNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Invitation not found.', meta, 'INVITATION_NOT_FOUND');
  },

  codeGenerationFailed(meta?: AppErrorMeta) {
    return AppError.internal('Could not generate a unique invitation code.', meta);
  },
} as const;
