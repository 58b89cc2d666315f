/**
 * backend/src/modules/invitations/policies/invitation.policy.ts
 *
 * WHY:
 * - Centralizes invitation redemption rules.
 * - Pure logic (no DB / no I/O) => easy to unit test.
 *
 * RULES:
 * - Pure functions only.
 * - Pass "now" for deterministic tests.
 * - Check order: not found -> expired -> used -> email.
 *   An expired code reports CODE_EXPIRED whether or not it was used.
 */

import type { AppError } from '../../../shared/http/errors';
import type { Invitation, InvitationState } from '../invitation.types';
import { InvitationErrors, type InvitationFailureReason } from '../invitation.errors';

export type InvitationFailure = {
  reason: InvitationFailureReason;
  error: AppError;
};

export function isInvitationExpired(invitation: Invitation, now: Date): boolean {
  return invitation.expiresAt !== null && now.getTime() > invitation.expiresAt.getTime();
}

export function emailsMatch(a: string, b: string): boolean {
  return a.trim().toLowerCase() === b.trim().toLowerCase();
}

export function getInvitationFailure(
  invitation: Invitation | undefined,
  email: string,
  now: Date,
): InvitationFailure | null {
  if (!invitation) {
    return { reason: 'INVALID_CODE', error: InvitationErrors.invalidCode() };
  }

  const meta = { invitationId: invitation.id };

  if (isInvitationExpired(invitation, now)) {
    return { reason: 'CODE_EXPIRED', error: InvitationErrors.codeExpired(meta) };
  }

  if (invitation.isUsed) {
    return { reason: 'CODE_ALREADY_USED', error: InvitationErrors.codeAlreadyUsed(meta) };
  }

  if (!emailsMatch(invitation.email, email)) {
    return { reason: 'EMAIL_MISMATCH', error: InvitationErrors.emailMismatch(meta) };
  }

  return null;
}

export function assertInvitationRedeemable(
  invitation: Invitation | undefined,
  email: string,
  now: Date,
): asserts invitation is Invitation {
  const failure = getInvitationFailure(invitation, email, now);
  if (failure) throw failure.error;
}

export function getInvitationState(invitation: Invitation, now: Date): InvitationState {
  if (invitation.isUsed) return 'used';
  if (isInvitationExpired(invitation, now)) return 'expired';
  return 'active';
}
