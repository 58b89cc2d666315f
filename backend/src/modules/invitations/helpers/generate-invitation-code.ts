/**
 * backend/src/modules/invitations/helpers/generate-invitation-code.ts
 *
 * 15 random bytes -> exactly 20 base64url characters: short enough to type
 * from an email, far too many to guess.
 */

import { generateSecureToken } from '../../../shared/security/token';

export const INVITATION_CODE_BYTES = 15;
export const INVITATION_CODE_LENGTH = 20;

export function generateInvitationCode(): string {
  return generateSecureToken(INVITATION_CODE_BYTES);
}
