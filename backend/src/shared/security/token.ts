/**
 * backend/src/shared/security/token.ts
 *
 * WHY:
 * - Random token generation should be consistent and strong across the system.
 * - Tokens are URL-safe: they travel in emails and get typed in by hand.
 *
 * HOW TO USE:
 * - generateSecureToken(15) -> 20 base64url characters
 */

import { randomBytes } from 'node:crypto';

export function generateSecureToken(bytes: number = 32): string {
  // URL-safe base64 (no + / =)
  return randomBytes(bytes).toString('base64url');
}
