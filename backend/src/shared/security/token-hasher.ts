/**
 * backend/src/shared/security/token-hasher.ts
 *
 * WHY:
 * - Emails and other identifiers go into rate-limit keys and logs as a hash,
 *   never in clear text.
 *
 * NOTE:
 * - Callers depend on the interface; today the implementation is SHA-256.
 */

export interface TokenHasher {
  hash(raw: string): string;
}
