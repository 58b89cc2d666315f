/**
 * backend/src/modules/auth/helpers/email-domain.ts
 *
 * WHY:
 * - PII-minimized logging: auth flows log the domain, never the full address.
 *
 * RULES:
 * - Pure function. Never throws.
 */

export function emailDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at >= 0 ? email.slice(at + 1).toLowerCase() : '';
}
