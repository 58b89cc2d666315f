/**
 * backend/src/shared/session/set-session-cookie.ts
 *
 * WHY:
 * - Login and logout set/clear the same cookie with the same flags.
 * - HttpOnly / SameSite=Strict / Secure (prod) rules are defined in one place.
 *
 * RULES:
 * - No business logic here.
 * - Receives isProduction from the caller (injected at construction time).
 */

import type { FastifyReply } from 'fastify';
import { SESSION_COOKIE_NAME } from './session.types';

function cookieParts(value: string, isProduction: boolean, extra: string[] = []): string {
  const parts = [`${SESSION_COOKIE_NAME}=${value}`, 'Path=/', 'HttpOnly', 'SameSite=Strict', ...extra];

  if (isProduction) {
    parts.push('Secure');
  }

  return parts.join('; ');
}

export function setSessionCookie(
  reply: FastifyReply,
  sessionId: string,
  isProduction: boolean,
): void {
  reply.header('Set-Cookie', cookieParts(sessionId, isProduction));
}

export function clearSessionCookie(reply: FastifyReply, isProduction: boolean): void {
  // Max-Age=0 instructs the browser to delete the cookie immediately.
  reply.header('Set-Cookie', cookieParts('', isProduction, ['Max-Age=0']));
}
