/**
 * src/modules/auth/auth.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call for signup, login and logout.
 * - Sets the session cookie on login, clears it on logout.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Cookie logic lives in shared/session/set-session-cookie (DRY).
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { clearSessionCookie, setSessionCookie } from '../../shared/session/set-session-cookie';
import { loginSchema, signupSchema } from './auth.schemas';
import type { AuthService } from './auth.service';

export class AuthController {
  constructor(
    private readonly authService: AuthService,
    private readonly isProduction: boolean,
  ) {}

  async signup(req: FastifyRequest, reply: FastifyReply) {
    const parsed = signupSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const result = await this.authService.activateAccount({
      ...parsed.data,
      request: req.requestContext,
    });

    return reply.status(201).send({
      userId: result.userId,
      memberId: result.memberId,
      username: result.username,
      memberNumber: result.memberNumber,
      status: result.status,
    });
  }

  async login(req: FastifyRequest, reply: FastifyReply) {
    const parsed = loginSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', {
        issues: parsed.error.issues,
      });
    }

    const { result, sessionId } = await this.authService.login({
      identifier: parsed.data.identifier,
      password: parsed.data.password,
      request: req.requestContext,
    });

    setSessionCookie(reply, sessionId, this.isProduction);
    return reply.status(200).send(result);
  }

  async logout(req: FastifyRequest, reply: FastifyReply) {
    await this.authService.logout({
      sessionId: req.authContext.sessionId ?? null,
      userId: req.authContext.userId ?? null,
      request: req.requestContext,
    });

    clearSessionCookie(reply, this.isProduction);
    return reply.status(204).send();
  }
}
