/**
 * src/modules/auth/auth.service.ts
 *
 * WHY:
 * - Entry point for account activation (signup with an invitation code),
 *   login and logout.
 * - Activation and login are deep flows (./flows); this class only holds deps.
 *
 * RULES:
 * - Never store/log raw passwords or codes.
 * - Signup does NOT create a session: the member signs in afterwards with the
 *   credentials they just chose.
 */

import type { Logger } from '../../shared/logger/logger';
import type { PasswordHasher } from '../../shared/security/password-hasher';
import type { TokenHasher } from '../../shared/security/token-hasher';
import type { RateLimiter } from '../../shared/security/rate-limit';
import type { SessionStore } from '../../shared/session/session.store';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { RequestContext } from '../../shared/http/request-context';
import type { Clock } from '../../shared/time/clock';
import type { DataStore } from '../_shared/data-store';

import { auditLogout } from './auth.audit';
import type { ActivateAccountParams, ActivationResult, LoginParams, LoginResult } from './auth.types';
import { executeActivateAccountFlow } from './flows/activate/execute-activate-account-flow';
import { executeLoginFlow } from './flows/login/execute-login-flow';

export type AuthServiceDeps = {
  store: DataStore;
  passwordHasher: PasswordHasher;
  tokenHasher: TokenHasher;
  rateLimiter: RateLimiter;
  sessionStore: SessionStore;
  logger: Logger;
  clock: Clock;
};

export class AuthService {
  constructor(private readonly deps: AuthServiceDeps) {}

  activateAccount(params: ActivateAccountParams): Promise<ActivationResult> {
    return executeActivateAccountFlow(this.deps, params);
  }

  login(params: LoginParams): Promise<{ result: LoginResult; sessionId: string }> {
    return executeLoginFlow(this.deps, params);
  }

  /** Idempotent: an unknown or expired session still logs out cleanly. */
  async logout(params: {
    sessionId: string | null;
    userId: string | null;
    request: RequestContext;
  }): Promise<void> {
    if (!params.sessionId) return;

    await this.deps.sessionStore.destroy(params.sessionId);

    if (params.userId) {
      const userId = params.userId;
      await this.deps.store.transaction((repos) =>
        auditLogout(new AuditWriter(repos.audit, { ...params.request, userId })),
      );
    }

    this.deps.logger.info({
      msg: 'auth.logout.success',
      flow: 'auth.logout',
      requestId: params.request.requestId,
      userId: params.userId,
    });
  }
}
