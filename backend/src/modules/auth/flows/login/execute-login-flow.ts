/**
 * backend/src/modules/auth/flows/login/execute-login-flow.ts
 *
 * WHY:
 * - Keeps AuthService thin while isolating the login sequence.
 * - Two audit paths, each in its own transaction:
 *   - success audit after every check passed
 *   - failure audit with the reason code (never the identifier itself)
 *
 * RULES:
 * - No HTTP concerns here (controller sets the cookie).
 * - Identifier = username, or an email address when it contains '@' and no
 *   username matches. An email shared by several accounts does not log in.
 * - Rate limit per identifier key + per IP before any lookup.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import type { SessionStore } from '../../../../shared/session/session.store';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import type { Clock } from '../../../../shared/time/clock';
import type { DataStore } from '../../../_shared/data-store';
import type { User, UserRepo } from '../../../users';

import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { auditLoginFailed, auditLoginSuccess } from '../../auth.audit';
import type { LoginParams, LoginResult } from '../../auth.types';
import { createAuthSession } from '../../helpers/create-auth-session';
import {
  assertLoginCredentialAllowed,
  getLoginCredentialFailure,
  getLoginMemberFailure,
  getPasswordFailure,
  type LoginGatingFailure,
} from '../../policies/login-gating.policy';

const FLOW = 'auth.login';

async function findUserByIdentifier(
  users: UserRepo,
  identifier: string,
): Promise<User | undefined> {
  const byUsername = await users.findByUsername(identifier);
  if (byUsername || !identifier.includes('@')) return byUsername;

  const byEmail = await users.findByEmail(identifier);
  return byEmail.length === 1 ? byEmail[0] : undefined;
}

export async function executeLoginFlow(
  deps: {
    store: DataStore;
    passwordHasher: PasswordHasher;
    tokenHasher: TokenHasher;
    rateLimiter: RateLimiter;
    sessionStore: SessionStore;
    logger: Logger;
    clock: Clock;
  },
  params: LoginParams,
): Promise<{ result: LoginResult; sessionId: string }> {
  const identifier = params.identifier.trim();
  const identifierKey = deps.tokenHasher.hash(identifier.toLowerCase());
  const { requestId, ip } = params.request;

  deps.logger.info({ msg: 'auth.login.start', flow: FLOW, requestId, identifierKey });

  await deps.rateLimiter.hitOrThrow({
    key: `login:identifier:${identifierKey}`,
    ...AUTH_RATE_LIMITS.login.perIdentifier,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `login:ip:${ip}`,
    ...AUTH_RATE_LIMITS.login.perIp,
  });

  const { repos } = deps.store;

  const reject = async (
    failure: LoginGatingFailure,
    context: { userId?: string; memberId?: string },
  ): Promise<never> => {
    await deps.store.transaction((trx) =>
      auditLoginFailed(
        new AuditWriter(trx.audit, params.request).withContext({
          userId: context.userId ?? null,
          memberId: context.memberId ?? null,
        }),
        { identifierKey, reason: failure.reason },
      ),
    );
    deps.logger.info({
      msg: 'auth.login.rejected',
      flow: FLOW,
      requestId,
      identifierKey,
      reason: failure.reason,
    });
    throw failure.error;
  };

  const user = await findUserByIdentifier(repos.users, identifier);

  const credentialFailure = getLoginCredentialFailure(user);
  if (credentialFailure) {
    return reject(credentialFailure, { userId: user?.id });
  }
  assertLoginCredentialAllowed(user);

  const passwordValid = await deps.passwordHasher.verify(params.password, user.passwordHash);
  const passwordFailure = getPasswordFailure(passwordValid);
  if (passwordFailure) {
    return reject(passwordFailure, { userId: user.id });
  }

  const member = await repos.members.findByUserId(user.id);
  const memberFailure = getLoginMemberFailure(member);
  if (memberFailure) {
    return reject(memberFailure, { userId: user.id, memberId: member?.id });
  }

  const { sessionId, capabilities } = await createAuthSession({
    sessionStore: deps.sessionStore,
    userId: user.id,
    isStaff: user.isStaff,
    isOfficer: member?.isOfficer ?? false,
    now: deps.clock(),
  });

  await deps.store.transaction((trx) =>
    auditLoginSuccess(
      new AuditWriter(trx.audit, params.request).withContext({
        userId: user.id,
        memberId: member?.id ?? null,
      }),
      { username: user.username, capabilities },
    ),
  );

  deps.logger.info({
    msg: 'auth.login.success',
    flow: FLOW,
    requestId,
    userId: user.id,
    memberId: member?.id ?? null,
    capabilities,
  });

  return {
    sessionId,
    result: {
      user: {
        id: user.id,
        username: user.username,
        email: user.email,
        firstName: user.firstName,
        lastName: user.lastName,
      },
      member: member
        ? { id: member.id, memberNumber: member.memberNumber, status: member.status }
        : null,
      capabilities,
    },
  };
}
