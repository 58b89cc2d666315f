/**
 * backend/src/modules/auth/flows/activate/execute-activate-account-flow.ts
 *
 * WHY:
 * - "Flow" = deep module for one end-to-end use-case.
 * - Redeeming an invitation touches three tables; either all of it commits or none of it.
 *
 * SEQUENCE (one transaction):
 * 1) lock the invitation row, re-validate it (state may have changed since /validate)
 * 2) ensureCredential: create, or adopt a placeholder
 * 3) linkMemberProfile: create / attach / re-link / keep
 * 4) markUsed (conditional on is_used = false) is the LAST write
 * 5) audits, same transaction
 *
 * RULES:
 * - bcrypt runs before the transaction so the row lock is held briefly.
 * - Rate limit at the start (before any DB work).
 * - Known failures (AppError) pass through unchanged. Unique violations become
 *   the matching conflict. Anything else is logged and becomes ACTIVATION_FAILED.
 * - Never log the code or the password.
 */

import type { Logger } from '../../../../shared/logger/logger';
import type { PasswordHasher } from '../../../../shared/security/password-hasher';
import type { TokenHasher } from '../../../../shared/security/token-hasher';
import type { RateLimiter } from '../../../../shared/security/rate-limit';
import { AuditWriter } from '../../../../shared/audit/audit.writer';
import { AppError } from '../../../../shared/http/errors';
import {
  getViolatedConstraint,
  isUniqueViolation,
} from '../../../../shared/db/unique-violation';
import type { Clock } from '../../../../shared/time/clock';
import type { DataStore } from '../../../_shared/data-store';

import { USERNAME_UNIQUE } from '../../../users';
import { MEMBER_NUMBER_UNIQUE, MEMBER_USER_UNIQUE } from '../../../members/dal/member.repo';
import { InvitationErrors } from '../../../invitations/invitation.errors';
import {
  assertInvitationRedeemable,
  getInvitationFailure,
} from '../../../invitations/policies/invitation.policy';

import { AUTH_RATE_LIMITS } from '../../auth.constants';
import { AuthErrors } from '../../auth.errors';
import { writeActivationAudits } from '../../auth.audit';
import type { ActivateAccountParams, ActivationResult } from '../../auth.types';
import { emailDomain } from '../../helpers/email-domain';
import { ensureCredential } from '../../helpers/ensure-credential';
import { linkMemberProfile } from '../../helpers/link-member-profile';

const FLOW = 'auth.activate';

function pickName(fromInvitation: string, fromForm: string): string {
  return fromInvitation.trim() !== '' ? fromInvitation.trim() : fromForm.trim();
}

function mapUniqueViolation(err: unknown): AppError | null {
  if (!isUniqueViolation(err)) return null;

  const constraint = getViolatedConstraint(err);
  if (constraint === USERNAME_UNIQUE) return AuthErrors.usernameConflict({ constraint });
  if (constraint === MEMBER_NUMBER_UNIQUE || constraint === MEMBER_USER_UNIQUE) {
    return AuthErrors.profileLinkConflict({ constraint });
  }
  return null;
}

export async function executeActivateAccountFlow(
  deps: {
    store: DataStore;
    passwordHasher: PasswordHasher;
    tokenHasher: TokenHasher;
    rateLimiter: RateLimiter;
    logger: Logger;
    clock: Clock;
  },
  params: ActivateAccountParams,
): Promise<ActivationResult> {
  const email = params.email.trim();
  const emailKey = deps.tokenHasher.hash(email.toLowerCase());
  const username = params.username.trim();
  const { requestId, ip } = params.request;

  deps.logger.info({
    msg: 'auth.activate.start',
    flow: FLOW,
    requestId,
    emailDomain: emailDomain(email),
    emailKey,
  });

  await deps.rateLimiter.hitOrThrow({
    key: `signup:email:${emailKey}`,
    ...AUTH_RATE_LIMITS.signup.perEmail,
  });
  await deps.rateLimiter.hitOrThrow({
    key: `signup:ip:${ip}`,
    ...AUTH_RATE_LIMITS.signup.perIp,
  });

  const passwordHash = await deps.passwordHasher.hash(params.password);
  const now = deps.clock();

  // Filled in as the transaction progresses; read by the failure log.
  const trace: { invitationId: string | null } = { invitationId: null };

  try {
    const result = await deps.store.transaction(async (repos): Promise<ActivationResult> => {
      const invitation = await repos.invitations.findByCodeForUpdate(params.code.trim());

      const failure = getInvitationFailure(invitation, email, now);
      if (failure) {
        deps.logger.info({
          msg: 'auth.activate.rejected',
          flow: FLOW,
          requestId,
          reason: failure.reason,
          invitationId: invitation?.id ?? null,
        });
      }
      assertInvitationRedeemable(invitation, email, now);
      trace.invitationId = invitation.id;

      const credential = await ensureCredential({
        users: repos.users,
        username,
        email,
        passwordHash,
        firstName: pickName(invitation.firstName, params.firstName),
        lastName: pickName(invitation.lastName, params.lastName),
        now,
      });

      const profile = await linkMemberProfile({
        users: repos.users,
        members: repos.members,
        userId: credential.user.id,
        memberNumber: invitation.memberNumber,
        now,
      });

      const marked = await repos.invitations.markUsed({
        invitationId: invitation.id,
        userId: credential.user.id,
        usedAt: now,
      });
      if (!marked) {
        throw InvitationErrors.codeAlreadyUsed({ invitationId: invitation.id });
      }

      const activation: ActivationResult = {
        userId: credential.user.id,
        memberId: profile.member.id,
        username: credential.user.username,
        memberNumber: profile.member.memberNumber,
        status: profile.member.status,
        credential: credential.outcome,
        profile: profile.outcome,
      };

      const audit = new AuditWriter(repos.audit, {
        ...params.request,
        userId: activation.userId,
        memberId: activation.memberId,
      });
      await writeActivationAudits(audit, {
        invitationId: invitation.id,
        result: activation,
        previousUserId: profile.previousUserId,
      });

      return activation;
    });

    deps.logger.info({
      msg: 'auth.activate.success',
      flow: FLOW,
      requestId,
      invitationId: trace.invitationId,
      userId: result.userId,
      memberId: result.memberId,
      credential: result.credential,
      profile: result.profile,
    });

    return result;
  } catch (err) {
    const known = err instanceof AppError ? err : mapUniqueViolation(err);
    if (known) {
      deps.logger.warn({
        msg: 'auth.activate.refused',
        flow: FLOW,
        requestId,
        invitationId: trace.invitationId,
        code: known.code,
        reason: known.reason ?? null,
      });
      throw known;
    }

    deps.logger.error({
      msg: 'auth.activate.failed',
      flow: FLOW,
      requestId,
      invitationId: trace.invitationId,
      username,
      error: err instanceof Error ? err.message : String(err),
    });
    throw AuthErrors.activationFailed({ invitationId: trace.invitationId });
  }
}
