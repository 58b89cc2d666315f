/**
 * backend/src/modules/auth/policies/login-gating.policy.ts
 *
 * WHY:
 * - Login gating is a security rule; keep it pure + unit-testable (no DB, no HTTP).
 * - The login flow needs a reason code for the failure audit, so the policy
 *   returns { reason, error } instead of throwing directly.
 *
 * RULES (checked in this order):
 * - no credential -> invalid credentials
 * - placeholder (no usable password) -> invalid credentials
 * - inactive credential -> invalid credentials
 * - wrong password -> invalid credentials
 * - suspended member profile -> 403
 *
 * The first four share one message so the response never reveals which
 * usernames exist.
 */

import type { User } from '../../users';
import { hasUsablePassword } from '../../users';
import type { Member } from '../../members/member.types';
import { isSuspended } from '../../members/policies/member-status.policy';
import type { AppError } from '../../../shared/http/errors';
import { AuthErrors } from '../auth.errors';

export type LoginCredentialFailureReason = 'user_not_found' | 'no_usable_password' | 'inactive';

export type LoginGatingFailure = {
  reason: LoginCredentialFailureReason | 'wrong_password' | 'suspended';
  error: AppError;
};

export function getLoginCredentialFailure(user: User | undefined): LoginGatingFailure | null {
  if (!user) {
    return { reason: 'user_not_found', error: AuthErrors.invalidCredentials() };
  }
  if (!hasUsablePassword(user)) {
    return { reason: 'no_usable_password', error: AuthErrors.invalidCredentials() };
  }
  if (!user.isActive) {
    return { reason: 'inactive', error: AuthErrors.invalidCredentials() };
  }
  return null;
}

/** A credential that passed getLoginCredentialFailure(). */
export type LoginableUser = User & { passwordHash: string };

export function assertLoginCredentialAllowed(
  user: User | undefined,
): asserts user is LoginableUser {
  const failure = getLoginCredentialFailure(user);
  if (failure) throw failure.error;
}

export function getPasswordFailure(passwordValid: boolean): LoginGatingFailure | null {
  return passwordValid ? null : { reason: 'wrong_password', error: AuthErrors.invalidCredentials() };
}

/** A member without a profile (e.g. a staff-only account) may still log in. */
export function getLoginMemberFailure(member: Member | undefined): LoginGatingFailure | null {
  if (member && isSuspended(member.status)) {
    return { reason: 'suspended', error: AuthErrors.accountSuspended({ memberId: member.id }) };
  }
  return null;
}
