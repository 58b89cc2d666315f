/**
 * src/modules/auth/auth.errors.ts
 *
 * WHY:
 * - Auth module owns its domain-specific error semantics.
 * - Login errors never reveal whether a username exists.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Never include passwords, codes, or hashes in meta.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const AuthErrors = {
  /** Login: unknown user or wrong password. Intentionally vague. */
  invalidCredentials(meta?: AppErrorMeta) {
    return AppError.unauthorized('Invalid username or password.', meta);
  },

  accountSuspended(meta?: AppErrorMeta) {
    return AppError.forbidden('Your membership has been suspended.', meta);
  },

  /** The chosen username belongs to an account that already has a password. */
  usernameConflict(meta?: AppErrorMeta) {
    return AppError.conflict(
      'That username is already taken. Please choose another.',
      meta,
      'USERNAME_CONFLICT',
    );
  },

  /** The invitation's member number is bound to another active account. */
  profileLinkConflict(meta?: AppErrorMeta) {
    return AppError.conflict(
      'This member number is already linked to another account. Please contact an administrator.',
      meta,
      'PROFILE_LINK_CONFLICT',
    );
  },

  /** Unexpected failure while activating; nothing was committed. */
  activationFailed(meta?: AppErrorMeta) {
    return AppError.internal(
      'We could not activate your account. Please try again or contact an administrator.',
      meta,
      'ACTIVATION_FAILED',
    );
  },
} as const;
