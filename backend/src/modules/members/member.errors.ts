/**
 * backend/src/modules/members/member.errors.ts
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Compliance reuses memberNotFound; it has no member lookup of its own.
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const MemberErrors = {
  memberNotFound(meta?: AppErrorMeta) {
    return AppError.notFound('Member not found.', meta, 'MEMBER_NOT_FOUND');
  },

  memberNumberTaken(meta?: AppErrorMeta) {
    return AppError.conflict(
      'That member number is already assigned to another member.',
      meta,
      'MEMBER_NUMBER_TAKEN',
    );
  },

  usernameTaken(meta?: AppErrorMeta) {
    return AppError.conflict('That username is already taken.', meta, 'USERNAME_TAKEN');
  },
} as const;
