/**
 * backend/src/modules/invitations/dal/invitation.repo.ts
 *
 * WHY:
 * - Storage contract for invitation codes.
 *
 * RULES:
 * - No transactions started here (DataStore owns tx).
 * - No AppError.
 * - No policies: state filtering uses the same definition as getInvitationState().
 */

import type { Invitation, InvitationStateFilter, NewInvitation } from '../invitation.types';

export const INVITATION_CODE_UNIQUE = 'invitation_codes_code_key';

export interface InvitationRepo {
  findById(invitationId: string): Promise<Invitation | undefined>;
  findByCode(code: string): Promise<Invitation | undefined>;

  /** Locks the row until the surrounding transaction ends (Postgres). */
  findByCodeForUpdate(code: string): Promise<Invitation | undefined>;

  existsByCode(code: string): Promise<boolean>;

  /** Newest first. */
  list(filter: { state: InvitationStateFilter; now: Date }): Promise<Invitation[]>;

  create(input: NewInvitation, now: Date): Promise<Invitation>;

  /**
   * unused -> used, only if still unused.
   * Returns true if updated, false if someone else redeemed it first.
   */
  markUsed(params: { invitationId: string; userId: string; usedAt: Date }): Promise<boolean>;

  delete(invitationId: string): Promise<boolean>;
}
