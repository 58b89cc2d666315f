/**
 * backend/src/modules/members/dal/member.repo.ts
 *
 * WHY:
 * - Storage contract for member profiles.
 * - Two implementations: Kysely (Postgres) and in-memory (tests, STORAGE_DRIVER=memory).
 *
 * RULES:
 * - No transactions started here (DataStore owns tx).
 * - No AppError. No policies.
 * - Unique violations surface as errors matched by isUniqueViolation().
 */

import type { Member, MemberPatch, MemberWithUser, NewMember } from '../member.types';

export const MEMBER_NUMBER_UNIQUE = 'member_profiles_member_number_key';
export const MEMBER_USER_UNIQUE = 'member_profiles_user_id_key';

export interface MemberRepo {
  findById(memberId: string): Promise<Member | undefined>;

  /** Locks the row until the surrounding transaction ends (Postgres). */
  findByIdForUpdate(memberId: string): Promise<Member | undefined>;

  findByUserId(userId: string): Promise<Member | undefined>;
  findByMemberNumber(memberNumber: string): Promise<Member | undefined>;

  /** Roster with credential fields, ordered by member number then username. */
  list(): Promise<MemberWithUser[]>;

  /** Members whose grace period started at or before `cutoff`. */
  listMarkedForRemovalBefore(cutoff: Date): Promise<Member[]>;

  create(input: NewMember, now: Date): Promise<Member>;

  /** Returns the updated row, or undefined if the member no longer exists. */
  update(memberId: string, patch: MemberPatch, now: Date): Promise<Member | undefined>;

  delete(memberId: string): Promise<boolean>;
}
