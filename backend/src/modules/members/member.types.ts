/**
 * backend/src/modules/members/member.types.ts
 *
 * WHY:
 * - Domain types for chapter member profiles.
 * - A profile belongs to exactly one credential (users row) and carries the
 *   compliance fields the grace-period countdown works on.
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL.
 */

export const MEMBER_STATUSES = [
  'financial',
  'non_financial',
  'financial_life_member',
  'non_financial_life_member',
  'new_member',
  'suspended',
] as const;

export type MemberStatus = (typeof MEMBER_STATUSES)[number];

export type MemberId = string;

export type Member = {
  id: MemberId;
  userId: string;

  memberNumber: string | null;
  status: MemberStatus;
  duesCurrent: boolean;
  isOfficer: boolean;

  /** null = compliant; set = grace period started at this instant. */
  markedForRemovalAt: Date | null;
  removalReason: string;

  createdAt: Date;
  updatedAt: Date;
};

export type NewMember = {
  userId: string;
  memberNumber: string | null;
  status: MemberStatus;
  duesCurrent?: boolean;
  isOfficer?: boolean;
};

export type MemberPatch = Partial<
  Pick<
    Member,
    | 'userId'
    | 'memberNumber'
    | 'status'
    | 'duesCurrent'
    | 'isOfficer'
    | 'markedForRemovalAt'
    | 'removalReason'
  >
>;

/** Roster row: profile + the credential fields an administrator needs to see. */
export type MemberWithUser = Member & {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  isActive: boolean;
};

export function parseMemberStatus(value: string): MemberStatus {
  const match = MEMBER_STATUSES.find((s) => s === value);
  return match ?? 'non_financial';
}
