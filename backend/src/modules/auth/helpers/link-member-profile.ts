/**
 * backend/src/modules/auth/helpers/link-member-profile.ts
 *
 * WHY:
 * - Step 2 of activation: make sure the credential ends up with exactly one
 *   member profile, carrying the invitation's member number when it has one.
 *
 * RULES:
 * - Runs inside the activation transaction (repos are tx-bound).
 * - A numbered profile owned by another credential is re-linked only when that
 *   credential is an unactivated placeholder. Anything else is
 *   PROFILE_LINK_CONFLICT and needs an administrator.
 * - Status goes through resolveActivationStatus() on every path.
 */

import type { UserRepo } from '../../users';
import { hasUsablePassword } from '../../users';
import type { MemberRepo } from '../../members/dal/member.repo';
import type { Member } from '../../members/member.types';
import { resolveActivationStatus } from '../../members/policies/member-status.policy';
import { AuthErrors } from '../auth.errors';
import type { ProfileOutcome } from '../auth.types';

export type LinkMemberProfileResult = {
  member: Member;
  outcome: ProfileOutcome;
  /** Set when a profile was moved off a placeholder credential. */
  previousUserId: string | null;
};

async function applyActivationStatus(
  members: MemberRepo,
  member: Member,
  patch: { userId?: string; memberNumber?: string },
  now: Date,
): Promise<Member> {
  const updated = await members.update(
    member.id,
    { ...patch, status: resolveActivationStatus(member.status) },
    now,
  );
  if (!updated) {
    throw new Error(`member profile ${member.id} disappeared during activation`);
  }
  return updated;
}

export async function linkMemberProfile(params: {
  users: UserRepo;
  members: MemberRepo;
  userId: string;
  memberNumber: string | null;
  now: Date;
}): Promise<LinkMemberProfileResult> {
  const { users, members, userId, memberNumber, now } = params;

  const own = await members.findByUserId(userId);

  if (memberNumber) {
    const numbered = await members.findByMemberNumber(memberNumber);

    if (numbered && numbered.userId !== userId) {
      const holder = await users.findById(numbered.userId);
      if (holder && hasUsablePassword(holder)) {
        throw AuthErrors.profileLinkConflict({ memberId: numbered.id, holderUserId: holder.id });
      }
      if (own) {
        // Two profiles would end up on one credential.
        throw AuthErrors.profileLinkConflict({ memberId: numbered.id, ownMemberId: own.id });
      }

      const member = await applyActivationStatus(members, numbered, { userId }, now);
      return { member, outcome: 'relinked', previousUserId: numbered.userId };
    }

    if (numbered) {
      const member = await applyActivationStatus(members, numbered, {}, now);
      return { member, outcome: 'kept', previousUserId: null };
    }

    if (own) {
      const member = await applyActivationStatus(members, own, { memberNumber }, now);
      return { member, outcome: 'attached', previousUserId: null };
    }
  } else if (own) {
    const member = await applyActivationStatus(members, own, {}, now);
    return { member, outcome: 'kept', previousUserId: null };
  }

  const member = await members.create(
    { userId, memberNumber, status: resolveActivationStatus(null) },
    now,
  );
  return { member, outcome: 'created', previousUserId: null };
}
