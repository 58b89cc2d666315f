/**
 * backend/src/modules/members/dal/member.kysely-repo.ts
 *
 * RULES:
 * - Rows are mapped to camelCase domain types here and nowhere else.
 */

import type { Selectable, Updateable } from 'kysely';

import type { DbExecutor } from '../../../shared/db/db';
import type { MemberProfiles } from '../../../shared/db/schema';
import type { Member, MemberPatch, MemberWithUser, NewMember } from '../member.types';
import { parseMemberStatus } from '../member.types';
import type { MemberRepo } from './member.repo';

type MemberRow = Selectable<MemberProfiles>;

function toMember(row: MemberRow): Member {
  return {
    id: row.id,
    userId: row.user_id,
    memberNumber: row.member_number,
    status: parseMemberStatus(row.status),
    duesCurrent: row.dues_current,
    isOfficer: row.is_officer,
    markedForRemovalAt: row.marked_for_removal_at,
    removalReason: row.removal_reason,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toUpdate(patch: MemberPatch, now: Date): Updateable<MemberProfiles> {
  const out: Updateable<MemberProfiles> = { updated_at: now };
  if (patch.userId !== undefined) out.user_id = patch.userId;
  if (patch.memberNumber !== undefined) out.member_number = patch.memberNumber;
  if (patch.status !== undefined) out.status = patch.status;
  if (patch.duesCurrent !== undefined) out.dues_current = patch.duesCurrent;
  if (patch.isOfficer !== undefined) out.is_officer = patch.isOfficer;
  if (patch.markedForRemovalAt !== undefined) out.marked_for_removal_at = patch.markedForRemovalAt;
  if (patch.removalReason !== undefined) out.removal_reason = patch.removalReason;
  return out;
}

export class KyselyMemberRepo implements MemberRepo {
  constructor(private readonly db: DbExecutor) {}

  async findById(memberId: string): Promise<Member | undefined> {
    const row = await this.db
      .selectFrom('member_profiles')
      .selectAll()
      .where('id', '=', memberId)
      .executeTakeFirst();
    return row ? toMember(row) : undefined;
  }

  async findByIdForUpdate(memberId: string): Promise<Member | undefined> {
    const row = await this.db
      .selectFrom('member_profiles')
      .selectAll()
      .where('id', '=', memberId)
      .forUpdate()
      .executeTakeFirst();
    return row ? toMember(row) : undefined;
  }

  async findByUserId(userId: string): Promise<Member | undefined> {
    const row = await this.db
      .selectFrom('member_profiles')
      .selectAll()
      .where('user_id', '=', userId)
      .executeTakeFirst();
    return row ? toMember(row) : undefined;
  }

  async findByMemberNumber(memberNumber: string): Promise<Member | undefined> {
    const row = await this.db
      .selectFrom('member_profiles')
      .selectAll()
      .where('member_number', '=', memberNumber)
      .executeTakeFirst();
    return row ? toMember(row) : undefined;
  }

  async list(): Promise<MemberWithUser[]> {
    const rows = await this.db
      .selectFrom('member_profiles')
      .innerJoin('users', 'users.id', 'member_profiles.user_id')
      .selectAll('member_profiles')
      .select([
        'users.username',
        'users.email',
        'users.first_name',
        'users.last_name',
        'users.is_active',
      ])
      .orderBy('member_profiles.member_number', 'asc')
      .orderBy('users.username', 'asc')
      .execute();

    return rows.map((row) => ({
      ...toMember(row),
      username: row.username,
      email: row.email,
      firstName: row.first_name,
      lastName: row.last_name,
      isActive: row.is_active,
    }));
  }

  async listMarkedForRemovalBefore(cutoff: Date): Promise<Member[]> {
    const rows = await this.db
      .selectFrom('member_profiles')
      .selectAll()
      .where('marked_for_removal_at', 'is not', null)
      .where('marked_for_removal_at', '<=', cutoff)
      .orderBy('marked_for_removal_at', 'asc')
      .execute();
    return rows.map(toMember);
  }

  async create(input: NewMember, now: Date): Promise<Member> {
    const row = await this.db
      .insertInto('member_profiles')
      .values({
        user_id: input.userId,
        member_number: input.memberNumber,
        status: input.status,
        dues_current: input.duesCurrent ?? false,
        is_officer: input.isOfficer ?? false,
        marked_for_removal_at: null,
        created_at: now,
        updated_at: now,
      })
      .returningAll()
      .executeTakeFirstOrThrow();
    return toMember(row);
  }

  async update(memberId: string, patch: MemberPatch, now: Date): Promise<Member | undefined> {
    const row = await this.db
      .updateTable('member_profiles')
      .set(toUpdate(patch, now))
      .where('id', '=', memberId)
      .returningAll()
      .executeTakeFirst();
    return row ? toMember(row) : undefined;
  }

  async delete(memberId: string): Promise<boolean> {
    const res = await this.db
      .deleteFrom('member_profiles')
      .where('id', '=', memberId)
      .executeTakeFirst();
    return Number(res.numDeletedRows) > 0;
  }
}
