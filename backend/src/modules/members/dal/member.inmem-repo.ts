/**
 * backend/src/modules/members/dal/member.inmem-repo.ts
 *
 * WHY:
 * - MemberRepo for STORAGE_DRIVER=memory and service tests.
 * - Enforces the same unique keys as the migration (user_id, member_number).
 *
 * RULES:
 * - Stored objects are never mutated; updates replace them. checkpoint() relies on it.
 * - Needs the user store for the roster join.
 */

import { randomUUID } from 'node:crypto';

import { UniqueViolationError } from '../../../shared/db/unique-violation';
import type { InMemUserRepo } from '../../users/dal/user.inmem-repo';
import type { Member, MemberPatch, MemberWithUser, NewMember } from '../member.types';
import type { MemberRepo } from './member.repo';
import { MEMBER_NUMBER_UNIQUE, MEMBER_USER_UNIQUE } from './member.repo';

function compareNullableAsc(a: string | null, b: string | null): number {
  if (a === b) return 0;
  // Postgres sorts NULLs last in ascending order
  if (a === null) return 1;
  if (b === null) return -1;
  return a < b ? -1 : 1;
}

export class InMemMemberRepo implements MemberRepo {
  private rows = new Map<string, Member>();

  constructor(private readonly users: InMemUserRepo) {}

  private findViolation(candidate: Member): UniqueViolationError | null {
    for (const row of this.rows.values()) {
      if (row.id === candidate.id) continue;
      if (row.userId === candidate.userId) return new UniqueViolationError(MEMBER_USER_UNIQUE);
      if (candidate.memberNumber !== null && row.memberNumber === candidate.memberNumber) {
        return new UniqueViolationError(MEMBER_NUMBER_UNIQUE);
      }
    }
    return null;
  }

  findById(memberId: string): Promise<Member | undefined> {
    return Promise.resolve(this.rows.get(memberId));
  }

  findByIdForUpdate(memberId: string): Promise<Member | undefined> {
    return this.findById(memberId);
  }

  findByUserId(userId: string): Promise<Member | undefined> {
    return Promise.resolve([...this.rows.values()].find((m) => m.userId === userId));
  }

  findByMemberNumber(memberNumber: string): Promise<Member | undefined> {
    return Promise.resolve([...this.rows.values()].find((m) => m.memberNumber === memberNumber));
  }

  async list(): Promise<MemberWithUser[]> {
    const out: MemberWithUser[] = [];

    for (const member of this.rows.values()) {
      const user = await this.users.findById(member.userId);
      if (!user) continue;

      out.push({
        ...member,
        username: user.username,
        email: user.email,
        firstName: user.firstName,
        lastName: user.lastName,
        isActive: user.isActive,
      });
    }

    return out.sort(
      (a, b) =>
        compareNullableAsc(a.memberNumber, b.memberNumber) ||
        compareNullableAsc(a.username, b.username),
    );
  }

  listMarkedForRemovalBefore(cutoff: Date): Promise<Member[]> {
    const due = [...this.rows.values()]
      .filter(
        (m) =>
          m.markedForRemovalAt !== null && m.markedForRemovalAt.getTime() <= cutoff.getTime(),
      )
      .sort(
        (a, b) => (a.markedForRemovalAt?.getTime() ?? 0) - (b.markedForRemovalAt?.getTime() ?? 0),
      );
    return Promise.resolve(due);
  }

  create(input: NewMember, now: Date): Promise<Member> {
    const member: Member = {
      id: randomUUID(),
      userId: input.userId,
      memberNumber: input.memberNumber,
      status: input.status,
      duesCurrent: input.duesCurrent ?? false,
      isOfficer: input.isOfficer ?? false,
      markedForRemovalAt: null,
      removalReason: '',
      createdAt: now,
      updatedAt: now,
    };

    const violation = this.findViolation(member);
    if (violation) return Promise.reject(violation);

    this.rows.set(member.id, member);
    return Promise.resolve(member);
  }

  update(memberId: string, patch: MemberPatch, now: Date): Promise<Member | undefined> {
    const existing = this.rows.get(memberId);
    if (!existing) return Promise.resolve(undefined);

    const updated: Member = {
      ...existing,
      userId: patch.userId ?? existing.userId,
      memberNumber: patch.memberNumber !== undefined ? patch.memberNumber : existing.memberNumber,
      status: patch.status ?? existing.status,
      duesCurrent: patch.duesCurrent ?? existing.duesCurrent,
      isOfficer: patch.isOfficer ?? existing.isOfficer,
      markedForRemovalAt:
        patch.markedForRemovalAt !== undefined
          ? patch.markedForRemovalAt
          : existing.markedForRemovalAt,
      removalReason: patch.removalReason ?? existing.removalReason,
      updatedAt: now,
    };
    const violation = this.findViolation(updated);
    if (violation) return Promise.reject(violation);

    this.rows.set(memberId, updated);
    return Promise.resolve(updated);
  }

  delete(memberId: string): Promise<boolean> {
    return Promise.resolve(this.rows.delete(memberId));
  }

  checkpoint(): () => void {
    const saved = new Map(this.rows);
    return () => {
      this.rows = saved;
    };
  }
}
