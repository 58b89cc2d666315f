/**
 * backend/src/modules/invitations/dal/invitation.inmem-repo.ts
 *
 * WHY:
 * - InvitationRepo for STORAGE_DRIVER=memory and service tests.
 * - Mirrors the unique index on code.
 *
 * RULES:
 * - Stored objects are never mutated; updates replace them. checkpoint() relies on it.
 */

import { randomUUID } from 'node:crypto';

import { UniqueViolationError } from '../../../shared/db/unique-violation';
import type { Invitation, InvitationStateFilter, NewInvitation } from '../invitation.types';
import { getInvitationState } from '../policies/invitation.policy';
import type { InvitationRepo } from './invitation.repo';
import { INVITATION_CODE_UNIQUE } from './invitation.repo';

export class InMemInvitationRepo implements InvitationRepo {
  private rows = new Map<string, Invitation>();

  findById(invitationId: string): Promise<Invitation | undefined> {
    return Promise.resolve(this.rows.get(invitationId));
  }

  findByCode(code: string): Promise<Invitation | undefined> {
    return Promise.resolve([...this.rows.values()].find((i) => i.code === code));
  }

  findByCodeForUpdate(code: string): Promise<Invitation | undefined> {
    return this.findByCode(code);
  }

  existsByCode(code: string): Promise<boolean> {
    return Promise.resolve([...this.rows.values()].some((i) => i.code === code));
  }

  list(filter: { state: InvitationStateFilter; now: Date }): Promise<Invitation[]> {
    const rows = [...this.rows.values()]
      .filter((i) => filter.state === 'all' || getInvitationState(i, filter.now) === filter.state)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
    return Promise.resolve(rows);
  }

  create(input: NewInvitation, now: Date): Promise<Invitation> {
    if ([...this.rows.values()].some((i) => i.code === input.code)) {
      return Promise.reject(new UniqueViolationError(INVITATION_CODE_UNIQUE));
    }

    const invitation: Invitation = {
      id: randomUUID(),
      ...input,
      isUsed: false,
      usedByUserId: null,
      usedAt: null,
      createdAt: now,
    };

    this.rows.set(invitation.id, invitation);
    return Promise.resolve(invitation);
  }

  markUsed(params: { invitationId: string; userId: string; usedAt: Date }): Promise<boolean> {
    const existing = this.rows.get(params.invitationId);
    if (!existing || existing.isUsed) return Promise.resolve(false);

    this.rows.set(existing.id, {
      ...existing,
      isUsed: true,
      usedByUserId: params.userId,
      usedAt: params.usedAt,
    });
    return Promise.resolve(true);
  }

  delete(invitationId: string): Promise<boolean> {
    return Promise.resolve(this.rows.delete(invitationId));
  }

  checkpoint(): () => void {
    const saved = new Map(this.rows);
    return () => {
      this.rows = saved;
    };
  }
}
