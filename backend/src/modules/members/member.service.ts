/**
 * backend/src/modules/members/member.service.ts
 *
 * WHY:
 * - Administrator-facing roster: provision placeholder accounts, read and edit the roster.
 * - A provisioned member has a credential with NO usable password. The person
 *   claims it later by signing up with an invitation code for the same username
 *   or member number.
 *
 * RULES:
 * - Only place in this module allowed to start transactions.
 * - Status always goes through deriveMemberStatus() before it is saved.
 * - Granting or revoking staff requires a staff caller.
 * - Capabilities are frozen into a session at login: an edit that changes them,
 *   or suspends the member, ends every session the member holds.
 */

import type { Logger } from '../../shared/logger/logger';
import { AuditWriter } from '../../shared/audit/audit.writer';
import { AppError } from '../../shared/http/errors';
import type { RequestContext } from '../../shared/http/request-context';
import type { SessionStore } from '../../shared/session/session.store';
import { getViolatedConstraint, isUniqueViolation } from '../../shared/db/unique-violation';
import type { Clock } from '../../shared/time/clock';
import type { DataStore } from '../_shared/data-store';
import { USERNAME_UNIQUE } from '../users';
import { daysUntilRemoval } from '../compliance/policies/grace-period.policy';

import { MEMBER_NUMBER_UNIQUE } from './dal/member.repo';
import { MemberErrors } from './member.errors';
import { auditMemberProvisioned, auditMemberUpdated, type MemberChanges } from './member.audit';
import type { Member, MemberStatus, MemberWithUser } from './member.types';
import { deriveMemberStatus, isSuspended } from './policies/member-status.policy';
import { hasAnyCapability, type Capability } from './policies/capability.policy';

export type CreateMemberParams = {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  memberNumber: string | null;
  status: MemberStatus;
  duesCurrent: boolean;
  isOfficer: boolean;
  isStaff: boolean;
  actor: { userId: string; capabilities: readonly Capability[] };
  request: RequestContext;
};

export type MemberUpdate = {
  memberNumber?: string | null;
  status?: MemberStatus;
  duesCurrent?: boolean;
  isOfficer?: boolean;
  isStaff?: boolean;
};

export type UpdateMemberParams = {
  memberId: string;
  patch: MemberUpdate;
  actor: { userId: string; capabilities: readonly Capability[] };
  request: RequestContext;
};

export type RosterEntry = MemberWithUser & { daysUntilRemoval: number | null };

function rethrowUniqueViolation(err: unknown, memberNumber: string | null | undefined): never {
  if (!isUniqueViolation(err)) throw err;

  const constraint = getViolatedConstraint(err);
  if (constraint === USERNAME_UNIQUE) throw MemberErrors.usernameTaken();
  if (constraint === MEMBER_NUMBER_UNIQUE) throw MemberErrors.memberNumberTaken({ memberNumber });
  throw err;
}

export class MemberService {
  constructor(
    private readonly deps: {
      store: DataStore;
      sessionStore: SessionStore;
      logger: Logger;
      clock: Clock;
      graceDays: number;
    },
  ) {}

  private toRosterEntry(member: MemberWithUser, now: Date): RosterEntry {
    return { ...member, daysUntilRemoval: daysUntilRemoval(member, now, this.deps.graceDays) };
  }

  async createMember(params: CreateMemberParams): Promise<RosterEntry> {
    const now = this.deps.clock();

    if (params.isStaff && !hasAnyCapability(params.actor.capabilities, ['staff'])) {
      throw AppError.forbidden('Only staff can grant staff access.');
    }

    let created: MemberWithUser;
    try {
      created = await this.deps.store.transaction(async (repos) => {
        if (await repos.users.findByUsername(params.username)) {
          throw MemberErrors.usernameTaken();
        }
        if (params.memberNumber && (await repos.members.findByMemberNumber(params.memberNumber))) {
          throw MemberErrors.memberNumberTaken({ memberNumber: params.memberNumber });
        }

        const user = await repos.users.create(
          {
            username: params.username,
            email: params.email,
            firstName: params.firstName,
            lastName: params.lastName,
            passwordHash: null,
            isActive: false,
            isStaff: params.isStaff,
          },
          now,
        );

        const member: Member = await repos.members.create(
          {
            userId: user.id,
            memberNumber: params.memberNumber,
            status: deriveMemberStatus({
              status: params.status,
              duesCurrent: params.duesCurrent,
            }),
            duesCurrent: params.duesCurrent,
            isOfficer: params.isOfficer,
          },
          now,
        );

        const audit = new AuditWriter(repos.audit, {
          ...params.request,
          userId: params.actor.userId,
          memberId: member.id,
        });
        await auditMemberProvisioned(audit, { member, username: user.username });

        return {
          ...member,
          username: user.username,
          email: user.email,
          firstName: user.firstName,
          lastName: user.lastName,
          isActive: user.isActive,
        };
      });
    } catch (err) {
      rethrowUniqueViolation(err, params.memberNumber);
    }

    this.deps.logger.info({
      msg: 'members.create.success',
      flow: 'members.create',
      requestId: params.request.requestId,
      memberId: created.id,
      createdByUserId: params.actor.userId,
    });

    return this.toRosterEntry(created, now);
  }

  /**
   * Edits roster fields. Status is re-derived from the resulting dues flag, so
   * `{ status: 'financial', duesCurrent: false }` saves non_financial.
   */
  async updateMember(params: UpdateMemberParams): Promise<RosterEntry> {
    const now = this.deps.clock();
    const { patch } = params;

    if (patch.isStaff !== undefined && !hasAnyCapability(params.actor.capabilities, ['staff'])) {
      throw AppError.forbidden('Only staff can grant staff access.');
    }

    let outcome: { entry: MemberWithUser; endSessions: boolean };
    try {
      outcome = await this.deps.store.transaction(async (repos) => {
        const member = await repos.members.findByIdForUpdate(params.memberId);
        const user = member ? await repos.users.findById(member.userId) : undefined;
        if (!member || !user) throw MemberErrors.memberNotFound({ memberId: params.memberId });

        if (patch.memberNumber && patch.memberNumber !== member.memberNumber) {
          const holder = await repos.members.findByMemberNumber(patch.memberNumber);
          if (holder && holder.id !== member.id) {
            throw MemberErrors.memberNumberTaken({ memberNumber: patch.memberNumber });
          }
        }

        const duesCurrent = patch.duesCurrent ?? member.duesCurrent;
        const updated = await repos.members.update(
          member.id,
          {
            memberNumber: patch.memberNumber,
            status: deriveMemberStatus({ status: patch.status ?? member.status, duesCurrent }),
            duesCurrent,
            isOfficer: patch.isOfficer,
          },
          now,
        );
        if (!updated) throw MemberErrors.memberNotFound({ memberId: member.id });

        const isStaff = patch.isStaff ?? user.isStaff;
        if (isStaff !== user.isStaff) {
          await repos.users.setStaff(user.id, isStaff, now);
        }

        const changes: MemberChanges = {};
        if (updated.memberNumber !== member.memberNumber) {
          changes.memberNumber = { from: member.memberNumber, to: updated.memberNumber };
        }
        if (updated.status !== member.status) {
          changes.status = { from: member.status, to: updated.status };
        }
        if (updated.duesCurrent !== member.duesCurrent) {
          changes.duesCurrent = { from: member.duesCurrent, to: updated.duesCurrent };
        }
        if (updated.isOfficer !== member.isOfficer) {
          changes.isOfficer = { from: member.isOfficer, to: updated.isOfficer };
        }
        if (isStaff !== user.isStaff) {
          changes.isStaff = { from: user.isStaff, to: isStaff };
        }

        if (Object.keys(changes).length > 0) {
          const audit = new AuditWriter(repos.audit, {
            ...params.request,
            userId: params.actor.userId,
            memberId: member.id,
          });
          await auditMemberUpdated(audit, changes);
        }

        const endSessions =
          changes.isOfficer !== undefined ||
          changes.isStaff !== undefined ||
          (changes.status !== undefined && isSuspended(updated.status));

        return {
          entry: {
            ...updated,
            username: user.username,
            email: user.email,
            firstName: user.firstName,
            lastName: user.lastName,
            isActive: user.isActive,
          },
          endSessions,
        };
      });
    } catch (err) {
      rethrowUniqueViolation(err, patch.memberNumber);
    }

    const { entry, endSessions } = outcome;

    this.deps.logger.info({
      msg: 'members.update.success',
      flow: 'members.update',
      requestId: params.request.requestId,
      memberId: entry.id,
      updatedByUserId: params.actor.userId,
      endSessions,
    });

    if (endSessions) {
      try {
        await this.deps.sessionStore.destroyAllForUser(entry.userId);
      } catch (err) {
        this.deps.logger.error({
          msg: 'members.update.session_cleanup_failed',
          flow: 'members.update',
          requestId: params.request.requestId,
          memberId: entry.id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    return this.toRosterEntry(entry, now);
  }

  async listMembers(): Promise<RosterEntry[]> {
    const now = this.deps.clock();
    const rows = await this.deps.store.repos.members.list();
    return rows.map((row) => this.toRosterEntry(row, now));
  }

  async getMember(memberId: string): Promise<RosterEntry> {
    const { repos } = this.deps.store;

    const member = await repos.members.findById(memberId);
    const user = member ? await repos.users.findById(member.userId) : undefined;
    if (!member || !user) {
      throw MemberErrors.memberNotFound({ memberId });
    }

    return this.toRosterEntry(
      {
        ...member,
        username: user.username,
        email: user.email,
        firstName: user.firstName,
        lastName: user.lastName,
        isActive: user.isActive,
      },
      this.deps.clock(),
    );
  }
}
