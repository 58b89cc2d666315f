/**
 * backend/src/modules/compliance/compliance.service.ts
 *
 * WHY:
 * - Owns the member compliance lifecycle:
 *     Compliant --markForRemoval--> Grace period --deadline--> Removed (sweep)
 *     Grace period --clearRemoval / recordDuesPayment--> Compliant
 * - syncRoster marks everyone missing from the authoritative HQ roster;
 *   syncRosterCsv reads that roster from the HQ CSV export first.
 *
 * RULES:
 * - Every state change is one transaction on a locked member row.
 * - Re-marking a marked member is a no-op: the countdown is not reset and no
 *   second notice goes out.
 * - The removal notice is best-effort and runs after commit.
 * - The sweep re-checks eligibility inside each member's transaction, so a
 *   re-run or a run racing a payment never removes a compliant member.
 * - One member failing never stops a sync or a sweep; it is logged and reported.
 */

import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import { AuditWriter } from '../../shared/audit/audit.writer';
import { AppError } from '../../shared/http/errors';
import type { AuditContext } from '../../shared/audit/audit.types';
import type { SessionStore } from '../../shared/session/session.store';
import { DAY_MS, type Clock } from '../../shared/time/clock';
import type { DataStore } from '../_shared/data-store';
import type { Member } from '../members/member.types';
import { MemberErrors } from '../members/member.errors';
import { deriveMemberStatus } from '../members/policies/member-status.policy';

import {
  auditDuesRecorded,
  auditMarkedForRemoval,
  auditMemberRemoved,
  auditRemovalCleared,
} from './compliance.audit';
import { ComplianceErrors } from './compliance.errors';
import { parseRosterCsv } from './helpers/parse-roster-csv';
import {
  HQ_ROSTER_REASON,
  type ComplianceActor,
  type MarkForRemovalResult,
  type SweepResult,
  type SyncRosterResult,
} from './compliance.types';
import {
  daysUntilRemoval,
  isEligibleForRemoval,
  removalCutoff,
  removalDeadline,
} from './policies/grace-period.policy';

type RemovalNotice = {
  member: Member;
  email: string;
  displayName: string;
};

function auditContext(actor: ComplianceActor, memberId: string): Partial<AuditContext> {
  return { ...(actor.request ?? {}), userId: actor.userId, memberId };
}

export class ComplianceService {
  constructor(
    private readonly deps: {
      store: DataStore;
      sessionStore: SessionStore;
      queue: Queue;
      logger: Logger;
      clock: Clock;
      graceDays: number;
    },
  ) {}

  async markForRemoval(params: {
    memberId: string;
    reason: string;
    actor: ComplianceActor;
  }): Promise<MarkForRemovalResult> {
    const now = this.deps.clock();

    const outcome = await this.deps.store.transaction(async (repos) => {
      const member = await repos.members.findByIdForUpdate(params.memberId);
      if (!member) throw MemberErrors.memberNotFound({ memberId: params.memberId });

      if (member.markedForRemovalAt) {
        return { member, notice: null, alreadyMarked: true };
      }

      const updated = await repos.members.update(
        member.id,
        {
          markedForRemovalAt: now,
          removalReason: params.reason,
          duesCurrent: false,
          status: deriveMemberStatus({ status: member.status, duesCurrent: false }),
        },
        now,
      );
      if (!updated) throw MemberErrors.memberNotFound({ memberId: member.id });

      const deadline = removalDeadline(updated, this.deps.graceDays) ?? now;
      const audit = new AuditWriter(repos.audit, auditContext(params.actor, member.id));
      await auditMarkedForRemoval(audit, { member: updated, deadline });

      const user = await repos.users.findById(updated.userId);
      const notice: RemovalNotice | null = user
        ? {
            member: updated,
            email: user.email,
            displayName: `${user.firstName} ${user.lastName}`.trim() || user.username,
          }
        : null;

      return { member: updated, notice, alreadyMarked: false };
    });

    const { alreadyMarked } = outcome;

    this.deps.logger.info({
      msg: alreadyMarked ? 'compliance.mark.already_marked' : 'compliance.mark.success',
      flow: 'compliance.mark',
      requestId: params.actor.request?.requestId ?? null,
      memberId: outcome.member.id,
    });

    if (outcome.notice) {
      await this.sendRemovalNotice(outcome.notice, now, params.actor.request?.requestId ?? null);
    }

    return { member: outcome.member, alreadyMarked };
  }

  private async sendRemovalNotice(
    notice: RemovalNotice,
    now: Date,
    requestId: string | null,
  ): Promise<void> {
    const deadline = removalDeadline(notice.member, this.deps.graceDays);
    const daysRemaining = daysUntilRemoval(notice.member, now, this.deps.graceDays);
    if (!deadline || daysRemaining === null) return;

    try {
      await this.deps.queue.enqueue({
        type: 'compliance.removal-notice-email',
        memberId: notice.member.id,
        email: notice.email,
        displayName: notice.displayName,
        reason: notice.member.removalReason,
        daysRemaining,
        removalDate: deadline.toISOString(),
      });
    } catch (err) {
      this.deps.logger.error({
        msg: 'compliance.mark.notice_failed',
        flow: 'compliance.mark',
        requestId,
        memberId: notice.member.id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /** Administrator reset. Clearing an unmarked member changes nothing. */
  async clearRemoval(params: { memberId: string; actor: ComplianceActor }): Promise<Member> {
    const now = this.deps.clock();

    const member = await this.deps.store.transaction(async (repos) => {
      const current = await repos.members.findByIdForUpdate(params.memberId);
      if (!current) throw MemberErrors.memberNotFound({ memberId: params.memberId });

      const previousMarkedAt = current.markedForRemovalAt;
      if (!previousMarkedAt) return current;

      const updated = await repos.members.update(
        current.id,
        { markedForRemovalAt: null, removalReason: '' },
        now,
      );
      if (!updated) throw MemberErrors.memberNotFound({ memberId: current.id });

      const audit = new AuditWriter(repos.audit, auditContext(params.actor, current.id));
      await auditRemovalCleared(audit, {
        previousMarkedAt,
        previousReason: current.removalReason,
      });

      return updated;
    });

    this.deps.logger.info({
      msg: 'compliance.clear.success',
      flow: 'compliance.clear',
      requestId: params.actor.request?.requestId ?? null,
      memberId: member.id,
    });

    return member;
  }

  /** A qualifying payment: dues current, status re-derived, grace period cleared. */
  async recordDuesPayment(params: { memberId: string; actor: ComplianceActor }): Promise<Member> {
    const now = this.deps.clock();

    const member = await this.deps.store.transaction(async (repos) => {
      const current = await repos.members.findByIdForUpdate(params.memberId);
      if (!current) throw MemberErrors.memberNotFound({ memberId: params.memberId });

      const updated = await repos.members.update(
        current.id,
        {
          duesCurrent: true,
          status: deriveMemberStatus({ status: current.status, duesCurrent: true }),
          markedForRemovalAt: null,
          removalReason: '',
        },
        now,
      );
      if (!updated) throw MemberErrors.memberNotFound({ memberId: current.id });

      const audit = new AuditWriter(repos.audit, auditContext(params.actor, current.id));
      await auditDuesRecorded(audit, {
        status: updated.status,
        clearedRemoval: current.markedForRemovalAt !== null,
      });

      return updated;
    });

    this.deps.logger.info({
      msg: 'compliance.dues.success',
      flow: 'compliance.dues',
      requestId: params.actor.request?.requestId ?? null,
      memberId: member.id,
      status: member.status,
    });

    return member;
  }

  /**
   * Marks every numbered member missing from `memberNumbers`.
   * Members without a number are never on the HQ roster and are left alone.
   */
  async syncRoster(params: {
    memberNumbers: readonly string[];
    actor: ComplianceActor;
  }): Promise<SyncRosterResult> {
    const roster = new Set(params.memberNumbers.map((n) => n.trim()).filter((n) => n !== ''));
    if (roster.size === 0) throw ComplianceErrors.emptyRoster();

    const flow = 'compliance.sync';
    const requestId = params.actor.request?.requestId ?? null;

    const members = await this.deps.store.repos.members.list();
    const known = new Set<string>();
    const result: SyncRosterResult = {
      marked: [],
      alreadyMarked: [],
      skipped: [],
      failed: [],
      unknownNumbers: [],
      rowErrors: [],
    };

    for (const member of members) {
      if (!member.memberNumber) continue;
      known.add(member.memberNumber);
      if (roster.has(member.memberNumber)) continue;

      let outcome: MarkForRemovalResult;
      try {
        outcome = await this.markForRemoval({
          memberId: member.id,
          reason: HQ_ROSTER_REASON,
          actor: params.actor,
        });
      } catch (err) {
        if (err instanceof AppError && err.reason === 'MEMBER_NOT_FOUND') {
          this.deps.logger.info({
            msg: 'compliance.sync.skipped',
            flow,
            requestId,
            memberId: member.id,
            reason: 'already_removed',
          });
          result.skipped.push(member.id);
          continue;
        }

        this.deps.logger.error({
          msg: 'compliance.sync.mark_failed',
          flow,
          requestId,
          memberId: member.id,
          error: err instanceof Error ? err.message : String(err),
        });
        result.failed.push(member.id);
        continue;
      }

      (outcome.alreadyMarked ? result.alreadyMarked : result.marked).push(member.id);
    }

    result.unknownNumbers = [...roster].filter((n) => !known.has(n));

    this.deps.logger.info({
      msg: 'compliance.sync.success',
      flow,
      requestId,
      rosterSize: roster.size,
      marked: result.marked.length,
      alreadyMarked: result.alreadyMarked.length,
      skipped: result.skipped.length,
      failed: result.failed.length,
      unknownNumbers: result.unknownNumbers.length,
    });

    return result;
  }

  /** syncRoster over an HQ CSV export. Rows without a number are reported, not fatal. */
  async syncRosterCsv(params: { csv: string; actor: ComplianceActor }): Promise<SyncRosterResult> {
    const { memberNumbers, rowErrors } = parseRosterCsv(params.csv);

    if (rowErrors.length > 0) {
      this.deps.logger.warn({
        msg: 'compliance.sync.csv_row_errors',
        flow: 'compliance.sync',
        requestId: params.actor.request?.requestId ?? null,
        rowErrors: rowErrors.length,
      });
    }

    const result = await this.syncRoster({ memberNumbers, actor: params.actor });
    return { ...result, rowErrors };
  }

  async sweepExpired(params: { dryRun: boolean; actor: ComplianceActor }): Promise<SweepResult> {
    const now = this.deps.clock();
    const flow = 'compliance.sweep';
    const requestId = params.actor.request?.requestId ?? null;

    const candidates = await this.deps.store.repos.members.listMarkedForRemovalBefore(
      removalCutoff(now, this.deps.graceDays),
    );

    this.deps.logger.info({
      msg: 'compliance.sweep.start',
      flow,
      requestId,
      dryRun: params.dryRun,
      candidates: candidates.length,
    });

    const result: SweepResult = { dryRun: params.dryRun, memberIds: [], failed: [] };

    if (params.dryRun) {
      for (const member of candidates) {
        this.deps.logger.info({
          msg: 'compliance.sweep.candidate',
          flow,
          requestId,
          memberId: member.id,
          memberNumber: member.memberNumber,
          reason: member.removalReason,
        });
        result.memberIds.push(member.id);
      }
      return result;
    }

    for (const candidate of candidates) {
      let removedUserId: string | null;
      try {
        removedUserId = await this.removeIfStillEligible(candidate.id, now, params.actor);
      } catch (err) {
        this.deps.logger.error({
          msg: 'compliance.sweep.remove_failed',
          flow,
          requestId,
          memberId: candidate.id,
          error: err instanceof Error ? err.message : String(err),
        });
        result.failed.push(candidate.id);
        continue;
      }

      if (!removedUserId) continue;
      result.memberIds.push(candidate.id);

      try {
        await this.deps.sessionStore.destroyAllForUser(removedUserId);
      } catch (err) {
        this.deps.logger.warn({
          msg: 'compliance.sweep.session_cleanup_failed',
          flow,
          requestId,
          memberId: candidate.id,
          error: err instanceof Error ? err.message : String(err),
        });
      }
    }

    this.deps.logger.info({
      msg: 'compliance.sweep.done',
      flow,
      requestId,
      removed: result.memberIds.length,
      failed: result.failed.length,
    });

    return result;
  }

  /** Returns the removed credential's id, or null when the member was skipped. */
  private async removeIfStillEligible(
    memberId: string,
    now: Date,
    actor: ComplianceActor,
  ): Promise<string | null> {
    return this.deps.store.transaction(async (repos) => {
      const member = await repos.members.findByIdForUpdate(memberId);
      if (!member || !isEligibleForRemoval(member, now, this.deps.graceDays)) {
        this.deps.logger.info({
          msg: 'compliance.sweep.skipped',
          flow: 'compliance.sweep',
          requestId: actor.request?.requestId ?? null,
          memberId,
          reason: member ? 'no_longer_eligible' : 'already_removed',
        });
        return null;
      }

      const user = await repos.users.findById(member.userId);
      const daysMarked = member.markedForRemovalAt
        ? Math.floor((now.getTime() - member.markedForRemovalAt.getTime()) / DAY_MS)
        : 0;

      this.deps.logger.warn({
        msg: 'compliance.sweep.removing',
        flow: 'compliance.sweep',
        requestId: actor.request?.requestId ?? null,
        memberId: member.id,
        memberNumber: member.memberNumber,
        reason: member.removalReason,
        daysMarked,
      });

      const audit = new AuditWriter(repos.audit, auditContext(actor, member.id));
      await auditMemberRemoved(audit, { member, username: user?.username ?? null, daysMarked });

      await repos.members.delete(member.id);
      await repos.users.delete(member.userId);

      return member.userId;
    });
  }
}
