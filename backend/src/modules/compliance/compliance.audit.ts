/**
 * backend/src/modules/compliance/compliance.audit.ts
 *
 * WHY:
 * - Typed audit helpers for grace-period transitions and removals.
 *
 * RULES:
 * - The removal audit is written BEFORE the rows are deleted, in the same transaction.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { Member } from '../members/member.types';

export function auditMarkedForRemoval(
  writer: AuditWriter,
  data: { member: Member; deadline: Date },
): Promise<void> {
  return writer.append('compliance.marked_for_removal', {
    memberNumber: data.member.memberNumber,
    reason: data.member.removalReason,
    deadline: data.deadline.toISOString(),
  });
}

export function auditRemovalCleared(
  writer: AuditWriter,
  data: { previousMarkedAt: Date; previousReason: string },
): Promise<void> {
  return writer.append('compliance.removal_cleared', {
    previousMarkedAt: data.previousMarkedAt.toISOString(),
    previousReason: data.previousReason,
  });
}

export function auditDuesRecorded(
  writer: AuditWriter,
  data: { status: string; clearedRemoval: boolean },
): Promise<void> {
  return writer.append('compliance.dues_recorded', data);
}

export function auditMemberRemoved(
  writer: AuditWriter,
  data: { member: Member; username: string | null; daysMarked: number },
): Promise<void> {
  return writer.append('compliance.member_removed', {
    removedUserId: data.member.userId,
    memberNumber: data.member.memberNumber,
    username: data.username,
    reason: data.member.removalReason,
    markedForRemovalAt: data.member.markedForRemovalAt?.toISOString() ?? null,
    daysMarked: data.daysMarked,
  });
}
