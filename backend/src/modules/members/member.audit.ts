/**
 * backend/src/modules/members/member.audit.ts
 *
 * RULES:
 * - Call AFTER the action succeeds, inside the same transaction.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { Member, MemberStatus } from './member.types';

export function auditMemberProvisioned(
  writer: AuditWriter,
  data: { member: Member; username: string },
): Promise<void> {
  return writer.append('member.created', {
    memberId: data.member.id,
    memberNumber: data.member.memberNumber,
    username: data.username,
    status: data.member.status,
    source: 'admin',
  });
}

type Change<T> = { from: T; to: T };

/** Only the fields whose value actually changed. */
export type MemberChanges = {
  memberNumber?: Change<string | null>;
  status?: Change<MemberStatus>;
  duesCurrent?: Change<boolean>;
  isOfficer?: Change<boolean>;
  isStaff?: Change<boolean>;
};

export function auditMemberUpdated(writer: AuditWriter, changes: MemberChanges): Promise<void> {
  return writer.append('member.updated', { changes });
}
