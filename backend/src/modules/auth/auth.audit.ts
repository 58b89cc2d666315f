/**
 * src/modules/auth/auth.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Auth module.
 *
 * RULES:
 * - Each function maps one domain action to one audit write.
 * - Never include passwords, hashes, or codes in metadata.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import { auditInvitationUsed } from '../invitations/invitation.audit';
import type { ActivationResult } from './auth.types';

export async function writeActivationAudits(
  writer: AuditWriter,
  data: { invitationId: string; result: ActivationResult; previousUserId: string | null },
): Promise<void> {
  const { result } = data;

  if (result.profile === 'relinked') {
    await writer.append('member.profile.relinked', {
      memberId: result.memberId,
      memberNumber: result.memberNumber,
      fromUserId: data.previousUserId,
      toUserId: result.userId,
    });
  } else if (result.profile === 'created') {
    await writer.append('member.created', {
      memberId: result.memberId,
      memberNumber: result.memberNumber,
      source: 'invitation',
    });
  } else if (result.profile === 'attached') {
    await writer.append('member.profile.linked', {
      memberId: result.memberId,
      memberNumber: result.memberNumber,
    });
  }

  await auditInvitationUsed(writer, {
    invitationId: data.invitationId,
    usedByUserId: result.userId,
  });

  await writer.append('auth.activation.success', {
    invitationId: data.invitationId,
    username: result.username,
    credential: result.credential,
    profile: result.profile,
    status: result.status,
  });
}

export function auditLoginSuccess(
  writer: AuditWriter,
  data: { username: string; capabilities: string[] },
): Promise<void> {
  return writer.append('auth.login.success', data);
}

export function auditLoginFailed(
  writer: AuditWriter,
  data: { identifierKey: string; reason: string },
): Promise<void> {
  return writer.append('auth.login.failed', data);
}

export function auditLogout(writer: AuditWriter): Promise<void> {
  return writer.append('auth.logout');
}
