/**
 * backend/src/modules/invitations/invitation.audit.ts
 *
 * WHY:
 * - Typed audit helpers for the Invitations module.
 * - Keeps audit metadata consistent per domain action.
 *
 * RULES:
 * - Call these AFTER the action succeeds, inside the same transaction.
 * - Never include raw codes in metadata.
 */

import type { AuditWriter } from '../../shared/audit/audit.writer';
import type { Invitation } from './invitation.types';

export function auditInvitationCreated(writer: AuditWriter, invitation: Invitation): Promise<void> {
  return writer.append('invitation.created', {
    invitationId: invitation.id,
    email: invitation.email,
    memberNumber: invitation.memberNumber,
    expiresAt: invitation.expiresAt?.toISOString() ?? null,
  });
}

export function auditInvitationDeleted(writer: AuditWriter, invitation: Invitation): Promise<void> {
  return writer.append('invitation.deleted', {
    invitationId: invitation.id,
    email: invitation.email,
    wasUsed: invitation.isUsed,
  });
}

export function auditInvitationUsed(
  writer: AuditWriter,
  data: { invitationId: string; usedByUserId: string },
): Promise<void> {
  return writer.append('invitation.used', data);
}
