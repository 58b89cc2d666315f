/**
 * src/shared/audit/audit.types.ts
 *
 * WHY:
 * - Central audit event types (compliance trail stored in DB).
 * - AuditContext groups the request-level fields that repeat on every event.
 * - AuditAction uses a union + escape hatch to catch typos early.
 *
 * RULES:
 * - Metadata is a plain object (repo serializes to JSON for DB).
 * - Never import module types here (shared must stay module-agnostic).
 */

export type KnownAuditAction =
  // Invitations
  | 'invitation.created'
  | 'invitation.deleted'
  | 'invitation.used'
  // Auth
  | 'auth.activation.success'
  | 'auth.login.success'
  | 'auth.login.failed'
  | 'auth.logout'
  // Members
  | 'member.created'
  | 'member.updated'
  | 'member.profile.linked'
  | 'member.profile.relinked'
  // Compliance
  | 'compliance.marked_for_removal'
  | 'compliance.removal_cleared'
  | 'compliance.dues_recorded'
  | 'compliance.member_removed';

export type AuditAction = KnownAuditAction | (string & {});

export type AuditMetadata = Record<string, unknown>;

/**
 * Request-level context shared by every event written within one operation.
 * All fields are nullable: CLI runs have no request, sweeps have no member yet.
 */
export type AuditContext = {
  userId: string | null;
  memberId: string | null;

  requestId: string | null;
  ip: string | null;
  userAgent: string | null;
};

export type AuditEventInsert = AuditContext & {
  action: AuditAction;
  metadata?: AuditMetadata;
};

export type AuditEvent = AuditContext & {
  id: string;
  action: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
};
