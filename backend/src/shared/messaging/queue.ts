/**
 * src/shared/messaging/queue.ts
 *
 * WHY:
 * - Decouples "I need to send an email" from "here is how emails are sent".
 * - Services enqueue messages; the transport (SMTP, in-memory) is wired in di.ts only.
 *
 * RULES:
 * - Queue interface depends on nothing else in this codebase.
 * - Message types are discriminated unions on the `type` field.
 * - Messages must be JSON-serializable (dates as ISO strings).
 * - The raw invitation code is allowed here: it travels to the recipient only
 *   and is never logged.
 */

export type InvitationCodeEmailMessage = {
  type: 'invitation.code-email';
  invitationId: string;
  email: string;
  firstName: string;
  code: string;
  /** ISO string, null when the code never expires. */
  expiresAt: string | null;
};

export type RemovalNoticeEmailMessage = {
  type: 'compliance.removal-notice-email';
  memberId: string;
  email: string;
  displayName: string;
  reason: string;
  daysRemaining: number;
  /** ISO string of the removal deadline. */
  removalDate: string;
};

export type QueueMessage = InvitationCodeEmailMessage | RemovalNoticeEmailMessage;

export interface Queue {
  enqueue(message: QueueMessage): Promise<void>;
}
