/**
 * backend/src/modules/invitations/invitation.types.ts
 *
 * WHY:
 * - Domain types for invitation codes.
 * - A code moves unused -> used exactly once; expiry is derived from expiresAt, not stored.
 *
 * RULES:
 * - Avoid leaking DB naming (snake_case) outside DAL.
 * - `code` is a bearer secret: it leaves the server only in the invitation email
 *   and the create response shown to the administrator.
 */

export type InvitationId = string;

export type Invitation = {
  id: InvitationId;
  code: string;

  email: string;
  firstName: string;
  lastName: string;
  memberNumber: string | null;

  isUsed: boolean;
  usedByUserId: string | null;
  usedAt: Date | null;

  createdByUserId: string | null;
  createdAt: Date;
  expiresAt: Date | null;

  /** Internal administrator notes; never shown to the invitee. */
  notes: string;
};

export type NewInvitation = {
  code: string;
  email: string;
  firstName: string;
  lastName: string;
  memberNumber: string | null;
  createdByUserId: string | null;
  expiresAt: Date | null;
  notes: string;
};

export const INVITATION_STATES = ['active', 'used', 'expired'] as const;
export type InvitationState = (typeof INVITATION_STATES)[number];

export type InvitationStateFilter = InvitationState | 'all';

/** What the signup form may show after a successful validation (no code, no notes). */
export type InvitationPreview = {
  email: string;
  firstName: string;
  lastName: string;
  memberNumber: string | null;
  expiresAt: Date | null;
};

export function toInvitationPreview(invitation: Invitation): InvitationPreview {
  return {
    email: invitation.email,
    firstName: invitation.firstName,
    lastName: invitation.lastName,
    memberNumber: invitation.memberNumber,
    expiresAt: invitation.expiresAt,
  };
}
