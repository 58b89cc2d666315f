/**
 * backend/src/modules/invitations/invitation.service.ts
 *
 * WHY:
 * - Administrator side of the invitation lifecycle: issue, list, clean up.
 * - Public validation (pre-check before the signup form is submitted).
 * - Redemption lives in auth (activate-account flow); it reuses the same policy.
 *
 * RULES:
 * - Only place in this module allowed to start transactions.
 * - Never log raw codes.
 * - The invitation email is best-effort: it runs after commit and never fails the request.
 */

import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import { AuditWriter } from '../../shared/audit/audit.writer';
import type { RequestContext } from '../../shared/http/request-context';
import { isUniqueViolation } from '../../shared/db/unique-violation';
import type { Clock } from '../../shared/time/clock';
import { addDays } from '../../shared/time/clock';
import type { DataStore } from '../_shared/data-store';

import { generateInvitationCode } from './helpers/generate-invitation-code';
import { InvitationErrors } from './invitation.errors';
import { auditInvitationCreated, auditInvitationDeleted } from './invitation.audit';
import { getInvitationFailure, getInvitationState } from './policies/invitation.policy';
import type {
  Invitation,
  InvitationPreview,
  InvitationState,
  InvitationStateFilter,
} from './invitation.types';
import { toInvitationPreview } from './invitation.types';

export const MAX_CODE_ATTEMPTS = 5;

export type CreateInvitationParams = {
  email: string;
  firstName: string;
  lastName: string;
  memberNumber: string | null;
  /** undefined = configured default lifetime; null = never expires. */
  expiresAt?: Date | null;
  notes: string;
  sendEmail: boolean;
  createdByUserId: string | null;
  request: RequestContext;
};

export type InvitationWithState = Invitation & { state: InvitationState };

export class InvitationService {
  constructor(
    private readonly deps: {
      store: DataStore;
      logger: Logger;
      queue: Queue;
      clock: Clock;
      generateCode?: () => string;
      defaultTtlDays: number | null;
    },
  ) {}

  private nextCode(): string {
    return (this.deps.generateCode ?? generateInvitationCode)();
  }

  private resolveExpiry(expiresAt: Date | null | undefined, now: Date): Date | null {
    if (expiresAt !== undefined) return expiresAt;
    return this.deps.defaultTtlDays === null ? null : addDays(now, this.deps.defaultTtlDays);
  }

  async createInvitation(params: CreateInvitationParams): Promise<Invitation> {
    const now = this.deps.clock();
    const flow = 'invitations.create';
    const email = params.email.trim();

    this.deps.logger.info({
      msg: 'invitations.create.start',
      flow,
      requestId: params.request.requestId,
      createdByUserId: params.createdByUserId,
    });

    const invitation = await this.insertWithUniqueCode(params, email, now);

    this.deps.logger.info({
      msg: 'invitations.create.success',
      flow,
      requestId: params.request.requestId,
      invitationId: invitation.id,
      hasExpiry: invitation.expiresAt !== null,
    });

    if (params.sendEmail) {
      await this.sendInvitationEmail(invitation, params.request.requestId);
    }

    return invitation;
  }

  /**
   * Probes the store before inserting; the unique index is the real guarantee,
   * so a violation on insert also counts as a collision and is retried.
   */
  private async insertWithUniqueCode(
    params: CreateInvitationParams,
    email: string,
    now: Date,
  ): Promise<Invitation> {
    for (let attempt = 1; attempt <= MAX_CODE_ATTEMPTS; attempt++) {
      const code = this.nextCode();

      if (await this.deps.store.repos.invitations.existsByCode(code)) {
        this.deps.logger.warn({
          msg: 'invitations.create.code_collision',
          flow: 'invitations.create',
          requestId: params.request.requestId,
          attempt,
        });
        continue;
      }

      try {
        return await this.deps.store.transaction(async (repos) => {
          const created = await repos.invitations.create(
            {
              code,
              email,
              firstName: params.firstName.trim(),
              lastName: params.lastName.trim(),
              memberNumber: params.memberNumber,
              createdByUserId: params.createdByUserId,
              expiresAt: this.resolveExpiry(params.expiresAt, now),
              notes: params.notes,
            },
            now,
          );

          const audit = new AuditWriter(repos.audit, {
            ...params.request,
            userId: params.createdByUserId,
          });
          await auditInvitationCreated(audit, created);

          return created;
        });
      } catch (err) {
        if (!isUniqueViolation(err)) throw err;

        this.deps.logger.warn({
          msg: 'invitations.create.code_collision',
          flow: 'invitations.create',
          requestId: params.request.requestId,
          attempt,
        });
      }
    }

    throw InvitationErrors.codeGenerationFailed({ attempts: MAX_CODE_ATTEMPTS });
  }

  private async sendInvitationEmail(invitation: Invitation, requestId: string): Promise<void> {
    try {
      await this.deps.queue.enqueue({
        type: 'invitation.code-email',
        invitationId: invitation.id,
        email: invitation.email,
        firstName: invitation.firstName,
        code: invitation.code,
        expiresAt: invitation.expiresAt?.toISOString() ?? null,
      });
    } catch (err) {
      this.deps.logger.error({
        msg: 'invitations.create.email_failed',
        flow: 'invitations.create',
        requestId,
        invitationId: invitation.id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  /** Read-only pre-check; safe to call any number of times. */
  async validateInvitation(params: {
    code: string;
    email: string;
    requestId: string;
  }): Promise<InvitationPreview> {
    const invitation = await this.deps.store.repos.invitations.findByCode(params.code);

    const failure = getInvitationFailure(invitation, params.email, this.deps.clock());
    if (failure) {
      this.deps.logger.info({
        msg: 'invitations.validate.rejected',
        flow: 'invitations.validate',
        requestId: params.requestId,
        reason: failure.reason,
        invitationId: invitation?.id ?? null,
      });
      throw failure.error;
    }

    if (!invitation) throw InvitationErrors.invalidCode();
    return toInvitationPreview(invitation);
  }

  async listInvitations(state: InvitationStateFilter): Promise<InvitationWithState[]> {
    const now = this.deps.clock();
    const rows = await this.deps.store.repos.invitations.list({ state, now });
    return rows.map((invitation) => ({ ...invitation, state: getInvitationState(invitation, now) }));
  }

  async deleteInvitation(params: {
    invitationId: string;
    actorUserId: string;
    request: RequestContext;
  }): Promise<void> {
    await this.deps.store.transaction(async (repos) => {
      const invitation = await repos.invitations.findById(params.invitationId);
      if (!invitation) {
        throw InvitationErrors.invitationNotFound({ invitationId: params.invitationId });
      }

      await repos.invitations.delete(invitation.id);

      const audit = new AuditWriter(repos.audit, {
        ...params.request,
        userId: params.actorUserId,
      });
      await auditInvitationDeleted(audit, invitation);
    });

    this.deps.logger.info({
      msg: 'invitations.delete.success',
      flow: 'invitations.delete',
      requestId: params.request.requestId,
      invitationId: params.invitationId,
    });
  }
}
