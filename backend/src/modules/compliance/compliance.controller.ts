/**
 * backend/src/modules/compliance/compliance.controller.ts
 *
 * RULES:
 * - No DB access here. No business rules here.
 * - The sweep deletes accounts: staff only. Everything else: roster admins.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-session';
import { ROSTER_ADMIN, STAFF_ONLY } from '../members/policies/capability.policy';
import type { Member } from '../members/member.types';
import { daysUntilRemoval } from './policies/grace-period.policy';
import {
  markForRemovalSchema,
  memberParamsSchema,
  sweepSchema,
  syncRosterCsvSchema,
  syncRosterSchema,
} from './compliance.schemas';
import type { ComplianceService } from './compliance.service';

export class ComplianceController {
  constructor(
    private readonly complianceService: ComplianceService,
    private readonly clock: () => Date,
    private readonly graceDays: number,
  ) {}

  private toComplianceDto(member: Member) {
    return {
      id: member.id,
      memberNumber: member.memberNumber,
      status: member.status,
      duesCurrent: member.duesCurrent,
      markedForRemovalAt: member.markedForRemovalAt?.toISOString() ?? null,
      removalReason: member.removalReason,
      daysUntilRemoval: daysUntilRemoval(member, this.clock(), this.graceDays),
    };
  }

  private parseMemberId(req: FastifyRequest): string {
    const parsed = memberParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw AppError.validationError('Invalid member id', { issues: parsed.error.issues });
    }
    return parsed.data.memberId;
  }

  async markForRemoval(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { anyOf: ROSTER_ADMIN });
    const memberId = this.parseMemberId(req);

    const parsed = markForRemovalSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const { member, alreadyMarked } = await this.complianceService.markForRemoval({
      memberId,
      reason: parsed.data.reason,
      actor: { userId: session.userId, request: req.requestContext },
    });

    return reply.status(200).send({ member: this.toComplianceDto(member), alreadyMarked });
  }

  async clearRemoval(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { anyOf: ROSTER_ADMIN });
    const memberId = this.parseMemberId(req);

    const member = await this.complianceService.clearRemoval({
      memberId,
      actor: { userId: session.userId, request: req.requestContext },
    });

    return reply.status(200).send({ member: this.toComplianceDto(member) });
  }

  async recordDuesPayment(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { anyOf: ROSTER_ADMIN });
    const memberId = this.parseMemberId(req);

    const member = await this.complianceService.recordDuesPayment({
      memberId,
      actor: { userId: session.userId, request: req.requestContext },
    });

    return reply.status(200).send({ member: this.toComplianceDto(member) });
  }

  async syncRoster(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { anyOf: ROSTER_ADMIN });

    const parsed = syncRosterSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const result = await this.complianceService.syncRoster({
      memberNumbers: parsed.data.memberNumbers,
      actor: { userId: session.userId, request: req.requestContext },
    });

    return reply.status(200).send(result);
  }

  async syncRosterCsv(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { anyOf: ROSTER_ADMIN });

    const parsed = syncRosterCsvSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const result = await this.complianceService.syncRosterCsv({
      csv: parsed.data.csv,
      actor: { userId: session.userId, request: req.requestContext },
    });

    return reply.status(200).send(result);
  }

  async sweep(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { anyOf: STAFF_ONLY });

    const parsed = sweepSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const result = await this.complianceService.sweepExpired({
      dryRun: parsed.data.dryRun,
      actor: { userId: session.userId, request: req.requestContext },
    });

    return reply.status(200).send(result);
  }
}
