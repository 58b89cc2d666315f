/**
 * backend/src/modules/members/member.controller.ts
 *
 * RULES:
 * - No DB access here.
 * - Every route here is roster-admin only.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-session';
import { ROSTER_ADMIN } from './policies/capability.policy';
import { createMemberSchema, memberParamsSchema, updateMemberSchema } from './member.schemas';
import type { MemberService, RosterEntry } from './member.service';

export function toMemberDto(member: RosterEntry) {
  return {
    id: member.id,
    userId: member.userId,
    username: member.username,
    email: member.email,
    firstName: member.firstName,
    lastName: member.lastName,
    isActive: member.isActive,
    memberNumber: member.memberNumber,
    status: member.status,
    duesCurrent: member.duesCurrent,
    isOfficer: member.isOfficer,
    markedForRemovalAt: member.markedForRemovalAt?.toISOString() ?? null,
    removalReason: member.removalReason,
    daysUntilRemoval: member.daysUntilRemoval,
    createdAt: member.createdAt.toISOString(),
  };
}

export class MemberController {
  constructor(private readonly memberService: MemberService) {}

  async createMember(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { anyOf: ROSTER_ADMIN });

    const parsed = createMemberSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const member = await this.memberService.createMember({
      ...parsed.data,
      actor: { userId: session.userId, capabilities: session.capabilities },
      request: req.requestContext,
    });

    return reply.status(201).send({ member: toMemberDto(member) });
  }

  async updateMember(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { anyOf: ROSTER_ADMIN });

    const params = memberParamsSchema.safeParse(req.params);
    if (!params.success) {
      throw AppError.validationError('Invalid member id', { issues: params.error.issues });
    }

    const parsed = updateMemberSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const member = await this.memberService.updateMember({
      memberId: params.data.memberId,
      patch: parsed.data,
      actor: { userId: session.userId, capabilities: session.capabilities },
      request: req.requestContext,
    });

    return reply.status(200).send({ member: toMemberDto(member) });
  }

  async listMembers(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req, { anyOf: ROSTER_ADMIN });

    const members = await this.memberService.listMembers();
    return reply.status(200).send({ members: members.map(toMemberDto) });
  }

  async getMember(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req, { anyOf: ROSTER_ADMIN });

    const parsed = memberParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw AppError.validationError('Invalid member id', { issues: parsed.error.issues });
    }

    const member = await this.memberService.getMember(parsed.data.memberId);
    return reply.status(200).send({ member: toMemberDto(member) });
  }
}
