/**
 * backend/src/modules/invitations/invitation.controller.ts
 *
 * WHY:
 * - Maps HTTP -> service call.
 * - Validates request payload and returns response.
 *
 * RULES:
 * - No DB access here.
 * - No business rules here.
 * - Validate with Zod and throw AppError.
 */

import type { FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../shared/http/errors';
import { requireSession } from '../../shared/http/require-session';
import { ROSTER_ADMIN } from '../members/policies/capability.policy';
import {
  createInvitationSchema,
  invitationParamsSchema,
  listInvitationsQuerySchema,
  validateInvitationSchema,
} from './invitation.schemas';
import type { InvitationService, InvitationWithState } from './invitation.service';
import { getInvitationState } from './policies/invitation.policy';
import type { Invitation } from './invitation.types';

function toInvitationDto(invitation: InvitationWithState) {
  return {
    id: invitation.id,
    code: invitation.code,
    email: invitation.email,
    firstName: invitation.firstName,
    lastName: invitation.lastName,
    memberNumber: invitation.memberNumber,
    state: invitation.state,
    usedByUserId: invitation.usedByUserId,
    usedAt: invitation.usedAt?.toISOString() ?? null,
    createdByUserId: invitation.createdByUserId,
    createdAt: invitation.createdAt.toISOString(),
    expiresAt: invitation.expiresAt?.toISOString() ?? null,
    notes: invitation.notes,
  };
}

export class InvitationController {
  constructor(
    private readonly invitationService: InvitationService,
    private readonly clock: () => Date,
  ) {}

  private withState(invitation: Invitation): InvitationWithState {
    return { ...invitation, state: getInvitationState(invitation, this.clock()) };
  }

  async validateInvitation(req: FastifyRequest, reply: FastifyReply) {
    const parsed = validateInvitationSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const preview = await this.invitationService.validateInvitation({
      code: parsed.data.code,
      email: parsed.data.email,
      requestId: req.requestContext.requestId,
    });

    return reply.status(200).send({
      valid: true,
      invitation: { ...preview, expiresAt: preview.expiresAt?.toISOString() ?? null },
    });
  }

  async createInvitation(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { anyOf: ROSTER_ADMIN });

    const parsed = createInvitationSchema.safeParse(req.body);
    if (!parsed.success) {
      throw AppError.validationError('Invalid request body', { issues: parsed.error.issues });
    }

    const invitation = await this.invitationService.createInvitation({
      ...parsed.data,
      createdByUserId: session.userId,
      request: req.requestContext,
    });

    return reply.status(201).send({ invitation: toInvitationDto(this.withState(invitation)) });
  }

  async listInvitations(req: FastifyRequest, reply: FastifyReply) {
    requireSession(req, { anyOf: ROSTER_ADMIN });

    const parsed = listInvitationsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      throw AppError.validationError('Invalid query', { issues: parsed.error.issues });
    }

    const invitations = await this.invitationService.listInvitations(parsed.data.state);
    return reply.status(200).send({ invitations: invitations.map(toInvitationDto) });
  }

  async deleteInvitation(req: FastifyRequest, reply: FastifyReply) {
    const session = requireSession(req, { anyOf: ROSTER_ADMIN });

    const parsed = invitationParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      throw AppError.validationError('Invalid invitation id', { issues: parsed.error.issues });
    }

    await this.invitationService.deleteInvitation({
      invitationId: parsed.data.invitationId,
      actorUserId: session.userId,
      request: req.requestContext,
    });

    return reply.status(204).send();
  }
}
