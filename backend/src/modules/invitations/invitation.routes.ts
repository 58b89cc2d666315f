/**
 * backend/src/modules/invitations/invitation.routes.ts
 *
 * SECURITY:
 * - Codes only in POST bodies (not URL/query).
 * - /admin/* handlers enforce the roster-admin capability in the controller.
 */

import type { FastifyInstance } from 'fastify';
import type { InvitationController } from './invitation.controller';

export function registerInvitationRoutes(app: FastifyInstance, controller: InvitationController) {
  app.post('/auth/invitations/validate', controller.validateInvitation.bind(controller));

  app.post('/admin/invitations', controller.createInvitation.bind(controller));
  app.get('/admin/invitations', controller.listInvitations.bind(controller));
  app.delete('/admin/invitations/:invitationId', controller.deleteInvitation.bind(controller));
}
