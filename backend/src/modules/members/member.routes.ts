/**
 * backend/src/modules/members/member.routes.ts
 */

import type { FastifyInstance } from 'fastify';
import type { MemberController } from './member.controller';

export function registerMemberRoutes(app: FastifyInstance, controller: MemberController) {
  app.post('/admin/members', controller.createMember.bind(controller));
  app.get('/admin/members', controller.listMembers.bind(controller));
  app.get('/admin/members/:memberId', controller.getMember.bind(controller));
  app.patch('/admin/members/:memberId', controller.updateMember.bind(controller));
}
