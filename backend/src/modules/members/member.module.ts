/**
 * backend/src/modules/members/member.module.ts
 *
 * WHY:
 * - Encapsulates Members module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { SessionStore } from '../../shared/session/session.store';
import type { Clock } from '../../shared/time/clock';
import type { DataStore } from '../_shared/data-store';

import { MemberController } from './member.controller';
import { MemberService } from './member.service';
import { registerMemberRoutes } from './member.routes';

export type MemberModule = ReturnType<typeof createMemberModule>;

export function createMemberModule(deps: {
  store: DataStore;
  sessionStore: SessionStore;
  logger: Logger;
  clock: Clock;
  graceDays: number;
}) {
  const memberService = new MemberService(deps);
  const controller = new MemberController(memberService);

  return {
    memberService,
    registerRoutes(app: FastifyInstance) {
      registerMemberRoutes(app, controller);
    },
  };
}
