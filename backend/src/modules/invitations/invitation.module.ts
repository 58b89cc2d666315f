/**
 * backend/src/modules/invitations/invitation.module.ts
 *
 * WHY:
 * - Encapsulates Invitations module wiring.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { Clock } from '../../shared/time/clock';
import type { DataStore } from '../_shared/data-store';

import { InvitationController } from './invitation.controller';
import { InvitationService } from './invitation.service';
import { registerInvitationRoutes } from './invitation.routes';

export type InvitationModule = ReturnType<typeof createInvitationModule>;

export function createInvitationModule(deps: {
  store: DataStore;
  logger: Logger;
  queue: Queue;
  clock: Clock;
  defaultTtlDays: number | null;
}) {
  const invitationService = new InvitationService(deps);
  const controller = new InvitationController(invitationService, deps.clock);

  return {
    invitationService,
    registerRoutes(app: FastifyInstance) {
      registerInvitationRoutes(app, controller);
    },
  };
}
