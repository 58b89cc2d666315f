/**
 * backend/src/modules/compliance/compliance.module.ts
 *
 * WHY:
 * - Encapsulates Compliance module wiring.
 * - The CLI sweep uses complianceService directly, without routes.
 *
 * RULES:
 * - No infra creation here (DI passes deps in).
 */

import type { FastifyInstance } from 'fastify';
import type { Logger } from '../../shared/logger/logger';
import type { Queue } from '../../shared/messaging/queue';
import type { SessionStore } from '../../shared/session/session.store';
import type { Clock } from '../../shared/time/clock';
import type { DataStore } from '../_shared/data-store';

import { ComplianceController } from './compliance.controller';
import { ComplianceService } from './compliance.service';
import { registerComplianceRoutes } from './compliance.routes';

export type ComplianceModule = ReturnType<typeof createComplianceModule>;

export function createComplianceModule(deps: {
  store: DataStore;
  sessionStore: SessionStore;
  queue: Queue;
  logger: Logger;
  clock: Clock;
  graceDays: number;
}) {
  const complianceService = new ComplianceService(deps);
  const controller = new ComplianceController(complianceService, deps.clock, deps.graceDays);

  return {
    complianceService,
    registerRoutes(app: FastifyInstance) {
      registerComplianceRoutes(app, controller);
    },
  };
}
