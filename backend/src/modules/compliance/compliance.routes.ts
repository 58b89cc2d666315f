/**
 * backend/src/modules/compliance/compliance.routes.ts
 *
 * Static paths (/sync, /sync-csv, /sweep) are distinct from /:memberId/<action>, so
 * registration order does not matter.
 */

import type { FastifyInstance } from 'fastify';
import type { ComplianceController } from './compliance.controller';
import { ROSTER_CSV_MAX_BYTES } from './compliance.schemas';

export function registerComplianceRoutes(app: FastifyInstance, controller: ComplianceController) {
  app.post('/admin/members/:memberId/mark-for-removal', controller.markForRemoval.bind(controller));
  app.post('/admin/members/:memberId/clear-removal', controller.clearRemoval.bind(controller));
  app.post('/admin/members/:memberId/dues-payments', controller.recordDuesPayment.bind(controller));
  app.post('/admin/members/sync', controller.syncRoster.bind(controller));
  // JSON-escaped CSV text can be larger than the file itself.
  app.post(
    '/admin/members/sync-csv',
    { bodyLimit: ROSTER_CSV_MAX_BYTES * 2 },
    controller.syncRosterCsv.bind(controller),
  );
  app.post('/admin/members/sweep', controller.sweep.bind(controller));
}
