/**
 * backend/src/modules/compliance/compliance.errors.ts
 */

import { AppError, type AppErrorMeta } from '../../shared/http/errors';

export const ComplianceErrors = {
  /** An empty roster would put every member into a grace period. */
  emptyRoster(meta?: AppErrorMeta) {
    return AppError.validationError(
      'The roster contains no member numbers.',
      meta,
      'EMPTY_ROSTER',
    );
  },

  emptyCsv(meta?: AppErrorMeta) {
    return AppError.validationError('The CSV file is empty.', meta, 'CSV_EMPTY');
  },

  invalidCsv(meta?: AppErrorMeta) {
    return AppError.validationError('The CSV file could not be parsed.', meta, 'CSV_INVALID');
  },

  missingMemberColumn(columns: readonly string[], meta?: AppErrorMeta) {
    return AppError.validationError(
      `The CSV must contain a "Member#" or "Member Number" column. Found columns: ${columns.join(', ')}`,
      meta,
      'CSV_MEMBER_COLUMN_MISSING',
    );
  },
} as const;
