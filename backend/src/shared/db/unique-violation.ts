/**
 * backend/src/shared/db/unique-violation.ts
 *
 * WHY:
 * - Find-or-create paths race: the unique index is the final arbiter.
 * - Services map a unique violation to a domain conflict instead of a 500.
 *
 * RULES:
 * - Postgres reports unique violations as SQLSTATE 23505.
 * - In-memory stores throw UniqueViolationError with the same code, so callers
 *   never branch on the storage driver.
 */

export const UNIQUE_VIOLATION_CODE = '23505';

export class UniqueViolationError extends Error {
  readonly code = UNIQUE_VIOLATION_CODE;

  constructor(readonly constraint: string) {
    super(`duplicate key value violates unique constraint "${constraint}"`);
    this.name = 'UniqueViolationError';
  }
}

export function isUniqueViolation(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  return 'code' in err && err.code === UNIQUE_VIOLATION_CODE;
}

export function getViolatedConstraint(err: unknown): string | null {
  if (!(err instanceof Error) || !('constraint' in err)) return null;
  return typeof err.constraint === 'string' ? err.constraint : null;
}
