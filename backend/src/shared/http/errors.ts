/**
 * backend/src/shared/http/errors.ts
 *
 * WHY:
 * - Central error primitive used across controllers/services.
 * - Keeps API error responses consistent.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. invitations/invitation.errors.ts).
 * - `reason` is the stable machine-readable discriminator clients switch on
 *   (e.g. CODE_ALREADY_USED vs CODE_EXPIRED). `meta` never leaves the server.
 */

export const APP_ERROR_CODES = [
  'UNAUTHORIZED',
  'FORBIDDEN',
  'NOT_FOUND',
  'VALIDATION_ERROR',
  'RATE_LIMITED',
  'CONFLICT',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly reason?: string;
  readonly meta?: AppErrorMeta;

  constructor(opts: {
    code: AppErrorCode;
    message: string;
    status: number;
    reason?: string;
    meta?: AppErrorMeta;
  }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.reason = opts.reason;
    this.meta = opts.meta;
  }

  static unauthorized(message = 'Unauthorized', meta?: AppErrorMeta, reason?: string) {
    return new AppError({ code: 'UNAUTHORIZED', status: 401, message, meta, reason });
  }

  static forbidden(message = 'Forbidden', meta?: AppErrorMeta, reason?: string) {
    return new AppError({ code: 'FORBIDDEN', status: 403, message, meta, reason });
  }

  static notFound(message = 'Not found', meta?: AppErrorMeta, reason?: string) {
    return new AppError({ code: 'NOT_FOUND', status: 404, message, meta, reason });
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta, reason?: string) {
    return new AppError({ code: 'VALIDATION_ERROR', status: 400, message, meta, reason });
  }

  static rateLimited(meta?: AppErrorMeta) {
    return new AppError({ code: 'RATE_LIMITED', status: 429, message: 'Rate limited', meta });
  }

  static conflict(message = 'Conflict', meta?: AppErrorMeta, reason?: string) {
    return new AppError({ code: 'CONFLICT', status: 409, message, meta, reason });
  }

  static internal(message = 'Internal error', meta?: AppErrorMeta, reason?: string) {
    return new AppError({ code: 'INTERNAL', status: 500, message, meta, reason });
  }
}
