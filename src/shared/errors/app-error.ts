/**
 * src/shared/errors/app-error.ts
 *
 * WHY:
 * - Central error primitive used across modules.
 * - Callers (route glue, CLIs) can map `code`/`status` without knowing module internals.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic errors (e.g. modules/hashers/hasher.errors.ts).
 */

export const APP_ERROR_CODES = [
  'NOT_FOUND',
  'CONFIGURATION_ERROR',
  'UNKNOWN_HASHER_TYPE',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly status: number;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; status: number; meta?: AppErrorMeta }) {
    super(opts.message);
    this.name = 'AppError';
    this.code = opts.code;
    this.status = opts.status;
    this.meta = opts.meta;
  }
}
