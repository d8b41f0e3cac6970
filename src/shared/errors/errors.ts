/**
 * src/shared/errors/errors.ts
 *
 * WHY:
 * - Central error primitive used across modules and the CLI.
 * - Every fatal condition maps to one code and one process exit code.
 *
 * RULES:
 * - This file MUST stay small.
 * - Do NOT add module-specific error factories here.
 * - Each module owns its own semantic error factories (e.g. storage/storage.errors.ts).
 */

export const APP_ERROR_CODES = [
  'VALIDATION_ERROR',
  'GROUP_NOT_FOUND',
  'QUOTA_FILE_UNREADABLE',
  'QUOTA_FILE_MALFORMED',
  'MEMBERSHIP_ENRICHMENT_MISMATCH',
  'INTERNAL',
] as const;

export type AppErrorCode = (typeof APP_ERROR_CODES)[number];
export type AppErrorMeta = Record<string, unknown>;

export const EXIT_CODES: Record<AppErrorCode, number> = {
  VALIDATION_ERROR: 2,
  GROUP_NOT_FOUND: 3,
  QUOTA_FILE_UNREADABLE: 4,
  QUOTA_FILE_MALFORMED: 4,
  MEMBERSHIP_ENRICHMENT_MISMATCH: 1,
  INTERNAL: 1,
};

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly exitCode: number;
  readonly meta?: AppErrorMeta;

  constructor(opts: { code: AppErrorCode; message: string; meta?: AppErrorMeta; cause?: unknown }) {
    super(opts.message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = 'AppError';
    this.code = opts.code;
    this.exitCode = EXIT_CODES[opts.code];
    this.meta = opts.meta;
  }

  static validationError(message = 'Validation error', meta?: AppErrorMeta) {
    return new AppError({ code: 'VALIDATION_ERROR', message, meta });
  }

  static notFound(message: string, meta?: AppErrorMeta) {
    return new AppError({ code: 'GROUP_NOT_FOUND', message, meta });
  }
}
