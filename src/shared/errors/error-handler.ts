/**
 * src/shared/errors/error-handler.ts
 *
 * WHY:
 * - The CLI needs one place that turns a thrown error into an exit code and a
 *   single stderr line.
 * - Internal details (meta, stack traces) must never reach the terminal output.
 *
 * RESPONSIBILITIES:
 * - AppError → its own exitCode + message.
 * - ZodError → exit 2 with the first issue (safety net if a command misses it).
 * - commander usage errors are reported by commander itself; we only map the code.
 * - Unexpected errors → exit 1 with a generic message.
 * - Log every error with full detail (REDACTED meta) for operators.
 */

import { ZodError } from 'zod';
import { AppError, EXIT_CODES } from './errors';
import { logger } from '../logger/logger';

export type HandledError = {
  exitCode: number;
  message: string;
};

const SENSITIVE_META_KEYS = new Set(['email', 'gecos', 'password', 'token', 'secret']);

export function redactMeta(meta: unknown): unknown {
  if (!meta || typeof meta !== 'object') return meta;

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(meta)) {
    out[k] = SENSITIVE_META_KEYS.has(k) ? '[REDACTED]' : v;
  }
  return out;
}

export function handleCliError(err: unknown): HandledError {
  // 1) Known application errors
  if (err instanceof AppError) {
    logger.error('cli.app_error', {
      flow: 'cli.error',
      code: err.code,
      exitCode: err.exitCode,
      message: err.message,
      meta: redactMeta(err.meta),
    });

    return { exitCode: err.exitCode, message: err.message };
  }

  // 2) Validation errors that escaped a schema.parse()
  if (err instanceof ZodError) {
    const first = err.issues[0];
    const message = first
      ? `${first.path.join('.') || 'input'}: ${first.message}`
      : 'Invalid input';

    logger.error('cli.validation_error', { flow: 'cli.error', issues: err.issues });

    return { exitCode: EXIT_CODES.VALIDATION_ERROR, message };
  }

  // 3) Unexpected errors: never print internals
  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('cli.unhandled_error', {
    flow: 'cli.error',
    message: error.message,
    stack: error.stack,
  });

  return { exitCode: EXIT_CODES.INTERNAL, message: 'Internal error while generating the report' };
}
