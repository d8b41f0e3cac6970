/**
 * src/modules/report/report.errors.ts
 *
 * WHY:
 * - Report module owns pipeline-level failures.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - enrichmentMismatch is an internal defect, never a user mistake.
 */

import { AppError, type AppErrorMeta } from '../../shared/errors/errors';

export const ReportErrors = {
  invalidInput(message: string, meta?: AppErrorMeta) {
    return AppError.validationError(message, meta);
  },

  enrichmentMismatch(username: string) {
    return new AppError({
      code: 'MEMBERSHIP_ENRICHMENT_MISMATCH',
      message: `Internal consistency error: no enrichment for group member "${username}".`,
      meta: { username },
    });
  },
} as const;
