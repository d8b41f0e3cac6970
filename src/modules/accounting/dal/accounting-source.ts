/**
 * src/modules/accounting/dal/accounting-source.ts
 *
 * WHY:
 * - The aggregation core never runs sacct directly; it calls this contract.
 * - Tests supply deterministic fixtures through a fake implementation.
 *
 * RULES:
 * - One entry per completed job allocation (job steps are not counted).
 * - An empty array is a valid "no usage" answer, not an error.
 */

import type { AccountingQuery } from '../accounting.types';

export interface AccountingSource {
  /** CPU time of each matching job, in seconds. */
  listJobCpuSeconds(query: AccountingQuery): Promise<number[]>;
}
