/**
 * src/modules/accounting/index.ts
 *
 * Public surface of the accounting module.
 */

export type { AccountingSource } from './dal/accounting-source';
export type {
  AccountingQuery,
  PartitionUsage,
  ReportPeriod,
  UsageByPartition,
} from './accounting.types';
export {
  EMPTY_USAGE,
  fillPartitions,
  normalizeUsage,
  summarizeJobs,
  toCoreHours,
} from './policies/usage.policy';
