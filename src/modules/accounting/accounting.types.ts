/**
 * src/modules/accounting/accounting.types.ts
 *
 * WHY:
 * - One unit for CPU time across the pipeline: core-hours.
 * - Raw accounting output is seconds; conversion happens once, in usage.policy.ts.
 */

/** Inclusive reporting window, both dates formatted YYYY-MM-DD. */
export type ReportPeriod = {
  start: string;
  end: string;
};

export type PartitionUsage = {
  jobCount: number;
  cpuHours: number;
};

/** partition → usage. Every configured partition has an entry. */
export type UsageByPartition = Record<string, PartitionUsage>;

export type AccountingQuery = {
  username: string;
  partition: string;
  period: ReportPeriod;
};
