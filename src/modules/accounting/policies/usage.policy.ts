/**
 * src/modules/accounting/policies/usage.policy.ts
 *
 * WHY:
 * - Single conversion point from accounting seconds to core-hours.
 * - Default-fill rules for partition usage.
 *
 * RULES:
 * - Pure functions only.
 * - Results are never negative and never missing a configured partition.
 */

import type { PartitionUsage, UsageByPartition } from '../accounting.types';

export const SECONDS_PER_CORE_HOUR = 3600;

export const EMPTY_USAGE: Readonly<PartitionUsage> = Object.freeze({ jobCount: 0, cpuHours: 0 });

export function toCoreHours(cpuSeconds: number): number {
  return cpuSeconds / SECONDS_PER_CORE_HOUR;
}

export function summarizeJobs(cpuSeconds: readonly number[]): PartitionUsage {
  const total = cpuSeconds.reduce((sum, s) => sum + s, 0);
  return { jobCount: cpuSeconds.length, cpuHours: toCoreHours(total) };
}

function nonNegative(value: number): number {
  return Number.isFinite(value) && value > 0 ? value : 0;
}

export function normalizeUsage(usage: PartitionUsage | undefined): PartitionUsage {
  if (!usage) return { ...EMPTY_USAGE };
  return {
    jobCount: Math.trunc(nonNegative(usage.jobCount)),
    cpuHours: nonNegative(usage.cpuHours),
  };
}

/** One entry per partition, in partition order; absent or invalid values become zero. */
export function fillPartitions(
  partitions: readonly string[],
  usage: Partial<UsageByPartition> | undefined,
): UsageByPartition {
  const out: UsageByPartition = {};
  for (const partition of partitions) {
    out[partition] = normalizeUsage(usage?.[partition]);
  }
  return out;
}
