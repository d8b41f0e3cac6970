/**
 * src/modules/report/policies/summary.policy.ts
 *
 * WHY:
 * - Group-level figures for the report's first page.
 *
 * RULES:
 * - total = primary + secondary; unknown is counted on its own.
 * - Tier counts and usage totals cover primary members only. Secondary members
 *   are billed to their own primary group.
 * - availableGB = allocation - used, not clamped.
 */

import type { PartitionUsage } from '../../accounting';
import { emptyTierCounts, type AccountTier } from '../../enrichment';
import type { GroupSummary, MemberCounts, UserRecord } from '../report.types';

function countMembers(records: readonly UserRecord[]): MemberCounts {
  const counts = { primary: 0, secondary: 0, unknown: 0 };
  for (const r of records) {
    counts[r.affiliation] += 1;
  }
  return { ...counts, total: counts.primary + counts.secondary };
}

function countTiers(primary: readonly UserRecord[]): Record<AccountTier, number> {
  const out = emptyTierCounts();
  for (const r of primary) {
    for (const tier of r.accountTiers) {
      out[tier] += 1;
    }
  }
  return out;
}

function totalUsage(
  primary: readonly UserRecord[],
  partitions: readonly string[],
): Record<string, PartitionUsage> {
  const out: Record<string, PartitionUsage> = {};
  for (const partition of partitions) {
    let jobCount = 0;
    let cpuHours = 0;
    for (const r of primary) {
      jobCount += r.usageByPartition[partition]?.jobCount ?? 0;
      cpuHours += r.usageByPartition[partition]?.cpuHours ?? 0;
    }
    out[partition] = { jobCount, cpuHours };
  }
  return out;
}

export function summarize(
  records: readonly UserRecord[],
  allocationGB: number,
  partitions: readonly string[],
): GroupSummary {
  const primary = records.filter((r) => r.affiliation === 'primary');
  const usedGB = records.reduce((sum, r) => sum + r.storageGB, 0);

  return {
    members: countMembers(records),
    tiers: countTiers(primary),
    storage: {
      allocationGB,
      usedGB,
      availableGB: allocationGB - usedGB,
    },
    usageByPartition: totalUsage(primary, partitions),
  };
}
