/**
 * src/modules/report/policies/top-n.policy.ts
 *
 * WHY:
 * - Bounded chart views: top N entries + one "All Others" rollup.
 *
 * RULES:
 * - Sort by value descending; ties keep the pool's order (username order).
 * - Pool larger than N → N entries + rollup (sum of the rest). Otherwise no rollup.
 * - Storage pool: every affiliation, storageGB > 0 only (zero never appears,
 *   not even inside the rollup).
 * - Usage pool: primary members only; zero usage is allowed.
 */

import { ROLLUP_LABEL } from '../report.constants';
import type { TopNEntry, UsageMetric, UserRecord } from '../report.types';
import { sortByUsername } from '../helpers/by-username';

export type RankedEntry = {
  label: string;
  value: number;
};

export function rankTopN(pool: readonly RankedEntry[], n: number): TopNEntry[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`top-N size must be a non-negative integer, got ${n}`);
  }

  // Array.prototype.sort is stable, so equal values keep pool order.
  const ranked = [...pool].sort((a, b) => b.value - a.value);

  const top: TopNEntry[] = ranked
    .slice(0, n)
    .map((e) => ({ label: e.label, value: e.value, isRollup: false }));

  if (ranked.length > n) {
    const rest = ranked.slice(n).reduce((sum, e) => sum + e.value, 0);
    top.push({ label: ROLLUP_LABEL, value: rest, isRollup: true });
  }

  return top;
}

export function topStorageConsumers(records: readonly UserRecord[], n: number): TopNEntry[] {
  const pool = sortByUsername(records.filter((r) => r.storageGB > 0));
  return rankTopN(
    pool.map((r) => ({ label: r.username, value: r.storageGB })),
    n,
  );
}

export function topUsageConsumers(
  records: readonly UserRecord[],
  partition: string,
  n: number,
  metric: UsageMetric = 'cpuHours',
): TopNEntry[] {
  const pool = sortByUsername(records.filter((r) => r.affiliation === 'primary'));
  return rankTopN(
    pool.map((r) => ({ label: r.username, value: r.usageByPartition[partition]?.[metric] ?? 0 })),
    n,
  );
}
