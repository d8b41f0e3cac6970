/**
 * src/modules/report/use-cases/merge-dataset.ts
 *
 * WHY:
 * - Explicit join keyed on username: membership × enrichment × storage.
 *
 * RULES:
 * - The affiliation map is the key set. Exactly one record per member.
 * - A member without enrichment is a defect → MembershipEnrichmentMismatch.
 * - Enrichment/storage entries for non-members are stale and dropped.
 * - Default fill: storage 0, every partition present, numbers clamped to >= 0.
 * - Output order is undefined; callers sort.
 */

import { fillPartitions } from '../../accounting';
import type { UserEnrichment } from '../../enrichment';
import type { AffiliationMap } from '../../membership';
import { ReportErrors } from '../report.errors';
import type { UserRecord } from '../report.types';

export type MergeInput = {
  affiliations: AffiliationMap;
  enrichments: ReadonlyMap<string, UserEnrichment>;
  storage: ReadonlyMap<string, number>;
  partitions: readonly string[];
};

export type StaleUsernames = {
  enrichmentOnly: string[];
  storageOnly: string[];
};

function normalizeStorage(gb: number | undefined): number {
  if (gb === undefined || !Number.isFinite(gb) || gb < 0) return 0;
  return Math.round(gb);
}

export function mergeDataset(input: MergeInput): UserRecord[] {
  const records: UserRecord[] = [];

  for (const [username, affiliation] of input.affiliations) {
    const enrichment = input.enrichments.get(username);
    if (!enrichment) {
      throw ReportErrors.enrichmentMismatch(username);
    }

    records.push({
      username,
      affiliation,
      name: enrichment.name,
      email: enrichment.email,
      accountTiers: [...enrichment.accountTiers],
      usageByPartition: fillPartitions(input.partitions, enrichment.usageByPartition),
      storageGB: normalizeStorage(input.storage.get(username)),
    });
  }

  return records;
}

export function findStaleUsernames(input: MergeInput): StaleUsernames {
  const isStale = (username: string) => !input.affiliations.has(username);

  return {
    enrichmentOnly: [...input.enrichments.keys()].filter(isStale).sort(),
    storageOnly: [...input.storage.keys()].filter(isStale).sort(),
  };
}
