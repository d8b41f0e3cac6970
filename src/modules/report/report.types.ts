/**
 * src/modules/report/report.types.ts
 *
 * WHY:
 * - One explicit record per member, built once by the merger.
 * - Everything downstream (summary, top-N, pages) derives from UserRecord[].
 *
 * RULES:
 * - Numbers are never negative and never missing.
 * - ReportDataset is frozen once built; renderers only read it.
 */

import type { PartitionUsage, ReportPeriod, UsageByPartition } from '../accounting';
import type { AccountTier } from '../enrichment';
import type { Affiliation } from '../membership';

export type UserRecord = {
  username: string;
  affiliation: Affiliation;
  name: string;
  email: string;
  accountTiers: AccountTier[];
  usageByPartition: UsageByPartition;
  storageGB: number;
};

export type MemberCounts = {
  primary: number;
  secondary: number;
  /** Defective affiliations; not part of total. */
  unknown: number;
  /** primary + secondary */
  total: number;
};

export type StorageSummary = {
  allocationGB: number;
  usedGB: number;
  /** allocationGB - usedGB. Negative when the group is over quota. */
  availableGB: number;
};

export type GroupSummary = {
  members: MemberCounts;
  /** Primary members only. */
  tiers: Record<AccountTier, number>;
  storage: StorageSummary;
  /** Totals over primary members, the same pool as the usage charts. */
  usageByPartition: Record<string, PartitionUsage>;
};

export type TopNEntry = {
  label: string;
  value: number;
  isRollup: boolean;
};

export const SECTION_LABELS = ['PRIMARY', 'SECONDARY', 'OTHER'] as const;

export type SectionLabel = (typeof SECTION_LABELS)[number];

export type Section = {
  label: SectionLabel;
  records: UserRecord[];
};

export type TableRow =
  | { kind: 'section'; label: SectionLabel }
  | { kind: 'member'; record: UserRecord };

export type Page = TableRow[];

/**
 * flow           - header rows fill the page budget like data rows and may end a page
 * keep-with-next - a header never ends a page; it moves to the next one
 */
export const HEADER_POLICIES = ['flow', 'keep-with-next'] as const;

export type HeaderPolicy = (typeof HEADER_POLICIES)[number];

export type UsageMetric = 'cpuHours' | 'jobCount';

export type ReportDataset = {
  groupId: string;
  period: ReportPeriod;
  generatedAt: string;
  partitions: string[];
  /** Sorted by username. */
  records: UserRecord[];
  summary: GroupSummary;
  storageTop: TopNEntry[];
  /** partition → top-N by core-hours over primary members. */
  usageTop: Record<string, TopNEntry[]>;
  pages: Page[];
};
