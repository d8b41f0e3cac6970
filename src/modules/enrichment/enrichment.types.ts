/**
 * src/modules/enrichment/enrichment.types.ts
 *
 * WHY:
 * - Per-user facts gathered from the directory and accounting collaborators.
 * - LookupResult makes "value or default" explicit: a failed lookup still carries
 *   the value the report will use, plus why it fell back.
 */

import type { UsageByPartition } from '../accounting';
import type { AccountTier } from './policies/account-tier.policy';

export const NOT_AVAILABLE = 'NA';

export type LookupFailureReason = 'IDENTITY_LOOKUP_FAILED' | 'ACCOUNTING_QUERY_FAILED';

export type LookupResult<T> =
  | { ok: true; value: T }
  | { ok: false; value: T; reason: LookupFailureReason; message: string };

export type LookupFailure = {
  reason: LookupFailureReason;
  /** What was being looked up: 'identity', 'groups' or 'usage:<partition>'. */
  lookup: string;
  message: string;
};

export type UserEnrichment = {
  name: string;
  email: string;
  accountTiers: AccountTier[];
  usageByPartition: UsageByPartition;
};

export type EnrichmentOutcome = {
  username: string;
  enrichment: UserEnrichment;
  failures: LookupFailure[];
};
