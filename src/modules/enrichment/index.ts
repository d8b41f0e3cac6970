/**
 * src/modules/enrichment/index.ts
 *
 * Public surface of the enrichment module.
 */

export { enrichUser } from './use-cases/enrich-user';
export type { EnrichUserDeps, EnrichUserParams } from './use-cases/enrich-user';
export { ACCOUNT_TIERS, emptyTierCounts, resolveAccountTiers } from './policies/account-tier.policy';
export type { AccountTier } from './policies/account-tier.policy';
export { NOT_AVAILABLE } from './enrichment.types';
export type {
  EnrichmentOutcome,
  LookupFailure,
  LookupFailureReason,
  LookupResult,
  UserEnrichment,
} from './enrichment.types';
