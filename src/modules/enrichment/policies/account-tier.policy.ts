/**
 * src/modules/enrichment/policies/account-tier.policy.ts
 *
 * WHY:
 * - Premium access is granted through Unix group membership; several group names
 *   (e.g. priority, priority1) map to the same tier.
 *
 * RULES:
 * - Pure functions only.
 * - Output follows ACCOUNT_TIERS order, one tag per tier.
 */

export const ACCOUNT_TIERS = [
  'priority',
  'priority-plus',
  'gpu-standard',
  'gpu-standard-plus',
  'gpu-highend',
  'bigmem-priority',
] as const;

export type AccountTier = (typeof ACCOUNT_TIERS)[number];

export const TIER_GROUPS: Readonly<Record<AccountTier, readonly string[]>> = {
  priority: [
    'priority',
    'priority1',
    'priority2',
    'priority3',
    'priority4',
    'priority5',
    'priority6',
    'priority7',
    'priority8',
    'priority9',
  ],
  'priority-plus': ['priority+', 'priority+1'],
  'gpu-standard': ['pri-gpu', 'pri-gpu1'],
  'gpu-standard-plus': ['pri-gpu+', 'pri-gpu+1'],
  'gpu-highend': ['gpu-he', 'gpu-he1'],
  'bigmem-priority': ['pri-bigmem', 'pri-bigmem1'],
};

export function resolveAccountTiers(groupNames: readonly string[]): AccountTier[] {
  const groups = new Set(groupNames);
  return ACCOUNT_TIERS.filter((tier) => TIER_GROUPS[tier].some((g) => groups.has(g)));
}

export function emptyTierCounts(): Record<AccountTier, number> {
  return {
    priority: 0,
    'priority-plus': 0,
    'gpu-standard': 0,
    'gpu-standard-plus': 0,
    'gpu-highend': 0,
    'bigmem-priority': 0,
  };
}
