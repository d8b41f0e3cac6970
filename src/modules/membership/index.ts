/**
 * src/modules/membership/index.ts
 *
 * Public surface of the membership module.
 */

export { resolveMembership } from './use-cases/resolve-membership';
export type { Affiliation, AffiliationMap } from './membership.types';
