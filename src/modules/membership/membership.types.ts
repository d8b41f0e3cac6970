/**
 * src/modules/membership/membership.types.ts
 *
 * WHY:
 * - Affiliation says how a user belongs to the reported group.
 *   primary   = the group is the user's default (passwd) group
 *   secondary = the user is on the group's supplementary member list
 *   unknown   = a record reached the dataset without an affiliation (defect)
 */

export type Affiliation = 'primary' | 'secondary' | 'unknown';

/** username → affiliation. Iteration order carries no meaning. */
export type AffiliationMap = ReadonlyMap<string, Affiliation>;
