/**
 * src/modules/membership/use-cases/resolve-membership.ts
 *
 * WHY:
 * - Canonical sequence: findGroup → assertExists → listUsers → classify.
 *
 * RULES:
 * - GroupNotFound is fatal for the run; directory failures propagate unchanged.
 */

import type { IdentityDirectory } from '../../directory';
import type { AffiliationMap } from '../membership.types';
import { assertGroupExists, classifyMembers } from '../policies/membership.policy';

export async function resolveMembership(
  directory: IdentityDirectory,
  groupId: string,
): Promise<AffiliationMap> {
  const group = await directory.findGroup(groupId);
  assertGroupExists(group, groupId);

  const users = await directory.listUsers();
  return classifyMembers(group, users);
}
