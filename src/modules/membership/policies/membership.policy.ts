/**
 * src/modules/membership/policies/membership.policy.ts
 *
 * WHY:
 * - Pure membership rules (no I/O) => easy to unit test.
 *
 * RULES:
 * - Secondary members are collected first, then primary members overwrite them.
 *   A user is never both.
 */

import type { GroupEntry, PasswdEntry } from '../../directory';
import { DirectoryErrors } from '../../directory';
import type { Affiliation, AffiliationMap } from '../membership.types';

export function assertGroupExists(
  group: GroupEntry | undefined,
  groupId: string,
): asserts group is GroupEntry {
  if (!group) {
    throw DirectoryErrors.groupNotFound(groupId);
  }
}

export function classifyMembers(group: GroupEntry, users: readonly PasswdEntry[]): AffiliationMap {
  const out = new Map<string, Affiliation>();

  for (const member of group.members) {
    const username = member.trim();
    if (username) out.set(username, 'secondary');
  }

  for (const user of users) {
    if (user.gid === group.gid) {
      out.set(user.username, 'primary');
    }
  }

  return out;
}
