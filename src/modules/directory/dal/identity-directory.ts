/**
 * src/modules/directory/dal/identity-directory.ts
 *
 * WHY:
 * - The report core depends on this contract, not on getent/id.
 * - Tests implement it with in-memory fixtures.
 *
 * RULES:
 * - "Not found" is `undefined`, not an error.
 * - Any other failure rejects; callers decide whether it is fatal.
 */

import type { GroupEntry, PasswdEntry } from '../directory.types';

export interface IdentityDirectory {
  findGroup(groupName: string): Promise<GroupEntry | undefined>;
  listUsers(): Promise<PasswdEntry[]>;
  findUser(username: string): Promise<PasswdEntry | undefined>;
  /** Names of every group the user belongs to (primary + secondary). */
  listGroupNamesForUser(username: string): Promise<string[]>;
}
