/**
 * src/modules/directory/dal/getent-directory.ts
 *
 * WHY:
 * - IdentityDirectory backed by the host name service (NSS: files, LDAP, sssd).
 * - `getent` sees the same users and groups the scheduler does.
 *
 * RULES:
 * - getent exits 2 when the key is unknown → return undefined.
 * - Every other failure propagates as CommandFailedError.
 */

import { CommandFailedError, type CommandRunner } from '../../../shared/system/command-runner';
import type { GroupEntry, PasswdEntry } from '../directory.types';
import type { IdentityDirectory } from './identity-directory';
import { parseGroupLine, parseLines, parsePasswdLine } from './directory.parse';

const GETENT_KEY_NOT_FOUND = 2;

export class GetentDirectory implements IdentityDirectory {
  constructor(
    private readonly run: CommandRunner,
    private readonly paths: { getent: string; id: string },
  ) {}

  private async getent(database: 'group' | 'passwd', key?: string): Promise<string | undefined> {
    const args = key === undefined ? [database] : [database, key];
    try {
      const { stdout } = await this.run(this.paths.getent, args);
      return stdout;
    } catch (err: unknown) {
      if (err instanceof CommandFailedError && err.exitCode === GETENT_KEY_NOT_FOUND) {
        return undefined;
      }
      throw err;
    }
  }

  async findGroup(groupName: string): Promise<GroupEntry | undefined> {
    const out = await this.getent('group', groupName);
    if (out === undefined) return undefined;
    return parseLines(out, parseGroupLine)[0];
  }

  async listUsers(): Promise<PasswdEntry[]> {
    const out = await this.getent('passwd');
    return out === undefined ? [] : parseLines(out, parsePasswdLine);
  }

  async findUser(username: string): Promise<PasswdEntry | undefined> {
    const out = await this.getent('passwd', username);
    if (out === undefined) return undefined;
    return parseLines(out, parsePasswdLine)[0];
  }

  async listGroupNamesForUser(username: string): Promise<string[]> {
    const { stdout } = await this.run(this.paths.id, ['-Gn', username]);
    return stdout
      .trim()
      .split(/\s+/)
      .filter((g) => g.length > 0);
  }
}
