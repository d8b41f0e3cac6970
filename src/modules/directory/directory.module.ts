/**
 * src/modules/directory/directory.module.ts
 *
 * WHY:
 * - Encapsulates Directory module wiring.
 * - Support module: membership and enrichment consume its IdentityDirectory.
 *
 * RULES:
 * - No infra creation here (DI passes the command runner in).
 */

import type { CommandRunner } from '../../shared/system/command-runner';
import { GetentDirectory } from './dal/getent-directory';
import type { IdentityDirectory } from './dal/identity-directory';

export type DirectoryModule = ReturnType<typeof createDirectoryModule>;

export function createDirectoryModule(deps: {
  run: CommandRunner;
  getentPath: string;
  idPath: string;
}) {
  const directory: IdentityDirectory = new GetentDirectory(deps.run, {
    getent: deps.getentPath,
    id: deps.idPath,
  });

  return {
    directory,
  };
}
