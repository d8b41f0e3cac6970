/**
 * src/modules/directory/index.ts
 *
 * Public surface of the directory module.
 */

export type { IdentityDirectory } from './dal/identity-directory';
export type { GroupEntry, PasswdEntry } from './directory.types';
export { DirectoryErrors } from './directory.errors';
