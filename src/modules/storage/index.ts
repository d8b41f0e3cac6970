/**
 * src/modules/storage/index.ts
 *
 * Public surface of the storage module.
 */

export { loadStorage, resolveQuotaFilePath } from './use-cases/load-storage';
export type { QuotaReader } from './dal/quota-reader';
export type { StorageSnapshot } from './storage.types';
