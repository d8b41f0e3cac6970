/**
 * src/modules/storage/storage.module.ts
 *
 * Storage module wiring.
 */

import { FsQuotaReader, type QuotaReader } from './dal/quota-reader';

export type StorageModule = ReturnType<typeof createStorageModule>;

export function createStorageModule() {
  const quotaReader: QuotaReader = new FsQuotaReader();

  return {
    quotaReader,
  };
}
