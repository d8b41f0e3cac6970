/**
 * src/modules/storage/dal/quota-reader.ts
 *
 * WHY:
 * - The loader depends on QuotaReader so tests can hand it a string.
 * - FsQuotaReader reads the periodic snapshot from disk.
 */

import { readFile } from 'node:fs/promises';

export interface QuotaReader {
  read(path: string): Promise<string>;
}

export class FsQuotaReader implements QuotaReader {
  async read(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }
}
