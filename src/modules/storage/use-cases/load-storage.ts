/**
 * src/modules/storage/use-cases/load-storage.ts
 *
 * WHY:
 * - read → parse, with read failures mapped to QuotaFileUnreadable.
 *
 * RULES:
 * - Never defaults to an empty snapshot: storage failures abort the report.
 */

import type { QuotaReader } from '../dal/quota-reader';
import { parseQuotaReport } from '../queries/parse-quota-report';
import { StorageErrors } from '../storage.errors';
import type { StorageSnapshot } from '../storage.types';

export async function loadStorage(
  reader: QuotaReader,
  opts: { path: string; headerLines: number },
): Promise<StorageSnapshot> {
  let text: string;
  try {
    text = await reader.read(opts.path);
  } catch (err: unknown) {
    throw StorageErrors.quotaFileUnreadable(opts.path, err);
  }

  return parseQuotaReport(text, opts);
}

export function resolveQuotaFilePath(opts: {
  dir: string;
  suffix: string;
  groupId: string;
}): string {
  const dir = opts.dir.endsWith('/') ? opts.dir.slice(0, -1) : opts.dir;
  return `${dir}/${opts.groupId}${opts.suffix}`;
}
