/**
 * src/modules/storage/queries/parse-quota-report.ts
 *
 * WHY:
 * - Turns the fixed-format quota text into a StorageSnapshot.
 *
 * FORMAT (whitespace-delimited, after `headerLines` header lines):
 *   username parent-path type GB-used GB-available GB-hard-limit grace files-used ...
 * - First data row = group aggregate (used + allocation), not a user.
 * - Remaining rows = one per user.
 * - Only columns 0, 3 and (aggregate only) 4 are read.
 *
 * RULES:
 * - Blank lines are skipped.
 * - Rows with fewer than 4 columns or a bad GB value are fatal (QuotaFileMalformed).
 */

import { StorageErrors } from '../storage.errors';
import type { StorageSnapshot } from '../storage.types';

const COL_USERNAME = 0;
const COL_GB_USED = 3;
const COL_GB_AVAILABLE = 4;

type DataLine = { lineNumber: number; columns: string[] };

function parseGb(path: string, value: string | undefined, line: DataLine, column: string): number {
  const n = value === undefined ? Number.NaN : Number(value);
  if (!Number.isFinite(n) || n < 0) {
    throw StorageErrors.quotaFileMalformed(
      path,
      `${column} "${value ?? ''}" is not a non-negative number`,
      line.lineNumber,
    );
  }
  return n;
}

export function parseQuotaReport(
  text: string,
  opts: { path: string; headerLines: number },
): StorageSnapshot {
  const dataLines: DataLine[] = text
    .split(/\r?\n/)
    .map((raw, index) => ({ lineNumber: index + 1, raw }))
    .slice(opts.headerLines)
    .filter((l) => l.raw.trim().length > 0)
    .map((l) => ({ lineNumber: l.lineNumber, columns: l.raw.trim().split(/\s+/) }));

  const [aggregate, ...rows] = dataLines;
  if (!aggregate) {
    throw StorageErrors.quotaFileMalformed(opts.path, 'no group aggregate row after the header');
  }
  if (aggregate.columns.length <= COL_GB_AVAILABLE) {
    throw StorageErrors.quotaFileMalformed(
      opts.path,
      'group aggregate row is missing the GB-available column',
      aggregate.lineNumber,
    );
  }

  const totalUsedGB = parseGb(opts.path, aggregate.columns[COL_GB_USED], aggregate, 'GB-used');
  const totalAvailableGB = parseGb(
    opts.path,
    aggregate.columns[COL_GB_AVAILABLE],
    aggregate,
    'GB-available',
  );

  const byUser = new Map<string, number>();
  for (const row of rows) {
    if (row.columns.length <= COL_GB_USED) {
      throw StorageErrors.quotaFileMalformed(opts.path, 'too few columns', row.lineNumber);
    }
    const username = row.columns[COL_USERNAME];
    const gb = Math.round(parseGb(opts.path, row.columns[COL_GB_USED], row, 'GB-used'));
    byUser.set(username, (byUser.get(username) ?? 0) + gb);
  }

  return { totalUsedGB, totalAvailableGB, byUser };
}
