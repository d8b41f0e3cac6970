/**
 * src/modules/storage/storage.errors.ts
 *
 * WHY:
 * - Storage is a mandatory report section: both conditions are fatal.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 * - Messages name the file and, for malformed input, the line.
 */

import { AppError } from '../../shared/errors/errors';

export const StorageErrors = {
  quotaFileUnreadable(path: string, cause?: unknown) {
    return new AppError({
      code: 'QUOTA_FILE_UNREADABLE',
      message: `Quota report "${path}" could not be read.`,
      meta: { path },
      cause,
    });
  },

  quotaFileMalformed(path: string, reason: string, lineNumber?: number) {
    const where = lineNumber === undefined ? '' : ` (line ${lineNumber})`;
    return new AppError({
      code: 'QUOTA_FILE_MALFORMED',
      message: `Quota report "${path}" is malformed${where}: ${reason}`,
      meta: { path, lineNumber, reason },
    });
  },
} as const;
