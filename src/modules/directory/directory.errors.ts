/**
 * src/modules/directory/directory.errors.ts
 *
 * WHY:
 * - Directory module owns the "group does not exist" meaning.
 *
 * RULES:
 * - Use AppError as the transport primitive.
 */

import { AppError, type AppErrorMeta } from '../../shared/errors/errors';

export const DirectoryErrors = {
  groupNotFound(groupId: string, meta?: AppErrorMeta) {
    return AppError.notFound(`Group "${groupId}" was not found in the identity directory.`, {
      groupId,
      ...meta,
    });
  },
} as const;
