/**
 * src/modules/storage/storage.types.ts
 *
 * WHY:
 * - Typed view of one quota snapshot.
 * - totalAvailableGB is the group's allocation ceiling (the aggregate row's
 *   GB-available column); the summarizer computes remaining space from it.
 */

export type StorageSnapshot = {
  totalUsedGB: number;
  totalAvailableGB: number;
  /** username → GB used (integer). The aggregate row is not in here. */
  byUser: ReadonlyMap<string, number>;
};
