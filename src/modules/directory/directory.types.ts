/**
 * src/modules/directory/directory.types.ts
 *
 * WHY:
 * - Domain shapes for the identity directory (name service).
 * - Mirrors the group and passwd databases without leaking their colon format.
 */

export type GroupEntry = {
  name: string;
  gid: number;
  /** Supplementary (secondary) members as listed on the group entry. */
  members: string[];
};

export type PasswdEntry = {
  username: string;
  uid: number;
  /** Primary group id. */
  gid: number;
  /** Comment (GECOS) field, raw. */
  gecos: string;
};
