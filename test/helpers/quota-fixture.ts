/**
 * Builds a quota snapshot in the on-disk format: two header lines, the group
 * aggregate row, then one row per user.
 */
export function quotaReport(opts: {
  group: string;
  usedGB: number;
  availableGB: number;
  users: Array<[string, number]>;
}): string {
  const lines = [
    '*** Report for USR GRP FILESET quotas on gpfs',
    'Name       fileset   type   GB   quota   limit   grace  files  quota  limit  grace',
    `${opts.group}  data  GRP  ${opts.usedGB}  ${opts.availableGB}  ${opts.availableGB + 50}  none  4200  0  0  none`,
    ...opts.users.map(([u, gb]) => `${u}  data  USR  ${gb}  0  0  none  100  0  0  none`),
  ];
  return `${lines.join('\n')}\n`;
}
