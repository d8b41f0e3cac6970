/**
 * src/modules/directory/dal/directory.parse.ts
 *
 * Line parsers for `getent group` and `getent passwd` output.
 * Malformed lines return undefined and are skipped by callers.
 */

import type { GroupEntry, PasswdEntry } from '../directory.types';

function parseId(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  return Number(value);
}

// name:password:gid:member1,member2
export function parseGroupLine(line: string): GroupEntry | undefined {
  const fields = line.trim().split(':');
  if (fields.length < 4 || !fields[0]) return undefined;

  const gid = parseId(fields[2]);
  if (gid === undefined) return undefined;

  const members = fields[3]
    .split(',')
    .map((m) => m.trim())
    .filter((m) => m.length > 0);

  return { name: fields[0], gid, members };
}

// name:password:uid:gid:gecos:home:shell
export function parsePasswdLine(line: string): PasswdEntry | undefined {
  const fields = line.replace(/\r?\n$/, '').split(':');
  if (fields.length < 7 || !fields[0]) return undefined;

  const uid = parseId(fields[2]);
  const gid = parseId(fields[3]);
  if (uid === undefined || gid === undefined) return undefined;

  return { username: fields[0], uid, gid, gecos: fields[4] };
}

export function parseLines<T>(output: string, parse: (line: string) => T | undefined): T[] {
  const out: T[] = [];
  for (const line of output.split('\n')) {
    if (!line.trim()) continue;
    const parsed = parse(line);
    if (parsed !== undefined) out.push(parsed);
  }
  return out;
}
