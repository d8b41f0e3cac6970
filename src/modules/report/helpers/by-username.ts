/**
 * Deterministic username ordering (code-unit order, locale independent).
 */
export function compareUsernames(a: { username: string }, b: { username: string }): number {
  if (a.username < b.username) return -1;
  if (a.username > b.username) return 1;
  return 0;
}

export function sortByUsername<T extends { username: string }>(items: readonly T[]): T[] {
  return [...items].sort(compareUsernames);
}
