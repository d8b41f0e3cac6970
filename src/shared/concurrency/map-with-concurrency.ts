/**
 * src/shared/concurrency/map-with-concurrency.ts
 *
 * WHY:
 * - Per-user enrichment fans out over every group member; the accounting backend
 *   must not see hundreds of simultaneous sacct calls.
 *
 * RULES:
 * - At most `limit` calls of `fn` are in flight.
 * - Results keep input order.
 * - Every item is processed; the returned settled results are the barrier.
 */

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`concurrency limit must be a positive integer, got ${limit}`);
  }

  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await fn(items[index], index) };
      } catch (reason: unknown) {
        results[index] = { status: 'rejected', reason };
      }
    }
  }

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);

  return results;
}
