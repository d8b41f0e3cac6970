/**
 * src/modules/enrichment/helpers/lookup-or-default.ts
 *
 * WHY:
 * - Every recoverable lookup goes through here, so no failure escapes enrichment
 *   and every fallback is visible to the caller.
 */

import type { LookupFailureReason, LookupResult } from '../enrichment.types';

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export async function lookupOrDefault<T>(
  lookup: () => Promise<T>,
  fallback: T,
  reason: LookupFailureReason,
): Promise<LookupResult<T>> {
  try {
    return { ok: true, value: await lookup() };
  } catch (err: unknown) {
    return { ok: false, value: fallback, reason, message: describe(err) };
  }
}
