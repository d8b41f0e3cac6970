/**
 * src/modules/enrichment/use-cases/enrich-user.ts
 *
 * WHY:
 * - Builds one member's name, email, tiers and per-partition usage.
 *
 * RULES:
 * - Never throws for a member: each sub-lookup defaults on failure.
 *   identity → "NA" per field, groups → no tiers, usage → (0, 0) per partition.
 * - Partition queries run one after another; concurrency is bounded across users
 *   by the report pipeline.
 * - Failures are returned, not logged here (the pipeline owns logging).
 */

import type { IdentityDirectory, PasswdEntry } from '../../directory';
import {
  EMPTY_USAGE,
  summarizeJobs,
  type AccountingSource,
  type PartitionUsage,
  type ReportPeriod,
  type UsageByPartition,
} from '../../accounting';
import {
  NOT_AVAILABLE,
  type EnrichmentOutcome,
  type LookupFailure,
  type LookupResult,
} from '../enrichment.types';
import { GECOS_EMAIL_INDEX, GECOS_NAME_INDEX, gecosField } from '../helpers/parse-gecos';
import { lookupOrDefault } from '../helpers/lookup-or-default';
import { resolveAccountTiers } from '../policies/account-tier.policy';

export type EnrichUserDeps = {
  directory: IdentityDirectory;
  accounting: AccountingSource;
};

export type EnrichUserParams = {
  username: string;
  period: ReportPeriod;
  partitions: readonly string[];
};

function collect<T>(failures: LookupFailure[], lookup: string, result: LookupResult<T>): T {
  if (!result.ok) {
    failures.push({ reason: result.reason, lookup, message: result.message });
  }
  return result.value;
}

async function requireUser(directory: IdentityDirectory, username: string): Promise<PasswdEntry> {
  const user = await directory.findUser(username);
  if (!user) throw new Error(`user "${username}" not found in directory`);
  return user;
}

export async function enrichUser(
  deps: EnrichUserDeps,
  params: EnrichUserParams,
): Promise<EnrichmentOutcome> {
  const { username } = params;
  const failures: LookupFailure[] = [];

  const user = collect(
    failures,
    'identity',
    await lookupOrDefault<PasswdEntry | undefined>(
      () => requireUser(deps.directory, username),
      undefined,
      'IDENTITY_LOOKUP_FAILED',
    ),
  );

  const groupNames = collect(
    failures,
    'groups',
    await lookupOrDefault(
      () => deps.directory.listGroupNamesForUser(username),
      [],
      'IDENTITY_LOOKUP_FAILED',
    ),
  );

  const usageByPartition: UsageByPartition = {};
  for (const partition of params.partitions) {
    usageByPartition[partition] = collect(
      failures,
      `usage:${partition}`,
      await lookupOrDefault<PartitionUsage>(
        async () =>
          summarizeJobs(
            await deps.accounting.listJobCpuSeconds({ username, partition, period: params.period }),
          ),
        { ...EMPTY_USAGE },
        'ACCOUNTING_QUERY_FAILED',
      ),
    );
  }

  return {
    username,
    enrichment: {
      name: (user && gecosField(user.gecos, GECOS_NAME_INDEX)) ?? NOT_AVAILABLE,
      email: (user && gecosField(user.gecos, GECOS_EMAIL_INDEX)) ?? NOT_AVAILABLE,
      accountTiers: resolveAccountTiers(groupNames),
      usageByPartition,
    },
    failures,
  };
}
