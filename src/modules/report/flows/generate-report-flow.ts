/**
 * src/modules/report/flows/generate-report-flow.ts
 *
 * WHY:
 * - "Flow" = one end-to-end use-case: membership → enrichment ∥ storage → merge →
 *   summary → top-N → pages.
 * - Keeps ReportService thin.
 *
 * RULES:
 * - Membership failure aborts before any other lookup runs.
 * - Enrichment fans out with at most `concurrency` members in flight, in parallel
 *   with the storage load.
 * - Barrier: every task settles before anything is merged. A storage failure is
 *   rethrown after the barrier; there is no partial dataset.
 * - Recovered lookup failures are logged here, once per failure.
 */

import type { IdentityDirectory } from '../../directory';
import type { AccountingSource, ReportPeriod } from '../../accounting';
import { enrichUser, type EnrichmentOutcome, type UserEnrichment } from '../../enrichment';
import { resolveMembership } from '../../membership';
import { loadStorage, type QuotaReader } from '../../storage';
import type { ReportLogger } from '../../../shared/logger/with-context';
import { mapWithConcurrency } from '../../../shared/concurrency/map-with-concurrency';

import type { HeaderPolicy, ReportDataset, TopNEntry } from '../report.types';
import { findStaleUsernames, mergeDataset, type MergeInput } from '../use-cases/merge-dataset';
import { summarize } from '../policies/summary.policy';
import { topStorageConsumers, topUsageConsumers } from '../policies/top-n.policy';
import { paginate } from '../policies/pagination.policy';
import { sortByUsername } from '../helpers/by-username';
import { deepFreeze } from '../helpers/deep-freeze';

export type ReportOptions = {
  partitions: readonly string[];
  concurrency: number;
  quotaHeaderLines: number;
  storageTopN: number;
  usageTopN: number;
  pageSize: number;
  headerPolicy: HeaderPolicy;
};

export type GenerateReportFlowDeps = {
  directory: IdentityDirectory;
  accounting: AccountingSource;
  quotaReader: QuotaReader;
  log: ReportLogger;
  options: ReportOptions;
  now: () => Date;
};

export type GenerateReportFlowParams = {
  groupId: string;
  period: ReportPeriod;
  quotaFilePath: string;
};

function logFailures(log: ReportLogger, outcome: EnrichmentOutcome): void {
  for (const failure of outcome.failures) {
    log.warn('enrichment.lookup_failed', {
      flow: 'report.enrich',
      username: outcome.username,
      reason: failure.reason,
      lookup: failure.lookup,
      message: failure.message,
    });
  }
}

export async function executeGenerateReportFlow(
  deps: GenerateReportFlowDeps,
  params: GenerateReportFlowParams,
): Promise<ReportDataset> {
  const { log, options } = deps;
  const partitions = [...options.partitions];

  log.info('report.start', {
    flow: 'report.generate',
    period: params.period,
    quotaFilePath: params.quotaFilePath,
    partitions,
  });

  const affiliations = await resolveMembership(deps.directory, params.groupId);
  const usernames = [...affiliations.keys()].sort();

  log.info('report.membership_resolved', { flow: 'report.membership', members: usernames.length });

  const [enrichSettled, storageSettled] = await Promise.allSettled([
    mapWithConcurrency(usernames, options.concurrency, (username) =>
      enrichUser(
        { directory: deps.directory, accounting: deps.accounting },
        { username, period: params.period, partitions },
      ),
    ),
    loadStorage(deps.quotaReader, {
      path: params.quotaFilePath,
      headerLines: options.quotaHeaderLines,
    }),
  ]);

  // barrier reached: nothing is in flight past this point
  if (storageSettled.status === 'rejected') throw storageSettled.reason;
  if (enrichSettled.status === 'rejected') throw enrichSettled.reason;

  const storage = storageSettled.value;
  const enrichments = new Map<string, UserEnrichment>();

  enrichSettled.value.forEach((result, index) => {
    if (result.status === 'fulfilled') {
      logFailures(log, result.value);
      enrichments.set(result.value.username, result.value.enrichment);
    } else {
      const reason: unknown = result.reason;
      log.error('enrichment.task_failed', {
        flow: 'report.enrich',
        username: usernames[index],
        message: reason instanceof Error ? reason.message : String(reason),
      });
    }
  });

  const mergeInput: MergeInput = {
    affiliations,
    enrichments,
    storage: storage.byUser,
    partitions,
  };

  const stale = findStaleUsernames(mergeInput);
  if (stale.enrichmentOnly.length > 0 || stale.storageOnly.length > 0) {
    log.info('report.stale_usernames_dropped', { flow: 'report.merge', ...stale });
  }

  const records = sortByUsername(mergeDataset(mergeInput));
  const summary = summarize(records, storage.totalAvailableGB, partitions);

  if (summary.storage.usedGB !== storage.totalUsedGB) {
    log.debug('report.storage_total_differs', {
      flow: 'report.summary',
      memberSumGB: summary.storage.usedGB,
      aggregateGB: storage.totalUsedGB,
    });
  }

  const usageTop: Record<string, TopNEntry[]> = {};
  for (const partition of partitions) {
    usageTop[partition] = topUsageConsumers(records, partition, options.usageTopN);
  }

  const dataset: ReportDataset = {
    groupId: params.groupId,
    period: { ...params.period },
    generatedAt: deps.now().toISOString(),
    partitions,
    records,
    summary,
    storageTop: topStorageConsumers(records, options.storageTopN),
    usageTop,
    pages: paginate(records, options.pageSize, options.headerPolicy),
  };

  log.info('report.done', {
    flow: 'report.generate',
    members: summary.members,
    pages: dataset.pages.length,
  });

  return deepFreeze(dataset);
}
