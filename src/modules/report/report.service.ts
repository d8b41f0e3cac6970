/**
 * src/modules/report/report.service.ts
 *
 * WHY:
 * - Entry point of the report module: validate input → resolve the quota path →
 *   run the generate flow with a run-scoped logger.
 *
 * RULES:
 * - Invalid input fails before any external lookup.
 * - Orchestration lives in flows/; this class stays thin.
 */

import { randomUUID } from 'node:crypto';

import type { IdentityDirectory } from '../directory';
import type { AccountingSource } from '../accounting';
import { resolveQuotaFilePath, type QuotaReader } from '../storage';
import { withReportContext } from '../../shared/logger/with-context';

import { generateReportSchema } from './report.schemas';
import { ReportErrors } from './report.errors';
import type { ReportDataset } from './report.types';
import { executeGenerateReportFlow, type ReportOptions } from './flows/generate-report-flow';

export type ReportServiceDeps = {
  directory: IdentityDirectory;
  accounting: AccountingSource;
  quotaReader: QuotaReader;
  options: ReportOptions;
  quotaReportDir: string;
  quotaReportSuffix: string;
  now?: () => Date;
  newRunId?: () => string;
};

export class ReportService {
  constructor(private readonly deps: ReportServiceDeps) {}

  async generate(input: {
    groupId: string;
    start: string;
    end: string;
    quotaFile?: string;
  }): Promise<ReportDataset> {
    const parsed = generateReportSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue?.path.join('.') || 'input';
      throw ReportErrors.invalidInput(`Invalid ${field}: ${issue?.message ?? 'invalid value'}`, {
        field,
      });
    }

    const { groupId, start, end, quotaFile } = parsed.data;

    const quotaFilePath =
      quotaFile ??
      resolveQuotaFilePath({
        dir: this.deps.quotaReportDir,
        suffix: this.deps.quotaReportSuffix,
        groupId,
      });

    const runId = (this.deps.newRunId ?? randomUUID)();

    return executeGenerateReportFlow(
      {
        directory: this.deps.directory,
        accounting: this.deps.accounting,
        quotaReader: this.deps.quotaReader,
        log: withReportContext({ runId, groupId }),
        options: this.deps.options,
        now: this.deps.now ?? (() => new Date()),
      },
      { groupId, period: { start, end }, quotaFilePath },
    );
  }
}
