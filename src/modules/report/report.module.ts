/**
 * src/modules/report/report.module.ts
 *
 * WHY:
 * - Encapsulates Report module wiring.
 * - DI hands in the collaborators (directory, accounting, quota reader) as interfaces.
 *
 * RULES:
 * - No infra creation here.
 */

import type { IdentityDirectory } from '../directory';
import type { AccountingSource } from '../accounting';
import type { QuotaReader } from '../storage';
import type { ReportOptions } from './flows/generate-report-flow';
import { ReportService } from './report.service';

export type ReportModule = ReturnType<typeof createReportModule>;

export function createReportModule(deps: {
  directory: IdentityDirectory;
  accounting: AccountingSource;
  quotaReader: QuotaReader;
  options: ReportOptions;
  quotaReportDir: string;
  quotaReportSuffix: string;
}) {
  const reportService = new ReportService(deps);

  return {
    reportService,
  };
}
