/**
 * src/app/di.ts
 *
 * WHY:
 * - Single dependency graph for one CLI invocation.
 * - Creates the command runner ONCE and shares it with every adapter.
 * - Keeps modules testable: tests build ReportService directly with fakes.
 *
 * RULES:
 * - No business logic here.
 * - No CLI parsing here.
 */

import type { AppConfig } from './config';

import { createCommandRunner } from '../shared/system/command-runner';
import type { CommandRunner } from '../shared/system/command-runner';

import { logger } from '../shared/logger/logger';
import type { Logger } from '../shared/logger/logger';

import { createDirectoryModule } from '../modules/directory/directory.module';
import type { DirectoryModule } from '../modules/directory/directory.module';

import { createAccountingModule } from '../modules/accounting/accounting.module';
import type { AccountingModule } from '../modules/accounting/accounting.module';

import { createStorageModule } from '../modules/storage/storage.module';
import type { StorageModule } from '../modules/storage/storage.module';

import { createReportModule } from '../modules/report/report.module';
import type { ReportModule } from '../modules/report/report.module';

export type AppDeps = {
  config: AppConfig;
  logger: Logger;
  run: CommandRunner;

  // modules
  directory: DirectoryModule;
  accounting: AccountingModule;
  storage: StorageModule;
  report: ReportModule;
};

export function buildDeps(config: AppConfig, overrides: { run?: CommandRunner } = {}): AppDeps {
  // config is validated; the logger started from raw env
  logger.level = config.logLevel;
  logger.defaultMeta = { service: config.serviceName, env: config.nodeEnv };

  const run = overrides.run ?? createCommandRunner({ timeoutMs: config.commands.timeoutMs });

  const directory = createDirectoryModule({
    run,
    getentPath: config.commands.getentPath,
    idPath: config.commands.idPath,
  });
  const accounting = createAccountingModule({ run, sacctPath: config.commands.sacctPath });
  const storage = createStorageModule();

  const report = createReportModule({
    directory: directory.directory,
    accounting: accounting.accountingSource,
    quotaReader: storage.quotaReader,
    quotaReportDir: config.quota.reportDir,
    quotaReportSuffix: config.quota.reportSuffix,
    options: {
      partitions: config.report.partitions,
      concurrency: config.report.concurrency,
      quotaHeaderLines: config.quota.headerLines,
      storageTopN: config.report.storageTopN,
      usageTopN: config.report.usageTopN,
      pageSize: config.report.pageSize,
      headerPolicy: config.report.headerPolicy,
    },
  });

  return {
    config,
    logger,
    run,
    directory,
    accounting,
    storage,
    report,
  };
}
