/**
 * src/cli/report.command.ts
 *
 * WHY:
 * - `report <groupId> -S <start> -E <end>` → dataset → PDF (or JSON) on disk.
 *
 * RULES:
 * - The file is written only after the dataset is complete and rendered.
 * - Errors propagate to the program's error handler (exit codes live there).
 */

import type { Command } from 'commander';
import type { AppDeps } from '../app/di';
import {
  defaultOutputPath,
  renderReportPdf,
  serializeDataset,
  writeReportFile,
  type OutputFormat,
} from '../modules/render';

type ReportCommandOptions = {
  start: string;
  end: string;
  quotaFile?: string;
  output?: string;
  json?: boolean;
};

export function registerReportCommand(program: Command, deps: AppDeps): void {
  program
    .command('report')
    .description('Generate the resource usage report for one group')
    .argument('<groupId>', 'Name of the group to report on')
    .requiredOption('-S, --start <date>', 'Beginning of the report period (YYYY-MM-DD)')
    .requiredOption('-E, --end <date>', 'End of the report period (YYYY-MM-DD)')
    .option('--quota-file <path>', 'Quota snapshot to read instead of the configured location')
    .option('-o, --output <path>', 'Where to write the report')
    .option('--json', 'Write the dataset as JSON instead of PDF', false)
    .action(async (groupId: string, opts: ReportCommandOptions) => {
      const format: OutputFormat = opts.json ? 'json' : 'pdf';

      const dataset = await deps.report.reportService.generate({
        groupId,
        start: opts.start,
        end: opts.end,
        quotaFile: opts.quotaFile,
      });

      const content = format === 'json' ? serializeDataset(dataset) : await renderReportPdf(dataset);

      const outputPath =
        opts.output ??
        defaultOutputPath({
          outputDir: deps.config.outputDir,
          groupId: dataset.groupId,
          start: dataset.period.start,
          end: dataset.period.end,
          format,
        });

      await writeReportFile(outputPath, content);

      deps.logger.info('report.written', {
        flow: 'cli.report',
        groupId: dataset.groupId,
        outputPath,
        format,
      });
    });
}
