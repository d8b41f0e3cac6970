/**
 * src/cli/program.ts
 *
 * WHY:
 * - Builds the commander program without running it, so tests can drive it.
 *
 * RULES:
 * - exitOverride(): commander throws instead of calling process.exit; index.ts
 *   owns the exit.
 */

import { Command } from 'commander';
import type { AppDeps } from '../app/di';
import { registerReportCommand } from './report.command';

export function buildProgram(deps: AppDeps): Command {
  const program = new Command();

  program
    .name('group-report')
    .description('Cluster resource usage reports per Unix group')
    .version('0.1.0')
    .exitOverride();

  registerReportCommand(program, deps);

  return program;
}
