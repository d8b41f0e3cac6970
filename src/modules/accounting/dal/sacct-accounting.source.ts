/**
 * src/modules/accounting/dal/sacct-accounting.source.ts
 *
 * WHY:
 * - AccountingSource backed by Slurm's sacct.
 *
 * QUERY:
 * - -X: allocations only (cumulative job usage, no steps)
 * - -s CD: completed jobs
 * - -n + --format=CPUTimeRaw: no header, one integer (seconds) per job
 * - -E gets an explicit end of day; a bare date means midnight and would drop
 *   the last day of the period
 *
 * RULES:
 * - No retries. Failures propagate; enrichment turns them into (0, 0).
 */

import type { CommandRunner } from '../../../shared/system/command-runner';
import type { AccountingQuery } from '../accounting.types';
import type { AccountingSource } from './accounting-source';
import { parseCpuTimeRaw } from '../queries/parse-sacct-output';

const END_OF_DAY = 'T23:59:59';

export function buildSacctArgs(query: AccountingQuery): string[] {
  return [
    '-u',
    query.username,
    '-S',
    query.period.start,
    '-E',
    `${query.period.end}${END_OF_DAY}`,
    '-r',
    query.partition,
    '-X',
    '-n',
    '-s',
    'CD',
    '--format=CPUTimeRaw',
  ];
}

export class SacctAccountingSource implements AccountingSource {
  constructor(
    private readonly run: CommandRunner,
    private readonly sacctPath: string,
  ) {}

  async listJobCpuSeconds(query: AccountingQuery): Promise<number[]> {
    const { stdout } = await this.run(this.sacctPath, buildSacctArgs(query));
    return parseCpuTimeRaw(stdout);
  }
}
