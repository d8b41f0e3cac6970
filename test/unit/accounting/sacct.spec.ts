import { describe, it, expect, vi } from 'vitest';
import {
  parseCpuTimeRaw,
  SacctOutputError,
} from '../../../src/modules/accounting/queries/parse-sacct-output';
import {
  buildSacctArgs,
  SacctAccountingSource,
} from '../../../src/modules/accounting/dal/sacct-accounting.source';
import type { CommandRunner } from '../../../src/shared/system/command-runner';

const QUERY = {
  username: 'alice',
  partition: 'gpu',
  period: { start: '2024-01-01', end: '2024-01-31' },
};

describe('parseCpuTimeRaw', () => {
  it('reads one integer per line and ignores blank lines', () => {
    expect(parseCpuTimeRaw('3600\n  7200 \n\n')).toEqual([3600, 7200]);
  });

  it('empty output is zero jobs', () => {
    expect(parseCpuTimeRaw('')).toEqual([]);
  });

  it('rejects unexpected content with the line number', () => {
    expect(() => parseCpuTimeRaw('60\nsacct: error: bad\n')).toThrow(SacctOutputError);
    expect(() => parseCpuTimeRaw('60\nsacct: error: bad\n')).toThrow(
      'Unexpected sacct output on line 2: "sacct: error: bad"',
    );
  });
});

describe('SacctAccountingSource', () => {
  it('builds an allocation-only, completed-jobs query', () => {
    expect(buildSacctArgs(QUERY)).toEqual([
      '-u',
      'alice',
      '-S',
      '2024-01-01',
      '-E',
      '2024-01-31T23:59:59',
      '-r',
      'gpu',
      '-X',
      '-n',
      '-s',
      'CD',
      '--format=CPUTimeRaw',
    ]);
  });

  it('runs sacct and parses its output', async () => {
    const run = vi.fn<CommandRunner>().mockResolvedValue({ stdout: '60\n120\n', stderr: '' });
    const source = new SacctAccountingSource(run, '/opt/slurm/bin/sacct');

    await expect(source.listJobCpuSeconds(QUERY)).resolves.toEqual([60, 120]);
    expect(run).toHaveBeenCalledWith('/opt/slurm/bin/sacct', buildSacctArgs(QUERY));
  });
});
