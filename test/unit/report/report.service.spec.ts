import { describe, it, expect } from 'vitest';
import { ReportService } from '../../../src/modules/report';
import type { AccountingQuery, AccountingSource } from '../../../src/modules/accounting';
import type { IdentityDirectory } from '../../../src/modules/directory';
import { FakeAccounting, FakeDirectory, FakeQuotaReader, passwd } from '../../helpers/fakes';
import { quotaReport } from '../../helpers/quota-fixture';
import { PARTITIONS } from '../../helpers/records';

const QUOTA_PATH = '/quota/lab-quota-report.txt';

function labDirectory(): FakeDirectory {
  return new FakeDirectory({
    groups: [{ name: 'lab', gid: 500, members: ['bob'] }],
    users: [
      passwd('alice', 500, 'Alice Smith,,,,alice@example.edu'),
      passwd('bob', 600, 'Bob Jones'),
    ],
  });
}

function labQuota(): FakeQuotaReader {
  return new FakeQuotaReader({
    [QUOTA_PATH]: quotaReport({
      group: 'lab',
      usedGB: 150,
      availableGB: 500,
      users: [
        ['alice', 120],
        ['ghost', 30],
      ],
    }),
  });
}

function buildService(
  overrides: {
    directory?: IdentityDirectory;
    accounting?: AccountingSource;
    quotaReader?: FakeQuotaReader;
    concurrency?: number;
  } = {},
) {
  const quotaReader = overrides.quotaReader ?? labQuota();
  const service = new ReportService({
    directory: overrides.directory ?? labDirectory(),
    accounting:
      overrides.accounting ?? new FakeAccounting({ 'alice:batch': [54000, 54000, 54000] }),
    quotaReader,
    options: {
      partitions: PARTITIONS,
      concurrency: overrides.concurrency ?? 2,
      quotaHeaderLines: 2,
      storageTopN: 5,
      usageTopN: 10,
      pageSize: 25,
      headerPolicy: 'flow',
    },
    quotaReportDir: '/quota/',
    quotaReportSuffix: '-quota-report.txt',
    now: () => new Date('2024-02-01T00:00:00Z'),
    newRunId: () => 'run-1',
  });
  return { service, quotaReader };
}

const PERIOD = { start: '2024-01-01', end: '2024-01-31' };

describe('ReportService.generate', () => {
  it('builds the dataset for a two-member group', async () => {
    const { service, quotaReader } = buildService();

    const dataset = await service.generate({ groupId: 'lab', ...PERIOD });

    expect(quotaReader.reads).toEqual([QUOTA_PATH]);
    expect(dataset.groupId).toBe('lab');
    expect(dataset.period).toEqual(PERIOD);
    expect(dataset.generatedAt).toBe('2024-02-01T00:00:00.000Z');
    expect(dataset.partitions).toEqual(['batch', 'bigmem', 'gpu']);

    expect(dataset.records).toEqual([
      {
        username: 'alice',
        affiliation: 'primary',
        name: 'Alice Smith',
        email: 'alice@example.edu',
        accountTiers: [],
        usageByPartition: {
          batch: { jobCount: 3, cpuHours: 45 },
          bigmem: { jobCount: 0, cpuHours: 0 },
          gpu: { jobCount: 0, cpuHours: 0 },
        },
        storageGB: 120,
      },
      {
        username: 'bob',
        affiliation: 'secondary',
        name: 'Bob Jones',
        email: 'NA',
        accountTiers: [],
        usageByPartition: {
          batch: { jobCount: 0, cpuHours: 0 },
          bigmem: { jobCount: 0, cpuHours: 0 },
          gpu: { jobCount: 0, cpuHours: 0 },
        },
        storageGB: 0,
      },
    ]);

    expect(dataset.summary.members).toEqual({ primary: 1, secondary: 1, unknown: 0, total: 2 });
    expect(dataset.summary.storage).toEqual({ allocationGB: 500, usedGB: 120, availableGB: 380 });
    expect(dataset.storageTop).toEqual([{ label: 'alice', value: 120, isRollup: false }]);
    expect(dataset.usageTop.batch).toEqual([{ label: 'alice', value: 45, isRollup: false }]);
    expect(dataset.usageTop.gpu).toEqual([{ label: 'alice', value: 0, isRollup: false }]);

    expect(dataset.pages).toHaveLength(1);
    expect(dataset.pages[0]?.map((r) => r.kind)).toEqual([
      'section',
      'member',
      'section',
      'member',
    ]);
  });

  it('returns a frozen dataset', async () => {
    const { service } = buildService();
    const dataset = await service.generate({ groupId: 'lab', ...PERIOD });

    expect(Object.isFrozen(dataset)).toBe(true);
    expect(Object.isFrozen(dataset.records)).toBe(true);
    expect(Object.isFrozen(dataset.records[0]?.usageByPartition.batch)).toBe(true);
  });

  it('an explicit quota file overrides the default path', async () => {
    const quotaReader = new FakeQuotaReader({
      '/tmp/lab.txt': quotaReport({ group: 'lab', usedGB: 0, availableGB: 10, users: [] }),
    });
    const { service } = buildService({ quotaReader });

    const dataset = await service.generate({ groupId: 'lab', ...PERIOD, quotaFile: '/tmp/lab.txt' });

    expect(quotaReader.reads).toEqual(['/tmp/lab.txt']);
    expect(dataset.summary.storage).toEqual({ allocationGB: 10, usedGB: 0, availableGB: 10 });
    expect(dataset.storageTop).toEqual([]);
  });

  it('unknown group => GROUP_NOT_FOUND and the quota file is never read', async () => {
    const { service, quotaReader } = buildService();

    await expect(service.generate({ groupId: 'nope', ...PERIOD })).rejects.toMatchObject({
      code: 'GROUP_NOT_FOUND',
      exitCode: 3,
    });
    expect(quotaReader.reads).toEqual([]);
  });

  it('unreadable quota file => QUOTA_FILE_UNREADABLE', async () => {
    const { service } = buildService();

    await expect(
      service.generate({ groupId: 'lab', ...PERIOD, quotaFile: '/missing.txt' }),
    ).rejects.toMatchObject({
      code: 'QUOTA_FILE_UNREADABLE',
      message: 'Quota report "/missing.txt" could not be read.',
    });
  });

  it('rejects a date that is not on the calendar', async () => {
    const { service, quotaReader } = buildService();

    await expect(
      service.generate({ groupId: 'lab', start: '2024-02-30', end: '2024-03-31' }),
    ).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Invalid start: Date is not a valid calendar date',
    });
    expect(quotaReader.reads).toEqual([]);
  });

  it('rejects a start date after the end date', async () => {
    const { service } = buildService();

    await expect(
      service.generate({ groupId: 'lab', start: '2024-03-01', end: '2024-02-01' }),
    ).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Invalid end: Start date must not be after end date',
    });
  });

  it('a failed usage lookup defaults that partition and the report still completes', async () => {
    const accounting = new FakeAccounting({
      'alice:batch': [3600],
      'alice:gpu': new Error('sacct timeout'),
    });
    const { service } = buildService({ accounting });

    const dataset = await service.generate({ groupId: 'lab', ...PERIOD });
    const alice = dataset.records.find((r) => r.username === 'alice');

    expect(alice?.usageByPartition).toEqual({
      batch: { jobCount: 1, cpuHours: 1 },
      bigmem: { jobCount: 0, cpuHours: 0 },
      gpu: { jobCount: 0, cpuHours: 0 },
    });
  });

  it('keeps at most `concurrency` members in flight', async () => {
    const members = ['u1', 'u2', 'u3', 'u4', 'u5', 'u6'];
    const directory = new FakeDirectory({
      groups: [{ name: 'lab', gid: 500, members: [] }],
      users: members.map((u) => passwd(u, 500)),
    });

    let inFlight = 0;
    let maxInFlight = 0;
    const accounting: AccountingSource = {
      async listJobCpuSeconds(_query: AccountingQuery) {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight -= 1;
        return [];
      },
    };

    const { service } = buildService({ directory, accounting, concurrency: 2 });
    const dataset = await service.generate({ groupId: 'lab', ...PERIOD });

    expect(dataset.records.map((r) => r.username)).toEqual(members);
    expect(maxInFlight).toBe(2);
  });
});
