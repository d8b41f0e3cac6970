import { ReportService, type ReportDataset } from '../../src/modules/report';
import { FakeAccounting, FakeDirectory, FakeQuotaReader, passwd } from './fakes';
import { quotaReport } from './quota-fixture';
import { PARTITIONS } from './records';

/**
 * A small finished dataset for renderer tests: two members, one of them with a
 * name outside the standard PDF font encoding.
 */
export function labDataset(): Promise<ReportDataset> {
  const service = new ReportService({
    directory: new FakeDirectory({
      groups: [{ name: 'lab', gid: 500, members: ['bob'] }],
      users: [passwd('alice', 500, 'Alice Smith,,,,alice@example.edu'), passwd('bob', 600, '李 Li')],
      userGroups: { alice: ['lab', 'priority', 'gpu-he'] },
    }),
    accounting: new FakeAccounting({ 'alice:batch': [54000, 54000, 54000] }),
    quotaReader: new FakeQuotaReader({
      '/quota/lab-quota-report.txt': quotaReport({
        group: 'lab',
        usedGB: 120,
        availableGB: 500,
        users: [['alice', 120]],
      }),
    }),
    options: {
      partitions: PARTITIONS,
      concurrency: 2,
      quotaHeaderLines: 2,
      storageTopN: 5,
      usageTopN: 10,
      pageSize: 25,
      headerPolicy: 'flow',
    },
    quotaReportDir: '/quota',
    quotaReportSuffix: '-quota-report.txt',
    now: () => new Date('2024-02-01T00:00:00Z'),
    newRunId: () => 'run-1',
  });

  return service.generate({ groupId: 'lab', start: '2024-01-01', end: '2024-01-31' });
}
