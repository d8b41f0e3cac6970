import { describe, it, expect } from 'vitest';
import { enrichUser } from '../../../src/modules/enrichment';
import { FakeAccounting, FakeDirectory, passwd } from '../../helpers/fakes';
import { PARTITIONS } from '../../helpers/records';

const PERIOD = { start: '2024-01-01', end: '2024-03-31' };

const directory = new FakeDirectory({
  users: [
    passwd('alice', 500, 'Alice Smith,,,,alice@example.edu'),
    passwd('noemail', 500, 'No Email'),
  ],
  userGroups: {
    alice: ['lab', 'priority1', 'gpu-he'],
    broken: new Error('id: timed out'),
  },
  failingUsers: ['flaky'],
});

describe('enrichUser', () => {
  it('collects name, email, tiers and per-partition usage', async () => {
    const accounting = new FakeAccounting({ 'alice:batch': [3600, 7200, 1800] });

    const outcome = await enrichUser(
      { directory, accounting },
      { username: 'alice', period: PERIOD, partitions: PARTITIONS },
    );

    expect(outcome).toEqual({
      username: 'alice',
      enrichment: {
        name: 'Alice Smith',
        email: 'alice@example.edu',
        accountTiers: ['priority', 'gpu-highend'],
        usageByPartition: {
          batch: { jobCount: 3, cpuHours: 3.5 },
          bigmem: { jobCount: 0, cpuHours: 0 },
          gpu: { jobCount: 0, cpuHours: 0 },
        },
      },
      failures: [],
    });
    expect(accounting.queries.map((q) => q.partition)).toEqual(PARTITIONS);
    expect(accounting.queries[0]?.period).toEqual(PERIOD);
  });

  it('a missing email field defaults to NA without a failure', async () => {
    const outcome = await enrichUser(
      { directory, accounting: new FakeAccounting() },
      { username: 'noemail', period: PERIOD, partitions: PARTITIONS },
    );

    expect(outcome.enrichment.name).toBe('No Email');
    expect(outcome.enrichment.email).toBe('NA');
    expect(outcome.failures).toEqual([]);
  });

  it('user absent from the directory => NA name/email and an identity failure', async () => {
    const outcome = await enrichUser(
      { directory, accounting: new FakeAccounting() },
      { username: 'ghost', period: PERIOD, partitions: PARTITIONS },
    );

    expect(outcome.enrichment.name).toBe('NA');
    expect(outcome.enrichment.email).toBe('NA');
    expect(outcome.failures).toEqual([
      {
        reason: 'IDENTITY_LOOKUP_FAILED',
        lookup: 'identity',
        message: 'user "ghost" not found in directory',
      },
    ]);
  });

  it('directory errors degrade to NA and never throw', async () => {
    const outcome = await enrichUser(
      { directory, accounting: new FakeAccounting() },
      { username: 'flaky', period: PERIOD, partitions: PARTITIONS },
    );

    expect(outcome.enrichment.name).toBe('NA');
    expect(outcome.failures[0]).toMatchObject({
      reason: 'IDENTITY_LOOKUP_FAILED',
      message: 'directory unavailable',
    });
  });

  it('a failed group lookup => no tiers', async () => {
    const outcome = await enrichUser(
      { directory, accounting: new FakeAccounting() },
      { username: 'broken', period: PERIOD, partitions: PARTITIONS },
    );

    expect(outcome.enrichment.accountTiers).toEqual([]);
    expect(outcome.failures).toContainEqual({
      reason: 'IDENTITY_LOOKUP_FAILED',
      lookup: 'groups',
      message: 'id: timed out',
    });
  });

  it('a failed accounting query => (0, 0) for that partition only', async () => {
    const accounting = new FakeAccounting({
      'alice:batch': [7200],
      'alice:gpu': new Error('sacct: slurmdbd unreachable'),
    });

    const outcome = await enrichUser(
      { directory, accounting },
      { username: 'alice', period: PERIOD, partitions: PARTITIONS },
    );

    expect(outcome.enrichment.usageByPartition).toEqual({
      batch: { jobCount: 1, cpuHours: 2 },
      bigmem: { jobCount: 0, cpuHours: 0 },
      gpu: { jobCount: 0, cpuHours: 0 },
    });
    expect(outcome.failures).toEqual([
      {
        reason: 'ACCOUNTING_QUERY_FAILED',
        lookup: 'usage:gpu',
        message: 'sacct: slurmdbd unreachable',
      },
    ]);
  });
});
