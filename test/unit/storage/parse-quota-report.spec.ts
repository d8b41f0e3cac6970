import { describe, it, expect } from 'vitest';
import { parseQuotaReport } from '../../../src/modules/storage/queries/parse-quota-report';
import { AppError } from '../../../src/shared/errors/errors';
import { quotaReport } from '../../helpers/quota-fixture';

const OPTS = { path: 'lab-quota-report.txt', headerLines: 2 };

function parseError(text: string, headerLines = 2): unknown {
  try {
    parseQuotaReport(text, { ...OPTS, headerLines });
  } catch (err: unknown) {
    return err;
  }
  return undefined;
}

describe('parseQuotaReport', () => {
  it('reads the aggregate row and one entry per user', () => {
    const snapshot = parseQuotaReport(
      quotaReport({
        group: 'lab',
        usedGB: 180,
        availableGB: 500,
        users: [
          ['alice', 120.4],
          ['carol', 59.6],
        ],
      }),
      OPTS,
    );

    expect(snapshot.totalUsedGB).toBe(180);
    expect(snapshot.totalAvailableGB).toBe(500);
    expect([...snapshot.byUser.entries()]).toEqual([
      ['alice', 120],
      ['carol', 60],
    ]);
  });

  it('the aggregate row never appears as a user', () => {
    const snapshot = parseQuotaReport(
      quotaReport({ group: 'lab', usedGB: 0, availableGB: 100, users: [] }),
      OPTS,
    );
    expect(snapshot.byUser.size).toBe(0);
  });

  it('skips blank lines and sums duplicate usernames', () => {
    const text = [
      'header one',
      'header two',
      '',
      'lab data GRP 30 100 150 none',
      'alice data USR 10 0 0 none',
      '   ',
      'alice other USR 20 0 0 none',
    ].join('\n');

    const snapshot = parseQuotaReport(text, OPTS);
    expect(snapshot.byUser.get('alice')).toBe(30);
  });

  it('no aggregate row => QUOTA_FILE_MALFORMED', () => {
    const err = parseError('header one\nheader two\n');

    expect(err).toBeInstanceOf(AppError);
    expect(err).toMatchObject({ code: 'QUOTA_FILE_MALFORMED', exitCode: 4 });
  });

  it('non-numeric GB value names the line', () => {
    const err = parseError(
      ['h1', 'h2', 'lab data GRP 30 100 150 none', 'alice data USR lots 0 0 none'].join('\n'),
    );

    expect(err).toMatchObject({
      code: 'QUOTA_FILE_MALFORMED',
      message:
        'Quota report "lab-quota-report.txt" is malformed (line 4): GB-used "lots" is not a non-negative number',
    });
  });

  it('a user row with too few columns is malformed', () => {
    const err = parseError(['h1', 'h2', 'lab data GRP 30 100', 'alice data USR'].join('\n'));

    expect(err).toMatchObject({
      message: 'Quota report "lab-quota-report.txt" is malformed (line 4): too few columns',
    });
  });

  it('an aggregate row without GB-available is malformed', () => {
    const err = parseError(['h1', 'h2', 'lab data GRP 30'].join('\n'));
    expect(err).toMatchObject({ code: 'QUOTA_FILE_MALFORMED' });
  });
});
