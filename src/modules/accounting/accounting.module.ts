/**
 * src/modules/accounting/accounting.module.ts
 *
 * Accounting module wiring. DI passes the command runner and sacct path in.
 */

import type { CommandRunner } from '../../shared/system/command-runner';
import type { AccountingSource } from './dal/accounting-source';
import { SacctAccountingSource } from './dal/sacct-accounting.source';

export type AccountingModule = ReturnType<typeof createAccountingModule>;

export function createAccountingModule(deps: { run: CommandRunner; sacctPath: string }) {
  const accountingSource: AccountingSource = new SacctAccountingSource(deps.run, deps.sacctPath);

  return {
    accountingSource,
  };
}
