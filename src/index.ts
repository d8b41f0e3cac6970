#!/usr/bin/env node
/**
 * src/index.ts
 *
 * WHY:
 * - Single entrypoint for the CLI.
 * - Keeps startup small: load config -> build deps -> build program -> parse.
 */

import { CommanderError } from 'commander';
import { buildConfig } from './app/config';
import { buildDeps } from './app/di';
import { buildProgram } from './cli/program';
import { handleCliError } from './shared/errors/error-handler';

async function main(argv: string[]): Promise<number> {
  try {
    const config = buildConfig();
    const deps = buildDeps(config);
    await buildProgram(deps).parseAsync(argv);
    return 0;
  } catch (err: unknown) {
    // commander already printed usage/help text; only the exit code is left.
    if (err instanceof CommanderError) return err.exitCode;

    const handled = handleCliError(err);
    process.stderr.write(`error: ${handled.message}\n`);
    return handled.exitCode;
  }
}

void main(process.argv).then((code) => {
  process.exitCode = code;
});
