/**
 * src/shared/system/command-runner.ts
 *
 * WHY:
 * - Identity and accounting lookups shell out to host tools (getent, id, sacct).
 * - Adapters depend on the CommandRunner type only, so tests pass a fake.
 *
 * RULES:
 * - No shell: arguments are passed as an argv array (execFile).
 * - No retries here. A failed command rejects with CommandFailedError.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

export type CommandResult = { stdout: string; stderr: string };

export type CommandRunner = (command: string, args: string[]) => Promise<CommandResult>;

export class CommandFailedError extends Error {
  constructor(
    public readonly command: string,
    public readonly args: readonly string[],
    /** Process exit code, or null when the process could not start or was killed. */
    public readonly exitCode: number | null,
    public readonly stderr: string,
  ) {
    super(`Command failed: ${command} ${args.join(' ')} (exit ${exitCode ?? 'n/a'})`);
    this.name = 'CommandFailedError';
  }
}

function readExitCode(err: unknown): number | null {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return null;
}

function readStderr(err: unknown): string {
  if (err && typeof err === 'object' && 'stderr' in err && typeof err.stderr === 'string') {
    return err.stderr;
  }
  return '';
}

export function createCommandRunner(opts: { timeoutMs: number }): CommandRunner {
  return async (command, args) => {
    try {
      const result = await execFileAsync(command, args, {
        encoding: 'utf8',
        timeout: opts.timeoutMs,
        maxBuffer: 64 * 1024 * 1024,
      });
      return { stdout: result.stdout, stderr: result.stderr };
    } catch (err: unknown) {
      throw new CommandFailedError(command, args, readExitCode(err), readStderr(err));
    }
  };
}
