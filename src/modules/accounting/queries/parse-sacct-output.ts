/**
 * src/modules/accounting/queries/parse-sacct-output.ts
 *
 * Parses `sacct -n -X --format=CPUTimeRaw` output: one integer (seconds) per line.
 * Blank lines are ignored. Anything else is a parse error for the whole query.
 */

export class SacctOutputError extends Error {
  constructor(
    public readonly lineNumber: number,
    public readonly line: string,
  ) {
    super(`Unexpected sacct output on line ${lineNumber}: "${line}"`);
    this.name = 'SacctOutputError';
  }
}

export function parseCpuTimeRaw(output: string): number[] {
  const out: number[] = [];
  const lines = output.split('\n');

  for (let i = 0; i < lines.length; i++) {
    const value = lines[i].trim();
    if (!value) continue;
    if (!/^\d+$/.test(value)) {
      throw new SacctOutputError(i + 1, value);
    }
    out.push(Number(value));
  }

  return out;
}
