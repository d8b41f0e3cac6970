/**
 * src/modules/render/write-report.ts
 *
 * WHY:
 * - Output is written once, after the whole dataset is built and rendered, so a
 *   failed run leaves no partial document.
 * - JSON output is the same frozen dataset, for downstream tooling.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { ReportDataset } from '../report';

export type OutputFormat = 'pdf' | 'json';

export function serializeDataset(dataset: ReportDataset): string {
  return `${JSON.stringify(dataset, null, 2)}\n`;
}

export function defaultOutputPath(opts: {
  outputDir: string;
  groupId: string;
  start: string;
  end: string;
  format: OutputFormat;
}): string {
  const dir = opts.outputDir.endsWith('/') ? opts.outputDir.slice(0, -1) : opts.outputDir;
  return `${dir}/${opts.groupId}-usage-${opts.start}_${opts.end}.${opts.format}`;
}

export async function writeReportFile(path: string, content: Uint8Array | string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content);
}
