/**
 * src/shared/logger/with-context.ts
 *
 * WHY:
 * - Every log line of a run should carry runId + groupId so one report can be traced.
 * - We don't want every flow repeating the same fields manually.
 *
 * HOW TO USE:
 * - `const log = withReportContext({ runId, groupId })`
 * - `log.info('report.start', { members: 12 })`
 */

import { logger } from './logger';

type LogMeta = Record<string, unknown>;

export type ReportLogContext = {
  runId: string;
  groupId: string;
};

export type ReportLogger = ReturnType<typeof withReportContext>;

export function withReportContext(ctx: ReportLogContext) {
  const base = {
    runId: ctx.runId,
    groupId: ctx.groupId,
  };

  return {
    info: (msg: string, meta: LogMeta = {}) => logger.info(msg, { ...base, ...meta }),
    warn: (msg: string, meta: LogMeta = {}) => logger.warn(msg, { ...base, ...meta }),
    error: (msg: string, meta: LogMeta = {}) => logger.error(msg, { ...base, ...meta }),
    debug: (msg: string, meta: LogMeta = {}) => logger.debug(msg, { ...base, ...meta }),
  };
}
