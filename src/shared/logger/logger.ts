/**
 * src/shared/logger/logger.ts
 *
 * WHY:
 * - One JSON logger for a report run, stamped with service + env.
 *
 * RULES:
 * - Every level goes to stderr; stdout is left to the CLI.
 * - Starts from raw env; buildDeps() re-applies LOG_LEVEL / SERVICE_NAME after
 *   config validation.
 * - Inside a run, log through withReportContext() so lines carry runId + groupId.
 */

import winston from 'winston';

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? 'info',
  format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
  defaultMeta: {
    service: process.env.SERVICE_NAME ?? 'group-usage-report',
    env: process.env.NODE_ENV ?? 'production',
  },
  transports: [new winston.transports.Console({ stderrLevels: LEVELS })],
});

export type Logger = typeof logger;
