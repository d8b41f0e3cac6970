/**
 * src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs halfway through a report run.
 *
 * HOW TO USE:
 * - Locally, values can come from a .env file via dotenv.
 * - On the cluster, the batch wrapper exports env vars (no file).
 *
 * TYPING:
 * - PARTITIONS is a comma list parsed into a non-empty, de-duplicated string[].
 * - PAGE_HEADER_POLICY is a union so an unknown value fails at startup.
 */

import 'dotenv/config';
import { z } from 'zod';
import { HEADER_POLICIES, type HeaderPolicy } from '../modules/report';
import { TABLE_ROWS_PER_PAGE } from '../modules/render';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('production');

const PartitionsSchema = z
  .string()
  .default('batch,bigmem,gpu')
  .transform((v) => [
    ...new Set(
      v
        .split(',')
        .map((p) => p.trim())
        .filter((p) => p.length > 0),
    ),
  ])
  .refine((v) => v.length > 0, 'PARTITIONS must name at least one partition');

const ConfigSchema = z.object({
  NODE_ENV: NodeEnvSchema,

  // Logging / service identity
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
  SERVICE_NAME: z.string().default('group-usage-report'),

  // Quota snapshot
  QUOTA_REPORT_DIR: z.string().min(1).default('/var/lib/quota-reports'),
  QUOTA_REPORT_SUFFIX: z.string().default('-quota-report.txt'),
  QUOTA_HEADER_LINES: z.coerce.number().int().min(0).max(100).default(2),

  // External tools
  SACCT_PATH: z.string().min(1).default('/usr/local/bin/sacct'),
  GETENT_PATH: z.string().min(1).default('getent'),
  ID_PATH: z.string().min(1).default('id'),
  COMMAND_TIMEOUT_MS: z.coerce.number().int().min(1000).max(600_000).default(60_000),

  PARTITIONS: PartitionsSchema,
  ENRICH_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(8),

  // Summary / layout
  STORAGE_TOP_N: z.coerce.number().int().min(1).max(50).default(5),
  USAGE_TOP_N: z.coerce.number().int().min(1).max(50).default(10),
  // a rendered table page holds TABLE_ROWS_PER_PAGE rows
  PAGE_SIZE: z.coerce.number().int().min(1).max(TABLE_ROWS_PER_PAGE).default(25),
  PAGE_HEADER_POLICY: z.enum(HEADER_POLICIES).default('flow'),

  OUTPUT_DIR: z.string().min(1).default('.'),
});

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;

  logLevel: string;
  serviceName: string;

  quota: {
    reportDir: string;
    reportSuffix: string;
    headerLines: number;
  };

  commands: {
    sacctPath: string;
    getentPath: string;
    idPath: string;
    timeoutMs: number;
  };

  report: {
    partitions: string[];
    concurrency: number;
    storageTopN: number;
    usageTopN: number;
    pageSize: number;
    headerPolicy: HeaderPolicy;
  };

  outputDir: string;
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    quota: {
      reportDir: parsed.QUOTA_REPORT_DIR,
      reportSuffix: parsed.QUOTA_REPORT_SUFFIX,
      headerLines: parsed.QUOTA_HEADER_LINES,
    },

    commands: {
      sacctPath: parsed.SACCT_PATH,
      getentPath: parsed.GETENT_PATH,
      idPath: parsed.ID_PATH,
      timeoutMs: parsed.COMMAND_TIMEOUT_MS,
    },

    report: {
      partitions: parsed.PARTITIONS,
      concurrency: parsed.ENRICH_CONCURRENCY,
      storageTopN: parsed.STORAGE_TOP_N,
      usageTopN: parsed.USAGE_TOP_N,
      pageSize: parsed.PAGE_SIZE,
      headerPolicy: parsed.PAGE_HEADER_POLICY,
    },

    outputDir: parsed.OUTPUT_DIR,
  };
}
