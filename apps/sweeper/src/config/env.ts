import { z } from 'zod';

import { RETENTION_PRESET_NAMES } from '@bucket-sweep/core';

const optionalNonEmptyString = () =>
  z.preprocess(
    (value) => {
      if (typeof value !== 'string') return value;
      const trimmed = value.trim();
      return trimmed.length === 0 ? undefined : trimmed;
    },
    z.string().min(1).optional(),
  );

const optionalUrl = () =>
  z.preprocess(
    (value) => {
      if (typeof value !== 'string') return value;
      const trimmed = value.trim();
      return trimmed.length === 0 ? undefined : trimmed;
    },
    z.string().url().optional(),
  );

export function parseBooleanFlag(value: unknown): unknown {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const v = value.trim().toLowerCase();
    if (v === 'true' || v === '1' || v === 'yes') return true;
    if (v === 'false' || v === '0' || v === 'no') return false;
  }
  return value;
}

const optionalDays = () =>
  z.preprocess(
    (value) => (typeof value === 'string' && value.trim().length === 0 ? undefined : value),
    z.coerce.number().int().nonnegative().optional(),
  );

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),

  // Object store (S3 or an S3-compatible endpoint such as MinIO)
  S3_BUCKET_NAME: optionalNonEmptyString(),
  AWS_REGION: z.string().min(1).default('us-east-1'),
  S3_ENDPOINT: optionalUrl(),
  S3_ACCESS_KEY_ID: optionalNonEmptyString(),
  S3_SECRET_ACCESS_KEY: optionalNonEmptyString(),
  S3_FORCE_PATH_STYLE: z.preprocess(parseBooleanFlag, z.boolean().optional()),

  // Retention rules: the preset supplies defaults, the rest override it
  RETENTION_PRESET: z.enum(RETENTION_PRESET_NAMES).default('weekday-guarded'),
  DAYS_THRESHOLD: optionalDays(),
  GLACIER_MIN_DAYS: optionalDays(),
  DEEP_ARCHIVE_MIN_DAYS: optionalDays(),
  PROTECTED_WEEKDAYS: z.string().optional(),
  EXCLUDED_PREFIXES: z.string().default(''),
  LIST_PREFIX: optionalNonEmptyString(),

  DRY_RUN: z.preprocess(parseBooleanFlag, z.boolean().default(false)),

  // Audit report
  REPORT_FORMAT: z.enum(['csv', 'json']).default('csv'),
  REPORT_DIR: optionalNonEmptyString(),
  REPORT_FILENAME: optionalNonEmptyString(),
  UPLOAD_REPORT: z.preprocess(parseBooleanFlag, z.boolean().default(false)),
  REPORT_PREFIX: z.string().min(1).default('cleanup_logs/'),

  // Scheduled sweeps (BullMQ)
  REDIS_URL: z.string().min(1).default('redis://localhost:6379'),
  SWEEP_ENABLED: z.preprocess(parseBooleanFlag, z.boolean().default(false)),
  SWEEP_CRON: z.string().min(1).default('0 3 * * *'),
  SWEEP_TZ: optionalNonEmptyString(),

  AWS_LAMBDA_FUNCTION_NAME: optionalNonEmptyString(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse({
    NODE_ENV: source.NODE_ENV,

    S3_BUCKET_NAME: source.S3_BUCKET_NAME,
    AWS_REGION: source.AWS_REGION,
    S3_ENDPOINT: source.S3_ENDPOINT,
    S3_ACCESS_KEY_ID: source.S3_ACCESS_KEY_ID,
    S3_SECRET_ACCESS_KEY: source.S3_SECRET_ACCESS_KEY,
    S3_FORCE_PATH_STYLE: source.S3_FORCE_PATH_STYLE,

    RETENTION_PRESET: source.RETENTION_PRESET,
    DAYS_THRESHOLD: source.DAYS_THRESHOLD,
    GLACIER_MIN_DAYS: source.GLACIER_MIN_DAYS,
    DEEP_ARCHIVE_MIN_DAYS: source.DEEP_ARCHIVE_MIN_DAYS,
    PROTECTED_WEEKDAYS: source.PROTECTED_WEEKDAYS,
    EXCLUDED_PREFIXES: source.EXCLUDED_PREFIXES,
    LIST_PREFIX: source.LIST_PREFIX,

    DRY_RUN: source.DRY_RUN,

    REPORT_FORMAT: source.REPORT_FORMAT,
    REPORT_DIR: source.REPORT_DIR,
    REPORT_FILENAME: source.REPORT_FILENAME,
    UPLOAD_REPORT: source.UPLOAD_REPORT,
    REPORT_PREFIX: source.REPORT_PREFIX,

    REDIS_URL: source.REDIS_URL,
    SWEEP_ENABLED: source.SWEEP_ENABLED,
    SWEEP_CRON: source.SWEEP_CRON,
    SWEEP_TZ: source.SWEEP_TZ,

    AWS_LAMBDA_FUNCTION_NAME: source.AWS_LAMBDA_FUNCTION_NAME,
  });
}

let cached: Env | null = null;

/** Entry points call this after `dotenv/config` has populated `process.env`. */
export function getEnv(): Env {
  if (!cached) {
    cached = parseEnv(process.env);
  }
  return cached;
}
