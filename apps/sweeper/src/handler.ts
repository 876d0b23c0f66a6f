import { z } from 'zod';

import { RETENTION_PRESET_NAMES, type ClassificationSummary } from '@bucket-sweep/core';

import { getEnv, parseBooleanFlag, type Env } from './config/env.js';
import { buildRetentionConfig, splitList } from './config/retention.js';
import { createObjectStore } from './storage/index.js';
import type { ObjectStore } from './storage/types.js';
import { normalizePrefix } from './sweep/report-writer.js';
import { runSweep } from './sweep/runner.js';
import { AppError, errorMessage, statusCodeFor } from './utils/errors.js';

// Whole days as a number or a digit string; null, booleans, arrays and blanks are rejected.
const optionalDays = () =>
  z
    .union([z.number(), z.string().trim().regex(/^\d+$/, 'Expected a whole number of days')])
    .pipe(z.coerce.number().int().nonnegative())
    .optional();

const listOrCsv = () =>
  z
    .union([z.string(), z.array(z.union([z.string(), z.number()]))])
    .optional()
    .transform((value) => (Array.isArray(value) ? value.map(String).join(',') : value));

export const sweepEventSchema = z.object({
  bucket_name: z.string().trim().min(1).optional(),
  preset: z.enum(RETENTION_PRESET_NAMES).optional(),
  days_threshold: optionalDays(),
  glacier_min_days: optionalDays(),
  deep_archive_min_days: optionalDays(),
  excluded_prefixes: listOrCsv(),
  protected_weekdays: listOrCsv(),
  report_prefix: z.string().trim().min(1).optional(),
  report_format: z.enum(['csv', 'json']).optional(),
  dry_run: z.preprocess(parseBooleanFlag, z.boolean().optional()),
});

export type SweepEvent = z.input<typeof sweepEventSchema>;

export type HandlerResponse = {
  statusCode: number;
  body: {
    status: 'success' | 'error';
    message: string;
    bucket: string | null;
    timestamp: string;
    dryRun?: boolean;
    summary?: ClassificationSummary;
    deleted?: number;
    failed?: number;
    reportLocations?: string[];
  };
};

export type HandlerDeps = {
  env: Env;
  /** Defaults to an S3 store built from `env`, closed after each invocation. */
  store?: ObjectStore;
  now?: () => Date;
};

export function createHandler(deps: HandlerDeps) {
  return async (event: unknown): Promise<HandlerResponse> => {
    const now = deps.now ? deps.now() : new Date();
    const timestamp = now.toISOString();
    let bucket: string | null = null;

    // eslint-disable-next-line no-console
    console.log('[handler] sweep started', { timestamp });

    const ownStore = deps.store ? null : createObjectStore(deps.env);
    try {
      const parsed = sweepEventSchema.safeParse(event ?? {});
      if (!parsed.success) {
        throw AppError.badRequest(
          `Invalid event: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        );
      }
      const input = parsed.data;

      bucket = input.bucket_name ?? deps.env.S3_BUCKET_NAME ?? null;
      if (!bucket) {
        throw AppError.badRequest('Missing bucket_name (or S3_BUCKET_NAME)');
      }

      const config = buildRetentionConfig({
        preset: input.preset ?? deps.env.RETENTION_PRESET,
        standardAgeThresholdDays: input.days_threshold ?? deps.env.DAYS_THRESHOLD,
        glacierMinAgeDays: input.glacier_min_days ?? deps.env.GLACIER_MIN_DAYS,
        deepArchiveMinAgeDays: input.deep_archive_min_days ?? deps.env.DEEP_ARCHIVE_MIN_DAYS,
        protectedWeekdays: input.protected_weekdays ?? deps.env.PROTECTED_WEEKDAYS,
        excludedPrefixes: splitList(input.excluded_prefixes ?? deps.env.EXCLUDED_PREFIXES),
      });

      const store = deps.store ?? ownStore;
      if (!store) throw new Error('No object store configured');

      const result = await runSweep({
        store,
        bucket,
        config,
        now,
        dryRun: input.dry_run ?? deps.env.DRY_RUN,
        listPrefix: deps.env.LIST_PREFIX,
        report: {
          format: input.report_format ?? deps.env.REPORT_FORMAT,
          dir: deps.env.REPORT_DIR,
          upload: { prefix: normalizePrefix(input.report_prefix ?? deps.env.REPORT_PREFIX) },
        },
      });

      return {
        statusCode: 200,
        body: {
          status: 'success',
          message: `Bucket sweep completed successfully for bucket ${bucket}`,
          bucket,
          timestamp,
          dryRun: result.dryRun,
          summary: result.summary,
          deleted: result.deletion?.deleted.length ?? 0,
          failed: result.deletion?.failed.length ?? 0,
          reportLocations: result.reportLocations,
        },
      };
    } catch (error) {
      const message = bucket
        ? `Error during bucket sweep for bucket ${bucket}: ${errorMessage(error)}`
        : `Error during bucket sweep: ${errorMessage(error)}`;
      // eslint-disable-next-line no-console
      console.error('[handler] sweep failed', { bucket, err: errorMessage(error) });
      return {
        statusCode: statusCodeFor(error),
        body: { status: 'error', message, bucket, timestamp },
      };
    } finally {
      ownStore?.close();
    }
  };
}

export const handler = (event: unknown): Promise<HandlerResponse> => createHandler({ env: getEnv() })(event);
