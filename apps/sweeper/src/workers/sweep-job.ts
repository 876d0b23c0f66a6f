import type { Env } from '../config/env.js';
import { retentionConfigFromEnv } from '../config/retention.js';
import type { ObjectStore } from '../storage/types.js';
import { runSweep, type SweepResult } from '../sweep/runner.js';
import { AppError } from '../utils/errors.js';

export const SWEEP_QUEUE_NAME = 'maintenance';
export const SWEEP_JOB_NAME = 'bucket-sweep';
export const SWEEP_JOB_ID = 'bucket-sweep-daily';

export type SweepJobData = {
  bucket?: string;
  dryRun?: boolean;
};

export type SweepJobResult = { ok: true; ignored: true; jobName: string } | (SweepResult & { ok: true });

/** Scheduled sweeps never prompt; dry-run and report settings come from the environment. */
export async function processSweepJob(
  job: { name: string; data: SweepJobData },
  deps: { env: Env; store: ObjectStore; now?: Date },
): Promise<SweepJobResult> {
  if (job.name !== SWEEP_JOB_NAME) {
    return { ok: true, ignored: true, jobName: job.name };
  }

  const bucket = job.data.bucket ?? deps.env.S3_BUCKET_NAME;
  if (!bucket) {
    throw AppError.badRequest('Missing S3_BUCKET_NAME for scheduled sweep');
  }

  const result = await runSweep({
    store: deps.store,
    bucket,
    config: retentionConfigFromEnv(deps.env),
    dryRun: job.data.dryRun ?? deps.env.DRY_RUN,
    now: deps.now,
    listPrefix: deps.env.LIST_PREFIX,
    report: {
      format: deps.env.REPORT_FORMAT,
      dir: deps.env.REPORT_DIR,
      filename: deps.env.REPORT_FILENAME,
      upload: deps.env.UPLOAD_REPORT ? { prefix: deps.env.REPORT_PREFIX } : undefined,
    },
  });

  return { ok: true, ...result };
}
