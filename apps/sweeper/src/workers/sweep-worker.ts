import 'dotenv/config';

import { Queue, Worker } from 'bullmq';

import { getEnv } from '../config/env.js';
import { createRedisConnection } from '../redis.js';
import { createObjectStore } from '../storage/index.js';
import { errorMessage } from '../utils/errors.js';
import {
  SWEEP_JOB_ID,
  SWEEP_JOB_NAME,
  SWEEP_QUEUE_NAME,
  processSweepJob,
  type SweepJobData,
} from './sweep-job.js';

const env = getEnv();
const redis = createRedisConnection({ url: env.REDIS_URL });
const store = createObjectStore(env);

const maintenanceQueue = new Queue<SweepJobData>(SWEEP_QUEUE_NAME, { connection: redis, prefix: 'bucket-sweep' });

async function ensureRepeatableSweepJob() {
  if (!env.SWEEP_ENABLED) {
    return;
  }
  if (!env.S3_BUCKET_NAME) {
    throw new Error('SWEEP_ENABLED=true but S3_BUCKET_NAME is missing');
  }

  await maintenanceQueue.add(
    SWEEP_JOB_NAME,
    {},
    {
      jobId: SWEEP_JOB_ID,
      repeat: {
        pattern: env.SWEEP_CRON,
        tz: env.SWEEP_TZ ?? undefined,
      },
      removeOnComplete: true,
      removeOnFail: 50,
    },
  );
}

async function main() {
  await ensureRepeatableSweepJob();

  const worker = new Worker<SweepJobData>(
    maintenanceQueue.name,
    async (job) => processSweepJob({ name: job.name, data: job.data }, { env, store }),
    { connection: redis, prefix: 'bucket-sweep' },
  );

  worker.on('failed', (job, err) => {
    // eslint-disable-next-line no-console
    console.error('[sweep-worker] job failed', { id: job?.id, name: job?.name, err: errorMessage(err) });
  });

  const shutdown = async () => {
    await worker.close();
    await maintenanceQueue.close();
    store.close();
    await redis.quit();
    process.exit(0);
  };
  const onSignal = () => {
    shutdown().catch((err) => {
      // eslint-disable-next-line no-console
      console.error('[sweep-worker] shutdown failed', err);
      process.exit(1);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  // eslint-disable-next-line no-console
  console.log('[sweep-worker] ready', {
    enabled: env.SWEEP_ENABLED,
    cron: env.SWEEP_CRON,
    tz: env.SWEEP_TZ ?? null,
    bucket: env.S3_BUCKET_NAME ?? null,
    preset: env.RETENTION_PRESET,
    dryRun: env.DRY_RUN,
  });
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('[sweep-worker] fatal', err);
  process.exit(1);
});
