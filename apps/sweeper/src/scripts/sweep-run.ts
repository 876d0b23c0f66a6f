import 'dotenv/config';

import { getEnv } from '../config/env.js';
import { retentionConfigFromEnv } from '../config/retention.js';
import { createObjectStore } from '../storage/index.js';
import { promptForDeletion } from '../sweep/confirm.js';
import { describeSweep, runSweep } from '../sweep/runner.js';

async function main() {
  const args = new Set(process.argv.slice(2));
  const env = getEnv();

  const bucket = env.S3_BUCKET_NAME;
  if (!bucket) {
    throw new Error('Missing S3_BUCKET_NAME');
  }

  const dryRun = args.has('--dry-run') || env.DRY_RUN;
  const interactive = !env.AWS_LAMBDA_FUNCTION_NAME && !args.has('--non-interactive');

  if (dryRun) {
    // eslint-disable-next-line no-console
    console.log('DRY RUN MODE - NO OBJECTS WILL BE DELETED');
  }

  const store = createObjectStore(env);
  try {
    const result = await runSweep({
      store,
      bucket,
      config: retentionConfigFromEnv(env),
      dryRun,
      listPrefix: env.LIST_PREFIX,
      checkAccess: true,
      report: {
        format: env.REPORT_FORMAT,
        dir: env.REPORT_DIR ?? (env.AWS_LAMBDA_FUNCTION_NAME ? '/tmp' : process.cwd()),
        filename: env.REPORT_FILENAME,
        upload: env.UPLOAD_REPORT ? { prefix: env.REPORT_PREFIX } : undefined,
      },
      confirm: interactive ? promptForDeletion({ input: process.stdin, output: process.stdout }) : undefined,
    });

    for (const line of describeSweep(result)) {
      // eslint-disable-next-line no-console
      console.log(line);
    }
    if (result.deletion && result.deletion.failed.length > 0) {
      process.exitCode = 2;
    }
  } finally {
    store.close();
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
