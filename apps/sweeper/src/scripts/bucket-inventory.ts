import 'dotenv/config';

import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';

import { renderInventoryCsv } from '@bucket-sweep/core';

import { getEnv } from '../config/env.js';
import { runInventory } from '../inventory/runner.js';
import { createObjectStore } from '../storage/index.js';

async function main() {
  const filename = process.argv[2] ?? 's3_bucket_info.csv';
  const env = getEnv();
  const store = createObjectStore(env);

  try {
    const rows = await runInventory({ store });
    const filePath = resolve(filename);
    await writeFile(filePath, renderInventoryCsv(rows), 'utf-8');

    // eslint-disable-next-line no-console
    console.log(`CSV file created successfully: ${filePath}`);
  } finally {
    store.close();
  }
}

main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
