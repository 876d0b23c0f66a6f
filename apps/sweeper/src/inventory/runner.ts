import { collectBucketStats, type InventoryRow } from '@bucket-sweep/core';

import type { ObjectStore } from '../storage/types.js';
import { errorMessage } from '../utils/errors.js';

export async function runInventory(args: {
  store: ObjectStore;
  now?: Date;
  latestCount?: number;
  buckets?: string[];
}): Promise<InventoryRow[]> {
  const now = args.now ?? new Date();
  const buckets = args.buckets ?? (await args.store.listBuckets());
  const rows: InventoryRow[] = [];

  for (const bucket of buckets) {
    // eslint-disable-next-line no-console
    console.log('[inventory] processing bucket', { bucket });
    try {
      const stats = await collectBucketStats(args.store.listObjects({ bucket }), {
        now,
        latestCount: args.latestCount,
      });
      rows.push({ bucket, stats });
    } catch (error) {
      // eslint-disable-next-line no-console
      console.error('[inventory] bucket failed', { bucket, err: errorMessage(error) });
      rows.push({ bucket, stats: null, error: errorMessage(error) });
    }
  }

  return rows;
}
