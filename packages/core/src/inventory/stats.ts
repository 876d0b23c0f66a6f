import { computeAgeDays, normalizeStorageClass } from '../retention/classifier.js';
import type { ObjectRecord } from '../retention/types.js';

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'] as const;

export function formatBytes(bytes: number): string {
  let value = bytes;
  let unit: (typeof SIZE_UNITS)[number] = 'B';
  for (const candidate of SIZE_UNITS) {
    unit = candidate;
    if (value < 1024 || candidate === 'PB') break;
    value /= 1024;
  }
  return `${value.toFixed(2)} ${unit}`;
}

export type AgeBucket = '<30d' | '30-89d' | '90-179d' | '>=180d';

export type ObjectSummary = {
  key: string;
  sizeBytes: number;
  lastModified: Date;
  storageClass: string;
};

export type BucketStats = {
  objectCount: number;
  totalBytes: number;
  oldest: ObjectSummary | null;
  newest: ObjectSummary | null;
  /** Most recently modified objects, newest first. */
  latest: ObjectSummary[];
  byStorageClass: Record<string, { count: number; bytes: number }>;
  byAge: Record<AgeBucket, number>;
};

export function ageBucketFor(ageDays: number): AgeBucket {
  if (ageDays < 30) return '<30d';
  if (ageDays < 90) return '30-89d';
  if (ageDays < 180) return '90-179d';
  return '>=180d';
}

function toSummary(record: ObjectRecord): ObjectSummary {
  return {
    key: record.key,
    sizeBytes: record.sizeBytes,
    lastModified: record.lastModified,
    storageClass: normalizeStorageClass(record.storageClass),
  };
}

export async function collectBucketStats(
  records: Iterable<ObjectRecord> | AsyncIterable<ObjectRecord>,
  options: { now: Date; latestCount?: number },
): Promise<BucketStats> {
  const latestCount = options.latestCount ?? 3;
  const stats: BucketStats = {
    objectCount: 0,
    totalBytes: 0,
    oldest: null,
    newest: null,
    latest: [],
    byStorageClass: {},
    byAge: { '<30d': 0, '30-89d': 0, '90-179d': 0, '>=180d': 0 },
  };

  for await (const record of records) {
    const summary = toSummary(record);
    const ts = summary.lastModified.getTime();

    stats.objectCount += 1;
    stats.totalBytes += summary.sizeBytes;

    const tier = (stats.byStorageClass[summary.storageClass] ??= { count: 0, bytes: 0 });
    tier.count += 1;
    tier.bytes += summary.sizeBytes;

    stats.byAge[ageBucketFor(computeAgeDays(summary.lastModified, options.now))] += 1;

    if (!stats.oldest || ts < stats.oldest.lastModified.getTime()) stats.oldest = summary;
    if (!stats.newest || ts > stats.newest.lastModified.getTime()) stats.newest = summary;

    // Keep only the top N instead of sorting the whole listing.
    if (latestCount > 0) {
      stats.latest.push(summary);
      stats.latest.sort((a, b) => b.lastModified.getTime() - a.lastModified.getTime());
      if (stats.latest.length > latestCount) stats.latest.length = latestCount;
    }
  }

  return stats;
}
