/**
 * In-process stand-ins for the object store, shared by the sweeper tests.
 */

import type { ObjectRecord } from '@bucket-sweep/core';

import type { DeleteOutcome, ObjectStore } from '../storage/types.js';
import { AppError } from '../utils/errors.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

// Wednesday
export const NOW = new Date('2024-06-19T12:00:00Z');

export function daysAgo(days: number): Date {
  return new Date(NOW.getTime() - days * DAY_MS);
}

export type Upload = { bucket: string; key: string; body: string; contentType: string };

export class InMemoryObjectStore implements ObjectStore {
  private readonly buckets = new Map<string, Map<string, ObjectRecord>>();
  readonly uploads: Upload[] = [];
  readonly deleteCalls: string[][] = [];
  readonly failKeys = new Set<string>();
  readonly failingBuckets = new Map<string, Error>();
  closed = false;

  addObjects(bucket: string, records: ObjectRecord[]): this {
    const objects = this.buckets.get(bucket) ?? new Map<string, ObjectRecord>();
    for (const record of records) objects.set(record.key, record);
    this.buckets.set(bucket, objects);
    return this;
  }

  keys(bucket: string): string[] {
    return [...(this.buckets.get(bucket)?.keys() ?? [])].sort();
  }

  async *listObjects(args: { bucket: string; prefix?: string }): AsyncGenerator<ObjectRecord> {
    const failure = this.failingBuckets.get(args.bucket);
    if (failure) throw failure;

    const objects = this.buckets.get(args.bucket) ?? new Map<string, ObjectRecord>();
    const sorted = [...objects.values()].sort((a, b) => a.key.localeCompare(b.key));
    for (const record of sorted) {
      if (args.prefix && !record.key.startsWith(args.prefix)) continue;
      yield record;
    }
  }

  async deleteObjects(args: { bucket: string; keys: readonly string[] }): Promise<DeleteOutcome> {
    this.deleteCalls.push([...args.keys]);
    const objects = this.buckets.get(args.bucket);
    const outcome: DeleteOutcome = { deleted: [], failed: [] };

    for (const key of args.keys) {
      if (this.failKeys.has(key)) {
        outcome.failed.push({ key, code: 'AccessDenied', message: 'Access Denied' });
        continue;
      }
      objects?.delete(key);
      outcome.deleted.push(key);
    }
    return outcome;
  }

  async putObject(args: Upload): Promise<{ etag: string | undefined }> {
    this.uploads.push(args);
    return { etag: `"etag-${this.uploads.length}"` };
  }

  async listBuckets(): Promise<string[]> {
    return [...new Set([...this.buckets.keys(), ...this.failingBuckets.keys()])];
  }

  async assertBucketAccess(bucket: string): Promise<void> {
    if (!this.buckets.has(bucket)) throw AppError.notFound(`Bucket '${bucket}' does not exist`);
  }

  close(): void {
    this.closed = true;
  }
}

/**
 * Six objects in "scratch", judged on a Wednesday with the weekday-guarded preset
 * plus a `logs/` exclusion:
 *   cold/glacier.bin     GLACIER, 60d      -> SkippedEarlyDeletionFee
 *   data/new.bin         3d                -> RetainedTooYoung
 *   data/old-friday.bin  19d, Friday       -> Delete
 *   data/old-monday.bin  16d, Monday       -> Delete
 *   data/old-sunday.bin  17d, Sunday       -> ProtectedByWeekday
 *   logs/old.txt         400d              -> ExcludedByPrefix
 */
export function scratchBucket(): InMemoryObjectStore {
  return new InMemoryObjectStore().addObjects('scratch', [
    { key: 'logs/old.txt', sizeBytes: 10, lastModified: daysAgo(400) },
    { key: 'data/new.bin', sizeBytes: 20, lastModified: daysAgo(3) },
    { key: 'data/old-monday.bin', sizeBytes: 30, lastModified: daysAgo(16) },
    { key: 'data/old-sunday.bin', sizeBytes: 40, lastModified: daysAgo(17), storageClass: 'STANDARD' },
    { key: 'cold/glacier.bin', sizeBytes: 50, lastModified: daysAgo(60), storageClass: 'GLACIER' },
    { key: 'data/old-friday.bin', sizeBytes: 60, lastModified: daysAgo(19) },
  ]);
}
