import type {
  ClassificationResult,
  ClassifiedObject,
  ObjectRecord,
  RetentionConfig,
  StorageClass,
} from './types.js';
import { weekdayName } from './weekday.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const GLACIER_CLASSES: ReadonlySet<string> = new Set(['GLACIER', 'GLACIER_IR']);
const DEEP_ARCHIVE_CLASS = 'DEEP_ARCHIVE';

export function normalizeStorageClass(storageClass: StorageClass | undefined): StorageClass {
  if (!storageClass || storageClass.trim().length === 0) return 'STANDARD';
  return storageClass;
}

/** Whole days elapsed since `lastModified`; objects dated in the future are age 0. */
export function computeAgeDays(lastModified: Date, now: Date): number {
  const elapsed = now.getTime() - lastModified.getTime();
  if (!(elapsed > 0)) return 0;
  return Math.floor(elapsed / MS_PER_DAY);
}

export function isColdStorageClass(storageClass: StorageClass | undefined): boolean {
  const normalized = normalizeStorageClass(storageClass);
  return GLACIER_CLASSES.has(normalized) || normalized === DEEP_ARCHIVE_CLASS;
}

export function minimumAgeDaysFor(storageClass: StorageClass | undefined, config: RetentionConfig): number {
  const normalized = normalizeStorageClass(storageClass);
  if (GLACIER_CLASSES.has(normalized)) return config.glacierMinAgeDays;
  if (normalized === DEEP_ARCHIVE_CLASS) return config.deepArchiveMinAgeDays;
  return config.standardAgeThresholdDays;
}

function tierLabel(storageClass: StorageClass): string {
  return storageClass === DEEP_ARCHIVE_CLASS ? 'Deep Archive' : 'Glacier';
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? '' : 's'}`;
}

/**
 * Decides what happens to one object. Rules are evaluated in order and the
 * first match wins: prefix exclusion, storage-class minimum age (with the
 * early-deletion-fee skip for cold tiers), weekday protection, delete.
 */
export function classify(record: ObjectRecord, config: RetentionConfig, now: Date): ClassificationResult {
  const storageClass = normalizeStorageClass(record.storageClass);
  const ageDays = computeAgeDays(record.lastModified, now);
  const minimumAgeDays = minimumAgeDaysFor(storageClass, config);
  const creationWeekday = record.lastModified.getUTCDay();
  const base = { ageDays, minimumAgeDays, creationWeekday };

  const prefix = config.excludedPrefixes.find((p) => record.key.startsWith(p));
  if (prefix !== undefined) {
    return { ...base, action: 'ExcludedByPrefix', reason: `Key is under excluded prefix "${prefix}"` };
  }

  if (ageDays < minimumAgeDays) {
    if (isColdStorageClass(storageClass) && ageDays >= config.standardAgeThresholdDays) {
      const remaining = minimumAgeDays - ageDays;
      return {
        ...base,
        action: 'SkippedEarlyDeletionFee',
        reason:
          `${tierLabel(storageClass)} early deletion fee would apply; ` +
          `needs ${plural(remaining, 'more day')} to reach the ${minimumAgeDays}-day minimum`,
      };
    }
    return {
      ...base,
      action: 'RetainedTooYoung',
      reason: `${plural(ageDays, 'day')} old; ${storageClass} objects are kept until ${minimumAgeDays} days`,
    };
  }

  if (config.protectedWeekdays.has(creationWeekday)) {
    return {
      ...base,
      action: 'ProtectedByWeekday',
      reason: `Protected - created on ${weekdayName(creationWeekday)}`,
    };
  }

  return {
    ...base,
    action: 'Delete',
    reason: `${plural(ageDays, 'day')} old; past the ${minimumAgeDays}-day threshold for ${storageClass}`,
  };
}

/** Lazily classifies a listing, judging every record against the same `now`. */
export async function* classifyAll(
  records: Iterable<ObjectRecord> | AsyncIterable<ObjectRecord>,
  config: RetentionConfig,
  now: Date,
): AsyncGenerator<ClassifiedObject> {
  for await (const record of records) {
    yield { record, result: classify(record, config, now) };
  }
}
