export const KNOWN_STORAGE_CLASSES = ['STANDARD', 'GLACIER', 'GLACIER_IR', 'DEEP_ARCHIVE'] as const;

export type KnownStorageClass = (typeof KNOWN_STORAGE_CLASSES)[number];

// Stores report other tiers too (STANDARD_IA, INTELLIGENT_TIERING, ...); they age like STANDARD.
export type StorageClass = KnownStorageClass | (string & {});

export type ObjectRecord = {
  readonly key: string;
  readonly sizeBytes: number;
  readonly lastModified: Date;
  readonly storageClass?: StorageClass;
};

export type RetentionConfig = {
  readonly standardAgeThresholdDays: number;
  readonly glacierMinAgeDays: number;
  readonly deepArchiveMinAgeDays: number;
  /** 0 = Sunday ... 6 = Saturday, as returned by `Date#getUTCDay`. */
  readonly protectedWeekdays: ReadonlySet<number>;
  readonly excludedPrefixes: readonly string[];
};

export const RETENTION_ACTIONS = [
  'Delete',
  'ProtectedByWeekday',
  'SkippedEarlyDeletionFee',
  'ExcludedByPrefix',
  'RetainedTooYoung',
] as const;

export type RetentionAction = (typeof RETENTION_ACTIONS)[number];

export type ClassificationResult = {
  action: RetentionAction;
  ageDays: number;
  reason: string;
  /** Age the object's storage class has to reach before it may be deleted. */
  minimumAgeDays: number;
  creationWeekday: number;
};

export type ClassifiedObject = {
  record: ObjectRecord;
  result: ClassificationResult;
};
