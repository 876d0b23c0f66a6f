import { z } from 'zod';

import type { RetentionConfig } from './types.js';
import { Weekday } from './weekday.js';

const dayCount = () => z.coerce.number().int().nonnegative();

export const retentionConfigInputSchema = z.object({
  standardAgeThresholdDays: dayCount(),
  glacierMinAgeDays: dayCount(),
  deepArchiveMinAgeDays: dayCount(),
  protectedWeekdays: z.array(z.number().int().min(0).max(6)).default([]),
  excludedPrefixes: z
    .array(z.string())
    .default([])
    .transform((prefixes) => prefixes.map((p) => p.trim()).filter((p) => p.length > 0)),
});

export type RetentionConfigInput = z.input<typeof retentionConfigInputSchema>;

export const retentionConfigSchema = retentionConfigInputSchema.transform(
  (value): RetentionConfig =>
    Object.freeze({
      standardAgeThresholdDays: value.standardAgeThresholdDays,
      glacierMinAgeDays: value.glacierMinAgeDays,
      deepArchiveMinAgeDays: value.deepArchiveMinAgeDays,
      protectedWeekdays: new Set(value.protectedWeekdays),
      excludedPrefixes: Object.freeze([...new Set(value.excludedPrefixes)]),
    }),
);

export class RetentionConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid retention config: ${issues.join('; ')}`);
    this.name = 'RetentionConfigError';
  }
}

export function createRetentionConfig(input: RetentionConfigInput): RetentionConfig {
  const parsed = retentionConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new RetentionConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}

/**
 * Cold-tier minimums below the standard threshold are accepted and applied
 * as given; this only lists them so callers can warn before a run.
 */
export function findRetentionConfigWarnings(config: RetentionConfig): string[] {
  const warnings: string[] = [];
  if (config.glacierMinAgeDays < config.standardAgeThresholdDays) {
    warnings.push(
      `glacierMinAgeDays (${config.glacierMinAgeDays}) is below standardAgeThresholdDays (${config.standardAgeThresholdDays})`,
    );
  }
  if (config.deepArchiveMinAgeDays < config.standardAgeThresholdDays) {
    warnings.push(
      `deepArchiveMinAgeDays (${config.deepArchiveMinAgeDays}) is below standardAgeThresholdDays (${config.standardAgeThresholdDays})`,
    );
  }
  return warnings;
}

export const RETENTION_PRESET_NAMES = ['weekday-guarded', 'cold-storage-aware', 'age-only'] as const;

export type RetentionPresetName = (typeof RETENTION_PRESET_NAMES)[number];

export const RETENTION_PRESETS: Record<RetentionPresetName, RetentionConfigInput> = {
  // Short-lived scratch buckets: two weekly snapshots survive regardless of age.
  'weekday-guarded': {
    standardAgeThresholdDays: 15,
    glacierMinAgeDays: 91,
    deepArchiveMinAgeDays: 181,
    protectedWeekdays: [Weekday.Wednesday, Weekday.Sunday],
    excludedPrefixes: [],
  },
  'cold-storage-aware': {
    standardAgeThresholdDays: 90,
    glacierMinAgeDays: 91,
    deepArchiveMinAgeDays: 181,
    protectedWeekdays: [],
    excludedPrefixes: [],
  },
  'age-only': {
    standardAgeThresholdDays: 90,
    glacierMinAgeDays: 90,
    deepArchiveMinAgeDays: 90,
    protectedWeekdays: [],
    excludedPrefixes: [],
  },
};

/** Returns a copy of `config` that also excludes `prefixes` (appended, deduplicated). */
export function withExcludedPrefixes(config: RetentionConfig, prefixes: readonly string[]): RetentionConfig {
  const { protectedWeekdays, excludedPrefixes, ...thresholds } = config;
  return createRetentionConfig({
    ...thresholds,
    protectedWeekdays: [...protectedWeekdays],
    excludedPrefixes: [...excludedPrefixes, ...prefixes],
  });
}

export function describeRetentionConfig(config: RetentionConfig) {
  return {
    standardAgeThresholdDays: config.standardAgeThresholdDays,
    glacierMinAgeDays: config.glacierMinAgeDays,
    deepArchiveMinAgeDays: config.deepArchiveMinAgeDays,
    protectedWeekdays: [...config.protectedWeekdays].sort((a, b) => a - b),
    excludedPrefixes: [...config.excludedPrefixes],
  };
}
