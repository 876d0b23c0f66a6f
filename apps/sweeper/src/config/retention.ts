import {
  RETENTION_PRESETS,
  createRetentionConfig,
  parseWeekdays,
  type RetentionConfig,
  type RetentionPresetName,
} from '@bucket-sweep/core';

import { AppError } from '../utils/errors.js';

export type RetentionOverrides = {
  preset: RetentionPresetName;
  standardAgeThresholdDays?: number;
  glacierMinAgeDays?: number;
  deepArchiveMinAgeDays?: number;
  /** Comma-separated weekday names or digits; undefined keeps the preset's days. */
  protectedWeekdays?: string;
  excludedPrefixes?: string[];
};

export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export function buildRetentionConfig(overrides: RetentionOverrides): RetentionConfig {
  const preset = RETENTION_PRESETS[overrides.preset];

  let protectedWeekdays = preset.protectedWeekdays;
  if (overrides.protectedWeekdays !== undefined) {
    const parsed = parseWeekdays(overrides.protectedWeekdays);
    if (parsed.invalid.length > 0) {
      throw AppError.badRequest(`Unknown weekday(s): ${parsed.invalid.join(', ')}`);
    }
    protectedWeekdays = parsed.days;
  }

  return createRetentionConfig({
    standardAgeThresholdDays: overrides.standardAgeThresholdDays ?? preset.standardAgeThresholdDays,
    glacierMinAgeDays: overrides.glacierMinAgeDays ?? preset.glacierMinAgeDays,
    deepArchiveMinAgeDays: overrides.deepArchiveMinAgeDays ?? preset.deepArchiveMinAgeDays,
    protectedWeekdays,
    excludedPrefixes: [...(preset.excludedPrefixes ?? []), ...(overrides.excludedPrefixes ?? [])],
  });
}

export function retentionConfigFromEnv(env: {
  RETENTION_PRESET: RetentionPresetName;
  DAYS_THRESHOLD?: number;
  GLACIER_MIN_DAYS?: number;
  DEEP_ARCHIVE_MIN_DAYS?: number;
  PROTECTED_WEEKDAYS?: string;
  EXCLUDED_PREFIXES: string;
}): RetentionConfig {
  return buildRetentionConfig({
    preset: env.RETENTION_PRESET,
    standardAgeThresholdDays: env.DAYS_THRESHOLD,
    glacierMinAgeDays: env.GLACIER_MIN_DAYS,
    deepArchiveMinAgeDays: env.DEEP_ARCHIVE_MIN_DAYS,
    protectedWeekdays: env.PROTECTED_WEEKDAYS,
    excludedPrefixes: splitList(env.EXCLUDED_PREFIXES),
  });
}
