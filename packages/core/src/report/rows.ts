import { normalizeStorageClass } from '../retention/classifier.js';
import type { ClassifiedObject, RetentionAction } from '../retention/types.js';
import { weekdayName } from '../retention/weekday.js';

export const REPORT_COLUMNS = [
  'Object_Key',
  'Last_Modified',
  'Size_Bytes',
  'Size_KB',
  'Size_MB',
  'Storage_Class',
  'Age_Days',
  'Creation_Day',
  'Action',
  'Notes',
] as const;

export type ReportColumn = (typeof REPORT_COLUMNS)[number];

export type ReportRow = Record<ReportColumn, string | number>;

export const REPORT_ACTION_LABELS: Record<RetentionAction, string> = {
  Delete: 'DELETE',
  ProtectedByWeekday: 'PROTECTED',
  SkippedEarlyDeletionFee: 'SKIPPED',
  ExcludedByPrefix: 'EXCLUDED',
  RetainedTooYoung: 'RETAINED',
};

function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function formatUtcTimestamp(date: Date): string {
  if (Number.isNaN(date.getTime())) return 'Invalid date';
  return `${date.toISOString().slice(0, 19).replace('T', ' ')} UTC`;
}

export function toReportRow(item: ClassifiedObject): ReportRow {
  const { record, result } = item;
  return {
    Object_Key: record.key,
    Last_Modified: formatUtcTimestamp(record.lastModified),
    Size_Bytes: record.sizeBytes,
    Size_KB: roundTo(record.sizeBytes / 1024, 2),
    Size_MB: roundTo(record.sizeBytes / (1024 * 1024), 4),
    Storage_Class: normalizeStorageClass(record.storageClass),
    Age_Days: result.ageDays,
    Creation_Day: weekdayName(result.creationWeekday),
    Action: REPORT_ACTION_LABELS[result.action],
    Notes: result.action === 'Delete' ? '' : result.reason,
  };
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function reportFilename(format: 'csv' | 'json', now: Date): string {
  const date = `${now.getUTCFullYear()}${pad2(now.getUTCMonth() + 1)}${pad2(now.getUTCDate())}`;
  const time = `${pad2(now.getUTCHours())}${pad2(now.getUTCMinutes())}${pad2(now.getUTCSeconds())}`;
  return `s3_cleanup_${date}_${time}.${format}`;
}
