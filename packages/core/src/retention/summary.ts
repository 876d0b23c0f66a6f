import { RETENTION_ACTIONS, type ClassifiedObject, type RetentionAction } from './types.js';

export type ActionTotals = { count: number; bytes: number };

export type ClassificationSummary = {
  totalObjects: number;
  totalBytes: number;
  byAction: Record<RetentionAction, ActionTotals>;
};

const zero = (): ActionTotals => ({ count: 0, bytes: 0 });

export function emptySummary(): ClassificationSummary {
  return {
    totalObjects: 0,
    totalBytes: 0,
    byAction: {
      Delete: zero(),
      ProtectedByWeekday: zero(),
      SkippedEarlyDeletionFee: zero(),
      ExcludedByPrefix: zero(),
      RetainedTooYoung: zero(),
    },
  };
}

/** Actions in report order, with their totals. */
export function summaryEntries(summary: ClassificationSummary): Array<[RetentionAction, ActionTotals]> {
  return RETENTION_ACTIONS.map((action): [RetentionAction, ActionTotals] => [action, summary.byAction[action]]);
}

export function addToSummary(summary: ClassificationSummary, item: ClassifiedObject): ClassificationSummary {
  const totals = summary.byAction[item.result.action];
  totals.count += 1;
  totals.bytes += item.record.sizeBytes;
  summary.totalObjects += 1;
  summary.totalBytes += item.record.sizeBytes;
  return summary;
}

export function summarizeClassifications(items: Iterable<ClassifiedObject>): ClassificationSummary {
  const summary = emptySummary();
  for (const item of items) addToSummary(summary, item);
  return summary;
}
