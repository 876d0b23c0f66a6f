import {
  addToSummary,
  classifyAll,
  describeRetentionConfig,
  emptySummary,
  findRetentionConfigWarnings,
  formatBytes,
  summaryEntries,
  withExcludedPrefixes,
  type ClassificationSummary,
  type ClassifiedObject,
  type RetentionConfig,
} from '@bucket-sweep/core';

import type { DeleteOutcome, ObjectStore } from '../storage/types.js';
import { normalizePrefix, writeReport, type ReportOptions } from './report-writer.js';

export type SweepPlan = {
  bucket: string;
  keys: string[];
  bytes: number;
};

export type SweepOptions = {
  store: ObjectStore;
  bucket: string;
  config: RetentionConfig;
  dryRun: boolean;
  /** Fixed once per run; every object is judged against it. */
  now?: Date;
  listPrefix?: string;
  report?: ReportOptions;
  /** Asked before deleting; resolving false cancels the deletion. */
  confirm?: (plan: SweepPlan) => Promise<boolean>;
  checkAccess?: boolean;
};

export type SweepResult = {
  bucket: string;
  dryRun: boolean;
  now: string;
  summary: ClassificationSummary;
  reportLocations: string[];
  deletion: DeleteOutcome | null;
  cancelled: boolean;
};

export async function runSweep(options: SweepOptions): Promise<SweepResult> {
  const now = options.now ?? new Date();
  const { store, bucket, dryRun } = options;

  // Reports uploaded into the swept bucket must never be swept themselves.
  const config = options.report?.upload
    ? withExcludedPrefixes(options.config, [normalizePrefix(options.report.upload.prefix)])
    : options.config;

  for (const warning of findRetentionConfigWarnings(config)) {
    // eslint-disable-next-line no-console
    console.warn('[sweep] config warning', { bucket, warning });
  }

  if (options.checkAccess) {
    await store.assertBucketAccess(bucket);
  }

  // eslint-disable-next-line no-console
  console.log('[sweep] scanning', {
    bucket,
    prefix: options.listPrefix ?? null,
    dryRun,
    now: now.toISOString(),
    config: describeRetentionConfig(config),
  });

  const items: ClassifiedObject[] = [];
  const summary = emptySummary();
  for await (const item of classifyAll(store.listObjects({ bucket, prefix: options.listPrefix }), config, now)) {
    items.push(item);
    addToSummary(summary, item);
  }

  const reportLocations = options.report
    ? await writeReport(store, options.report, { bucket, dryRun, now, config, items, summary })
    : [];

  const toDelete = items.filter((item) => item.result.action === 'Delete');
  const plan: SweepPlan = {
    bucket,
    keys: toDelete.map((item) => item.record.key),
    bytes: summary.byAction.Delete.bytes,
  };

  let deletion: DeleteOutcome | null = null;
  let cancelled = false;

  if (plan.keys.length > 0 && !dryRun) {
    if (options.confirm && !(await options.confirm(plan))) {
      cancelled = true;
    } else {
      deletion = await store.deleteObjects({ bucket, keys: plan.keys });
      for (const failure of deletion.failed) {
        // eslint-disable-next-line no-console
        console.error('[sweep] delete failed', { bucket, ...failure });
      }
    }
  }

  const result: SweepResult = {
    bucket,
    dryRun,
    now: now.toISOString(),
    summary,
    reportLocations,
    deletion,
    cancelled,
  };

  // eslint-disable-next-line no-console
  console.log('[sweep] done', {
    bucket,
    dryRun,
    cancelled,
    scanned: summary.totalObjects,
    eligible: plan.keys.length,
    deleted: deletion?.deleted.length ?? 0,
    failed: deletion?.failed.length ?? 0,
  });

  return result;
}

const ACTION_LABELS = {
  Delete: 'eligible for deletion',
  ProtectedByWeekday: 'protected by creation weekday',
  SkippedEarlyDeletionFee: 'skipped to avoid early deletion fees',
  ExcludedByPrefix: 'excluded by prefix',
  RetainedTooYoung: 'retained (too young)',
} as const;

/** Human-readable lines for terminals and logs. */
export function describeSweep(result: SweepResult): string[] {
  const lines = [
    `${result.dryRun ? 'DRY RUN - ' : ''}Scanned ${result.summary.totalObjects} objects ` +
      `(${formatBytes(result.summary.totalBytes)}) in '${result.bucket}'`,
  ];

  for (const [action, totals] of summaryEntries(result.summary)) {
    if (totals.count === 0) continue;
    lines.push(`  ${totals.count} ${ACTION_LABELS[action]} (${formatBytes(totals.bytes)})`);
  }

  if (result.deletion) {
    lines.push(`Deleted ${result.deletion.deleted.length} objects, ${result.deletion.failed.length} failed.`);
  } else if (result.cancelled) {
    lines.push('Deletion cancelled.');
  } else if (result.dryRun && result.summary.byAction.Delete.count > 0) {
    lines.push(`Would delete ${result.summary.byAction.Delete.count} objects.`);
  }

  for (const location of result.reportLocations) {
    lines.push(`Report: ${location}`);
  }

  return lines;
}
