import { describeRetentionConfig } from '../retention/config.js';
import type { ClassificationSummary } from '../retention/summary.js';
import type { ClassifiedObject, RetentionConfig } from '../retention/types.js';
import { toReportRow, type ReportRow } from './rows.js';

export type JsonReport = {
  bucket: string;
  generatedAt: string;
  dryRun: boolean;
  config: ReturnType<typeof describeRetentionConfig>;
  summary: ClassificationSummary;
  objects: ReportRow[];
};

export function buildJsonReport(args: {
  bucket: string;
  generatedAt: Date;
  dryRun: boolean;
  config: RetentionConfig;
  summary: ClassificationSummary;
  items: readonly ClassifiedObject[];
}): JsonReport {
  return {
    bucket: args.bucket,
    generatedAt: args.generatedAt.toISOString(),
    dryRun: args.dryRun,
    config: describeRetentionConfig(args.config),
    summary: args.summary,
    objects: args.items.map(toReportRow),
  };
}

export function renderJsonReport(args: Parameters<typeof buildJsonReport>[0]): string {
  return JSON.stringify(buildJsonReport(args), null, 2) + '\n';
}
