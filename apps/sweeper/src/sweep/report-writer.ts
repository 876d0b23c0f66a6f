import { mkdir, writeFile } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import {
  renderCsvReport,
  renderJsonReport,
  reportFilename,
  summarizeClassifications,
  toReportRow,
  type ClassificationSummary,
  type ClassifiedObject,
  type RetentionConfig,
} from '@bucket-sweep/core';

import type { ObjectStore } from '../storage/types.js';

export type ReportFormat = 'csv' | 'json';

export type ReportOptions = {
  format: ReportFormat;
  /** Local directory to write into; omit to skip the local copy. */
  dir?: string;
  filename?: string;
  /** Upload to `<prefix><filename>` in the swept bucket. */
  upload?: { prefix: string };
};

export type ReportContext = {
  bucket: string;
  dryRun: boolean;
  now: Date;
  config: RetentionConfig;
  items: readonly ClassifiedObject[];
  summary?: ClassificationSummary;
};

const CONTENT_TYPES: Record<ReportFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  json: 'application/json',
};

export function normalizePrefix(prefix: string): string {
  if (prefix.length === 0) return prefix;
  return prefix.endsWith('/') ? prefix : `${prefix}/`;
}

export function renderReport(format: ReportFormat, ctx: ReportContext): string {
  if (format === 'json') {
    return renderJsonReport({
      bucket: ctx.bucket,
      generatedAt: ctx.now,
      dryRun: ctx.dryRun,
      config: ctx.config,
      summary: ctx.summary ?? summarizeClassifications(ctx.items),
      items: ctx.items,
    });
  }
  return renderCsvReport(ctx.items.map(toReportRow));
}

/** Writes the audit report locally and/or back to storage; returns where it went. */
export async function writeReport(store: ObjectStore, options: ReportOptions, ctx: ReportContext): Promise<string[]> {
  const filename = options.filename ?? reportFilename(options.format, ctx.now);
  const body = renderReport(options.format, ctx);
  const locations: string[] = [];

  if (options.dir) {
    await mkdir(options.dir, { recursive: true });
    const filePath = resolve(join(options.dir, filename));
    await writeFile(filePath, body, 'utf-8');
    locations.push(filePath);
  }

  if (options.upload) {
    const key = `${normalizePrefix(options.upload.prefix)}${filename}`;
    await store.putObject({ bucket: ctx.bucket, key, body, contentType: CONTENT_TYPES[options.format] });
    locations.push(`s3://${ctx.bucket}/${key}`);
  }

  return locations;
}
