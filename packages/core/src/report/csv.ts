import { formatBytes, type BucketStats } from '../inventory/stats.js';
import { REPORT_COLUMNS, formatUtcTimestamp, type ReportRow } from './rows.js';

// Prevent CSV injection in Excel/Sheets.
function sanitizeForCsv(s: string): string {
  if (/^[=+\-@]/.test(s)) return `'${s}`;
  return s;
}

export function escapeCsvCell(value: unknown): string {
  if (typeof value === 'number') return String(value);
  const raw = value === null || value === undefined ? '' : String(value);
  const s = sanitizeForCsv(raw);
  if (/[",\n\r]/.test(s)) return '"' + s.replaceAll('"', '""') + '"';
  return s;
}

export function renderCsv(header: readonly string[], rows: ReadonlyArray<readonly unknown[]>): string {
  const lines = [header.map(escapeCsvCell).join(',')];
  for (const row of rows) {
    lines.push(row.map(escapeCsvCell).join(','));
  }
  return lines.join('\n') + '\n';
}

export function renderCsvReport(rows: readonly ReportRow[]): string {
  return renderCsv(
    REPORT_COLUMNS,
    rows.map((row) => REPORT_COLUMNS.map((column) => row[column])),
  );
}

export type InventoryRow = {
  bucket: string;
  stats: BucketStats | null;
  error?: string;
};

export const INVENTORY_COLUMNS = [
  'Bucket Name',
  'Total Size',
  'Total Size (Bytes)',
  'Object Count',
  'Last Modified Date',
  'Last Modified File',
  'Storage Classes',
] as const;

export function renderInventoryCsv(rows: readonly InventoryRow[]): string {
  const ordered = [...rows].sort((a, b) => (b.stats?.totalBytes ?? 0) - (a.stats?.totalBytes ?? 0));
  return renderCsv(
    INVENTORY_COLUMNS,
    ordered.map(({ bucket, stats, error }) => {
      if (!stats) {
        return [bucket, 'Error', 0, 0, `Error: ${error ?? 'unknown'}`, 'Error', ''];
      }
      const classes = Object.entries(stats.byStorageClass)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([name, totals]) => `${name}=${totals.count}`)
        .join(' ');
      return [
        bucket,
        formatBytes(stats.totalBytes),
        stats.totalBytes,
        stats.objectCount,
        stats.newest ? formatUtcTimestamp(stats.newest.lastModified) : 'N/A',
        stats.newest?.key ?? 'N/A',
        classes,
      ];
    }),
  );
}
