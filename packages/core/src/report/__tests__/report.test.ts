import { describe, it, expect } from 'vitest';

import { classify } from '../../retention/classifier.js';
import { createRetentionConfig } from '../../retention/config.js';
import { summarizeClassifications } from '../../retention/summary.js';
import type { ClassifiedObject } from '../../retention/types.js';
import { escapeCsvCell, renderCsvReport, renderInventoryCsv } from '../csv.js';
import { buildJsonReport } from '../json.js';
import { REPORT_COLUMNS, formatUtcTimestamp, reportFilename, toReportRow } from '../rows.js';

const deleted: ClassifiedObject = {
  record: {
    key: 'exports/2024-01-03.csv',
    sizeBytes: 1536,
    lastModified: new Date('2024-01-03T09:05:07Z'),
  },
  result: {
    action: 'Delete',
    ageDays: 168,
    reason: '168 days old; past the 15-day threshold for STANDARD',
    minimumAgeDays: 15,
    creationWeekday: 3,
  },
};

const skipped: ClassifiedObject = {
  record: {
    key: 'archive/"quoted", name.bin',
    sizeBytes: 3 * 1024 * 1024,
    lastModified: new Date('2024-03-21T00:00:00Z'),
    storageClass: 'GLACIER',
  },
  result: {
    action: 'SkippedEarlyDeletionFee',
    ageDays: 90,
    reason: 'Glacier early deletion fee would apply; needs 1 more day to reach the 91-day minimum',
    minimumAgeDays: 91,
    creationWeekday: 4,
  },
};

describe('toReportRow', () => {
  it('flattens a classified object into report columns', () => {
    expect(toReportRow(deleted)).toEqual({
      Object_Key: 'exports/2024-01-03.csv',
      Last_Modified: '2024-01-03 09:05:07 UTC',
      Size_Bytes: 1536,
      Size_KB: 1.5,
      Size_MB: 0.0015,
      Storage_Class: 'STANDARD',
      Age_Days: 168,
      Creation_Day: 'Wednesday',
      Action: 'DELETE',
      Notes: '',
    });
  });

  it('keeps the reason for objects that are not deleted', () => {
    const row = toReportRow(skipped);
    expect(row.Action).toBe('SKIPPED');
    expect(row.Creation_Day).toBe('Thursday');
    expect(row.Notes).toBe(skipped.result.reason);
  });
});

describe('CSV rendering', () => {
  it('quotes separators and guards against formula injection', () => {
    expect(escapeCsvCell('plain')).toBe('plain');
    expect(escapeCsvCell('a,b')).toBe('"a,b"');
    expect(escapeCsvCell('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvCell('=SUM(A1)')).toBe("'=SUM(A1)");
    expect(escapeCsvCell(-3)).toBe('-3');
    expect(escapeCsvCell(undefined)).toBe('');
  });

  it('renders a header and one line per object', () => {
    const csv = renderCsvReport([toReportRow(deleted), toReportRow(skipped)]);
    const lines = csv.split('\n');

    expect(lines[0]).toBe(REPORT_COLUMNS.join(','));
    expect(lines[1]).toBe(
      'exports/2024-01-03.csv,2024-01-03 09:05:07 UTC,1536,1.5,0.0015,STANDARD,168,Wednesday,DELETE,',
    );
    expect(lines[2]).toBe(
      '"archive/""quoted"", name.bin",2024-03-21 00:00:00 UTC,3145728,3072,3,GLACIER,90,Thursday,SKIPPED,' +
        'Glacier early deletion fee would apply; needs 1 more day to reach the 91-day minimum',
    );
    expect(lines[3]).toBe('');
    expect(lines).toHaveLength(4);
  });

  it('renders the inventory sorted by size with error rows last', () => {
    const csv = renderInventoryCsv([
      { bucket: 'broken', stats: null, error: 'AccessDenied' },
      {
        bucket: 'small',
        stats: {
          objectCount: 1,
          totalBytes: 10,
          oldest: null,
          newest: { key: 'x', sizeBytes: 10, lastModified: new Date('2024-05-01T00:00:00Z'), storageClass: 'STANDARD' },
          latest: [],
          byStorageClass: { STANDARD: { count: 1, bytes: 10 } },
          byAge: { '<30d': 1, '30-89d': 0, '90-179d': 0, '>=180d': 0 },
        },
      },
      {
        bucket: 'big',
        stats: {
          objectCount: 2,
          totalBytes: 2048,
          oldest: null,
          newest: null,
          latest: [],
          byStorageClass: { STANDARD: { count: 1, bytes: 1024 }, GLACIER: { count: 1, bytes: 1024 } },
          byAge: { '<30d': 0, '30-89d': 0, '90-179d': 0, '>=180d': 2 },
        },
      },
    ]);

    expect(csv.split('\n')).toEqual([
      'Bucket Name,Total Size,Total Size (Bytes),Object Count,Last Modified Date,Last Modified File,Storage Classes',
      'big,2.00 KB,2048,2,N/A,N/A,GLACIER=1 STANDARD=1',
      'small,10.00 B,10,1,2024-05-01 00:00:00 UTC,x,STANDARD=1',
      'broken,Error,0,0,Error: AccessDenied,Error,',
      '',
    ]);
  });
});

describe('JSON report', () => {
  it('carries the config, summary and rows', () => {
    const config = createRetentionConfig({
      standardAgeThresholdDays: 15,
      glacierMinAgeDays: 91,
      deepArchiveMinAgeDays: 181,
      protectedWeekdays: [3, 0],
      excludedPrefixes: ['logs/'],
    });
    const items = [deleted, skipped];
    const report = buildJsonReport({
      bucket: 'scratch',
      generatedAt: new Date('2024-06-19T12:00:00Z'),
      dryRun: true,
      config,
      summary: summarizeClassifications(items),
      items,
    });

    expect(report.bucket).toBe('scratch');
    expect(report.generatedAt).toBe('2024-06-19T12:00:00.000Z');
    expect(report.config.protectedWeekdays).toEqual([0, 3]);
    expect(report.summary.byAction.Delete).toEqual({ count: 1, bytes: 1536 });
    expect(report.objects.map((o) => o.Action)).toEqual(['DELETE', 'SKIPPED']);
  });
});

describe('report naming', () => {
  it('stamps the filename in UTC', () => {
    expect(reportFilename('csv', new Date('2024-06-09T03:04:05Z'))).toBe('s3_cleanup_20240609_030405.csv');
    expect(reportFilename('json', new Date('2024-12-31T23:59:59Z'))).toBe('s3_cleanup_20241231_235959.json');
  });

  it('formats timestamps without milliseconds', () => {
    expect(formatUtcTimestamp(new Date('2024-02-29T18:30:00.999Z'))).toBe('2024-02-29 18:30:00 UTC');
  });

  it('marks unparseable timestamps instead of throwing', () => {
    expect(formatUtcTimestamp(new Date('garbage'))).toBe('Invalid date');
  });
});

describe('rows for unparseable timestamps', () => {
  it('still renders a row for an object the classifier accepted', () => {
    const config = createRetentionConfig({
      standardAgeThresholdDays: 15,
      glacierMinAgeDays: 91,
      deepArchiveMinAgeDays: 181,
    });
    const record = { key: 'broken.bin', sizeBytes: 10, lastModified: new Date('garbage') };
    const row = toReportRow({ record, result: classify(record, config, new Date('2024-06-19T12:00:00Z')) });

    expect(row.Last_Modified).toBe('Invalid date');
    expect(row.Creation_Day).toBe('Unknown');
    expect(row.Age_Days).toBe(0);
    expect(row.Action).toBe('RETAINED');
  });
});
