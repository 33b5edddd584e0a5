import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { makeReport } from '../__fixtures__/items.js';
import { csvCell, generateCsv, renderReportCsv, renderReportJson, reportFilename, writeReportFile } from './report-export.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

describe('csvCell', () => {
  it('should leave plain values alone', () => {
    expect(csvCell('price_change')).toBe('price_change');
    expect(csvCell(0.79)).toBe('0.79');
    expect(csvCell(null)).toBe('');
  });

  it('should quote delimiters and double embedded quotes', () => {
    expect(csvCell('a,b')).toBe('"a,b"');
    expect(csvCell('say "hi"')).toBe('"say ""hi"""');
    expect(csvCell('two\nlines')).toBe('"two\nlines"');
  });
});

describe('generateCsv', () => {
  it('should join a header and rows', () => {
    expect(generateCsv(['a', 'b'], [[1, 'x,y']])).toBe('a,b\n1,"x,y"');
  });
});

describe('reportFilename', () => {
  it('should use the compact report date', () => {
    expect(reportFilename(makeReport(), 'json')).toBe('daily_report_20240301.json');
  });
});

describe('renderReportCsv', () => {
  it('should render the summary row followed by the count sections', () => {
    expect(renderReportCsv(makeReport()).split('\n')).toEqual([
      'Report ID,Report Date,Generated At,Total Items in System,Items Checked,Changes Detected,New Items Added,Items Updated,Items Removed,Detection Duration (s),Average Processing Time (s),System Health Score',
      'report_20240301,2024-03-01,2024-03-01T09:05:00.000Z,20,20,3,1,1,1,1.5,0.012,0.79',
      '',
      'Changes by Type',
      'price_change,1',
      'new_item,1',
      'item_removed,1',
      '',
      'Changes by Severity',
      'medium,1',
      'high,2',
      '',
      'Significant Changes,Change Type,Severity,Summary,Detected At',
      ",price_change,high,Price (incl. tax) changed from '51.77' to '10' (-80.7%),2024-03-01T09:00:00.000Z",
    ]);
  });

  it('should omit the significant changes section when there are none', () => {
    const lines = renderReportCsv(makeReport({ significant_changes: [] })).split('\n');

    expect(lines[lines.length - 1]).toBe('high,2');
  });
});

describe('renderReportJson', () => {
  it('should group the report into sections', () => {
    const document = JSON.parse(renderReportJson(makeReport()));

    expect(Object.keys(document)).toEqual([
      'report',
      'summary',
      'performance',
      'changes_by_type',
      'changes_by_severity',
      'significant_changes',
      'new_items',
      'errors_encountered',
    ]);
    expect(document.report).toEqual({
      report_id: 'report_20240301',
      report_date: '2024-03-01',
      generated_at: '2024-03-01T09:05:00.000Z',
    });
    expect(document.summary.system_health_score).toBe(0.79);
    expect(document.performance).toEqual({ detection_duration_seconds: 1.5, average_item_processing_time: 0.012 });
  });
});

describe('writeReportFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'report-export-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the export under its final name only', async () => {
    const target = await writeReportFile(makeReport(), 'csv', join(dir, 'nested'));

    expect(target).toBe(join(dir, 'nested', 'daily_report_20240301.csv'));
    expect(await readdir(join(dir, 'nested'))).toEqual(['daily_report_20240301.csv']);
    expect(await readFile(target, 'utf-8')).toBe(renderReportCsv(makeReport()));
  });

  it('should replace an earlier export for the same day', async () => {
    await writeReportFile(makeReport({ changes_detected: 1 }), 'json', dir);
    const target = await writeReportFile(makeReport({ changes_detected: 7 }), 'json', dir);

    expect(JSON.parse(await readFile(target, 'utf-8')).summary.changes_detected).toBe(7);
  });
});
