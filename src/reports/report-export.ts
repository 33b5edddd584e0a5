import { mkdir, rename, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { CHANGE_TYPES, DailyReport, ReportFormat, SEVERITIES } from '../types/index.js';
import { logger } from '../utils/logger.js';

type CsvCell = string | number | boolean | null;

/**
 * Quotes a cell when it holds a delimiter, quote or line break
 */
export function csvCell(value: CsvCell): string {
  const text = value === null ? '' : String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

export function csvRow(cells: readonly CsvCell[]): string {
  return cells.map(csvCell).join(',');
}

/**
 * Generate CSV content from headers and rows
 */
export function generateCsv(headers: readonly string[], rows: ReadonlyArray<readonly CsvCell[]>): string {
  return [csvRow(headers), ...rows.map(csvRow)].join('\n');
}

export function compactDate(reportDate: string): string {
  return reportDate.replace(/-/g, '');
}

export function reportFilename(report: Pick<DailyReport, 'report_date'>, format: ReportFormat): string {
  return `daily_report_${compactDate(report.report_date)}.${format}`;
}

/**
 * Structured export: one record per concern
 */
export function renderReportJson(report: DailyReport): string {
  const document = {
    report: {
      report_id: report.report_id,
      report_date: report.report_date,
      generated_at: report.generated_at,
    },
    summary: {
      total_items_in_system: report.total_items_in_system,
      items_checked: report.items_checked,
      changes_detected: report.changes_detected,
      new_items_added: report.new_items_added,
      items_updated: report.items_updated,
      items_removed: report.items_removed,
      detection_runs: report.detection_runs,
      system_health_score: report.system_health_score,
    },
    performance: {
      detection_duration_seconds: report.detection_duration_seconds,
      average_item_processing_time: report.average_item_processing_time,
    },
    changes_by_type: report.changes_by_type,
    changes_by_severity: report.changes_by_severity,
    significant_changes: report.significant_changes,
    new_items: report.new_items,
    errors_encountered: report.errors_encountered,
  };
  return JSON.stringify(document, null, 2);
}

export const REPORT_CSV_HEADERS = [
  'Report ID',
  'Report Date',
  'Generated At',
  'Total Items in System',
  'Items Checked',
  'Changes Detected',
  'New Items Added',
  'Items Updated',
  'Items Removed',
  'Detection Duration (s)',
  'Average Processing Time (s)',
  'System Health Score',
] as const;

/**
 * Flat export: the summary row followed by count sections and significant changes
 */
export function renderReportCsv(report: DailyReport): string {
  const rows: CsvCell[][] = [
    [
      report.report_id,
      report.report_date,
      report.generated_at,
      report.total_items_in_system,
      report.items_checked,
      report.changes_detected,
      report.new_items_added,
      report.items_updated,
      report.items_removed,
      report.detection_duration_seconds,
      report.average_item_processing_time,
      report.system_health_score,
    ],
    [],
    ['Changes by Type'],
  ];

  for (const changeType of CHANGE_TYPES) {
    const count = report.changes_by_type[changeType];
    if (count !== undefined) {
      rows.push([changeType, count]);
    }
  }

  rows.push([], ['Changes by Severity']);
  for (const severity of SEVERITIES) {
    const count = report.changes_by_severity[severity];
    if (count !== undefined) {
      rows.push([severity, count]);
    }
  }

  if (report.significant_changes.length > 0) {
    rows.push([], ['Significant Changes', 'Change Type', 'Severity', 'Summary', 'Detected At']);
    for (const change of report.significant_changes) {
      rows.push(['', change.change_type, change.severity, change.human_summary, change.detected_at]);
    }
  }

  return generateCsv(REPORT_CSV_HEADERS, rows);
}

export function renderReport(report: DailyReport, format: ReportFormat): string {
  return format === 'csv' ? renderReportCsv(report) : renderReportJson(report);
}

/**
 * Writes the export beside a temporary name and renames it into place, so
 * readers never observe a half written file.
 */
export async function writeReportFile(report: DailyReport, format: ReportFormat, dir: string): Promise<string> {
  await mkdir(dir, { recursive: true });

  const target = join(dir, reportFilename(report, format));
  const temporary = `${target}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(temporary, renderReport(report, format), 'utf-8');
    await rename(temporary, target);
  } catch (error) {
    await rm(temporary, { force: true });
    throw error;
  }

  logger.info('Exported report', { path: target, format });
  return target;
}
