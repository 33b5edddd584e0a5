import { readdir, rm } from 'fs/promises';
import { join } from 'path';
import {
  Change,
  ChangeCounts,
  ChangeType,
  Config,
  DailyReport,
  DetectionResult,
  HealthScoreWeights,
  NewItemEntry,
  ReportFormat,
  Severity,
} from '../types/index.js';
import { ChangeStore, FingerprintStore, ReportStore } from '../database/stores.js';
import { severityAtLeast } from '../detection/change-policy.js';
import { errorMessage, logger } from '../utils/logger.js';
import { compactDate, writeReportFile } from './report-export.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const SIGNIFICANT_CHANGES_LIMIT = 100;
const REPORT_FILE_PATTERN = /^daily_report_(\d{8})\.(json|csv)$/;

export interface HealthInputs {
  itemsChecked: number;
  errorCount: number;
  changesDetected: number;
  severeChanges: number;
  removedItems: number;
}

export interface ReportAggregationInput {
  reportDate: string;
  generatedAt: string;
  totalItemsInSystem: number;
  results: readonly DetectionResult[];
  changes: readonly Change[];
  weights: HealthScoreWeights;
}

export interface CleanupResult {
  deletedReports: number;
  deletedFiles: number;
  cutoffDate: string;
}

export interface ReportGeneratorDeps {
  reports: ReportStore;
  changes: ChangeStore;
  fingerprints: FingerprintStore;
  settings: Config['reports'];
  clock?: () => Date;
}

/** Calendar day (UTC) of a timestamp, as YYYY-MM-DD */
export function toReportDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function reportIdForDate(reportDate: string): string {
  return `report_${compactDate(reportDate)}`;
}

export function dayBounds(reportDate: string): { start: string; end: string } {
  const start = new Date(`${reportDate}T00:00:00.000Z`);
  return { start: start.toISOString(), end: new Date(start.getTime() + DAY_MS).toISOString() };
}

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function round(value: number, places: number): number {
  const factor = Math.pow(10, places);
  return Math.round(value * factor) / factor;
}

/**
 * 1 - weighted sum of error rate, share of high/critical changes and removal
 * rate; each term and the result clamped to [0, 1], rounded to 2 dp.
 * Returns 0 when nothing was checked.
 */
export function calculateHealthScore(inputs: HealthInputs, weights: HealthScoreWeights): number {
  if (inputs.itemsChecked <= 0) {
    return 0;
  }

  const errorRate = clamp01(inputs.errorCount / inputs.itemsChecked);
  const severeShare = inputs.changesDetected > 0 ? clamp01(inputs.severeChanges / inputs.changesDetected) : 0;
  const removalRate = clamp01(inputs.removedItems / inputs.itemsChecked);

  const penalty =
    weights.errorRate * errorRate + weights.severeChangeRate * severeShare + weights.removalRate * removalRate;

  return round(clamp01(1 - penalty), 2);
}

function increment<K extends string>(counts: ChangeCounts<K>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Pure reduction of a day's detection results and changes into one report.
 * Run counters come from the results; the type and severity breakdowns and
 * the severe share of the health score come from the changes themselves.
 */
export function aggregateReport(input: ReportAggregationInput): DailyReport {
  const changesByType: ChangeCounts<ChangeType> = {};
  const changesBySeverity: ChangeCounts<Severity> = {};
  const errors: string[] = [];

  let itemsChecked = 0;
  let changesDetected = 0;
  let newItems = 0;
  let updatedItems = 0;
  let removedItems = 0;
  let duration = 0;
  let weightedProcessingTime = 0;

  const results = [...input.results].sort((a, b) => a.run_timestamp.localeCompare(b.run_timestamp));

  for (const result of results) {
    itemsChecked += result.total_checked;
    changesDetected += result.changes_detected;
    newItems += result.new_items;
    updatedItems += result.updated_items;
    removedItems += result.removed_items;
    duration += result.detection_duration_seconds;
    weightedProcessingTime += result.average_item_processing_time * result.total_checked;
    errors.push(...result.errors);
  }

  const changes = [...input.changes].sort((a, b) => a.detected_at.localeCompare(b.detected_at));
  for (const change of changes) {
    increment(changesByType, change.change_type);
    increment(changesBySeverity, change.severity);
  }
  const severe = changes.filter(change => severityAtLeast(change.severity, 'high'));
  const newItemEntries: NewItemEntry[] = changes
    .filter(change => change.change_type === 'new_item')
    .map(change => ({ item_id: change.item_id, name: change.new_value, detected_at: change.detected_at }));

  return {
    report_id: reportIdForDate(input.reportDate),
    report_date: input.reportDate,
    generated_at: input.generatedAt,
    total_items_in_system: input.totalItemsInSystem,
    items_checked: itemsChecked,
    changes_detected: changesDetected,
    new_items_added: newItems,
    items_updated: updatedItems,
    items_removed: removedItems,
    changes_by_type: changesByType,
    changes_by_severity: changesBySeverity,
    system_health_score: calculateHealthScore(
      {
        itemsChecked,
        errorCount: errors.length,
        changesDetected: changes.length,
        severeChanges: severe.length,
        removedItems,
      },
      input.weights
    ),
    detection_duration_seconds: round(duration, 3),
    average_item_processing_time: itemsChecked > 0 ? round(weightedProcessingTime / itemsChecked, 6) : 0,
    detection_runs: results.length,
    significant_changes: severe.slice(0, SIGNIFICANT_CHANGES_LIMIT),
    new_items: newItemEntries,
    errors_encountered: errors,
  };
}

function mergeById<T>(stored: readonly T[], fresh: readonly T[], idOf: (value: T) => string): T[] {
  const byId = new Map<string, T>();
  for (const value of [...stored, ...fresh]) {
    byId.set(idOf(value), value);
  }
  return [...byId.values()];
}

/**
 * Builds, stores and exports daily reports. Report writes, exports and
 * retention cleanup share one exclusive section.
 */
export class ReportGenerator {
  private readonly reports: ReportStore;
  private readonly changes: ChangeStore;
  private readonly fingerprints: FingerprintStore;
  private readonly settings: Config['reports'];
  private readonly clock: () => Date;
  private tail: Promise<void> = Promise.resolve();

  constructor(deps: ReportGeneratorDeps) {
    this.reports = deps.reports;
    this.changes = deps.changes;
    this.fingerprints = deps.fingerprints;
    this.settings = deps.settings;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Folds a run into the report for its day. Results and changes already
   * stored for that day are merged by id, so generating twice with the same
   * inputs stores the same report once.
   */
  async generate(
    detectionResult: DetectionResult,
    changes: readonly Change[],
    asOfDate: Date = new Date(detectionResult.run_timestamp)
  ): Promise<DailyReport> {
    const reportDate = toReportDate(asOfDate);
    const { start, end } = dayBounds(reportDate);

    return this.exclusive(async () => {
      const [storedResults, storedChanges, totalItems] = await Promise.all([
        this.changes.listDetectionResults(start, end),
        this.changes.listChangesBetween(start, end),
        this.fingerprints.countActiveFingerprints(),
      ]);

      const report = aggregateReport({
        reportDate,
        generatedAt: this.clock().toISOString(),
        totalItemsInSystem: totalItems,
        results: mergeById(storedResults, [detectionResult], result => result.detection_id),
        changes: mergeById(storedChanges, changes, change => change.change_id),
        weights: this.settings.healthWeights,
      });

      await this.reports.persistDailyReport(report);

      logger.info('Daily report generated', {
        reportId: report.report_id,
        changesDetected: report.changes_detected,
        healthScore: report.system_health_score,
        detectionRuns: report.detection_runs,
      });

      return report;
    });
  }

  /**
   * Rebuilds the report for a day from whatever the stores hold for it
   */
  async generateForDate(date: Date): Promise<DailyReport> {
    const reportDate = toReportDate(date);
    const { start, end } = dayBounds(reportDate);

    return this.exclusive(async () => {
      const [results, changes, totalItems] = await Promise.all([
        this.changes.listDetectionResults(start, end),
        this.changes.listChangesBetween(start, end),
        this.fingerprints.countActiveFingerprints(),
      ]);

      const report = aggregateReport({
        reportDate,
        generatedAt: this.clock().toISOString(),
        totalItemsInSystem: totalItems,
        results,
        changes,
        weights: this.settings.healthWeights,
      });

      await this.reports.persistDailyReport(report);
      logger.info('Daily report rebuilt', { reportId: report.report_id, detectionRuns: results.length });
      return report;
    });
  }

  getReport(reportDate: string): Promise<DailyReport | null> {
    return this.reports.getDailyReport(reportDate);
  }

  async getReportHistory(days = 7): Promise<DailyReport[]> {
    const since = toReportDate(new Date(this.clock().getTime() - days * DAY_MS));
    return this.reports.listDailyReports(since);
  }

  exportReport(report: DailyReport, format: ReportFormat = this.settings.format): Promise<string> {
    return this.exclusive(() => writeReportFile(report, format, this.settings.dir));
  }

  /**
   * Deletes stored reports and exported files dated before the retention horizon
   */
  cleanupOldReports(retentionDays: number = this.settings.retentionDays): Promise<CleanupResult> {
    const cutoffDate = toReportDate(new Date(this.clock().getTime() - retentionDays * DAY_MS));

    return this.exclusive(async () => {
      const deletedReports = await this.reports.deleteReportsBefore(cutoffDate);
      const deletedFiles = await this.deleteExportsBefore(cutoffDate);

      logger.info('Cleaned up old reports', { deletedReports, deletedFiles, retentionDays, cutoffDate });
      return { deletedReports, deletedFiles, cutoffDate };
    });
  }

  private async deleteExportsBefore(cutoffDate: string): Promise<number> {
    let entries: string[];
    try {
      entries = await readdir(this.settings.dir);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return 0;
      }
      throw error;
    }

    const cutoff = compactDate(cutoffDate);
    let deleted = 0;

    for (const entry of entries) {
      const match = REPORT_FILE_PATTERN.exec(entry);
      if (match && match[1] < cutoff) {
        try {
          await rm(join(this.settings.dir, entry), { force: true });
          deleted++;
        } catch (error) {
          logger.warn('Failed to delete report file', { file: entry, error: errorMessage(error) });
        }
      }
    }
    return deleted;
  }

  /**
   * Runs fn after every previously queued section settles
   */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.tail.then(fn);
    this.tail = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }
}
