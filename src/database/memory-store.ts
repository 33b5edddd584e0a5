import {
  Change,
  ChangeFilters,
  ChangePage,
  DailyReport,
  DetectionResult,
  FingerprintRecord,
  Pagination,
} from '../types/index.js';
import {
  ChangeStore,
  FingerprintStore,
  ItemSource,
  ListFingerprintIdsOptions,
  ReportStore,
  Stores,
  toChangePage,
} from './stores.js';

/**
 * In-process stores for tests and dry runs. Records are copied on the way in
 * and out so callers never share mutable state with the store.
 */

export class StaticItemSource implements ItemSource {
  private readonly items: unknown[];

  constructor(items: unknown[] = []) {
    this.items = [...items];
  }

  async fetchCurrentItemBatch(offset: number, limit: number): Promise<unknown[]> {
    return this.items.slice(offset, offset + limit);
  }
}

export class InMemoryFingerprintStore implements FingerprintStore {
  private readonly records = new Map<string, FingerprintRecord>();

  async getFingerprint(itemId: string): Promise<FingerprintRecord | null> {
    const record = this.records.get(itemId);
    return record ? { ...record } : null;
  }

  async upsertFingerprint(record: FingerprintRecord): Promise<void> {
    this.records.set(record.item_id, { ...record });
  }

  async listAllFingerprintItemIds(options: ListFingerprintIdsOptions = {}): Promise<string[]> {
    const includeRemoved = options.includeRemoved ?? true;
    return [...this.records.values()]
      .filter(record => includeRemoved || record.removed_at === null)
      .map(record => record.item_id);
  }

  async markRemoved(itemId: string, removedAt: string): Promise<void> {
    const record = this.records.get(itemId);
    if (record) {
      this.records.set(itemId, { ...record, removed_at: removedAt });
    }
  }

  async countActiveFingerprints(): Promise<number> {
    return [...this.records.values()].filter(record => record.removed_at === null).length;
  }

  async listFingerprints(limit: number, offset: number): Promise<FingerprintRecord[]> {
    return [...this.records.values()]
      .sort((a, b) => b.updated_at.localeCompare(a.updated_at))
      .slice(offset, offset + limit)
      .map(record => ({ ...record }));
  }

  async purgeRemovedBefore(cutoff: string): Promise<number> {
    let purged = 0;
    for (const [itemId, record] of this.records) {
      if (record.removed_at !== null && record.removed_at < cutoff) {
        this.records.delete(itemId);
        purged++;
      }
    }
    return purged;
  }

  size(): number {
    return this.records.size;
  }
}

export function matchesFilters(change: Change, filters: ChangeFilters): boolean {
  if (filters.item_id && change.item_id !== filters.item_id) return false;
  if (filters.change_type && change.change_type !== filters.change_type) return false;
  if (filters.severity && change.severity !== filters.severity) return false;
  if (filters.since && change.detected_at < filters.since) return false;
  if (filters.until && change.detected_at >= filters.until) return false;
  return true;
}

export class InMemoryChangeStore implements ChangeStore {
  private readonly changes: Change[] = [];
  private readonly results: DetectionResult[] = [];

  async persistChanges(changes: readonly Change[]): Promise<void> {
    const known = new Set(this.changes.map(change => change.change_id));
    for (const change of changes) {
      if (!known.has(change.change_id)) {
        known.add(change.change_id);
        this.changes.push({ ...change });
      }
    }
  }

  async persistDetectionResult(result: DetectionResult): Promise<void> {
    this.results.push({ ...result, errors: [...result.errors] });
  }

  async queryChanges(filters: ChangeFilters, pagination: Pagination): Promise<ChangePage> {
    const matching = this.changes
      .filter(change => matchesFilters(change, filters))
      .sort((a, b) => b.detected_at.localeCompare(a.detected_at));
    const start = (pagination.page - 1) * pagination.per_page;
    return toChangePage(matching.slice(start, start + pagination.per_page), matching.length, pagination);
  }

  async listChangesBetween(start: string, end: string): Promise<Change[]> {
    return this.changes.filter(change => change.detected_at >= start && change.detected_at < end);
  }

  async listDetectionResults(start: string, end: string): Promise<DetectionResult[]> {
    return this.results.filter(result => result.run_timestamp >= start && result.run_timestamp < end);
  }

  async getLastDetectionResult(): Promise<DetectionResult | null> {
    if (this.results.length === 0) {
      return null;
    }
    return this.results.reduce((latest, result) =>
      result.run_timestamp > latest.run_timestamp ? result : latest
    );
  }

  allChanges(): Change[] {
    return [...this.changes];
  }

  allDetectionResults(): DetectionResult[] {
    return [...this.results];
  }
}

export class InMemoryReportStore implements ReportStore {
  private readonly reports = new Map<string, DailyReport>();

  async persistDailyReport(report: DailyReport): Promise<void> {
    this.reports.set(report.report_date, { ...report });
  }

  async getDailyReport(reportDate: string): Promise<DailyReport | null> {
    const report = this.reports.get(reportDate);
    return report ? { ...report } : null;
  }

  async listDailyReports(sinceDate: string): Promise<DailyReport[]> {
    return [...this.reports.values()]
      .filter(report => report.report_date >= sinceDate)
      .sort((a, b) => b.report_date.localeCompare(a.report_date));
  }

  async deleteReportsBefore(beforeDate: string): Promise<number> {
    let deleted = 0;
    for (const reportDate of [...this.reports.keys()]) {
      if (reportDate < beforeDate) {
        this.reports.delete(reportDate);
        deleted++;
      }
    }
    return deleted;
  }

  size(): number {
    return this.reports.size;
  }
}

export interface MemoryStores extends Stores {
  items: StaticItemSource;
  fingerprints: InMemoryFingerprintStore;
  changes: InMemoryChangeStore;
  reports: InMemoryReportStore;
}

export function createMemoryStores(items: unknown[] = []): MemoryStores {
  return {
    items: new StaticItemSource(items),
    fingerprints: new InMemoryFingerprintStore(),
    changes: new InMemoryChangeStore(),
    reports: new InMemoryReportStore(),
  };
}
