import {
  Change,
  ChangeFilters,
  ChangePage,
  DailyReport,
  DetectionResult,
  FingerprintRecord,
  Pagination,
} from '../types/index.js';

/**
 * Source of raw crawled records. Pages are re-fetched on every run.
 */
export interface ItemSource {
  /** Returns up to `limit` raw records starting at `offset`; fewer than `limit` means the end */
  fetchCurrentItemBatch(offset: number, limit: number): Promise<unknown[]>;
}

export interface ListFingerprintIdsOptions {
  /** Include fingerprints already marked removed (default true) */
  includeRemoved?: boolean;
}

export interface FingerprintStore {
  getFingerprint(itemId: string): Promise<FingerprintRecord | null>;
  upsertFingerprint(record: FingerprintRecord): Promise<void>;
  listAllFingerprintItemIds(options?: ListFingerprintIdsOptions): Promise<string[]>;
  markRemoved(itemId: string, removedAt: string): Promise<void>;
  /** Number of fingerprints not marked removed */
  countActiveFingerprints(): Promise<number>;
  listFingerprints(limit: number, offset: number): Promise<FingerprintRecord[]>;
  /** Deletes fingerprints marked removed before the cutoff; returns how many went */
  purgeRemovedBefore(cutoff: string): Promise<number>;
}

export interface ChangeStore {
  persistChanges(changes: readonly Change[]): Promise<void>;
  persistDetectionResult(result: DetectionResult): Promise<void>;
  queryChanges(filters: ChangeFilters, pagination: Pagination): Promise<ChangePage>;
  /** Changes with detected_at in [start, end) */
  listChangesBetween(start: string, end: string): Promise<Change[]>;
  /** Detection results with run_timestamp in [start, end) */
  listDetectionResults(start: string, end: string): Promise<DetectionResult[]>;
  getLastDetectionResult(): Promise<DetectionResult | null>;
}

export interface ReportStore {
  /** Overwrites any report stored for the same report_date */
  persistDailyReport(report: DailyReport): Promise<void>;
  getDailyReport(reportDate: string): Promise<DailyReport | null>;
  /** Reports dated on or after `sinceDate`, newest first */
  listDailyReports(sinceDate: string): Promise<DailyReport[]>;
  /** Deletes reports dated strictly before `beforeDate`; returns how many went */
  deleteReportsBefore(beforeDate: string): Promise<number>;
}

export interface Stores {
  items: ItemSource;
  fingerprints: FingerprintStore;
  changes: ChangeStore;
  reports: ReportStore;
}

export const MAX_PER_PAGE = 100;

/**
 * Builds the page envelope shared by every ChangeStore implementation
 */
export function toChangePage(changes: Change[], total: number, pagination: Pagination): ChangePage {
  const totalPages = total === 0 ? 0 : Math.ceil(total / pagination.per_page);
  return {
    changes,
    total,
    page: pagination.page,
    per_page: pagination.per_page,
    total_pages: totalPages,
    has_next: pagination.page < totalPages,
    has_prev: pagination.page > 1,
  };
}

/**
 * Reads every page of an ItemSource
 */
export async function fetchAllItems(source: ItemSource, pageSize: number): Promise<unknown[]> {
  const items: unknown[] = [];
  let offset = 0;

  for (;;) {
    const page = await source.fetchCurrentItemBatch(offset, pageSize);
    items.push(...page);
    if (page.length < pageSize) {
      return items;
    }
    offset += page.length;
  }
}
