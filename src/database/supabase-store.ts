import { PostgrestError, SupabaseClient } from '@supabase/supabase-js';
import {
  Change,
  ChangeFilters,
  ChangePage,
  DailyReport,
  DetectionResult,
  FingerprintRecord,
  Pagination,
} from '../types/index.js';
import { PersistenceError, TransientIOError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import {
  changeRowSchema,
  dailyReportRowSchema,
  detectionResultRowSchema,
  fingerprintRowSchema,
  parseRow,
  parseRows,
} from './rows.js';
import {
  ChangeStore,
  FingerprintStore,
  ItemSource,
  ListFingerprintIdsOptions,
  ReportStore,
  Stores,
  toChangePage,
} from './stores.js';

// PostgREST caps unranged selects at this many rows
const PAGE_SIZE = 1000;

const ITEM_COLUMNS =
  'name, description, category, price_including_tax, price_excluding_tax, availability, number_of_reviews, image_url, rating, source_url';

/**
 * Maps a PostgREST failure onto the error taxonomy: connection loss, rate
 * limiting and 5xx responses are transient, everything else is not.
 */
export function toStoreError(operation: string, error: PostgrestError, status: number): Error {
  const transient =
    status === 0 ||
    status === 429 ||
    status >= 500 ||
    error.code.startsWith('08') ||
    /fetch failed|ECONNRESET|ETIMEDOUT|ENOTFOUND|network/i.test(error.message);

  logger.error(`Failed to ${operation}`, { error: error.message, code: error.code, status, transient });

  return transient
    ? new TransientIOError(`${operation}: ${error.message}`, { cause: error })
    : new PersistenceError(operation, error.message, { cause: error });
}

async function fetchAllPages<T>(fetchPage: (from: number, to: number) => Promise<T[]>): Promise<T[]> {
  const rows: T[] = [];
  for (let from = 0; ; from += PAGE_SIZE) {
    const page = await fetchPage(from, from + PAGE_SIZE - 1);
    rows.push(...page);
    if (page.length < PAGE_SIZE) {
      return rows;
    }
  }
}

export class SupabaseItemSource implements ItemSource {
  constructor(private readonly client: SupabaseClient) {}

  async fetchCurrentItemBatch(offset: number, limit: number): Promise<unknown[]> {
    const { data, error, status } = await this.client
      .from('books')
      .select(ITEM_COLUMNS)
      .order('source_url')
      .range(offset, offset + limit - 1);

    if (error) {
      throw toStoreError('fetch item batch', error, status);
    }

    return data ?? [];
  }
}

export class SupabaseFingerprintStore implements FingerprintStore {
  constructor(private readonly client: SupabaseClient) {}

  async getFingerprint(itemId: string): Promise<FingerprintRecord | null> {
    const { data, error, status } = await this.client
      .from('fingerprints')
      .select('*')
      .eq('item_id', itemId)
      .maybeSingle();

    if (error) {
      throw toStoreError('fetch fingerprint', error, status);
    }

    return parseRow(fingerprintRowSchema, data, 'fetch fingerprint');
  }

  async upsertFingerprint(record: FingerprintRecord): Promise<void> {
    const { error, status } = await this.client.from('fingerprints').upsert(record, { onConflict: 'item_id' });

    if (error) {
      throw toStoreError('upsert fingerprint', error, status);
    }
  }

  async listAllFingerprintItemIds(options: ListFingerprintIdsOptions = {}): Promise<string[]> {
    const includeRemoved = options.includeRemoved ?? true;

    const rows = await fetchAllPages(async (from, to) => {
      let query = this.client.from('fingerprints').select('item_id').order('item_id').range(from, to);
      if (!includeRemoved) {
        query = query.is('removed_at', null);
      }
      const { data, error, status } = await query;
      if (error) {
        throw toStoreError('list fingerprint ids', error, status);
      }
      return parseRows(fingerprintRowSchema.pick({ item_id: true }), data, 'list fingerprint ids');
    });

    return rows.map(row => row.item_id);
  }

  async markRemoved(itemId: string, removedAt: string): Promise<void> {
    const { error, status } = await this.client
      .from('fingerprints')
      .update({ removed_at: removedAt })
      .eq('item_id', itemId);

    if (error) {
      throw toStoreError('mark fingerprint removed', error, status);
    }
  }

  async countActiveFingerprints(): Promise<number> {
    const { count, error, status } = await this.client
      .from('fingerprints')
      .select('item_id', { count: 'exact', head: true })
      .is('removed_at', null);

    if (error) {
      throw toStoreError('count fingerprints', error, status);
    }

    return count ?? 0;
  }

  async listFingerprints(limit: number, offset: number): Promise<FingerprintRecord[]> {
    const { data, error, status } = await this.client
      .from('fingerprints')
      .select('*')
      .order('updated_at', { ascending: false })
      .range(offset, offset + limit - 1);

    if (error) {
      throw toStoreError('list fingerprints', error, status);
    }

    return parseRows(fingerprintRowSchema, data, 'list fingerprints');
  }

  async purgeRemovedBefore(cutoff: string): Promise<number> {
    const { data, error, status } = await this.client
      .from('fingerprints')
      .delete()
      .lt('removed_at', cutoff)
      .select('item_id');

    if (error) {
      throw toStoreError('purge removed fingerprints', error, status);
    }

    return data?.length ?? 0;
  }
}

export class SupabaseChangeStore implements ChangeStore {
  constructor(private readonly client: SupabaseClient) {}

  async persistChanges(changes: readonly Change[]): Promise<void> {
    if (changes.length === 0) {
      return;
    }

    // Changes are immutable: a retried insert must not rewrite an existing row
    const { error, status } = await this.client
      .from('change_logs')
      .upsert([...changes], { onConflict: 'change_id', ignoreDuplicates: true });

    if (error) {
      throw toStoreError('persist changes', error, status);
    }
  }

  async persistDetectionResult(result: DetectionResult): Promise<void> {
    const { error, status } = await this.client
      .from('detection_results')
      .upsert(result, { onConflict: 'detection_id' });

    if (error) {
      throw toStoreError('persist detection result', error, status);
    }
  }

  async queryChanges(filters: ChangeFilters, pagination: Pagination): Promise<ChangePage> {
    const from = (pagination.page - 1) * pagination.per_page;

    let query = this.client.from('change_logs').select('*', { count: 'exact' });
    if (filters.item_id) query = query.eq('item_id', filters.item_id);
    if (filters.change_type) query = query.eq('change_type', filters.change_type);
    if (filters.severity) query = query.eq('severity', filters.severity);
    if (filters.since) query = query.gte('detected_at', filters.since);
    if (filters.until) query = query.lt('detected_at', filters.until);

    const { data, count, error, status } = await query
      .order('detected_at', { ascending: false })
      .range(from, from + pagination.per_page - 1);

    if (error) {
      throw toStoreError('query changes', error, status);
    }

    return toChangePage(parseRows(changeRowSchema, data, 'query changes'), count ?? 0, pagination);
  }

  async listChangesBetween(start: string, end: string): Promise<Change[]> {
    return fetchAllPages(async (from, to) => {
      const { data, error, status } = await this.client
        .from('change_logs')
        .select('*')
        .gte('detected_at', start)
        .lt('detected_at', end)
        .order('detected_at')
        .range(from, to);

      if (error) {
        throw toStoreError('list changes', error, status);
      }
      return parseRows(changeRowSchema, data, 'list changes');
    });
  }

  async listDetectionResults(start: string, end: string): Promise<DetectionResult[]> {
    const { data, error, status } = await this.client
      .from('detection_results')
      .select('*')
      .gte('run_timestamp', start)
      .lt('run_timestamp', end)
      .order('run_timestamp');

    if (error) {
      throw toStoreError('list detection results', error, status);
    }

    return parseRows(detectionResultRowSchema, data, 'list detection results');
  }

  async getLastDetectionResult(): Promise<DetectionResult | null> {
    const { data, error, status } = await this.client
      .from('detection_results')
      .select('*')
      .order('run_timestamp', { ascending: false })
      .limit(1)
      .maybeSingle();

    if (error) {
      throw toStoreError('fetch last detection result', error, status);
    }

    return parseRow(detectionResultRowSchema, data, 'fetch last detection result');
  }
}

export class SupabaseReportStore implements ReportStore {
  constructor(private readonly client: SupabaseClient) {}

  async persistDailyReport(report: DailyReport): Promise<void> {
    const { error, status } = await this.client
      .from('daily_reports')
      .upsert(report, { onConflict: 'report_date' });

    if (error) {
      throw toStoreError('persist daily report', error, status);
    }
  }

  async getDailyReport(reportDate: string): Promise<DailyReport | null> {
    const { data, error, status } = await this.client
      .from('daily_reports')
      .select('*')
      .eq('report_date', reportDate)
      .maybeSingle();

    if (error) {
      throw toStoreError('fetch daily report', error, status);
    }

    return parseRow(dailyReportRowSchema, data, 'fetch daily report');
  }

  async listDailyReports(sinceDate: string): Promise<DailyReport[]> {
    const { data, error, status } = await this.client
      .from('daily_reports')
      .select('*')
      .gte('report_date', sinceDate)
      .order('report_date', { ascending: false });

    if (error) {
      throw toStoreError('list daily reports', error, status);
    }

    return parseRows(dailyReportRowSchema, data, 'list daily reports');
  }

  async deleteReportsBefore(beforeDate: string): Promise<number> {
    const { data, error, status } = await this.client
      .from('daily_reports')
      .delete()
      .lt('report_date', beforeDate)
      .select('report_id');

    if (error) {
      throw toStoreError('delete old daily reports', error, status);
    }

    return data?.length ?? 0;
  }
}

export function createSupabaseStores(client: SupabaseClient): Stores {
  return {
    items: new SupabaseItemSource(client),
    fingerprints: new SupabaseFingerprintStore(client),
    changes: new SupabaseChangeStore(client),
    reports: new SupabaseReportStore(client),
  };
}
