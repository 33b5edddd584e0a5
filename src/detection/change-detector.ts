import { v4 as uuidv4, v5 as uuidv5 } from 'uuid';
import {
  Change,
  ChangeCounts,
  ChangeType,
  ChangeValue,
  DetectionResult,
  Fingerprint,
  FingerprintRecord,
  Item,
  Severity,
  TrackedField,
} from '../types/index.js';
import { ChangeStore, FingerprintStore } from '../database/stores.js';
import { StoreGuard } from '../database/store-guard.js';
import { chunk, mapWithConcurrency } from '../utils/concurrency.js';
import { DetectionError, RunCancelledError, isFatalError } from '../utils/errors.js';
import { errorMessage, logger } from '../utils/logger.js';
import {
  computeFingerprint,
  deriveItemId,
  diffFingerprints,
  extractTrackedFields,
  fieldsEqual,
} from './fingerprint.js';
import {
  ChangePolicyRule,
  HASH_ONLY_CONFIDENCE,
  LIFECYCLE_POLICY,
  PolicyContext,
  relativePriceDelta,
  resolveSeverity,
  rulesForGroup,
} from './change-policy.js';
import { describeRawItem, parseItem } from './item-schema.js';

export interface DetectionContext extends PolicyContext {
  detectionId: string;
  now: Date;
}

export interface ChangeDetectorSettings {
  concurrency: number;
  batchSize: number;
  priceChangeThreshold: number;
}

export interface ChangeDetectorDeps {
  fingerprints: FingerprintStore;
  changes: ChangeStore;
  guard: StoreGuard;
  settings: ChangeDetectorSettings;
  clock?: () => Date;
}

export interface DetectBatchOptions {
  detectionId?: string;
  signal?: AbortSignal;
  /** Overrides the configured worker count for this run */
  concurrency?: number;
  /** Overrides the configured batch size for this run */
  batchSize?: number;
  /** Called after each batch with the number of items processed so far */
  onProgress?: (processed: number, total: number) => void;
}

export interface BatchOutcome {
  changes: readonly Change[];
  result: DetectionResult;
  /** Set when the run stopped early (cancellation or a fatal store failure) */
  abortError: DetectionError | null;
}

interface RemovalOutcome {
  /** Removals whose change was stored, even when marking the fingerprint failed afterwards */
  removals: Change[];
  errors: string[];
  fatal: DetectionError | null;
}

type ItemOutcome =
  | { kind: 'new' | 'updated' | 'unchanged'; itemId: string; changes: Change[]; seconds: number }
  | { kind: 'error'; ref: string; error: unknown; seconds: number }
  | { kind: 'fatal'; ref: string; error: DetectionError; seconds: number };

const FIELD_LABELS: Record<TrackedField, string> = {
  name: 'Name',
  description: 'Description',
  category: 'Category',
  price_including_tax: 'Price (incl. tax)',
  price_excluding_tax: 'Price (excl. tax)',
  availability: 'Availability',
  number_of_reviews: 'Number of reviews',
  image_url: 'Image',
  rating: 'Rating',
  source_url: 'Source URL',
};

function formatValue(value: ChangeValue): string {
  return value === null ? 'none' : String(value);
}

function roundTo(value: number, places: number): number {
  const factor = Math.pow(10, places);
  return Math.round(value * factor) / factor;
}

function summarize(rule: ChangePolicyRule, field: TrackedField, previous: Item, current: Item): string {
  const base = `${FIELD_LABELS[field]} changed from '${formatValue(previous[field])}' to '${formatValue(current[field])}'`;
  if (rule.changeType !== 'price_change') {
    return base;
  }
  const before = previous[field];
  const after = current[field];
  if (typeof before === 'number' && typeof after === 'number' && before !== 0) {
    const percent = ((after - before) / before) * 100;
    return `${base} (${percent > 0 ? '+' : ''}${percent.toFixed(1)}%)`;
  }
  return base;
}

// Namespace for item_removed change ids, derived from the removed fingerprint version
const REMOVAL_ID_NAMESPACE = '3b2f8c1e-6d4a-4f7b-9e05-a1c7d2e94b60';

/**
 * One id per removal of a fingerprint version, so a removal that was stored but
 * not yet marked is written only once when the next run retries it.
 */
export function removalChangeId(record: Pick<Fingerprint, 'item_id' | 'updated_at'>): string {
  return uuidv5(`${record.item_id}:item_removed:${record.updated_at}`, REMOVAL_ID_NAMESPACE);
}

function isFatalDetectionError(error: unknown): error is DetectionError {
  return error instanceof DetectionError && isFatalError(error);
}

function increment<K extends string>(counts: ChangeCounts<K>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

/**
 * Compares observed items against their stored fingerprints and records
 * classified Changes. Classification rules live in change-policy.ts.
 */
export class ChangeDetector {
  private readonly fingerprints: FingerprintStore;
  private readonly changes: ChangeStore;
  private readonly guard: StoreGuard;
  private readonly settings: ChangeDetectorSettings;
  private readonly clock: () => Date;

  constructor(deps: ChangeDetectorDeps) {
    this.fingerprints = deps.fingerprints;
    this.changes = deps.changes;
    this.guard = deps.guard;
    this.settings = deps.settings;
    this.clock = deps.clock ?? (() => new Date());
  }

  createContext(detectionId: string = uuidv4()): DetectionContext {
    return {
      detectionId,
      now: this.clock(),
      priceChangeThreshold: this.settings.priceChangeThreshold,
    };
  }

  /**
   * Changes between an observed item and its stored fingerprint. Pure apart
   * from id generation.
   */
  detect(item: Item, stored: FingerprintRecord | null, context: DetectionContext): Change[] {
    return this.classify(item, computeFingerprint(item, context.now), stored, context);
  }

  /**
   * One item_removed Change for every known record that was not observed in
   * this run and is not already marked removed.
   */
  detectRemovals(
    known: readonly FingerprintRecord[],
    observedIds: ReadonlySet<string>,
    context: DetectionContext
  ): Change[] {
    return known
      .filter(record => record.removed_at === null && !observedIds.has(record.item_id))
      .map(record => {
        const name = record.snapshot?.name ?? null;
        return this.buildChange(
          context,
          record,
          {
            change_type: 'item_removed',
            severity: LIFECYCLE_POLICY.item_removed.severity,
            old_value: name,
            new_value: null,
            field_name: null,
            human_summary: `Item '${name ?? record.source_url}' has been removed from the site`,
            confidence_score: 1,
          },
          removalChangeId(record)
        );
      });
  }

  /**
   * Runs detection over a full set of raw records: bounded worker pool per
   * batch, per-item error capture, cancellation checked between batches,
   * removal detection once every batch was seen.
   */
  async detectBatch(rawItems: readonly unknown[], options: DetectBatchOptions = {}): Promise<BatchOutcome> {
    const context = this.createContext(options.detectionId);
    const startedAt = Date.now();
    const concurrency = options.concurrency ?? this.settings.concurrency;
    const batches = chunk(rawItems, options.batchSize ?? this.settings.batchSize);

    const collected: Change[] = [];
    const errors: string[] = [];
    const observedIds = new Set<string>();
    const changesByType: ChangeCounts<ChangeType> = {};
    const changesBySeverity: ChangeCounts<Severity> = {};
    let processed = 0;
    let newItems = 0;
    let updatedItems = 0;
    let removedItems = 0;
    let processingSeconds = 0;
    let abortError: DetectionError | null = null;

    const record = (changes: readonly Change[]) => {
      for (const change of changes) {
        collected.push(change);
        increment(changesByType, change.change_type);
        increment(changesBySeverity, change.severity);
      }
    };

    logger.info('Change detection started', {
      detectionId: context.detectionId,
      items: rawItems.length,
      batches: batches.length,
      concurrency,
    });

    for (const [batchIndex, batch] of batches.entries()) {
      if (options.signal?.aborted) {
        abortError = new RunCancelledError(`Detection run cancelled after ${batchIndex} of ${batches.length} batches`);
        break;
      }

      // ItemIds are claimed before any worker starts so two records for one item never race
      const work: Array<{ raw: unknown; duplicateOf: string | null }> = batch.map(raw => {
        const ref = describeRawItem(raw);
        if (!URL.canParse(ref)) {
          return { raw, duplicateOf: null };
        }
        const itemId = deriveItemId(ref);
        if (observedIds.has(itemId)) {
          return { raw, duplicateOf: itemId };
        }
        observedIds.add(itemId);
        return { raw, duplicateOf: null };
      });

      const outcomes = await mapWithConcurrency(work, concurrency, async entry => {
        if (entry.duplicateOf !== null) {
          const outcome: ItemOutcome = {
            kind: 'error',
            ref: describeRawItem(entry.raw),
            error: new Error(`duplicate record for ${entry.duplicateOf} in this run`),
            seconds: 0,
          };
          return outcome;
        }
        return this.processItem(entry.raw, context);
      });

      for (const outcome of outcomes) {
        processed++;
        processingSeconds += outcome.seconds;

        switch (outcome.kind) {
          case 'new':
            newItems++;
            record(outcome.changes);
            break;
          case 'updated':
            updatedItems++;
            record(outcome.changes);
            break;
          case 'unchanged':
            break;
          case 'error':
            errors.push(`${outcome.ref}: ${errorMessage(outcome.error)}`);
            break;
          case 'fatal':
            errors.push(`${outcome.ref}: ${outcome.error.message}`);
            abortError = abortError ?? outcome.error;
            break;
        }
      }

      options.onProgress?.(processed, rawItems.length);

      if (abortError) {
        break;
      }
    }

    if (!abortError && options.signal?.aborted) {
      abortError = new RunCancelledError('Detection run cancelled before removal detection');
    }

    if (!abortError) {
      try {
        const outcome = await this.processRemovals(observedIds, context);
        removedItems = outcome.removals.length;
        record(outcome.removals);
        errors.push(...outcome.errors);
        abortError = outcome.fatal;
      } catch (error) {
        if (isFatalDetectionError(error)) {
          abortError = error;
        }
        errors.push(`removal detection: ${errorMessage(error)}`);
      }
    }

    if (abortError) {
      if (!errors.includes(abortError.message)) {
        errors.push(abortError.message);
      }
      logger.warn('Change detection stopped early', {
        detectionId: context.detectionId,
        processed,
        reason: abortError.message,
      });
    }

    const durationSeconds = (Date.now() - startedAt) / 1000;

    const result: DetectionResult = {
      detection_id: context.detectionId,
      run_timestamp: context.now.toISOString(),
      total_checked: processed,
      changes_detected: collected.length,
      new_items: newItems,
      updated_items: updatedItems,
      removed_items: removedItems,
      detection_duration_seconds: roundTo(durationSeconds, 3),
      average_item_processing_time: processed > 0 ? roundTo(processingSeconds / processed, 6) : 0,
      changes_by_type: changesByType,
      changes_by_severity: changesBySeverity,
      success: errors.length === 0 && abortError === null,
      errors,
    };

    logger.info('Change detection finished', {
      detectionId: context.detectionId,
      totalChecked: result.total_checked,
      changesDetected: result.changes_detected,
      newItems,
      updatedItems,
      removedItems,
      errors: errors.length,
    });

    return {
      changes: Object.freeze(collected),
      result: Object.freeze(result),
      abortError,
    };
  }

  /**
   * validate -> fingerprint -> compare -> persist changes -> upsert fingerprint.
   * Never throws: failures come back as error or fatal outcomes.
   */
  private async processItem(raw: unknown, context: DetectionContext): Promise<ItemOutcome> {
    const started = Date.now();
    const ref = describeRawItem(raw);
    const elapsed = () => (Date.now() - started) / 1000;

    try {
      const item = parseItem(raw);
      const fresh = computeFingerprint(item, context.now);
      const stored = await this.guard.run('get fingerprint', () => this.fingerprints.getFingerprint(fresh.item_id));
      const changes = this.classify(item, fresh, stored, context);

      if (changes.length > 0) {
        await this.guard.run('persist changes', () => this.changes.persistChanges(changes));
      }

      const needsUpsert =
        stored === null ||
        changes.length > 0 ||
        stored.content_hash !== fresh.content_hash ||
        stored.removed_at !== null ||
        stored.snapshot === null;

      if (needsUpsert) {
        const next: FingerprintRecord = {
          ...fresh,
          created_at: stored?.created_at ?? fresh.created_at,
          snapshot: extractTrackedFields(item),
          removed_at: null,
        };
        await this.guard.run('upsert fingerprint', () => this.fingerprints.upsertFingerprint(next));
      }

      if (stored === null) {
        return { kind: 'new', itemId: fresh.item_id, changes, seconds: elapsed() };
      }
      return { kind: changes.length > 0 ? 'updated' : 'unchanged', itemId: fresh.item_id, changes, seconds: elapsed() };
    } catch (error) {
      if (isFatalDetectionError(error)) {
        return { kind: 'fatal', ref, error, seconds: elapsed() };
      }
      logger.warn('Item skipped', { item: ref, error: errorMessage(error) });
      return { kind: 'error', ref, error, seconds: elapsed() };
    }
  }

  /**
   * Each removal is stored then marked on its own; a failure is captured for
   * that item and the rest continue, unless the store became unavailable.
   */
  private async processRemovals(observedIds: ReadonlySet<string>, context: DetectionContext): Promise<RemovalOutcome> {
    const outcome: RemovalOutcome = { removals: [], errors: [], fatal: null };
    const activeIds = await this.guard.run('list fingerprint ids', () =>
      this.fingerprints.listAllFingerprintItemIds({ includeRemoved: false })
    );
    const missingIds = activeIds.filter(itemId => !observedIds.has(itemId));
    if (missingIds.length === 0) {
      return outcome;
    }

    const records = await mapWithConcurrency(missingIds, this.settings.concurrency, itemId =>
      this.guard.run('get fingerprint', () => this.fingerprints.getFingerprint(itemId))
    );
    const known = records.filter((record): record is FingerprintRecord => record !== null);
    const removals = this.detectRemovals(known, observedIds, context);

    const removedAt = context.now.toISOString();
    for (const change of removals) {
      try {
        await this.guard.run('persist changes', () => this.changes.persistChanges([change]));
        outcome.removals.push(change);
        await this.guard.run('mark fingerprint removed', () => this.fingerprints.markRemoved(change.item_id, removedAt));
      } catch (error) {
        logger.warn('Removal not recorded', { item: change.source_url, error: errorMessage(error) });
        outcome.errors.push(`${change.source_url}: ${errorMessage(error)}`);
        if (isFatalDetectionError(error)) {
          outcome.fatal = error;
          break;
        }
      }
    }

    if (outcome.removals.length > 0) {
      logger.info('Removed items detected', { detectionId: context.detectionId, count: outcome.removals.length });
    }
    return outcome;
  }

  private classify(
    item: Item,
    fresh: Fingerprint,
    stored: FingerprintRecord | null,
    context: DetectionContext
  ): Change[] {
    if (stored === null) {
      return [
        this.buildChange(context, fresh, {
          change_type: 'new_item',
          severity: LIFECYCLE_POLICY.new_item.severity,
          old_value: null,
          new_value: item.name,
          field_name: null,
          human_summary: `New item discovered: ${item.name}`,
          confidence_score: 1,
        }),
      ];
    }

    if (stored.content_hash === fresh.content_hash) {
      return [];
    }

    const groups = [...diffFingerprints(stored, fresh), 'content' as const];
    const changes: Change[] = [];

    for (const group of groups) {
      const rules = rulesForGroup(group);
      const emitted = stored.snapshot
        ? rules.flatMap(rule => this.fieldChanges(rule, stored.snapshot ?? item, item, fresh, context))
        : [];

      // content is always inspected for a name change; other groups get here only on a real hash diff
      if (emitted.length === 0 && (group !== 'content' || changes.length === 0)) {
        const [rule] = rules;
        if (rule) {
          changes.push(this.hashOnlyChange(rule, item, fresh, context));
        }
        continue;
      }
      changes.push(...emitted);
    }

    return changes;
  }

  private fieldChanges(
    rule: ChangePolicyRule,
    previous: Item,
    current: Item,
    fresh: Fingerprint,
    context: DetectionContext
  ): Change[] {
    const changedField = rule.fields.find(field => !fieldsEqual(previous, current, field));
    if (!changedField) {
      return [];
    }

    const severity = resolveSeverity(rule, previous, current, context);
    const change = this.buildChange(context, fresh, {
      change_type: rule.changeType,
      severity,
      old_value: previous[changedField],
      new_value: current[changedField],
      field_name: changedField,
      human_summary: summarize(rule, changedField, previous, current),
      confidence_score: 1,
    });

    if (rule.changeType === 'price_change') {
      logger.debug('Price change classified', {
        itemId: fresh.item_id,
        delta: relativePriceDelta(previous, current),
        severity,
      });
    }
    return [change];
  }

  private hashOnlyChange(rule: ChangePolicyRule, item: Item, fresh: Fingerprint, context: DetectionContext): Change {
    const [field] = rule.fields;
    return this.buildChange(context, fresh, {
      change_type: rule.changeType,
      severity: rule.hashOnlySeverity,
      old_value: null,
      new_value: field ? item[field] : null,
      field_name: field ?? null,
      human_summary: `${field ? FIELD_LABELS[field] : 'Content'} changed (previous value unavailable)`,
      confidence_score: HASH_ONLY_CONFIDENCE,
    });
  }

  private buildChange(
    context: DetectionContext,
    target: Pick<Fingerprint, 'item_id' | 'source_url'>,
    details: Omit<Change, 'change_id' | 'detection_id' | 'item_id' | 'source_url' | 'detected_at'>,
    changeId: string = uuidv4()
  ): Change {
    return Object.freeze({
      change_id: changeId,
      detection_id: context.detectionId,
      item_id: target.item_id,
      source_url: target.source_url,
      detected_at: context.now.toISOString(),
      ...details,
    });
  }
}
