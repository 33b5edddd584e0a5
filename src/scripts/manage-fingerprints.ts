#!/usr/bin/env node

/**
 * Script to inspect and maintain stored fingerprints
 *
 * Usage:
 *   manage-fingerprints list [limit]
 *   manage-fingerprints find <source_url>
 *   manage-fingerprints stats
 *   manage-fingerprints cleanup [retention_days]
 */

import { FingerprintRecord } from '../types/index.js';
import { Stores, fetchAllItems } from '../database/stores.js';
import { getSupabaseClient } from '../database/client.js';
import { createSupabaseStores } from '../database/supabase-store.js';
import { deriveItemId } from '../detection/fingerprint.js';
import { describeRawItem } from '../detection/item-schema.js';
import { loadConfig } from '../utils/config.js';
import { errorMessage, logger } from '../utils/logger.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface FingerprintStats {
  totalItems: number;
  activeFingerprints: number;
  removedFingerprints: number;
  /** Fingerprints with no matching item in the current source */
  orphanedFingerprints: number;
  /** Share of current items that have a fingerprint, 0-100 */
  coveragePercent: number;
}

export async function collectStats(stores: Stores, pageSize = 500): Promise<FingerprintStats> {
  const [items, allIds, activeIds] = await Promise.all([
    fetchAllItems(stores.items, pageSize),
    stores.fingerprints.listAllFingerprintItemIds(),
    stores.fingerprints.listAllFingerprintItemIds({ includeRemoved: false }),
  ]);

  const currentIds = new Set<string>();
  for (const raw of items) {
    const ref = describeRawItem(raw);
    if (URL.canParse(ref)) {
      currentIds.add(deriveItemId(ref));
    }
  }

  const fingerprinted = allIds.filter(itemId => currentIds.has(itemId)).length;

  return {
    totalItems: currentIds.size,
    activeFingerprints: activeIds.length,
    removedFingerprints: allIds.length - activeIds.length,
    orphanedFingerprints: allIds.length - fingerprinted,
    coveragePercent: currentIds.size > 0 ? Math.round((fingerprinted / currentIds.size) * 1000) / 10 : 0,
  };
}

export function findFingerprint(stores: Stores, sourceUrl: string): Promise<FingerprintRecord | null> {
  return stores.fingerprints.getFingerprint(deriveItemId(sourceUrl));
}

export function purgeRemoved(stores: Stores, retentionDays: number, now: Date = new Date()): Promise<number> {
  return stores.fingerprints.purgeRemovedBefore(new Date(now.getTime() - retentionDays * DAY_MS).toISOString());
}

function describeRecord(record: FingerprintRecord): Record<string, unknown> {
  return {
    itemId: record.item_id,
    sourceUrl: record.source_url,
    name: record.snapshot?.name ?? null,
    contentHash: `${record.content_hash.slice(0, 16)}...`,
    updatedAt: record.updated_at,
    removedAt: record.removed_at,
  };
}

async function main(args: string[]): Promise<void> {
  const config = loadConfig(process.env, { requireSupabase: true });
  const stores = createSupabaseStores(getSupabaseClient(config));
  const command = (args[0] || '').toLowerCase();

  switch (command) {
    case 'list': {
      const limit = Number(args[1] || 50);
      const records = await stores.fingerprints.listFingerprints(Number.isInteger(limit) && limit > 0 ? limit : 50, 0);
      logger.info(`=== ${records.length} most recently updated fingerprints ===`);
      for (const record of records) {
        logger.info('Fingerprint', describeRecord(record));
      }
      return;
    }
    case 'find': {
      const sourceUrl = args[1];
      if (!sourceUrl) {
        throw new Error('URL required for find command');
      }
      const record = await findFingerprint(stores, sourceUrl);
      if (!record) {
        logger.warn('No fingerprint found', { sourceUrl, itemId: deriveItemId(sourceUrl) });
        return;
      }
      logger.info('Fingerprint found', {
        ...describeRecord(record),
        priceHash: record.price_hash,
        availabilityHash: record.availability_hash,
        metadataHash: record.metadata_hash,
        snapshot: record.snapshot,
      });
      return;
    }
    case 'stats': {
      const stats = await collectStats(stores, config.detection.batchSize);
      logger.info('=== Fingerprint statistics ===', { ...stats });
      if (stats.orphanedFingerprints > 0) {
        logger.warn(`${stats.orphanedFingerprints} fingerprints have no matching item; run cleanup after they age out`);
      }
      return;
    }
    case 'cleanup': {
      const days = Number(args[1] || config.reports.removedFingerprintRetentionDays);
      if (!Number.isInteger(days) || days < 0) {
        throw new Error(`Invalid retention days: ${args[1]}`);
      }
      const purged = await purgeRemoved(stores, days);
      logger.info('Removed fingerprints purged', { purged, retentionDays: days });
      return;
    }
    default:
      throw new Error(`Unknown command: ${command || '(none)'}. Available commands: list, find, stats, cleanup`);
  }
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  main(process.argv.slice(2)).catch(error => {
    logger.error('Script failed', { error: errorMessage(error) });
    process.exit(1);
  });
}
