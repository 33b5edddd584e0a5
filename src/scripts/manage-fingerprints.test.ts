import { describe, it, expect, vi } from 'vitest';
import { FIXED_NOW, itemUrl, makeCatalog, makeItem } from '../__fixtures__/items.js';
import { createMemoryStores } from '../database/memory-store.js';
import { computeFingerprint } from '../detection/fingerprint.js';
import { FingerprintRecord, Item } from '../types/index.js';
import { collectStats, findFingerprint, purgeRemoved } from './manage-fingerprints.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

function record(item: Item, removedAt: string | null = null): FingerprintRecord {
  return { ...computeFingerprint(item, FIXED_NOW), snapshot: null, removed_at: removedAt };
}

describe('collectStats', () => {
  it('should report coverage, removals and orphans', async () => {
    const catalog = makeCatalog(4);
    const stores = createMemoryStores([...catalog, { name: 'no url' }]);
    await stores.fingerprints.upsertFingerprint(record(catalog[0]));
    await stores.fingerprints.upsertFingerprint(record(catalog[1]));
    await stores.fingerprints.upsertFingerprint(record(catalog[2], '2024-02-01T00:00:00.000Z'));
    await stores.fingerprints.upsertFingerprint(record(makeItem({ source_url: itemUrl('gone') }), '2024-02-01T00:00:00.000Z'));

    expect(await collectStats(stores, 2)).toEqual({
      totalItems: 4,
      activeFingerprints: 2,
      removedFingerprints: 2,
      orphanedFingerprints: 1,
      coveragePercent: 75,
    });
  });

  it('should report zero coverage for an empty source', async () => {
    expect((await collectStats(createMemoryStores())).coveragePercent).toBe(0);
  });
});

describe('findFingerprint', () => {
  it('should find a record by its canonical URL', async () => {
    const stores = createMemoryStores();
    const item = makeItem();
    await stores.fingerprints.upsertFingerprint(record(item));

    const found = await findFingerprint(
      stores,
      'https://WWW.Books.Example.com/catalogue/a-light-in-the-attic_1000/index.html/'
    );

    expect(found?.item_id).toBe(computeFingerprint(item, FIXED_NOW).item_id);
  });
});

describe('purgeRemoved', () => {
  it('should delete only records removed before the retention window', async () => {
    const stores = createMemoryStores();
    const [old, recent, active] = makeCatalog(3);
    await stores.fingerprints.upsertFingerprint(record(old, '2023-11-01T00:00:00.000Z'));
    await stores.fingerprints.upsertFingerprint(record(recent, '2024-02-15T00:00:00.000Z'));
    await stores.fingerprints.upsertFingerprint(record(active));

    expect(await purgeRemoved(stores, 90, FIXED_NOW)).toBe(1);
    expect(stores.fingerprints.size()).toBe(2);
  });
});
