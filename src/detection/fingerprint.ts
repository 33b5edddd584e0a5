import { createHash } from 'crypto';
import { Fingerprint, FingerprintGroup, Item, ItemSnapshot, TrackedField } from '../types/index.js';
import { canonicalizeUrl } from '../utils/canonicalize.js';

/** Token substituted for absent optional values so "value -> absent" still moves the hash */
export const ABSENT_TOKEN = '\u0000absent';

const PRICE_SCALE = 2;

type Canonicalizer = (value: Item[TrackedField]) => string;

function canonicalText(value: Item[TrackedField]): string {
  if (value === null || value === undefined) {
    return ABSENT_TOKEN;
  }
  return String(value).normalize('NFC').trim();
}

function canonicalDecimal(scale: number): Canonicalizer {
  return value => {
    if (value === null || value === undefined || value === '') {
      return ABSENT_TOKEN;
    }
    const numeric = typeof value === 'number' ? value : Number(value);
    if (!Number.isFinite(numeric)) {
      return canonicalText(value);
    }
    // -0 and 0 must digest identically
    return (numeric === 0 ? 0 : numeric).toFixed(scale);
  };
}

function canonicalUrlField(value: Item[TrackedField]): string {
  if (value === null || value === undefined || value === '') {
    return ABSENT_TOKEN;
  }
  return canonicalizeUrl(String(value));
}

const CANONICALIZERS: Record<TrackedField, Canonicalizer> = {
  name: canonicalText,
  description: canonicalText,
  category: canonicalText,
  price_including_tax: canonicalDecimal(PRICE_SCALE),
  price_excluding_tax: canonicalDecimal(PRICE_SCALE),
  availability: canonicalText,
  number_of_reviews: canonicalDecimal(0),
  image_url: canonicalUrlField,
  rating: canonicalDecimal(0),
  source_url: canonicalUrlField,
};

export const FINGERPRINT_GROUPS: Record<FingerprintGroup, readonly TrackedField[]> = {
  price: ['price_including_tax', 'price_excluding_tax'],
  availability: ['availability', 'number_of_reviews'],
  metadata: ['description', 'category', 'rating', 'image_url'],
  content: [
    'name',
    'description',
    'category',
    'price_including_tax',
    'price_excluding_tax',
    'availability',
    'number_of_reviews',
    'image_url',
    'rating',
    'source_url',
  ],
};

const GROUP_HASH_KEYS: Record<FingerprintGroup, keyof Fingerprint> = {
  price: 'price_hash',
  availability: 'availability_hash',
  metadata: 'metadata_hash',
  content: 'content_hash',
};

export function canonicalizeField(item: Item, field: TrackedField): string {
  return CANONICALIZERS[field](item[field]);
}

/**
 * Serializes the canonical form of the given fields with sorted keys, so
 * neither field order nor number formatting reaches the digest.
 */
export function canonicalSerialization(item: Item, fields: readonly TrackedField[]): string {
  const sorted = [...fields].sort();
  const entries = sorted.map(field => [field, canonicalizeField(item, field)] as const);
  return JSON.stringify(Object.fromEntries(entries));
}

function sha256(payload: string): string {
  return createHash('sha256').update(payload, 'utf8').digest('hex');
}

export function computeGroupHash(item: Item, group: FingerprintGroup): string {
  return sha256(`${group}:${canonicalSerialization(item, FINGERPRINT_GROUPS[group])}`);
}

/**
 * Stable identity for an item, derived from its canonical source URL
 */
export function deriveItemId(sourceUrl: string): string {
  return `item_${sha256(canonicalizeUrl(sourceUrl)).slice(0, 32)}`;
}

/**
 * Pure function of the item's tracked fields; `now` only stamps the timestamps.
 */
export function computeFingerprint(item: Item, now: Date = new Date()): Fingerprint {
  const timestamp = now.toISOString();
  return {
    item_id: deriveItemId(item.source_url),
    source_url: item.source_url,
    content_hash: computeGroupHash(item, 'content'),
    price_hash: computeGroupHash(item, 'price'),
    availability_hash: computeGroupHash(item, 'availability'),
    metadata_hash: computeGroupHash(item, 'metadata'),
    created_at: timestamp,
    updated_at: timestamp,
  };
}

export function groupHash(fingerprint: Fingerprint, group: FingerprintGroup): string {
  return fingerprint[GROUP_HASH_KEYS[group]];
}

/**
 * Sub-hash groups whose digests differ, in price, availability, metadata order.
 * Returns [] when the content hashes match.
 */
export function diffFingerprints(stored: Fingerprint, fresh: Fingerprint): FingerprintGroup[] {
  if (stored.content_hash === fresh.content_hash) {
    return [];
  }
  const groups: FingerprintGroup[] = ['price', 'availability', 'metadata'];
  return groups.filter(group => groupHash(stored, group) !== groupHash(fresh, group));
}

export function extractTrackedFields(item: Item): ItemSnapshot {
  return Object.freeze({
    name: item.name,
    description: item.description,
    category: item.category,
    price_including_tax: item.price_including_tax,
    price_excluding_tax: item.price_excluding_tax,
    availability: item.availability,
    number_of_reviews: item.number_of_reviews,
    image_url: item.image_url,
    rating: item.rating,
    source_url: item.source_url,
  });
}

export function fieldsEqual(a: Item, b: Item, field: TrackedField): boolean {
  return canonicalizeField(a, field) === canonicalizeField(b, field);
}
