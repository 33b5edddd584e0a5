import { z } from 'zod';
import { Item } from '../types/index.js';
import { DataIntegrityError } from '../utils/errors.js';

const requiredText = z.string().trim().min(1);

const price = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite().nonnegative());

const reviewCount = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().int().nonnegative());

const rating = z
  .union([z.number(), z.string().trim(), z.null(), z.undefined()])
  .transform(value => (value === undefined || value === null || value === '' ? null : Number(value)))
  .pipe(z.number().int().min(1).max(5).nullable());

export const itemSchema = z.object({
  name: requiredText,
  description: z.string().default(''),
  category: requiredText,
  price_including_tax: price,
  price_excluding_tax: price,
  availability: requiredText,
  number_of_reviews: reviewCount,
  image_url: z.string().trim().default(''),
  rating,
  source_url: requiredText.url(),
});

/**
 * Best-effort reference for error messages, before the record is known to be valid
 */
export function describeRawItem(raw: unknown): string {
  if (raw !== null && typeof raw === 'object' && 'source_url' in raw && typeof raw.source_url === 'string') {
    return raw.source_url;
  }
  return '<unknown item>';
}

/**
 * Validates and normalizes a raw crawled record into an Item.
 * Throws DataIntegrityError listing every failing field.
 */
export function parseItem(raw: unknown): Item {
  const parsed = itemSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DataIntegrityError(
      describeRawItem(raw),
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'item'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
