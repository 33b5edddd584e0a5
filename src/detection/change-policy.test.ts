import { describe, it, expect } from 'vitest';
import { makeItem } from '../__fixtures__/items.js';
import {
  CHANGE_POLICY,
  classifyAvailabilitySeverity,
  classifyPriceSeverity,
  isInStock,
  relativePriceDelta,
  rulesForGroup,
  severityAtLeast,
} from './change-policy.js';

const context = { priceChangeThreshold: 0.1 };

describe('classifyPriceSeverity', () => {
  it('should rate a small price move as medium', () => {
    const before = makeItem({ price_including_tax: 51.77 });
    const after = makeItem({ price_including_tax: 49.99 });

    expect(classifyPriceSeverity(before, after, context)).toBe('medium');
  });

  it('should rate a move beyond the threshold as high', () => {
    const before = makeItem({ price_including_tax: 51.77 });
    const after = makeItem({ price_including_tax: 10.0 });

    expect(classifyPriceSeverity(before, after, context)).toBe('high');
  });

  it('should treat a delta exactly at the threshold as high', () => {
    const before = makeItem({ price_including_tax: 20 });
    const after = makeItem({ price_including_tax: 22 });

    expect(classifyPriceSeverity(before, after, context)).toBe('high');
  });
});

describe('relativePriceDelta', () => {
  it('should fall back to the tax-exclusive price', () => {
    const before = makeItem({ price_excluding_tax: 40 });
    const after = makeItem({ price_excluding_tax: 30 });

    expect(relativePriceDelta(before, after)).toBe(0.25);
  });

  it('should return Infinity when the old price was zero', () => {
    const before = makeItem({ price_including_tax: 0 });
    const after = makeItem({ price_including_tax: 5 });

    expect(relativePriceDelta(before, after)).toBe(Number.POSITIVE_INFINITY);
  });

  it('should return 0 when nothing moved', () => {
    expect(relativePriceDelta(makeItem(), makeItem())).toBe(0);
  });
});

describe('availability', () => {
  it('should recognise in-stock strings', () => {
    expect(isInStock('In stock (22 available)')).toBe(true);
    expect(isInStock(' Available ')).toBe(true);
    expect(isInStock('Out of stock')).toBe(false);
  });

  it('should rate a stock flip as high and a count change as low', () => {
    const inStock = makeItem({ availability: 'In stock (22 available)' });

    expect(classifyAvailabilitySeverity(inStock, makeItem({ availability: 'Out of stock' }))).toBe('high');
    expect(classifyAvailabilitySeverity(inStock, makeItem({ availability: 'In stock (3 available)' }))).toBe('low');
  });
});

describe('CHANGE_POLICY', () => {
  it('should list availability rules in table order', () => {
    expect(rulesForGroup('availability').map(rule => rule.changeType)).toEqual([
      'availability_change',
      'reviews_change',
    ]);
  });

  it('should report the name under the content group', () => {
    const [rule] = rulesForGroup('content');

    expect(rule?.fields).toEqual(['name']);
    expect(rule?.severity).toBe('high');
  });

  it('should never watch source_url', () => {
    expect(CHANGE_POLICY.some(rule => rule.fields.includes('source_url'))).toBe(false);
  });
});

describe('severityAtLeast', () => {
  it('should order severities', () => {
    expect(severityAtLeast('high', 'medium')).toBe(true);
    expect(severityAtLeast('medium', 'medium')).toBe(true);
    expect(severityAtLeast('low', 'medium')).toBe(false);
  });
});
