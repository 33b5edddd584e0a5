/**
 * Change classification policy.
 *
 * Classification is driven by CHANGE_POLICY: each rule maps a set of tracked
 * fields inside a fingerprint group to a change type and a severity rule.
 * Changing thresholds or the field-to-type mapping only touches this table.
 */

import { ChangeType, FingerprintGroup, Item, Severity, TrackedField } from '../types/index.js';

export interface PolicyContext {
  /** Relative price delta at or above which a price change is high severity (0.1 = 10%) */
  priceChangeThreshold: number;
}

export type SeverityRule = Severity | ((previous: Item, current: Item, context: PolicyContext) => Severity);

export interface ChangePolicyRule {
  group: FingerprintGroup;
  changeType: ChangeType;
  /** Fields watched by this rule; the first one is reported as field_name */
  fields: readonly TrackedField[];
  /** Severity when old values are known */
  severity: SeverityRule;
  /** Severity when only the hash mismatch is known */
  hashOnlySeverity: Severity;
}

export const SEVERITY_ORDER: Record<Severity, number> = {
  low: 1,
  medium: 2,
  high: 3,
  critical: 4,
};

export function severityAtLeast(severity: Severity, minimum: Severity): boolean {
  return SEVERITY_ORDER[severity] >= SEVERITY_ORDER[minimum];
}

/**
 * Relative change of the tax-inclusive price, falling back to the
 * tax-exclusive price when the former did not move.
 */
export function relativePriceDelta(previous: Item, current: Item): number {
  const [before, after] =
    previous.price_including_tax !== current.price_including_tax
      ? [previous.price_including_tax, current.price_including_tax]
      : [previous.price_excluding_tax, current.price_excluding_tax];

  if (before === after) {
    return 0;
  }
  if (before === 0) {
    return Number.POSITIVE_INFINITY;
  }
  return Math.abs(after - before) / Math.abs(before);
}

export function classifyPriceSeverity(previous: Item, current: Item, context: PolicyContext): Severity {
  return relativePriceDelta(previous, current) >= context.priceChangeThreshold ? 'high' : 'medium';
}

export function isInStock(availability: string): boolean {
  const normalized = availability.trim().toLowerCase();
  return normalized.startsWith('in stock') || normalized === 'available';
}

export function classifyAvailabilitySeverity(previous: Item, current: Item): Severity {
  return isInStock(previous.availability) !== isInStock(current.availability) ? 'high' : 'low';
}

export const CHANGE_POLICY: readonly ChangePolicyRule[] = [
  {
    group: 'price',
    changeType: 'price_change',
    fields: ['price_including_tax', 'price_excluding_tax'],
    severity: classifyPriceSeverity,
    hashOnlySeverity: 'medium',
  },
  {
    group: 'availability',
    changeType: 'availability_change',
    fields: ['availability'],
    severity: classifyAvailabilitySeverity,
    hashOnlySeverity: 'low',
  },
  {
    group: 'availability',
    changeType: 'reviews_change',
    fields: ['number_of_reviews'],
    severity: 'low',
    hashOnlySeverity: 'low',
  },
  {
    group: 'metadata',
    changeType: 'description_change',
    fields: ['description'],
    severity: 'low',
    hashOnlySeverity: 'low',
  },
  {
    group: 'metadata',
    changeType: 'category_change',
    fields: ['category'],
    severity: 'medium',
    hashOnlySeverity: 'low',
  },
  {
    group: 'metadata',
    changeType: 'rating_change',
    fields: ['rating'],
    severity: 'low',
    hashOnlySeverity: 'low',
  },
  {
    group: 'metadata',
    changeType: 'description_change',
    fields: ['image_url'],
    severity: 'low',
    hashOnlySeverity: 'low',
  },
  {
    group: 'content',
    changeType: 'description_change',
    fields: ['name'],
    severity: 'high',
    hashOnlySeverity: 'high',
  },
];

export function rulesForGroup(group: FingerprintGroup): ChangePolicyRule[] {
  return CHANGE_POLICY.filter(rule => rule.group === group);
}

export function resolveSeverity(
  rule: ChangePolicyRule,
  previous: Item,
  current: Item,
  context: PolicyContext
): Severity {
  return typeof rule.severity === 'function' ? rule.severity(previous, current, context) : rule.severity;
}

/** Severity and type assigned outside the field table */
export const LIFECYCLE_POLICY = {
  new_item: { severity: 'medium' },
  item_removed: { severity: 'high' },
} as const satisfies Record<'new_item' | 'item_removed', { severity: Severity }>;

/** Confidence of a change whose old value could not be recovered */
export const HASH_ONLY_CONFIDENCE = 0.5;
