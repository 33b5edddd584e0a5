import { Change, DailyReport, Item } from '../types/index.js';

export const FIXED_NOW = new Date('2024-03-01T09:00:00.000Z');

export function itemUrl(slug: string): string {
  return `https://books.example.com/catalogue/${slug}/index.html`;
}

export function makeItem(overrides: Partial<Item> = {}): Item {
  return {
    name: 'A Light in the Attic',
    description: 'Poems for all ages',
    category: 'Poetry',
    price_including_tax: 51.77,
    price_excluding_tax: 51.77,
    availability: 'In stock (22 available)',
    number_of_reviews: 0,
    image_url: 'https://books.example.com/media/attic.jpg',
    rating: 3,
    source_url: itemUrl('a-light-in-the-attic_1000'),
    ...overrides,
  };
}

/**
 * `count` distinct valid items, numbered from 1
 */
export function makeCatalog(count: number): Item[] {
  return Array.from({ length: count }, (_, index) =>
    makeItem({
      name: `Book ${index + 1}`,
      source_url: itemUrl(`book-${index + 1}`),
      price_including_tax: 10 + index,
      price_excluding_tax: 10 + index,
    })
  );
}

export function makeChange(overrides: Partial<Change> = {}): Change {
  return {
    change_id: 'change-1',
    detection_id: 'run-1',
    item_id: 'item_0001',
    source_url: itemUrl('book-1'),
    change_type: 'price_change',
    severity: 'high',
    old_value: 51.77,
    new_value: 10,
    field_name: 'price_including_tax',
    human_summary: "Price (incl. tax) changed from '51.77' to '10' (-80.7%)",
    detected_at: FIXED_NOW.toISOString(),
    confidence_score: 1,
    ...overrides,
  };
}

export function makeReport(overrides: Partial<DailyReport> = {}): DailyReport {
  return {
    report_id: 'report_20240301',
    report_date: '2024-03-01',
    generated_at: '2024-03-01T09:05:00.000Z',
    total_items_in_system: 20,
    items_checked: 20,
    changes_detected: 3,
    new_items_added: 1,
    items_updated: 1,
    items_removed: 1,
    changes_by_type: { price_change: 1, new_item: 1, item_removed: 1 },
    changes_by_severity: { medium: 1, high: 2 },
    system_health_score: 0.79,
    detection_duration_seconds: 1.5,
    average_item_processing_time: 0.012,
    detection_runs: 1,
    significant_changes: [makeChange()],
    new_items: [],
    errors_encountered: [],
    ...overrides,
  };
}
