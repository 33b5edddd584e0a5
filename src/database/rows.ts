import { z } from 'zod';
import { CHANGE_TYPES, SEVERITIES } from '../types/index.js';
import { PersistenceError } from '../utils/errors.js';

/**
 * Row shapes as they come back from PostgREST. Rows are parsed rather than
 * trusted so a schema drift surfaces as a PersistenceError at the boundary.
 */

const changeValue = z.union([z.string(), z.number(), z.null()]);

export const snapshotRowSchema = z.object({
  name: z.string(),
  description: z.string(),
  category: z.string(),
  price_including_tax: z.number(),
  price_excluding_tax: z.number(),
  availability: z.string(),
  number_of_reviews: z.number(),
  image_url: z.string(),
  rating: z.number().nullable(),
  source_url: z.string(),
});

export const fingerprintRowSchema = z.object({
  item_id: z.string(),
  source_url: z.string(),
  content_hash: z.string(),
  price_hash: z.string(),
  availability_hash: z.string(),
  metadata_hash: z.string(),
  snapshot: snapshotRowSchema.nullable(),
  removed_at: z.string().nullable(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const changeRowSchema = z.object({
  change_id: z.string(),
  detection_id: z.string(),
  item_id: z.string(),
  source_url: z.string(),
  change_type: z.enum(CHANGE_TYPES),
  severity: z.enum(SEVERITIES),
  old_value: changeValue,
  new_value: changeValue,
  field_name: z.string().nullable(),
  human_summary: z.string(),
  detected_at: z.string(),
  confidence_score: z.number(),
});

const countsByType = z.record(z.enum(CHANGE_TYPES), z.number());
const countsBySeverity = z.record(z.enum(SEVERITIES), z.number());

export const detectionResultRowSchema = z.object({
  detection_id: z.string(),
  run_timestamp: z.string(),
  total_checked: z.number(),
  changes_detected: z.number(),
  new_items: z.number(),
  updated_items: z.number(),
  removed_items: z.number(),
  detection_duration_seconds: z.number(),
  average_item_processing_time: z.number(),
  changes_by_type: countsByType,
  changes_by_severity: countsBySeverity,
  success: z.boolean(),
  errors: z.array(z.string()),
});

export const dailyReportRowSchema = z.object({
  report_id: z.string(),
  report_date: z.string(),
  generated_at: z.string(),
  total_items_in_system: z.number(),
  items_checked: z.number(),
  changes_detected: z.number(),
  new_items_added: z.number(),
  items_updated: z.number(),
  items_removed: z.number(),
  changes_by_type: countsByType,
  changes_by_severity: countsBySeverity,
  system_health_score: z.number(),
  detection_duration_seconds: z.number(),
  average_item_processing_time: z.number(),
  detection_runs: z.number(),
  significant_changes: z.array(changeRowSchema),
  new_items: z.array(z.object({ item_id: z.string(), name: changeValue, detected_at: z.string() })),
  errors_encountered: z.array(z.string()),
});

export function parseRows<T extends z.ZodTypeAny>(schema: T, rows: unknown, operation: string): z.output<T>[] {
  const parsed = z.array(schema).safeParse(rows ?? []);
  if (!parsed.success) {
    throw new PersistenceError(
      operation,
      `unexpected row shape: ${parsed.error.issues
        .slice(0, 3)
        .map(issue => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')}`
    );
  }
  return parsed.data;
}

export function parseRow<T extends z.ZodTypeAny>(schema: T, row: unknown, operation: string): z.output<T> | null {
  if (row === null || row === undefined) {
    return null;
  }
  const [parsed] = parseRows(schema, [row], operation);
  return parsed ?? null;
}
