// Catalog items (produced by the crawler, consumed here)
export interface Item {
  name: string;
  description: string;
  category: string;
  price_including_tax: number;
  price_excluding_tax: number;
  availability: string;
  number_of_reviews: number;
  image_url: string;
  rating: number | null;
  source_url: string;
}

export type TrackedField = keyof Item;

/** Last observed values of every tracked field, kept alongside the fingerprint */
export type ItemSnapshot = Readonly<Item>;

export type FingerprintGroup = 'price' | 'availability' | 'metadata' | 'content';

// Fingerprints
export interface Fingerprint {
  item_id: string;
  source_url: string;
  content_hash: string;
  price_hash: string;
  availability_hash: string;
  metadata_hash: string;
  created_at: string;
  updated_at: string;
}

export interface FingerprintRecord extends Fingerprint {
  snapshot: ItemSnapshot | null;
  removed_at: string | null;
}

// Changes
export const CHANGE_TYPES = [
  'price_change',
  'availability_change',
  'rating_change',
  'description_change',
  'reviews_change',
  'category_change',
  'new_item',
  'item_removed',
] as const;

export type ChangeType = (typeof CHANGE_TYPES)[number];

export const SEVERITIES = ['low', 'medium', 'high', 'critical'] as const;

export type Severity = (typeof SEVERITIES)[number];

export type ChangeValue = string | number | null;

export interface Change {
  change_id: string;
  detection_id: string;
  item_id: string;
  source_url: string;
  change_type: ChangeType;
  severity: Severity;
  old_value: ChangeValue;
  new_value: ChangeValue;
  field_name: string | null;
  human_summary: string;
  detected_at: string;
  confidence_score: number;
}

export type ChangeCounts<K extends string> = Partial<Record<K, number>>;

// Detection runs
export interface DetectionResult {
  detection_id: string;
  run_timestamp: string;
  total_checked: number;
  changes_detected: number;
  new_items: number;
  updated_items: number;
  removed_items: number;
  detection_duration_seconds: number;
  average_item_processing_time: number;
  changes_by_type: ChangeCounts<ChangeType>;
  changes_by_severity: ChangeCounts<Severity>;
  success: boolean;
  errors: string[];
}

export type RunState =
  | 'IDLE'
  | 'LOADING'
  | 'DETECTING'
  | 'PERSISTING'
  | 'ALERTING'
  | 'REPORTING'
  | 'DONE'
  | 'FAILED';

export type RunTrigger = 'scheduled' | 'manual' | 'missed' | 'startup';

// Reports
export interface NewItemEntry {
  item_id: string;
  name: ChangeValue;
  detected_at: string;
}

export interface DailyReport {
  report_id: string;
  report_date: string;
  generated_at: string;
  total_items_in_system: number;
  items_checked: number;
  changes_detected: number;
  new_items_added: number;
  items_updated: number;
  items_removed: number;
  changes_by_type: ChangeCounts<ChangeType>;
  changes_by_severity: ChangeCounts<Severity>;
  system_health_score: number;
  detection_duration_seconds: number;
  average_item_processing_time: number;
  detection_runs: number;
  significant_changes: Change[];
  new_items: NewItemEntry[];
  errors_encountered: string[];
}

export type ReportFormat = 'json' | 'csv';

// Queries
export interface ChangeFilters {
  item_id?: string;
  change_type?: ChangeType;
  severity?: Severity;
  since?: string;
  until?: string;
}

export interface Pagination {
  page: number;
  per_page: number;
}

export interface ChangePage {
  changes: Change[];
  total: number;
  page: number;
  per_page: number;
  total_pages: number;
  has_next: boolean;
  has_prev: boolean;
}

// Configuration
export interface HealthScoreWeights {
  errorRate: number;
  severeChangeRate: number;
  removalRate: number;
}

export interface Config {
  supabase: {
    url: string;
    serviceKey: string;
  };
  sendgrid: {
    apiKey: string;
    fromEmail: string;
    recipients: string[];
  };
  detection: {
    concurrency: number;
    batchSize: number;
    priceChangeThreshold: number;
    retryAttempts: number;
    retryBaseDelayMs: number;
  };
  alerting: {
    enabled: boolean;
    minSeverity: Severity;
    rateLimitWindowMs: number;
    rateLimitQuota: number;
    rateLimitScope: 'severity' | 'global';
    cooldownMs: number;
    emailEnabled: boolean;
    emailMinSeverity: Severity;
  };
  reports: {
    dir: string;
    format: ReportFormat;
    retentionDays: number;
    healthWeights: HealthScoreWeights;
    removedFingerprintRetentionDays: number;
  };
  scheduler: {
    enabled: boolean;
    schedule: string;
    timezone: string;
    runOnStart: boolean;
  };
  app: {
    apiPort: number;
    apiKey: string;
    logLevel: string;
  };
}

// Utility Types
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}
