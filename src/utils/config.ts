import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { Config, SEVERITIES } from '../types/index.js';
import { ConfigurationError } from './errors.js';

dotenvConfig();

type Env = Record<string, string | undefined>;

export interface LoadConfigOptions {
  /** Entrypoints that talk to Supabase require its credentials */
  requireSupabase?: boolean;
}

function getEnvVar(env: Env, key: string, required = false): string {
  const value = env[key];
  if (required && !value) {
    throw new ConfigurationError([`Missing required environment variable: ${key}`]);
  }
  return value || '';
}

function asNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  // NaN is left for the schema to reject
  return Number(value);
}

function asBoolean(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function asList(value: string | undefined): string[] {
  return (value || '')
    .split(',')
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

const severitySchema = z.enum(SEVERITIES);
const positiveInt = z.number().int().positive();
const weight = z.number().min(0).max(1);

const configSchema = z
  .object({
    supabase: z.object({ url: z.string(), serviceKey: z.string() }),
    sendgrid: z.object({
      apiKey: z.string(),
      fromEmail: z.string(),
      recipients: z.array(z.string().email()),
    }),
    detection: z.object({
      concurrency: positiveInt.max(200),
      batchSize: positiveInt,
      priceChangeThreshold: z.number().positive().max(10),
      retryAttempts: positiveInt.max(10),
      retryBaseDelayMs: z.number().int().min(0),
    }),
    alerting: z.object({
      enabled: z.boolean(),
      minSeverity: severitySchema,
      rateLimitWindowMs: positiveInt,
      rateLimitQuota: positiveInt,
      rateLimitScope: z.enum(['severity', 'global']),
      cooldownMs: z.number().int().min(0),
      emailEnabled: z.boolean(),
      emailMinSeverity: severitySchema,
    }),
    reports: z.object({
      dir: z.string().min(1),
      format: z.enum(['json', 'csv']),
      retentionDays: positiveInt,
      healthWeights: z
        .object({ errorRate: weight, severeChangeRate: weight, removalRate: weight })
        .refine(w => w.errorRate + w.severeChangeRate + w.removalRate > 0, {
          message: 'at least one health weight must be positive',
        }),
      removedFingerprintRetentionDays: positiveInt,
    }),
    scheduler: z.object({
      enabled: z.boolean(),
      schedule: z.string().min(1),
      timezone: z.string().min(1),
      runOnStart: z.boolean(),
    }),
    app: z.object({
      apiPort: positiveInt.max(65535),
      apiKey: z.string(),
      logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']),
    }),
  })
  .superRefine((value, ctx) => {
    if (value.alerting.emailEnabled) {
      if (!value.sendgrid.apiKey || !value.sendgrid.fromEmail || value.sendgrid.recipients.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['sendgrid'],
          message: 'email alerts require SENDGRID_API_KEY, SENDGRID_FROM_EMAIL and SENDGRID_RECIPIENT_EMAILS',
        });
      }
    }
  });

/**
 * Validates a configuration object, raising ConfigurationError with every issue found
 */
export function validateConfig(candidate: Config): Config {
  const parsed = configSchema.safeParse(candidate);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || 'config'}: ${issue.message}`)
    );
  }
  return candidate;
}

export function loadConfig(env: Env = process.env, options: LoadConfigOptions = {}): Config {
  const requireSupabase = options.requireSupabase ?? false;

  const candidate: Config = {
    supabase: {
      url: getEnvVar(env, 'SUPABASE_URL', requireSupabase),
      serviceKey: getEnvVar(env, 'SUPABASE_SERVICE_KEY', requireSupabase),
    },
    sendgrid: {
      apiKey: getEnvVar(env, 'SENDGRID_API_KEY'),
      fromEmail: getEnvVar(env, 'SENDGRID_FROM_EMAIL'),
      recipients: asList(env.SENDGRID_RECIPIENT_EMAILS),
    },
    detection: {
      concurrency: asNumber(env.DETECTION_CONCURRENCY, 10),
      batchSize: asNumber(env.DETECTION_BATCH_SIZE, 100),
      priceChangeThreshold: asNumber(env.PRICE_CHANGE_THRESHOLD, 0.1),
      retryAttempts: asNumber(env.STORE_RETRY_ATTEMPTS, 3),
      retryBaseDelayMs: asNumber(env.STORE_RETRY_BASE_DELAY_MS, 500),
    },
    alerting: {
      enabled: asBoolean(env.ALERTS_ENABLED, true),
      minSeverity: severitySchema.catch('medium').parse(env.ALERT_MIN_SEVERITY || 'medium'),
      rateLimitWindowMs: asNumber(env.ALERT_RATE_LIMIT_WINDOW_MS, 60 * 60 * 1000),
      rateLimitQuota: asNumber(env.ALERT_RATE_LIMIT_QUOTA, 10),
      rateLimitScope: env.ALERT_RATE_LIMIT_SCOPE === 'global' ? 'global' : 'severity',
      cooldownMs: asNumber(env.ALERT_COOLDOWN_MS, 30 * 60 * 1000),
      emailEnabled: asBoolean(env.EMAIL_ALERTS_ENABLED, false),
      emailMinSeverity: severitySchema.catch('high').parse(env.EMAIL_MIN_SEVERITY || 'high'),
    },
    reports: {
      dir: getEnvVar(env, 'REPORTS_DIR') || 'reports',
      format: env.REPORT_FORMAT === 'csv' ? 'csv' : 'json',
      retentionDays: asNumber(env.REPORT_RETENTION_DAYS, 30),
      healthWeights: {
        errorRate: asNumber(env.HEALTH_WEIGHT_ERROR_RATE, 0.5),
        severeChangeRate: asNumber(env.HEALTH_WEIGHT_SEVERE_CHANGE_RATE, 0.3),
        removalRate: asNumber(env.HEALTH_WEIGHT_REMOVAL_RATE, 0.2),
      },
      removedFingerprintRetentionDays: asNumber(env.REMOVED_FINGERPRINT_RETENTION_DAYS, 90),
    },
    scheduler: {
      enabled: asBoolean(env.SCHEDULER_ENABLED, true),
      schedule: getEnvVar(env, 'SCHEDULE_CRON') || '0 2 * * *',
      timezone: getEnvVar(env, 'TIMEZONE') || 'UTC',
      runOnStart: asBoolean(env.RUN_ON_START, false),
    },
    app: {
      apiPort: asNumber(env.API_PORT, 3000),
      apiKey: getEnvVar(env, 'API_KEY'),
      logLevel: (getEnvVar(env, 'LOG_LEVEL') || 'info').toLowerCase(),
    },
  };

  return validateConfig(candidate);
}
