import * as Sentry from '@sentry/node';
import { logger } from './logger.js';

// Sentry is only enabled when a DSN is provided
const sentryDsn = process.env.SENTRY_DSN || '';
const sentryEnabled = !!sentryDsn;

if (sentryEnabled) {
  Sentry.init({
    dsn: sentryDsn,
    environment: process.env.SENTRY_ENVIRONMENT || process.env.NODE_ENV || 'development',
    tracesSampleRate: 0.2,
    sampleRate: 1.0,
    release: process.env.SENTRY_RELEASE || undefined,
    serverName: process.env.SENTRY_SERVER_NAME || 'catalog-change-detector',
  });

  logger.info('Sentry initialized for error tracking');
}

// Manual error capture helper
export function captureError(error: unknown, context?: Record<string, unknown>): void {
  if (!sentryEnabled) return;

  Sentry.withScope(scope => {
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureException(error);
  });
}

// Capture message helper (for non-error notifications)
export function captureMessage(
  message: string,
  level: 'info' | 'warning' | 'error' = 'info',
  context?: Record<string, unknown>
): void {
  if (!sentryEnabled) return;

  Sentry.withScope(scope => {
    scope.setLevel(level);
    if (context) {
      scope.setExtras(context);
    }
    Sentry.captureMessage(message);
  });
}

// Add breadcrumb for debugging
export function addBreadcrumb(breadcrumb: {
  category?: string;
  message: string;
  level?: 'debug' | 'info' | 'warning' | 'error';
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;
  Sentry.addBreadcrumb(breadcrumb);
}

// ============================================
// Cron Monitoring (Sentry Crons)
// ============================================

export interface CronMonitorConfig {
  /** Unique identifier for this monitor (slug format) */
  monitorSlug: string;
  /** Cron schedule expression (e.g., '0 2 * * *') */
  schedule: string;
  timezone: string;
  /** Maximum expected runtime in minutes */
  maxRuntimeMinutes?: number;
  /** Grace period in minutes before alerting on missed check-in */
  checkinMarginMinutes?: number;
}

/**
 * Wraps a scheduled job with Sentry cron check-ins and error capture.
 * Without a DSN it just runs the job.
 */
export async function withCronMonitoring<T>(config: CronMonitorConfig, jobFn: () => Promise<T>): Promise<T> {
  if (!sentryEnabled) {
    return jobFn();
  }

  const checkInId = Sentry.captureCheckIn(
    { monitorSlug: config.monitorSlug, status: 'in_progress' },
    {
      schedule: { type: 'crontab', value: config.schedule },
      timezone: config.timezone,
      checkinMargin: config.checkinMarginMinutes,
      maxRuntime: config.maxRuntimeMinutes,
    }
  );

  try {
    const result = await jobFn();
    Sentry.captureCheckIn({ checkInId, monitorSlug: config.monitorSlug, status: 'ok' });
    return result;
  } catch (error) {
    Sentry.captureCheckIn({ checkInId, monitorSlug: config.monitorSlug, status: 'error' });
    captureError(error, { monitorSlug: config.monitorSlug });
    throw error;
  }
}
