import { Config } from './types/index.js';
import { Stores } from './database/stores.js';
import { StoreGuard } from './database/store-guard.js';
import { ChangeDetector } from './detection/change-detector.js';
import { AlertManager } from './alerting/alert-manager.js';
import { SendGridClient } from './email/sendgrid-client.js';
import { ReportGenerator } from './reports/report-generator.js';
import { DetectionOrchestrator } from './scheduler/detection-orchestrator.js';
import { JobScheduler } from './scheduler/scheduler.js';

export interface DetectionService {
  config: Config;
  stores: Stores;
  guard: StoreGuard;
  detector: ChangeDetector;
  alerts: AlertManager;
  reports: ReportGenerator;
  orchestrator: DetectionOrchestrator;
  scheduler: JobScheduler;
}

export interface CreateServiceOptions {
  config: Config;
  stores: Stores;
  /** Defaults to a SendGrid client built from config.sendgrid */
  email?: SendGridClient;
  clock?: () => Date;
  /** Backoff sleep used by store retries */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Wires the components around one set of stores. Nothing here is a module
 * level singleton; entrypoints build one service each.
 */
export function createDetectionService(options: CreateServiceOptions): DetectionService {
  const { config, stores, clock } = options;

  const guard = new StoreGuard({
    retryAttempts: config.detection.retryAttempts,
    retryBaseDelayMs: config.detection.retryBaseDelayMs,
    sleep: options.sleep,
  });

  const detector = new ChangeDetector({
    fingerprints: stores.fingerprints,
    changes: stores.changes,
    guard,
    settings: {
      concurrency: config.detection.concurrency,
      batchSize: config.detection.batchSize,
      priceChangeThreshold: config.detection.priceChangeThreshold,
    },
    clock,
  });

  const alerts = new AlertManager({
    settings: config.alerting,
    email: options.email ?? new SendGridClient(config.sendgrid),
    clock,
  });

  const reports = new ReportGenerator({
    reports: stores.reports,
    changes: stores.changes,
    fingerprints: stores.fingerprints,
    settings: config.reports,
    clock,
  });

  const orchestrator = new DetectionOrchestrator({
    stores,
    guard,
    detector,
    alerts,
    reports,
    settings: {
      itemPageSize: config.detection.batchSize,
      exportFormat: config.reports.format,
    },
    clock,
  });

  const scheduler = new JobScheduler({
    orchestrator,
    reports,
    fingerprints: stores.fingerprints,
    changes: stores.changes,
    config: config.scheduler,
    removedFingerprintRetentionDays: config.reports.removedFingerprintRetentionDays,
    clock,
  });

  return { config, stores, guard, detector, alerts, reports, orchestrator, scheduler };
}
