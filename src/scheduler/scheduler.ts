import * as cron from 'node-cron';
import { Config, RunTrigger } from '../types/index.js';
import { ChangeStore, FingerprintStore } from '../database/stores.js';
import { ReportGenerator, CleanupResult } from '../reports/report-generator.js';
import { ConcurrentRunRejectedError, ConfigurationError } from '../utils/errors.js';
import { errorMessage, logger } from '../utils/logger.js';
import { captureMessage, withCronMonitoring } from '../utils/sentry.js';
import { DetectionOrchestrator, RunReport, StartedRun } from './detection-orchestrator.js';

/**
 * Job scheduler for automated detection runs
 *
 * Cron schedule format:
 * ┌────────────── second (optional, 0-59)
 * │ ┌──────────── minute (0-59)
 * │ │ ┌────────── hour (0-23)
 * │ │ │ ┌──────── day of month (1-31)
 * │ │ │ │ ┌────── month (1-12)
 * │ │ │ │ │ ┌──── day of week (0-7, 0 and 7 are Sunday)
 * │ │ │ │ │ │
 * * * * * * *
 */

const DAY_MS = 24 * 60 * 60 * 1000;

interface WallClock {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

function wallClockIn(date: Date, timeZone: string): WallClock {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    hourCycle: 'h23',
    year: 'numeric',
    month: 'numeric',
    day: 'numeric',
    hour: 'numeric',
    minute: 'numeric',
    second: 'numeric',
  }).formatToParts(date);
  const read = (type: Intl.DateTimeFormatPartTypes) => Number(parts.find(part => part.type === type)?.value ?? 0);

  return {
    year: read('year'),
    month: read('month'),
    day: read('day'),
    hour: read('hour'),
    minute: read('minute'),
    second: read('second'),
  };
}

function zoneOffsetMs(date: Date, timeZone: string): number {
  const wall = wallClockIn(date, timeZone);
  const wallAsUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute, wall.second);
  return wallAsUtc - (date.getTime() - date.getUTCMilliseconds());
}

/** Instant at which the clocks in timeZone show the given wall time */
function fromWallClock(year: number, month: number, day: number, hour: number, minute: number, timeZone: string): Date {
  const guess = Date.UTC(year, month - 1, day, hour, minute);
  const firstPass = guess - zoneOffsetMs(new Date(guess), timeZone);
  return new Date(guess - zoneOffsetMs(new Date(firstPass), timeZone));
}

type BaseSchedulerConfig = Config['scheduler'];

export interface SchedulerConfig extends BaseSchedulerConfig {
  /** Cron expression for retention cleanup (default: 4 AM daily) */
  maintenanceSchedule?: string;
  /** Check for missed runs on startup (default: true) */
  checkMissedRuns?: boolean;
  /** Schedule interval in hours for missed run detection (default: 24 = daily) */
  scheduleIntervalHours?: number;
}

export interface JobSchedulerDeps {
  orchestrator: DetectionOrchestrator;
  reports: ReportGenerator;
  fingerprints: FingerprintStore;
  changes: ChangeStore;
  config: SchedulerConfig;
  /** Days a removed fingerprint is kept before the maintenance job purges it */
  removedFingerprintRetentionDays: number;
  clock?: () => Date;
}

export interface MaintenanceResult {
  reports: CleanupResult;
  purgedFingerprints: number;
}

export class JobScheduler {
  private detectionTask: cron.ScheduledTask | null = null;
  private maintenanceTask: cron.ScheduledTask | null = null;
  private readonly deps: JobSchedulerDeps;
  private readonly config: Required<SchedulerConfig>;
  private readonly clock: () => Date;

  constructor(deps: JobSchedulerDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
    this.config = {
      ...deps.config,
      maintenanceSchedule: deps.config.maintenanceSchedule || '0 4 * * *',
      checkMissedRuns: deps.config.checkMissedRuns ?? true,
      scheduleIntervalHours: deps.config.scheduleIntervalHours ?? 24,
    };
  }

  /**
   * Start the scheduler
   */
  async start(): Promise<void> {
    if (!this.config.enabled) {
      logger.info('Scheduler is disabled');
      return;
    }

    if (this.detectionTask) {
      logger.warn('Scheduler is already running');
      return;
    }

    for (const expression of [this.config.schedule, this.config.maintenanceSchedule]) {
      if (!cron.validate(expression)) {
        throw new ConfigurationError([`Invalid cron expression: ${expression}`]);
      }
    }

    logger.info('Starting job scheduler', {
      schedule: this.config.schedule,
      timezone: this.config.timezone,
      runOnStart: this.config.runOnStart,
      checkMissedRuns: this.config.checkMissedRuns,
      intervalHours: this.config.scheduleIntervalHours,
    });

    this.detectionTask = cron.schedule(
      this.config.schedule,
      () => {
        this.runScheduled().catch(error => {
          logger.error('Scheduled detection run crashed', { error: errorMessage(error) });
        });
      },
      { timezone: this.config.timezone }
    );

    this.maintenanceTask = cron.schedule(
      this.config.maintenanceSchedule,
      () => {
        this.runMaintenance().catch(error => {
          logger.error('Maintenance job failed', { error: errorMessage(error) });
        });
      },
      { timezone: this.config.timezone }
    );

    logger.info('Job scheduler started', {
      schedule: this.config.schedule,
      timezone: this.config.timezone,
      nextRun: this.getNextRun()?.toISOString() ?? null,
      maintenanceSchedule: this.config.maintenanceSchedule,
    });

    const missed = this.config.checkMissedRuns && (await this.checkMissedRun());
    if (missed) {
      logger.warn('Missed run detected - running catch-up job now');
      captureMessage('Missed detection run, starting catch-up', 'warning');
      this.launch('missed');
    } else if (this.config.runOnStart) {
      logger.info('Running job immediately on startup');
      this.launch('startup');
    }
  }

  /**
   * True when the last persisted run is older than the schedule interval (or there is none)
   */
  async checkMissedRun(): Promise<boolean> {
    try {
      const last = await this.deps.changes.getLastDetectionResult();
      if (!last) {
        return true;
      }
      const ageMs = this.clock().getTime() - new Date(last.run_timestamp).getTime();
      return ageMs > this.config.scheduleIntervalHours * 60 * 60 * 1000;
    } catch (error) {
      logger.error('Failed to check for missed runs', { error: errorMessage(error) });
      return false;
    }
  }

  /**
   * Starts a run without waiting; a run already in progress wins
   */
  launch(trigger: RunTrigger): string | null {
    try {
      const { runId, completion } = this.deps.orchestrator.start(trigger);
      completion.then(report => this.logCompletion(report)).catch(error => {
        logger.error('Detection run completion handler failed', { error: errorMessage(error) });
      });
      return runId;
    } catch (error) {
      if (error instanceof ConcurrentRunRejectedError) {
        logger.warn('Previous job still running, skipping this execution', {
          trigger,
          activeRunId: error.activeRunId,
        });
        return null;
      }
      throw error;
    }
  }

  private async runScheduled(): Promise<RunReport | null> {
    return withCronMonitoring(
      {
        monitorSlug: 'daily-change-detection',
        schedule: this.config.schedule,
        timezone: this.config.timezone,
        maxRuntimeMinutes: 120,
        checkinMarginMinutes: 10,
      },
      async () => {
        logger.info('Job execution triggered (scheduled)');
        let started: StartedRun;
        try {
          started = this.deps.orchestrator.start('scheduled');
        } catch (error) {
          if (error instanceof ConcurrentRunRejectedError) {
            logger.warn('Previous job still running, skipping this execution', { activeRunId: error.activeRunId });
            return null;
          }
          throw error;
        }

        const report = await started.completion;
        this.logCompletion(report);
        if (report.state === 'FAILED') {
          throw new Error(`Detection run ${report.runId} failed: ${report.error ?? 'unknown error'}`);
        }
        return report;
      }
    );
  }

  /**
   * Retention cleanup: old reports and long-removed fingerprints
   */
  async runMaintenance(): Promise<MaintenanceResult> {
    logger.info('Maintenance job started');

    const reports = await this.deps.reports.cleanupOldReports();
    const cutoff = new Date(this.clock().getTime() - this.deps.removedFingerprintRetentionDays * DAY_MS);
    const purgedFingerprints = await this.deps.fingerprints.purgeRemovedBefore(cutoff.toISOString());

    logger.info('Maintenance job completed', {
      deletedReports: reports.deletedReports,
      deletedFiles: reports.deletedFiles,
      purgedFingerprints,
    });

    return { reports, purgedFingerprints };
  }

  private logCompletion(report: RunReport): void {
    if (report.state === 'DONE') {
      logger.info(`Job completed successfully (${report.trigger})`, { runId: report.runId });
    } else {
      logger.error(`Job failed (${report.trigger})`, { runId: report.runId, error: report.error });
    }
  }

  /**
   * Stop the scheduler and cancel any run in progress
   */
  async stop(): Promise<void> {
    if (this.detectionTask) {
      logger.info('Stopping job scheduler');
      this.detectionTask.stop();
      this.detectionTask = null;
    }
    if (this.maintenanceTask) {
      this.maintenanceTask.stop();
      this.maintenanceTask = null;
    }
    await this.deps.orchestrator.stop();
  }

  /**
   * Next run for plain "minute hour * * *" schedules, in the configured timezone.
   * Returns null for anything more elaborate.
   */
  getNextRun(): Date | null {
    const parts = this.config.schedule.trim().split(/\s+/);
    if (parts.length !== 5) return null;

    const minute = Number(parts[0]);
    const hour = Number(parts[1]);
    if (!Number.isInteger(minute) || !Number.isInteger(hour)) return null;

    const now = this.clock();
    const today = wallClockIn(now, this.config.timezone);
    const next = fromWallClock(today.year, today.month, today.day, hour, minute, this.config.timezone);
    if (next > now) {
      return next;
    }

    // Time has passed today, schedule for tomorrow
    const tomorrow = new Date(Date.UTC(today.year, today.month - 1, today.day + 1));
    return fromWallClock(
      tomorrow.getUTCFullYear(),
      tomorrow.getUTCMonth() + 1,
      tomorrow.getUTCDate(),
      hour,
      minute,
      this.config.timezone
    );
  }

  isSchedulerRunning(): boolean {
    return this.detectionTask !== null;
  }
}
