import { v4 as uuidv4 } from 'uuid';
import { Change, DailyReport, DetectionResult, ReportFormat, RunState, RunTrigger } from '../types/index.js';
import { Stores, fetchAllItems } from '../database/stores.js';
import { StoreGuard } from '../database/store-guard.js';
import { ChangeDetector } from '../detection/change-detector.js';
import { AlertManager, AlertOutcome } from '../alerting/alert-manager.js';
import { ReportGenerator } from '../reports/report-generator.js';
import { ConcurrentRunRejectedError, RunCancelledError } from '../utils/errors.js';
import { errorMessage, logger } from '../utils/logger.js';
import { addBreadcrumb, captureError } from '../utils/sentry.js';

/**
 * Allowed stage transitions. FAILED is reachable from every active stage;
 * DONE and FAILED may start the next run.
 */
export const RUN_TRANSITIONS: Readonly<Record<RunState, readonly RunState[]>> = {
  IDLE: ['LOADING'],
  LOADING: ['DETECTING', 'FAILED'],
  DETECTING: ['PERSISTING', 'FAILED'],
  PERSISTING: ['ALERTING', 'FAILED'],
  ALERTING: ['REPORTING', 'FAILED'],
  REPORTING: ['DONE', 'FAILED'],
  DONE: ['LOADING'],
  FAILED: ['LOADING'],
};

const ACTIVE_STATES: ReadonlySet<RunState> = new Set(['LOADING', 'DETECTING', 'PERSISTING', 'ALERTING', 'REPORTING']);

export interface RunReport {
  runId: string;
  trigger: RunTrigger;
  state: 'DONE' | 'FAILED';
  /** Stage the run was in when it failed */
  failedStage: RunState | null;
  startedAt: string;
  finishedAt: string;
  result: DetectionResult | null;
  alerts: AlertOutcome | null;
  report: DailyReport | null;
  exportPath: string | null;
  error: string | null;
}

export interface StartedRun {
  runId: string;
  /** Resolves when the run reaches DONE or FAILED; never rejects */
  completion: Promise<RunReport>;
}

export interface OrchestratorStatus {
  state: RunState;
  activeRunId: string | null;
  trigger: RunTrigger | null;
  startedAt: string | null;
  lastRun: RunReport | null;
}

export interface DetectionOrchestratorDeps {
  stores: Stores;
  guard: StoreGuard;
  detector: ChangeDetector;
  alerts: AlertManager;
  reports: ReportGenerator;
  settings: {
    /** Page size used when reading the item source */
    itemPageSize: number;
    /** Export format written after each run; null skips the file export */
    exportFormat: ReportFormat | null;
  };
  clock?: () => Date;
}

interface ActiveRun {
  runId: string;
  trigger: RunTrigger;
  startedAt: Date;
  controller: AbortController;
  completion: Promise<RunReport>;
}

/**
 * Drives one detection run at a time:
 * IDLE -> LOADING -> DETECTING -> PERSISTING -> ALERTING -> REPORTING -> DONE,
 * or FAILED from any active stage.
 */
export class DetectionOrchestrator {
  private readonly deps: DetectionOrchestratorDeps;
  private readonly clock: () => Date;
  private currentRunState: RunState = 'IDLE';
  private activeRun: ActiveRun | null = null;
  private lastRunResult: RunReport | null = null;

  constructor(deps: DetectionOrchestratorDeps) {
    this.deps = deps;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Starts a run and returns immediately. Throws ConcurrentRunRejectedError
   * synchronously while another run is active; runs are never queued.
   */
  start(trigger: RunTrigger = 'manual'): StartedRun {
    if (this.activeRun) {
      logger.warn('Detection run rejected, another run is active', {
        activeRunId: this.activeRun.runId,
        trigger,
      });
      throw new ConcurrentRunRejectedError(this.activeRun.runId);
    }

    const runId = uuidv4();
    const startedAt = this.clock();
    const controller = new AbortController();

    this.transition('LOADING', runId);

    const completion = this.execute(runId, trigger, startedAt, controller.signal).then(report => {
      this.lastRunResult = report;
      this.activeRun = null;
      return report;
    });

    this.activeRun = { runId, trigger, startedAt, controller, completion };
    return { runId, completion };
  }

  /** Starts a run and waits for it to finish */
  run(trigger: RunTrigger = 'manual'): Promise<RunReport> {
    return this.start(trigger).completion;
  }

  /**
   * Requests cancellation of the active run; it stops at the next batch boundary.
   * Returns false when nothing is running.
   */
  cancel(reason = 'cancelled by request'): boolean {
    if (!this.activeRun) {
      return false;
    }
    logger.info('Cancelling detection run', { runId: this.activeRun.runId, reason });
    this.activeRun.controller.abort(reason);
    return true;
  }

  /**
   * Cancels any active run and waits for it to settle
   */
  async stop(): Promise<RunReport | null> {
    const active = this.activeRun;
    if (!active) {
      return null;
    }
    this.cancel('orchestrator stopping');
    return active.completion;
  }

  isRunning(): boolean {
    return this.activeRun !== null;
  }

  getState(): RunState {
    return this.currentRunState;
  }

  getLastRunResult(): RunReport | null {
    return this.lastRunResult;
  }

  getStatus(): OrchestratorStatus {
    return {
      state: this.currentRunState,
      activeRunId: this.activeRun?.runId ?? null,
      trigger: this.activeRun?.trigger ?? null,
      startedAt: this.activeRun?.startedAt.toISOString() ?? null,
      lastRun: this.lastRunResult,
    };
  }

  private transition(next: RunState, runId: string): void {
    const current = this.currentRunState;
    if (!RUN_TRANSITIONS[current].includes(next)) {
      throw new Error(`Illegal run state transition ${current} -> ${next}`);
    }
    this.currentRunState = next;
    logger.debug('Run state changed', { runId, from: current, to: next });
    addBreadcrumb({ category: 'detection-run', message: `${current} -> ${next}`, data: { runId } });
  }

  private async execute(runId: string, trigger: RunTrigger, startedAt: Date, signal: AbortSignal): Promise<RunReport> {
    const { stores, guard, detector, alerts, reports, settings } = this.deps;

    let result: DetectionResult | null = null;
    let changes: readonly Change[] = [];
    let resultPersisted = false;
    let alertOutcome: AlertOutcome | null = null;
    let report: DailyReport | null = null;
    let exportPath: string | null = null;

    logger.info('=== Detection run started ===', { runId, trigger });

    try {
      // Let start() return before any work happens
      await Promise.resolve();

      const items = await guard.run('fetch current items', () => fetchAllItems(stores.items, settings.itemPageSize));
      if (signal.aborted) {
        throw new RunCancelledError('Detection run cancelled before detection started');
      }
      logger.info('Items loaded', { runId, items: items.length });

      this.transition('DETECTING', runId);
      const outcome = await detector.detectBatch(items, { detectionId: runId, signal });
      result = outcome.result;
      changes = outcome.changes;
      if (outcome.abortError) {
        throw outcome.abortError;
      }

      this.transition('PERSISTING', runId);
      const finalResult = result;
      await guard.run('persist detection result', () => stores.changes.persistDetectionResult(finalResult));
      resultPersisted = true;

      this.transition('ALERTING', runId);
      alertOutcome = await alerts.process(changes);

      this.transition('REPORTING', runId);
      report = await reports.generate(finalResult, changes, startedAt);
      if (settings.exportFormat) {
        exportPath = await reports.exportReport(report, settings.exportFormat);
      }
      await alerts.sendDailySummary(report);

      this.transition('DONE', runId);

      const finishedAt = this.clock();
      logger.info('=== Detection run completed ===', {
        runId,
        durationSeconds: (finishedAt.getTime() - startedAt.getTime()) / 1000,
        totalChecked: finalResult.total_checked,
        changesDetected: finalResult.changes_detected,
        success: finalResult.success,
        alertsDelivered: alertOutcome.delivered,
        healthScore: report.system_health_score,
      });

      return {
        runId,
        trigger,
        state: 'DONE',
        failedStage: null,
        startedAt: startedAt.toISOString(),
        finishedAt: finishedAt.toISOString(),
        result: finalResult,
        alerts: alertOutcome,
        report,
        exportPath,
        error: null,
      };
    } catch (error) {
      const failedStage = this.currentRunState;
      if (ACTIVE_STATES.has(failedStage)) {
        this.transition('FAILED', runId);
      }

      const message = errorMessage(error);
      logger.error('=== Detection run failed ===', { runId, trigger, stage: failedStage, error: message });
      captureError(error, { runId, trigger, stage: failedStage });

      const partial = this.partialResult(runId, startedAt, result, message);
      if (!resultPersisted) {
        await this.persistPartialResult(partial);
      }

      return {
        runId,
        trigger,
        state: 'FAILED',
        failedStage,
        startedAt: startedAt.toISOString(),
        finishedAt: this.clock().toISOString(),
        result: partial,
        alerts: alertOutcome,
        report,
        exportPath,
        error: message,
      };
    }
  }

  private partialResult(
    runId: string,
    startedAt: Date,
    result: DetectionResult | null,
    message: string
  ): DetectionResult {
    if (result) {
      return {
        ...result,
        success: false,
        errors: result.errors.includes(message) ? [...result.errors] : [...result.errors, message],
      };
    }
    return {
      detection_id: runId,
      run_timestamp: startedAt.toISOString(),
      total_checked: 0,
      changes_detected: 0,
      new_items: 0,
      updated_items: 0,
      removed_items: 0,
      detection_duration_seconds: (this.clock().getTime() - startedAt.getTime()) / 1000,
      average_item_processing_time: 0,
      changes_by_type: {},
      changes_by_severity: {},
      success: false,
      errors: [message],
    };
  }

  /**
   * Best effort: the store may be the reason the run failed
   */
  private async persistPartialResult(result: DetectionResult): Promise<void> {
    try {
      await this.deps.stores.changes.persistDetectionResult(result);
      logger.info('Partial detection result persisted', { runId: result.detection_id });
    } catch (error) {
      logger.error('Failed to persist partial detection result', {
        runId: result.detection_id,
        error: errorMessage(error),
      });
    }
  }
}
