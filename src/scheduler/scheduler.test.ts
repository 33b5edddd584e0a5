import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { makeCatalog, makeReport } from '../__fixtures__/items.js';
import { MemoryStores, createMemoryStores } from '../database/memory-store.js';
import { computeFingerprint, extractTrackedFields } from '../detection/fingerprint.js';
import { SendGridClient } from '../email/sendgrid-client.js';
import { DetectionService, createDetectionService } from '../service.js';
import { loadConfig } from '../utils/config.js';
import { ConfigurationError } from '../utils/errors.js';
import { JobScheduler, SchedulerConfig } from './scheduler.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

describe('JobScheduler', () => {
  let dir: string;
  let stores: MemoryStores;
  let now: Date;
  let service: DetectionService;

  function createScheduler(overrides: Partial<SchedulerConfig> = {}) {
    return new JobScheduler({
      orchestrator: service.orchestrator,
      reports: service.reports,
      fingerprints: stores.fingerprints,
      changes: stores.changes,
      config: { ...service.config.scheduler, checkMissedRuns: false, ...overrides },
      removedFingerprintRetentionDays: 90,
      clock: () => now,
    });
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), 'scheduler-'));
    stores = createMemoryStores(makeCatalog(2));
    now = new Date('2024-03-01T09:00:00.000Z');
    service = createDetectionService({
      config: loadConfig({ REPORTS_DIR: dir }),
      stores,
      email: new SendGridClient({ apiKey: '', fromEmail: '', recipients: [] }, async () => undefined),
      clock: () => now,
      sleep: async () => {},
    });
  });

  afterEach(async () => {
    await service.scheduler.stop();
    await rm(dir, { recursive: true, force: true });
  });

  describe('launch()', () => {
    it('should skip a run while another is in progress', async () => {
      const scheduler = createScheduler();

      const runId = scheduler.launch('scheduled');
      expect(runId).not.toBeNull();
      expect(scheduler.launch('manual')).toBeNull();

      const report = await service.orchestrator.stop();
      expect(report?.runId).toBe(runId);
    });
  });

  describe('checkMissedRun()', () => {
    it('should flag a missed run when nothing ran yet', async () => {
      expect(await createScheduler().checkMissedRun()).toBe(true);
    });

    it('should not flag a run inside the interval', async () => {
      await service.orchestrator.run('manual');
      now = new Date('2024-03-02T08:00:00.000Z');

      expect(await createScheduler().checkMissedRun()).toBe(false);
    });

    it('should flag a run older than the interval', async () => {
      await service.orchestrator.run('manual');
      now = new Date('2024-03-02T10:00:00.000Z');

      expect(await createScheduler().checkMissedRun()).toBe(true);
    });
  });

  describe('runMaintenance()', () => {
    it('should purge old reports and long-removed fingerprints', async () => {
      const [recent, old] = makeCatalog(2);
      await stores.fingerprints.upsertFingerprint({
        ...computeFingerprint(recent),
        snapshot: extractTrackedFields(recent),
        removed_at: '2024-02-20T00:00:00.000Z',
      });
      await stores.fingerprints.upsertFingerprint({
        ...computeFingerprint(old),
        snapshot: extractTrackedFields(old),
        removed_at: '2023-10-01T00:00:00.000Z',
      });
      await stores.reports.persistDailyReport(makeReport({ report_date: '2024-01-01' }));

      const result = await createScheduler().runMaintenance();

      expect(result.purgedFingerprints).toBe(1);
      expect(result.reports.deletedReports).toBe(1);
      expect(stores.fingerprints.size()).toBe(1);
    });
  });

  describe('start() and stop()', () => {
    it('should do nothing when disabled', async () => {
      const scheduler = createScheduler({ enabled: false });

      await scheduler.start();

      expect(scheduler.isSchedulerRunning()).toBe(false);
    });

    it('should reject an invalid cron expression', async () => {
      await expect(createScheduler({ schedule: 'every day' }).start()).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should schedule and unschedule the jobs', async () => {
      const scheduler = createScheduler();

      await scheduler.start();
      expect(scheduler.isSchedulerRunning()).toBe(true);
      expect(service.orchestrator.isRunning()).toBe(false);

      await scheduler.stop();
      expect(scheduler.isSchedulerRunning()).toBe(false);
    });

    it('should start a catch-up run when one was missed', async () => {
      const scheduler = createScheduler({ checkMissedRuns: true });

      await scheduler.start();
      await scheduler.stop();

      expect(service.orchestrator.getLastRunResult()?.trigger).toBe('missed');
    });
  });

  describe('getNextRun()', () => {
    it('should return the next occurrence of a daily schedule', () => {
      now = new Date('2024-03-01T01:30:00.000Z');
      expect(createScheduler({ schedule: '0 2 * * *', timezone: 'UTC' }).getNextRun()).toEqual(
        new Date('2024-03-01T02:00:00.000Z')
      );

      now = new Date('2024-03-01T03:00:00.000Z');
      expect(createScheduler({ schedule: '0 2 * * *', timezone: 'UTC' }).getNextRun()).toEqual(
        new Date('2024-03-02T02:00:00.000Z')
      );
    });

    it('should read the schedule in the configured timezone', () => {
      now = new Date('2024-03-01T12:00:00.000Z');
      expect(createScheduler({ schedule: '0 2 * * *', timezone: 'America/New_York' }).getNextRun()).toEqual(
        new Date('2024-03-02T07:00:00.000Z')
      );

      now = new Date('2024-03-01T16:30:00.000Z');
      expect(createScheduler({ schedule: '30 2 * * *', timezone: 'Asia/Tokyo' }).getNextRun()).toEqual(
        new Date('2024-03-01T17:30:00.000Z')
      );
    });

    it('should give up on elaborate schedules', () => {
      expect(createScheduler({ schedule: '*/5 * * * *' }).getNextRun()).toBeNull();
    });
  });
});
