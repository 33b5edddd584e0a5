import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { FIXED_NOW, makeCatalog } from '../__fixtures__/items.js';
import { MemoryStores, createMemoryStores } from '../database/memory-store.js';
import { SendGridClient } from '../email/sendgrid-client.js';
import { DetectionService, createDetectionService } from '../service.js';
import { loadConfig } from '../utils/config.js';
import { ConcurrentRunRejectedError, PersistenceError, TransientIOError } from '../utils/errors.js';

vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

describe('DetectionOrchestrator', () => {
  let dir: string;
  let stores: MemoryStores;
  let service: DetectionService;

  function createService(env: Record<string, string> = {}): DetectionService {
    return createDetectionService({
      config: loadConfig({ REPORTS_DIR: dir, ...env }),
      stores,
      email: new SendGridClient({ apiKey: '', fromEmail: '', recipients: [] }, async () => undefined),
      clock: () => FIXED_NOW,
      sleep: async () => {},
    });
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    dir = await mkdtemp(join(tmpdir(), 'orchestrator-'));
    stores = createMemoryStores(makeCatalog(3));
    service = createService();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should take a run through every stage to DONE', async () => {
    const report = await service.orchestrator.run('manual');

    expect(report.state).toBe('DONE');
    expect(report.failedStage).toBeNull();
    expect(report.error).toBeNull();
    expect(report.result?.new_items).toBe(3);
    expect(report.alerts?.delivered).toBe(3);
    expect(report.report?.report_id).toBe('report_20240301');
    expect(report.report?.changes_detected).toBe(3);
    expect(report.exportPath).toBe(join(dir, 'daily_report_20240301.json'));

    expect(stores.changes.allDetectionResults()).toHaveLength(1);
    expect(stores.changes.allChanges()).toHaveLength(3);
    expect(service.orchestrator.getState()).toBe('DONE');
    expect(service.orchestrator.getLastRunResult()).toEqual(report);
    expect(service.orchestrator.isRunning()).toBe(false);
  });

  it('should reject a second run while one is active', async () => {
    const first = service.orchestrator.start('scheduled');

    expect(() => service.orchestrator.start('manual')).toThrow(ConcurrentRunRejectedError);
    expect(service.orchestrator.getStatus()).toMatchObject({
      state: 'LOADING',
      activeRunId: first.runId,
      trigger: 'scheduled',
    });

    await first.completion;
    const second = await service.orchestrator.run('manual');
    expect(second.state).toBe('DONE');
    expect(second.runId).not.toBe(first.runId);
  });

  it('should fail a cancelled run and keep a partial result', async () => {
    const started = service.orchestrator.start('manual');

    expect(service.orchestrator.cancel('test')).toBe(true);
    const report = await started.completion;

    expect(report.state).toBe('FAILED');
    expect(report.failedStage).toBe('LOADING');
    expect(report.error).toBe('Detection run cancelled before detection started');
    expect(service.orchestrator.getState()).toBe('FAILED');

    const [persisted] = stores.changes.allDetectionResults();
    expect(persisted).toMatchObject({
      detection_id: started.runId,
      success: false,
      total_checked: 0,
      errors: ['Detection run cancelled before detection started'],
    });
    expect(stores.fingerprints.size()).toBe(0);
  });

  it('should return false when cancelling with nothing running', () => {
    expect(service.orchestrator.cancel()).toBe(false);
  });

  it('should fail in LOADING when the item source is broken', async () => {
    vi.spyOn(stores.items, 'fetchCurrentItemBatch').mockRejectedValue(
      new PersistenceError('fetch items', 'relation "books" does not exist')
    );

    const report = await service.orchestrator.run('manual');

    expect(report.state).toBe('FAILED');
    expect(report.failedStage).toBe('LOADING');
    expect(report.error).toBe('fetch items: relation "books" does not exist');
    expect(stores.changes.allDetectionResults()).toHaveLength(1);
  });

  it('should fail in DETECTING once the persistence breaker opens', async () => {
    stores = createMemoryStores(makeCatalog(10));
    service = createService({ DETECTION_CONCURRENCY: '1' });
    vi.spyOn(stores.fingerprints, 'getFingerprint').mockRejectedValue(new TransientIOError('connection reset'));

    const report = await service.orchestrator.run('manual');

    expect(report.state).toBe('FAILED');
    expect(report.failedStage).toBe('DETECTING');
    expect(report.error).toMatch(/^Circuit breaker persistence is OPEN/);
    expect(report.result?.total_checked).toBe(10);
    expect(report.result?.success).toBe(false);
    expect(report.report).toBeNull();
    expect(stores.changes.allDetectionResults()).toHaveLength(1);
  });

  it('should report nothing new on an unchanged second run', async () => {
    await service.orchestrator.run('manual');

    const report = await service.orchestrator.run('manual');

    expect(report.result?.changes_detected).toBe(0);
    expect(report.report?.detection_runs).toBe(2);
    expect(report.report?.changes_detected).toBe(3);
  });

  it('should wait for the active run on stop()', async () => {
    const started = service.orchestrator.start('manual');

    const report = await service.orchestrator.stop();

    expect(report?.runId).toBe(started.runId);
    expect(report?.state).toBe('FAILED');
    expect(await service.orchestrator.stop()).toBeNull();
  });
});
