import { describe, it, expect, vi, beforeEach } from 'vitest';
import { FIXED_NOW, makeChange, makeReport } from '../__fixtures__/items.js';
import { Config } from '../types/index.js';
import { EmailMessage, SendGridClient } from '../email/sendgrid-client.js';
import { AlertManager, formatReportSummary } from './alert-manager.js';
import { AlertChannel } from './channels.js';

// Mock logger to prevent console output during tests
vi.mock('../utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
  errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error)),
}));

function alertSettings(overrides: Partial<Config['alerting']> = {}): Config['alerting'] {
  return {
    enabled: true,
    minSeverity: 'medium',
    rateLimitWindowMs: 60000,
    rateLimitQuota: 10,
    rateLimitScope: 'severity',
    cooldownMs: 0,
    emailEnabled: false,
    emailMinSeverity: 'high',
    ...overrides,
  };
}

const sendgridSettings: Config['sendgrid'] = {
  apiKey: 'test-secret',
  fromEmail: 'alerts@example.com',
  recipients: ['ops@example.com'],
};

function fakeChannel(deliver: AlertChannel['deliver']): AlertChannel {
  return { name: 'fake', minSeverity: 'low', isEnabled: () => true, deliver };
}

describe('AlertManager', () => {
  let sent: EmailMessage[];
  let email: SendGridClient;

  beforeEach(() => {
    vi.clearAllMocks();
    sent = [];
    email = new SendGridClient(sendgridSettings, async message => {
      sent.push(message);
    });
  });

  describe('process()', () => {
    it('should suppress the second alert once the quota is used up', async () => {
      const manager = new AlertManager({ settings: alertSettings({ rateLimitQuota: 1 }) });

      const outcome = await manager.process(
        [makeChange({ change_id: 'c1', item_id: 'item_a' }), makeChange({ change_id: 'c2', item_id: 'item_b' })],
        FIXED_NOW
      );

      expect(outcome.decisions.map(d => [d.change_id, d.channel, d.status])).toEqual([
        ['c1', 'log', 'delivered'],
        ['c2', 'log', 'suppressed_rate_limit'],
      ]);
      expect(outcome.delivered).toBe(1);
      expect(outcome.suppressed).toBe(1);
    });

    it('should count severities in separate buckets by default', async () => {
      const manager = new AlertManager({ settings: alertSettings({ rateLimitQuota: 1 }) });

      const outcome = await manager.process(
        [
          makeChange({ change_id: 'c1', item_id: 'item_a', severity: 'high' }),
          makeChange({ change_id: 'c2', item_id: 'item_b', severity: 'medium' }),
        ],
        FIXED_NOW
      );

      expect(outcome.delivered).toBe(2);
    });

    it('should share one bucket per channel in global scope', async () => {
      const manager = new AlertManager({ settings: alertSettings({ rateLimitQuota: 1, rateLimitScope: 'global' }) });

      const outcome = await manager.process(
        [
          makeChange({ change_id: 'c1', item_id: 'item_a', severity: 'high' }),
          makeChange({ change_id: 'c2', item_id: 'item_b', severity: 'medium' }),
        ],
        FIXED_NOW
      );

      expect(outcome.delivered).toBe(1);
      expect(outcome.suppressed).toBe(1);
    });

    it('should filter changes below the minimum severity', async () => {
      const manager = new AlertManager({ settings: alertSettings() });

      const outcome = await manager.process([makeChange({ severity: 'low' })], FIXED_NOW);

      expect(outcome.decisions).toEqual([
        { change_id: 'change-1', item_id: 'item_0001', severity: 'low', channel: null, status: 'below_threshold' },
      ]);
      expect(outcome.filtered).toBe(1);
    });

    it('should record every change as disabled when alerting is off', async () => {
      const manager = new AlertManager({ settings: alertSettings({ enabled: false }) });

      const outcome = await manager.process([makeChange(), makeChange({ change_id: 'c2' })], FIXED_NOW);

      expect(outcome.decisions.map(d => d.status)).toEqual(['alerting_disabled', 'alerting_disabled']);
      expect(outcome.delivered).toBe(0);
    });

    it('should hold back repeats for the same item and change type', async () => {
      const manager = new AlertManager({ settings: alertSettings({ cooldownMs: 3600000 }) });

      const outcome = await manager.process(
        [
          makeChange({ change_id: 'c1' }),
          makeChange({ change_id: 'c2' }),
          makeChange({ change_id: 'c3', change_type: 'availability_change' }),
        ],
        FIXED_NOW
      );

      expect(outcome.decisions.map(d => d.status)).toEqual(['delivered', 'suppressed_cooldown', 'delivered']);
    });

    it('should not start a cooldown for a change that was only rate limited', async () => {
      const manager = new AlertManager({ settings: alertSettings({ rateLimitQuota: 1, cooldownMs: 3600000 }) });
      const later = new Date(FIXED_NOW.getTime() + 60000);

      await manager.process(
        [makeChange({ change_id: 'c1', item_id: 'item_a' }), makeChange({ change_id: 'c2', item_id: 'item_b' })],
        FIXED_NOW
      );
      const outcome = await manager.process([makeChange({ change_id: 'c3', item_id: 'item_b' })], later);

      expect(outcome.decisions.map(d => d.status)).toEqual(['delivered']);
    });

    it('should record failures without rejecting', async () => {
      const manager = new AlertManager({
        settings: alertSettings(),
        channels: [
          fakeChannel(async () => {
            throw new Error('smtp down');
          }),
        ],
      });

      const outcome = await manager.process([makeChange()], FIXED_NOW);

      expect(outcome.failed).toBe(1);
      expect(outcome.decisions[0]).toMatchObject({ channel: 'fake', status: 'failed', reason: 'smtp down' });
    });

    it('should treat a false delivery result as a failure', async () => {
      const manager = new AlertManager({ settings: alertSettings(), channels: [fakeChannel(async () => false)] });

      const outcome = await manager.process([makeChange()], FIXED_NOW);

      expect(outcome.decisions[0]).toMatchObject({ status: 'failed', reason: 'transport reported failure' });
    });

    it('should email only changes at or above the email threshold', async () => {
      const manager = new AlertManager({ settings: alertSettings({ emailEnabled: true }), email });

      const outcome = await manager.process(
        [makeChange({ change_id: 'c1', severity: 'high' }), makeChange({ change_id: 'c2', item_id: 'item_b', severity: 'medium' })],
        FIXED_NOW
      );

      expect(manager.getChannelNames()).toEqual(['log', 'email']);
      expect(outcome.decisions.map(d => [d.change_id, d.channel, d.status])).toEqual([
        ['c1', 'log', 'delivered'],
        ['c1', 'email', 'delivered'],
        ['c2', 'log', 'delivered'],
      ]);
      expect(sent).toHaveLength(1);
      expect(sent[0]?.subject).toBe('[HIGH] Catalog change: price_change');
      expect(sent[0]?.to).toEqual(['ops@example.com']);
    });
  });

  describe('sendDailySummary()', () => {
    it('should only log when email is off', async () => {
      const manager = new AlertManager({ settings: alertSettings(), email });

      expect(await manager.sendDailySummary(makeReport())).toEqual({ logged: true, emailed: false });
      expect(sent).toHaveLength(0);
    });

    it('should mail the summary with the CSV export attached', async () => {
      const manager = new AlertManager({ settings: alertSettings({ emailEnabled: true }), email });

      const outcome = await manager.sendDailySummary(makeReport());

      expect(outcome).toEqual({ logged: true, emailed: true });
      expect(sent[0]?.subject).toBe('Daily Change Report - 2024-03-01');
      expect(sent[0]?.attachments?.map(a => [a.filename, a.type])).toEqual([['daily_report_20240301.csv', 'text/csv']]);
    });

    it('should report a failed send', async () => {
      const failing = new SendGridClient(sendgridSettings, async () => {
        throw new Error('quota exceeded');
      });
      const manager = new AlertManager({ settings: alertSettings({ emailEnabled: true }), email: failing });

      expect(await manager.sendDailySummary(makeReport())).toEqual({ logged: true, emailed: false });
    });
  });
});

describe('formatReportSummary', () => {
  it('should render the headline numbers and significant changes', () => {
    expect(formatReportSummary(makeReport()).split('\n')).toEqual([
      'Daily change report 2024-03-01',
      'Items in system: 20',
      'Items checked: 20 over 1 run(s)',
      'Changes detected: 3 (new 1, updated 1, removed 1)',
      'System health score: 0.79',
      'By severity: medium=1, high=2',
      '',
      'Significant changes:',
      "- [high] Price (incl. tax) changed from '51.77' to '10' (-80.7%) (https://books.example.com/catalogue/book-1/index.html)",
    ]);
  });
});
