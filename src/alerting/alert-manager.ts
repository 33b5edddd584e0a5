import { Change, Config, DailyReport, Severity } from '../types/index.js';
import { SendGridClient, csvAttachment } from '../email/sendgrid-client.js';
import { severityAtLeast } from '../detection/change-policy.js';
import { renderReportCsv, reportFilename } from '../reports/report-export.js';
import { errorMessage, logger } from '../utils/logger.js';
import { AlertChannel, EmailAlertChannel, LogAlertChannel, formatAlertSummary } from './channels.js';
import { CooldownTracker, FixedWindowRateLimiter } from './rate-limiter.js';

export type AlertStatus =
  | 'delivered'
  | 'failed'
  | 'suppressed_rate_limit'
  | 'suppressed_cooldown'
  | 'below_threshold'
  | 'alerting_disabled';

export interface AlertDecision {
  change_id: string;
  item_id: string;
  severity: Severity;
  /** null for decisions taken before any channel was considered */
  channel: string | null;
  status: AlertStatus;
  reason?: string;
}

export interface AlertOutcome {
  decisions: AlertDecision[];
  delivered: number;
  suppressed: number;
  failed: number;
  filtered: number;
}

export interface AlertManagerDeps {
  settings: Config['alerting'];
  /** Enables the email channel when alerting.emailEnabled is set */
  email?: SendGridClient;
  /** Replaces the default log (+ email) channels */
  channels?: AlertChannel[];
  clock?: () => Date;
}

export interface DailySummaryOutcome {
  logged: boolean;
  emailed: boolean;
}

export function formatReportSummary(report: DailyReport): string {
  const lines = [
    `Daily change report ${report.report_date}`,
    `Items in system: ${report.total_items_in_system}`,
    `Items checked: ${report.items_checked} over ${report.detection_runs} run(s)`,
    `Changes detected: ${report.changes_detected} (new ${report.new_items_added}, updated ${report.items_updated}, removed ${report.items_removed})`,
    `System health score: ${report.system_health_score.toFixed(2)}`,
  ];

  const severities = Object.entries(report.changes_by_severity)
    .map(([severity, count]) => `${severity}=${count}`)
    .join(', ');
  if (severities) {
    lines.push(`By severity: ${severities}`);
  }

  if (report.significant_changes.length > 0) {
    lines.push('', 'Significant changes:');
    for (const change of report.significant_changes.slice(0, 20)) {
      lines.push(`- [${change.severity}] ${change.human_summary} (${change.source_url})`);
    }
  }

  if (report.errors_encountered.length > 0) {
    lines.push('', `Errors: ${report.errors_encountered.length}`);
  }

  return lines.join('\n');
}

/**
 * Filters changes by severity, applies per (item, change type) cooldown and
 * per-channel fixed-window limits, then dispatches. Delivery problems end up
 * as decisions in the outcome; process() never rejects because of them.
 */
export class AlertManager {
  private readonly settings: Config['alerting'];
  private readonly channels: AlertChannel[];
  private readonly email: SendGridClient | null;
  private readonly limiter: FixedWindowRateLimiter;
  private readonly cooldowns: CooldownTracker;
  private readonly clock: () => Date;

  constructor(deps: AlertManagerDeps) {
    this.settings = deps.settings;
    this.email = deps.email ?? null;
    this.clock = deps.clock ?? (() => new Date());
    this.limiter = new FixedWindowRateLimiter(deps.settings.rateLimitWindowMs, deps.settings.rateLimitQuota);
    this.cooldowns = new CooldownTracker(deps.settings.cooldownMs);

    if (deps.channels) {
      this.channels = deps.channels;
    } else {
      this.channels = [new LogAlertChannel(deps.settings.minSeverity)];
      if (this.email && deps.settings.emailEnabled) {
        this.channels.push(new EmailAlertChannel(this.email, deps.settings.emailMinSeverity));
      }
    }
  }

  getChannelNames(): string[] {
    return this.channels.map(channel => channel.name);
  }

  async process(changes: readonly Change[], now: Date = this.clock()): Promise<AlertOutcome> {
    const nowMs = now.getTime();
    this.limiter.sweep(nowMs);
    this.cooldowns.sweep(nowMs);
    logger.debug('Alert state swept', { rateWindows: this.limiter.size(), coolingDown: this.cooldowns.size() });

    const decisions: AlertDecision[] = [];

    for (const change of changes) {
      decisions.push(...(await this.processChange(change, nowMs)));
    }

    const outcome: AlertOutcome = {
      decisions,
      delivered: decisions.filter(d => d.status === 'delivered').length,
      suppressed: decisions.filter(d => d.status === 'suppressed_rate_limit' || d.status === 'suppressed_cooldown').length,
      failed: decisions.filter(d => d.status === 'failed').length,
      filtered: decisions.filter(d => d.status === 'below_threshold' || d.status === 'alerting_disabled').length,
    };

    if (changes.length > 0) {
      logger.info('Alert processing completed', {
        changes: changes.length,
        delivered: outcome.delivered,
        suppressed: outcome.suppressed,
        failed: outcome.failed,
        filtered: outcome.filtered,
      });
    }

    return outcome;
  }

  private async processChange(change: Change, nowMs: number): Promise<AlertDecision[]> {
    const base = { change_id: change.change_id, item_id: change.item_id, severity: change.severity };

    if (!this.settings.enabled) {
      return [{ ...base, channel: null, status: 'alerting_disabled' }];
    }

    if (!severityAtLeast(change.severity, this.settings.minSeverity)) {
      return [{ ...base, channel: null, status: 'below_threshold' }];
    }

    const cooldownKey = `${change.item_id}:${change.change_type}`;
    if (this.cooldowns.isCoolingDown(cooldownKey, nowMs)) {
      return [{ ...base, channel: null, status: 'suppressed_cooldown' }];
    }

    const summary = formatAlertSummary(change);
    const decisions: AlertDecision[] = [];
    let attempted = false;

    for (const channel of this.channels) {
      if (!channel.isEnabled() || !severityAtLeast(change.severity, channel.minSeverity)) {
        continue;
      }

      const bucket =
        this.settings.rateLimitScope === 'global' ? `${channel.name}:*` : `${channel.name}:${change.severity}`;
      const slot = this.limiter.tryAcquire(bucket, nowMs);

      if (!slot.allowed) {
        logger.debug('Alert suppressed by rate limit', {
          channel: channel.name,
          bucket,
          changeId: change.change_id,
          resetAt: new Date(slot.resetAt).toISOString(),
        });
        decisions.push({ ...base, channel: channel.name, status: 'suppressed_rate_limit' });
        continue;
      }

      attempted = true;
      try {
        const delivered = await channel.deliver({ channel: channel.name, severity: change.severity, summary, change });
        decisions.push({
          ...base,
          channel: channel.name,
          status: delivered ? 'delivered' : 'failed',
          ...(delivered ? {} : { reason: 'transport reported failure' }),
        });
      } catch (error) {
        logger.error('Alert delivery failed', {
          channel: channel.name,
          changeId: change.change_id,
          error: errorMessage(error),
        });
        decisions.push({ ...base, channel: channel.name, status: 'failed', reason: errorMessage(error) });
      }
    }

    if (attempted) {
      this.cooldowns.record(cooldownKey, nowMs);
    }

    return decisions;
  }

  /**
   * Logs the day's summary and mails it with the CSV export when email is enabled
   */
  async sendDailySummary(report: DailyReport): Promise<DailySummaryOutcome> {
    const summary = formatReportSummary(report);

    logger.info('Daily report summary', {
      reportId: report.report_id,
      summary,
    });

    if (!this.email || !this.settings.emailEnabled || !this.email.isConfigured()) {
      return { logged: true, emailed: false };
    }

    const emailed = await this.email.sendDailyReport(report, summary, [
      csvAttachment(reportFilename(report, 'csv'), renderReportCsv(report)),
    ]);
    return { logged: true, emailed };
  }
}
