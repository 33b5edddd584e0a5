import { Change, Severity } from '../types/index.js';
import { SendGridClient } from '../email/sendgrid-client.js';
import { severityAtLeast } from '../detection/change-policy.js';
import { logger } from '../utils/logger.js';

export interface DispatchRequest {
  channel: string;
  severity: Severity;
  summary: string;
  change: Change;
}

/**
 * A delivery transport. deliver() resolves false (or rejects) on failure;
 * the Alert Manager records either outcome without rethrowing.
 */
export interface AlertChannel {
  readonly name: string;
  readonly minSeverity: Severity;
  isEnabled(): boolean;
  deliver(request: DispatchRequest): Promise<boolean>;
}

export function formatAlertSummary(change: Change): string {
  return `[${change.severity.toUpperCase()}] ${change.change_type}: ${change.human_summary} (${change.source_url})`;
}

export class LogAlertChannel implements AlertChannel {
  readonly name = 'log';

  constructor(readonly minSeverity: Severity = 'low') {}

  isEnabled(): boolean {
    return true;
  }

  async deliver(request: DispatchRequest): Promise<boolean> {
    const meta = {
      channel: this.name,
      changeId: request.change.change_id,
      itemId: request.change.item_id,
      changeType: request.change.change_type,
      severity: request.severity,
    };

    if (severityAtLeast(request.severity, 'high')) {
      logger.warn(request.summary, meta);
    } else {
      logger.info(request.summary, meta);
    }
    return true;
  }
}

export class EmailAlertChannel implements AlertChannel {
  readonly name = 'email';

  constructor(
    private readonly client: SendGridClient,
    readonly minSeverity: Severity,
    private readonly enabled: boolean = true
  ) {}

  isEnabled(): boolean {
    return this.enabled && this.client.isConfigured();
  }

  deliver(request: DispatchRequest): Promise<boolean> {
    const subject = `[${request.severity.toUpperCase()}] Catalog change: ${request.change.change_type}`;
    const body = [
      request.summary,
      '',
      `Item: ${request.change.item_id}`,
      `URL: ${request.change.source_url}`,
      `Detected at: ${request.change.detected_at}`,
    ].join('\n');
    return this.client.sendAlertEmail(subject, body);
  }
}
