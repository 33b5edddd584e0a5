import sgMail from '@sendgrid/mail';
import { Config, DailyReport } from '../types/index.js';
import { errorMessage, logger } from '../utils/logger.js';

export interface EmailAttachment {
  /** Base64 encoded content */
  content: string;
  filename: string;
  type: string;
  disposition: 'attachment';
}

export interface EmailMessage {
  to: string[];
  from: string;
  subject: string;
  text: string;
  html: string;
  attachments?: EmailAttachment[];
}

export type MailSender = (message: EmailMessage) => Promise<unknown>;

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

export function csvAttachment(filename: string, csv: string): EmailAttachment {
  return {
    content: Buffer.from(csv, 'utf-8').toString('base64'),
    filename,
    type: 'text/csv',
    disposition: 'attachment',
  };
}

/**
 * SendGrid email client for change alerts and daily reports
 */
export class SendGridClient {
  private readonly settings: Config['sendgrid'];
  private readonly send: MailSender;

  constructor(settings: Config['sendgrid'], send?: MailSender) {
    this.settings = settings;
    if (send) {
      this.send = send;
    } else {
      if (settings.apiKey) {
        sgMail.setApiKey(settings.apiKey);
      }
      this.send = message => sgMail.send(message);
    }
  }

  isConfigured(): boolean {
    return Boolean(this.settings.apiKey && this.settings.fromEmail && this.settings.recipients.length > 0);
  }

  /**
   * Send simple alert email
   */
  async sendAlertEmail(subject: string, message: string): Promise<boolean> {
    try {
      logger.info('Sending alert email', { subject });

      await this.send({
        to: this.settings.recipients,
        from: this.settings.fromEmail,
        subject,
        text: message,
        html: `<p>${escapeHtml(message)}</p>`,
      });

      logger.info('Alert email sent successfully');
      return true;
    } catch (error) {
      logger.error('Failed to send alert email', {
        subject,
        error: errorMessage(error),
      });
      return false;
    }
  }

  /**
   * Send the daily change report with its CSV export attached
   */
  async sendDailyReport(report: DailyReport, summary: string, attachments: EmailAttachment[] = []): Promise<boolean> {
    try {
      logger.info('Sending daily report email', {
        recipients: this.settings.recipients.length,
        reportDate: report.report_date,
        changes: report.changes_detected,
      });

      const lines = summary.split('\n');

      await this.send({
        to: this.settings.recipients,
        from: this.settings.fromEmail,
        subject: `Daily Change Report - ${report.report_date}`,
        text: summary,
        html: `<pre>${lines.map(escapeHtml).join('\n')}</pre>`,
        attachments,
      });

      logger.info('Daily report email sent successfully');
      return true;
    } catch (error) {
      logger.error('Failed to send daily report email', {
        reportDate: report.report_date,
        error: errorMessage(error),
      });
      return false;
    }
  }
}
