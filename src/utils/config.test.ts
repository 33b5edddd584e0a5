import { describe, it, expect } from 'vitest';
import { loadConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('loadConfig', () => {
  it('should apply defaults to an empty environment', () => {
    const config = loadConfig({});

    expect(config.detection).toEqual({
      concurrency: 10,
      batchSize: 100,
      priceChangeThreshold: 0.1,
      retryAttempts: 3,
      retryBaseDelayMs: 500,
    });
    expect(config.alerting.minSeverity).toBe('medium');
    expect(config.alerting.emailEnabled).toBe(false);
    expect(config.reports.format).toBe('json');
    expect(config.reports.healthWeights).toEqual({ errorRate: 0.5, severeChangeRate: 0.3, removalRate: 0.2 });
    expect(config.scheduler.schedule).toBe('0 2 * * *');
    expect(config.app.apiPort).toBe(3000);
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      DETECTION_CONCURRENCY: '4',
      PRICE_CHANGE_THRESHOLD: '0.25',
      ALERT_RATE_LIMIT_SCOPE: 'global',
      ALERTS_ENABLED: 'off',
      REPORT_FORMAT: 'csv',
      SENDGRID_RECIPIENT_EMAILS: 'a@example.com, b@example.com',
    });

    expect(config.detection.concurrency).toBe(4);
    expect(config.detection.priceChangeThreshold).toBe(0.25);
    expect(config.alerting.rateLimitScope).toBe('global');
    expect(config.alerting.enabled).toBe(false);
    expect(config.reports.format).toBe('csv');
    expect(config.sendgrid.recipients).toEqual(['a@example.com', 'b@example.com']);
  });

  it('should require Supabase credentials when asked to', () => {
    expect(() => loadConfig({}, { requireSupabase: true })).toThrow(
      'Missing required environment variable: SUPABASE_URL'
    );
  });

  it('should collect every invalid value in one error', () => {
    try {
      loadConfig({ DETECTION_CONCURRENCY: 'many', DETECTION_BATCH_SIZE: '0' });
      expect.fail('loadConfig should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.issues.map(issue => issue.split(':')[0])).toEqual([
          'detection.concurrency',
          'detection.batchSize',
        ]);
      }
    }
  });

  it('should insist on SendGrid settings when email alerts are on', () => {
    expect(() => loadConfig({ EMAIL_ALERTS_ENABLED: 'true' })).toThrow(ConfigurationError);
  });

  it('should reject all-zero health weights', () => {
    expect(() =>
      loadConfig({ HEALTH_WEIGHT_ERROR_RATE: '0', HEALTH_WEIGHT_SEVERE_CHANGE_RATE: '0', HEALTH_WEIGHT_REMOVAL_RATE: '0' })
    ).toThrow('at least one health weight must be positive');
  });
});
