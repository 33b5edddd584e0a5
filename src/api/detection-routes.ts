import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { CHANGE_TYPES, SEVERITIES } from '../types/index.js';
import { DetectionService } from '../service.js';
import { MAX_PER_PAGE } from '../database/stores.js';
import { renderReport, reportFilename } from '../reports/report-export.js';
import {
  ConcurrentRunRejectedError,
  PersistenceUnavailableError,
  TransientIOError,
} from '../utils/errors.js';
import { errorMessage, logger } from '../utils/logger.js';

const isoTimestamp = z
  .string()
  .trim()
  .refine(value => !Number.isNaN(Date.parse(value)), { message: 'must be an ISO 8601 timestamp' })
  .transform(value => new Date(value).toISOString());

const reportDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a date in YYYY-MM-DD format')
  .refine(value => !Number.isNaN(Date.parse(`${value}T00:00:00Z`)), { message: 'must be a valid date' });

export const changeQuerySchema = z.object({
  item_id: z.string().trim().min(1).optional(),
  change_type: z.enum(CHANGE_TYPES).optional(),
  severity: z.enum(SEVERITIES).optional(),
  since: isoTimestamp.optional(),
  until: isoTimestamp.optional(),
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(MAX_PER_PAGE).default(20),
});

const historyQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(365).default(7),
});

const exportQuerySchema = z.object({
  format: z.enum(['json', 'csv']).optional(),
});

function validationFailed(res: Response, error: z.ZodError): void {
  res.status(400).json({
    success: false,
    error: 'Invalid request',
    details: error.issues.map(issue => `${issue.path.join('.') || 'query'}: ${issue.message}`),
  });
}

/**
 * Maps the error taxonomy onto HTTP statuses
 */
function sendError(res: Response, error: unknown, context: string): void {
  const message = errorMessage(error);

  if (error instanceof ConcurrentRunRejectedError) {
    res.status(409).json({ success: false, error: message, activeRunId: error.activeRunId });
    return;
  }

  if (error instanceof PersistenceUnavailableError || error instanceof TransientIOError) {
    logger.warn(`API: ${context} unavailable`, { error: message });
    res.status(503).json({ success: false, error: 'Storage temporarily unavailable' });
    return;
  }

  logger.error(`API error: ${context}`, { error: message });
  res.status(500).json({ success: false, error: `Failed to ${context}` });
}

export function createDetectionRouter(service: DetectionService): Router {
  const router = Router();
  const { stores, orchestrator, reports } = service;

  /**
   * GET /changes
   * Filters: item_id, change_type, severity, since, until. Pagination: page, per_page (1-100).
   */
  router.get('/changes', async (req: Request, res: Response) => {
    const parsed = changeQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      validationFailed(res, parsed.error);
      return;
    }

    const { page, per_page, ...filters } = parsed.data;

    try {
      const result = await stores.changes.queryChanges(filters, { page, per_page });
      res.json({ success: true, ...result });
    } catch (error) {
      sendError(res, error, 'retrieve changes');
    }
  });

  /**
   * GET /stats
   */
  router.get('/stats', async (_req: Request, res: Response) => {
    try {
      const since = new Date(Date.now() - 24 * 60 * 60 * 1000).toISOString();
      const [activeItems, lastRun, recent] = await Promise.all([
        stores.fingerprints.countActiveFingerprints(),
        stores.changes.getLastDetectionResult(),
        stores.changes.queryChanges({ since }, { page: 1, per_page: 1 }),
      ]);

      res.json({
        success: true,
        stats: {
          active_items: activeItems,
          changes_last_24h: recent.total,
          last_run: lastRun,
          run_state: orchestrator.getState(),
        },
      });
    } catch (error) {
      sendError(res, error, 'retrieve stats');
    }
  });

  /**
   * GET /runs/status
   */
  router.get('/runs/status', (_req: Request, res: Response) => {
    res.json({ success: true, ...orchestrator.getStatus() });
  });

  /**
   * POST /runs
   * Starts a detection run and returns immediately; 409 while one is active.
   */
  router.post('/runs', (_req: Request, res: Response) => {
    try {
      const { runId, completion } = orchestrator.start('manual');
      completion
        .then(report => {
          logger.info('API: manual detection run finished', { runId, state: report.state });
        })
        .catch(error => {
          logger.error('API: manual detection run completion failed', { runId, error: errorMessage(error) });
        });

      res.status(202).json({ success: true, message: 'Detection run started', runId });
    } catch (error) {
      sendError(res, error, 'start detection run');
    }
  });

  /**
   * POST /runs/cancel
   */
  router.post('/runs/cancel', (_req: Request, res: Response) => {
    const activeRunId = orchestrator.getStatus().activeRunId;
    if (!orchestrator.cancel('cancelled via API')) {
      res.status(409).json({ success: false, error: 'No detection run in progress' });
      return;
    }
    res.json({ success: true, message: 'Cancellation requested', runId: activeRunId });
  });

  /**
   * GET /reports?days=7
   */
  router.get('/reports', async (req: Request, res: Response) => {
    const parsed = historyQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      validationFailed(res, parsed.error);
      return;
    }

    try {
      const history = await reports.getReportHistory(parsed.data.days);
      res.json({ success: true, reports: history });
    } catch (error) {
      sendError(res, error, 'retrieve reports');
    }
  });

  /**
   * GET /reports/:date
   */
  router.get('/reports/:date', async (req: Request, res: Response) => {
    const parsed = reportDate.safeParse(req.params.date);
    if (!parsed.success) {
      validationFailed(res, parsed.error);
      return;
    }

    try {
      const report = await reports.getReport(parsed.data);
      if (!report) {
        res.status(404).json({ success: false, error: `No report for ${parsed.data}` });
        return;
      }
      res.json({ success: true, report });
    } catch (error) {
      sendError(res, error, 'retrieve report');
    }
  });

  /**
   * GET /reports/:date/export?format=json|csv
   */
  router.get('/reports/:date/export', async (req: Request, res: Response) => {
    const date = reportDate.safeParse(req.params.date);
    if (!date.success) {
      validationFailed(res, date.error);
      return;
    }
    const query = exportQuerySchema.safeParse(req.query);
    if (!query.success) {
      validationFailed(res, query.error);
      return;
    }

    try {
      const report = await reports.getReport(date.data);
      if (!report) {
        res.status(404).json({ success: false, error: `No report for ${date.data}` });
        return;
      }

      const format = query.data.format ?? service.config.reports.format;
      res.setHeader('Content-Type', format === 'csv' ? 'text/csv; charset=utf-8' : 'application/json; charset=utf-8');
      res.setHeader('Content-Disposition', `attachment; filename="${reportFilename(report, format)}"`);
      res.send(renderReport(report, format));
    } catch (error) {
      sendError(res, error, 'export report');
    }
  });

  /**
   * POST /reports/:date/regenerate
   * Rebuilds the day's report from stored detection results and changes.
   */
  router.post('/reports/:date/regenerate', async (req: Request, res: Response) => {
    const parsed = reportDate.safeParse(req.params.date);
    if (!parsed.success) {
      validationFailed(res, parsed.error);
      return;
    }

    try {
      const report = await reports.generateForDate(new Date(`${parsed.data}T00:00:00Z`));
      res.json({ success: true, report });
    } catch (error) {
      sendError(res, error, 'regenerate report');
    }
  });

  return router;
}
