import express, { Express } from 'express';
import cors from 'cors';
import { DetectionService } from '../service.js';
import { rateLimitRequests, requireApiKey } from '../middleware/auth.js';
import { createDetectionRouter } from './detection-routes.js';

export interface AppOptions {
  /** Requests allowed per client per hour */
  requestsPerHour?: number;
}

export function createApp(service: DetectionService, options: AppOptions = {}): Express {
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      runState: service.orchestrator.getState(),
    });
  });

  app.use(
    '/api',
    requireApiKey(service.config.app.apiKey),
    rateLimitRequests({ windowMs: 60 * 60 * 1000, quota: options.requestsPerHour ?? 1000 }),
    createDetectionRouter(service)
  );

  return app;
}
