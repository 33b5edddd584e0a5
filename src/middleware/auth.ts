import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction, RequestHandler } from 'express';
import { FixedWindowRateLimiter } from '../alerting/rate-limiter.js';
import { logger } from '../utils/logger.js';

const API_KEY_HEADER = 'x-api-key';

/**
 * Reads the caller's key from X-API-Key or an "Authorization: Bearer" header
 */
export function extractApiKey(req: Request): string | null {
  const headerKey = req.get(API_KEY_HEADER);
  if (headerKey) {
    return headerKey;
  }

  const authHeader = req.get('authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    return authHeader.substring(7);
  }
  return null;
}

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Middleware requiring the configured API key. An empty key disables the check.
 */
export function requireApiKey(apiKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!apiKey) {
      next();
      return;
    }

    const provided = extractApiKey(req);

    if (!provided) {
      res.status(401).json({
        success: false,
        error: 'Missing API key',
      });
      return;
    }

    if (!keysMatch(provided, apiKey)) {
      logger.warn('API key verification failed', { path: req.path, ip: req.ip });
      res.status(401).json({
        success: false,
        error: 'Invalid API key',
      });
      return;
    }

    next();
  };
}

export interface RequestRateLimitOptions {
  windowMs: number;
  quota: number;
  now?: () => number;
}

/**
 * Per-client request throttling (keyed by API key, falling back to IP)
 */
export function rateLimitRequests(options: RequestRateLimitOptions): RequestHandler {
  const limiter = new FixedWindowRateLimiter(options.windowMs, options.quota);
  const now = options.now ?? Date.now;
  let requestsSinceSweep = 0;

  return (req: Request, res: Response, next: NextFunction): void => {
    const current = now();
    if (++requestsSinceSweep >= 1000) {
      limiter.sweep(current);
      requestsSinceSweep = 0;
    }

    const client = extractApiKey(req) ?? req.ip ?? 'anonymous';
    const decision = limiter.tryAcquire(client, current);

    res.setHeader('X-RateLimit-Limit', String(options.quota));
    res.setHeader('X-RateLimit-Remaining', String(decision.remaining));

    if (!decision.allowed) {
      res.setHeader('Retry-After', String(Math.max(1, Math.ceil((decision.resetAt - current) / 1000))));
      res.status(429).json({
        success: false,
        error: 'Rate limit exceeded',
      });
      return;
    }

    next();
  };
}
