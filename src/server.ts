#!/usr/bin/env node

import { loadConfig } from './utils/config.js';
import { getSupabaseClient } from './database/client.js';
import { createSupabaseStores } from './database/supabase-store.js';
import { createDetectionService } from './service.js';
import { createApp } from './api/app.js';
import { errorMessage, logger } from './utils/logger.js';
import { captureError } from './utils/sentry.js';

/**
 * API server plus the daily scheduler in one process
 */
async function main(): Promise<void> {
  const config = loadConfig(process.env, { requireSupabase: true });
  const stores = createSupabaseStores(getSupabaseClient(config));
  const service = createDetectionService({ config, stores });
  const app = createApp(service);

  if (!config.app.apiKey) {
    logger.warn('API_KEY is not set; the API accepts unauthenticated requests');
  }

  const server = app.listen(config.app.apiPort, () => {
    logger.info('API server started', { port: config.app.apiPort });
  });

  await service.scheduler.start();

  const shutdown = (signal: string) => {
    logger.info('Shutting down', { signal });
    server.close();
    service.scheduler
      .stop()
      .then(() => process.exit(0))
      .catch(error => {
        logger.error('Shutdown failed', { error: errorMessage(error) });
        process.exit(1);
      });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch(error => {
  logger.error('Server failed to start', { error: errorMessage(error) });
  captureError(error);
  process.exit(1);
});
