#!/usr/bin/env node

import { loadConfig } from './utils/config.js';
import { getSupabaseClient } from './database/client.js';
import { createSupabaseStores } from './database/supabase-store.js';
import { createDetectionService } from './service.js';
import { errorMessage, logger } from './utils/logger.js';
import { captureError } from './utils/sentry.js';

/**
 * Runs a single detection pass and exits: 0 on DONE, 1 on FAILED
 */
async function runOnce(): Promise<number> {
  const config = loadConfig(process.env, { requireSupabase: true });
  const stores = createSupabaseStores(getSupabaseClient(config));
  const service = createDetectionService({ config, stores });

  const cancel = () => {
    logger.warn('Interrupt received, cancelling at the next batch boundary');
    service.orchestrator.cancel('interrupted');
  };
  process.on('SIGINT', cancel);
  process.on('SIGTERM', cancel);

  const report = await service.orchestrator.run('manual');

  logger.info('Detection finished', {
    state: report.state,
    totalChecked: report.result?.total_checked ?? 0,
    changesDetected: report.result?.changes_detected ?? 0,
    exportPath: report.exportPath,
    error: report.error,
  });

  return report.state === 'DONE' ? 0 : 1;
}

runOnce()
  .then(code => process.exit(code))
  .catch(error => {
    logger.error('Detection failed', { error: errorMessage(error) });
    captureError(error);
    process.exit(1);
  });
