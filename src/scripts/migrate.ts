#!/usr/bin/env node

import { existsSync, readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { getSupabaseClient } from '../database/client.js';
import { loadConfig } from '../utils/config.js';
import { errorMessage, logger } from '../utils/logger.js';

// Source tree when run through tsx, compiled tree (dist/src/scripts) otherwise
const SCHEMA_CANDIDATES = ['../database/schema.sql', '../../../src/database/schema.sql'];

export function resolveSchemaPath(): string {
  for (const candidate of SCHEMA_CANDIDATES) {
    const path = fileURLToPath(new URL(candidate, import.meta.url));
    if (existsSync(path)) {
      return path;
    }
  }
  throw new Error('schema.sql not found next to the migration script');
}

/**
 * Splits a schema file into statements, dropping comment lines
 */
export function splitStatements(schemaSql: string): string[] {
  return schemaSql
    .split('\n')
    .filter(line => !line.trim().startsWith('--'))
    .join('\n')
    .split(';')
    .map(statement => statement.trim())
    .filter(statement => statement.length > 0);
}

const TABLES = ['books', 'fingerprints', 'change_logs', 'detection_results', 'daily_reports'];

/**
 * Run database migrations
 */
async function runMigrations(): Promise<void> {
  logger.info('Running database migrations');

  const config = loadConfig(process.env, { requireSupabase: true });
  const supabase = getSupabaseClient(config);

  const statements = splitStatements(readFileSync(resolveSchemaPath(), 'utf-8'));
  logger.info(`Executing ${statements.length} SQL statements`);

  let failed = 0;
  for (const [index, statement] of statements.entries()) {
    // Requires an exec_sql(sql text) function in the database
    const { error } = await supabase.rpc('exec_sql', { sql: statement });

    if (error) {
      failed++;
      logger.warn(`Statement ${index + 1} failed via RPC`, {
        error: error.message,
        statement: statement.substring(0, 100),
      });
    } else {
      logger.debug(`Statement ${index + 1} executed successfully`);
    }
  }

  // Verify tables exist
  const missing: string[] = [];
  for (const table of TABLES) {
    const { error } = await supabase.from(table).select('*', { count: 'exact', head: true });
    if (error) {
      missing.push(table);
    }
  }

  if (missing.length > 0) {
    logger.error('Table verification failed', { missing, failedStatements: failed });
    throw new Error(`Missing tables: ${missing.join(', ')}`);
  }

  logger.info('Database tables verified successfully', { failedStatements: failed });
}

// Run if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  runMigrations()
    .then(() => {
      logger.info('Migrations completed successfully');
      process.exit(0);
    })
    .catch(error => {
      logger.error('Migrations failed', { error: errorMessage(error) });
      logger.info('Manual migration: run src/database/schema.sql in the Supabase SQL editor');
      process.exit(1);
    });
}

export { runMigrations };
