import { createClient, SupabaseClient } from '@supabase/supabase-js';
import { Config } from '../types/index.js';
import { ConfigurationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

let supabaseClient: SupabaseClient | null = null;

export function getSupabaseClient(config: Pick<Config, 'supabase'>): SupabaseClient {
  if (!supabaseClient) {
    if (!config.supabase.url || !config.supabase.serviceKey) {
      throw new ConfigurationError(['SUPABASE_URL and SUPABASE_SERVICE_KEY are required']);
    }

    logger.info('Initializing Supabase client');
    supabaseClient = createClient(config.supabase.url, config.supabase.serviceKey, {
      auth: {
        autoRefreshToken: false,
        persistSession: false,
      },
    });
  }
  return supabaseClient;
}
