import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { AppConfig } from './config.js';

/**
 * Service-role client for the outreach tables. Created once per process in
 * createServices() and handed to the history store. `fetchImpl` replaces the
 * global fetch for every PostgREST call.
 */
export function createSupabaseAdmin(config: AppConfig['supabase'], fetchImpl?: typeof fetch): SupabaseClient {
  return createClient(config.url, config.serviceRoleKey, {
    auth: { persistSession: false, autoRefreshToken: false },
    ...(fetchImpl ? { global: { fetch: fetchImpl } } : {}),
  });
}
