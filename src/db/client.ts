/**
 * Supabase client — one per process, built from the loaded configuration and
 * handed to the storage bucket and videos table adapters.
 */
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import type { SupabaseConfig } from '../config.js';

export function createSupabase(cfg: SupabaseConfig): SupabaseClient {
  return createClient(cfg.url, cfg.serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}

export function isConnError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.message.includes('ECONNREFUSED') ||
      err.message.includes('fetch failed') ||
      err.message.includes('network timeout') ||
      err.message.includes('ETIMEDOUT'))
  );
}
