import { createClient, type SupabaseClient } from '@supabase/supabase-js';

declare global {
  // eslint-disable-next-line no-var
  var __supabase: SupabaseClient | undefined;
}

/**
 * Singleton Supabase client (service role, no session persistence).
 */
export function getSupabase(params: { url: string; serviceRoleKey: string }): SupabaseClient {
  if (globalThis.__supabase) return globalThis.__supabase;
  const client = createClient(params.url, params.serviceRoleKey, {
    auth: { persistSession: false },
  });
  globalThis.__supabase = client;
  return client;
}
