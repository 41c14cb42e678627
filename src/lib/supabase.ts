import { createClient, type SupabaseClient } from '@supabase/supabase-js';

let adminClient: SupabaseClient | null = null;

/**
 * Service-role client for server-side session persistence. Created on first
 * use so that memory-backed deployments and tests never need credentials.
 */
export function getSupabaseAdmin(url: string | undefined, serviceKey: string | undefined): SupabaseClient {
  if (adminClient) return adminClient;
  if (!url || !serviceKey) {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for the Supabase session store');
  }
  adminClient = createClient(url, serviceKey, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
  return adminClient;
}
