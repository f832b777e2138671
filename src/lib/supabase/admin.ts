import 'server-only';
import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { getServerEnv } from '@/src/lib/config/env';

/**
 * Server-only Supabase admin client (service role).
 * Sessions are ours, not Supabase Auth, so all table access goes through
 * this client and ownership is enforced in the services.
 * Never import in client components.
 */
export function createAdminClient(): SupabaseClient {
  const env = getServerEnv();
  const url = env.NEXT_PUBLIC_SUPABASE_URL;
  const key = env.SUPABASE_SERVICE_ROLE_KEY;

  if (!url || !key) {
    throw new Error(
      'SUPABASE_SERVICE_ROLE_KEY (and NEXT_PUBLIC_SUPABASE_URL) must be set for admin client',
    );
  }

  return createClient(url, key, {
    auth: { persistSession: false, autoRefreshToken: false },
  });
}
