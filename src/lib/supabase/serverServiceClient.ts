/**
 * Server-Side Supabase Service Role Client
 *
 * Used by the bridge record provider to read bridge JSON from Storage.
 *
 * SECURITY:
 * - Never import this file in client-side code
 * - Never expose SUPABASE_SERVICE_ROLE_KEY to the browser
 * - This file only works in Node.js runtime (not Edge)
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

type Env = Record<string, string | undefined>;

/**
 * Creates a Supabase client with the service role for server-side use.
 *
 * @returns null when credentials are missing and allowNull is set
 * @throws Error when credentials are missing or the key is the anon key
 */
export function createServiceRoleClient(options?: {
  /** If true, returns null instead of throwing on missing credentials */
  allowNull?: boolean;
  env?: Env;
}): SupabaseClient | null {
  const env = options?.env ?? process.env;
  const supabaseUrl = env.NEXT_PUBLIC_SUPABASE_URL;
  const serviceRoleKey = env.SUPABASE_SERVICE_ROLE_KEY;

  if (!supabaseUrl) {
    console.error('[SERVICE_CLIENT] NEXT_PUBLIC_SUPABASE_URL is not configured');
    if (options?.allowNull) return null;
    throw new Error('NEXT_PUBLIC_SUPABASE_URL is required for service role client');
  }

  if (!serviceRoleKey) {
    console.error(
      '[SERVICE_CLIENT] SUPABASE_SERVICE_ROLE_KEY is not configured. ' +
        'Bridge records cannot be read from Storage without it.'
    );
    if (options?.allowNull) return null;
    throw new Error('SUPABASE_SERVICE_ROLE_KEY is required for bridge record access');
  }

  if (serviceRoleKey === env.NEXT_PUBLIC_SUPABASE_ANON_KEY) {
    console.error(
      '[SERVICE_CLIENT] SUPABASE_SERVICE_ROLE_KEY appears to be the same as anon key. ' +
        'This is a misconfiguration - service role key should be different.'
    );
    if (options?.allowNull) return null;
    throw new Error('SUPABASE_SERVICE_ROLE_KEY must not equal NEXT_PUBLIC_SUPABASE_ANON_KEY');
  }

  return createClient(supabaseUrl, serviceRoleKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
    },
  });
}

export function isServiceRoleConfigured(env: Env = process.env): boolean {
  return Boolean(env.NEXT_PUBLIC_SUPABASE_URL && env.SUPABASE_SERVICE_ROLE_KEY);
}
