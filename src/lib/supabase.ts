/**
 * Supabase Client Configuration
 * Admin client for the document store and token verification
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';

export interface SupabaseConnection {
  url: string;
  serviceKey: string;
}

/**
 * Create a Supabase admin client that bypasses RLS
 * Server-side only: document search and auth.getUser
 */
export function createSupabaseAdmin(connection: SupabaseConnection): SupabaseClient {
  if (connection.url === '' || connection.serviceKey === '') {
    throw new Error('SUPABASE_URL and SUPABASE_SERVICE_KEY are required');
  }

  return createClient(connection.url, connection.serviceKey, {
    auth: {
      autoRefreshToken: false,
      persistSession: false,
      detectSessionInUrl: false,
    },
  });
}
