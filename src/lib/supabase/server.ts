// Server-side Supabase client (service role, no session persistence)

import { createClient as createSupabaseClient, type SupabaseClient } from '@supabase/supabase-js'
import type { AppConfig } from '../config'
import { ConfigurationError } from '../errors'

export type { SupabaseClient }

export function createClient(config: AppConfig): SupabaseClient {
  if (!config.supabase) {
    throw new ConfigurationError(['SUPABASE_URL and SUPABASE_SERVICE_ROLE_KEY are required for persistent storage'])
  }

  return createSupabaseClient(config.supabase.url, config.supabase.serviceRoleKey, {
    auth: {
      persistSession: false,
      autoRefreshToken: false,
    },
  })
}
