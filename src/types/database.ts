// Row shapes for the Supabase tables and RPCs (see supabase/migrations)
// Rows are validated on the way in, so a drifted schema surfaces as an error instead of bad data

import { z } from 'zod'

const timestamp = z.string().min(1)

export const patentCacheRowSchema = z.object({
  identifier: z.string(),
  record: z.unknown(), // PatentRecord as jsonb, validated by patentRecordSchema
  status: z.string(),
  source: z.string(),
  fetch_count: z.number().int(),
  last_fetched: timestamp,
  created_at: timestamp,
  updated_at: timestamp.optional(),
})

export const rateLimitWindowRowSchema = z.object({
  client_key: z.string(),
  tier: z.string(),
  window_start: timestamp,
  request_count: z.number().int(),
})

// admit_request returns a single-row table
export const admitRequestResultSchema = z.object({
  is_admitted: z.boolean(),
  current_window_start: timestamp,
  current_count: z.number().int(),
})

// request_log is write-only from the app; reads go through the usage_* functions
export interface RequestLogInsert {
  identifier: string
  client_key_hash: string | null
  user_tier: string
  cache_hit: boolean
  degraded: boolean
  source: string | null
  response_time_ms: number
  status_code: number
  created_at: string
}

const count = z.number().int().nonnegative()

// usage_overview returns a single-row table
export const usageOverviewRowSchema = z.object({
  total_requests: count,
  cache_hits: count,
  avg_response_time_ms: z.number(),
  status_codes: z.record(count),
  sources: z.record(count),
  top_patents: z.array(z.object({ identifier: z.string(), requests: count })),
})

export const usageByTierRowSchema = z.object({
  user_tier: z.string(),
  requests: count,
  unique_clients: count,
})

export const usageTimelineRowSchema = z.object({
  day: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  requests: count,
  cache_hits: count,
})
