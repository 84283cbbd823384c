// Usage log
// One append-only entry per request; aggregation happens on read

import type { SupabaseClient } from '@supabase/supabase-js'
import { parseTier, type Tier } from '../config'
import type { PatentSource } from '../patents/types'
import {
  usageByTierRowSchema,
  usageOverviewRowSchema,
  usageTimelineRowSchema,
  type RequestLogInsert,
} from '@/types/database'

export interface UsageLogEntry {
  identifier: string
  clientKeyHash: string | null
  tier: Tier
  cacheHit: boolean
  degraded: boolean
  source: PatentSource | null
  durationMs: number
  statusCode: number
  createdAt: string
}

export interface UsageQuery {
  since: Date
  periodDays: number
  topPatents: number
}

export interface UsageSummary {
  periodDays: number
  totalRequests: number
  cacheHits: number
  cacheHitRate: number // percent, 2 decimals
  avgResponseTimeMs: number
  statusCodes: Record<string, number>
  sources: Record<string, number>
  topPatents: Array<{ identifier: string; requests: number }>
}

export interface TierUsage {
  tier: Tier
  requests: number
  uniqueClients: number // distinct client key hashes, anonymous requests excluded
}

export interface DailyUsage {
  date: string // YYYY-MM-DD, UTC
  requests: number
  cacheHits: number
  cacheHitRate: number
}

export interface UsageRecorder {
  record(entry: UsageLogEntry): Promise<void>
  summarize(query: UsageQuery): Promise<UsageSummary>
  summarizeByTier(since: Date): Promise<TierUsage[]>
  summarizeTimeline(since: Date): Promise<DailyUsage[]>
}

function round2(value: number): number {
  return Math.round(value * 100) / 100
}

function hitRate(hits: number, total: number): number {
  return total === 0 ? 0 : round2((hits / total) * 100)
}

function increment(counts: Record<string, number>, key: string): void {
  counts[key] = (counts[key] ?? 0) + 1
}

/**
 * Aggregates raw log entries into the analytics overview
 */
export function summarizeUsage(
  entries: readonly UsageLogEntry[],
  options: { periodDays: number; topPatents?: number }
): UsageSummary {
  const statusCodes: Record<string, number> = {}
  const sources: Record<string, number> = {}
  const patents: Record<string, number> = {}
  let cacheHits = 0
  let totalDuration = 0

  for (const entry of entries) {
    if (entry.cacheHit) cacheHits++
    totalDuration += entry.durationMs
    increment(statusCodes, String(entry.statusCode))
    if (entry.source) increment(sources, entry.source)
    increment(patents, entry.identifier)
  }

  const total = entries.length
  const topPatents = Object.entries(patents)
    .map(([identifier, requests]) => ({ identifier, requests }))
    .sort((a, b) => b.requests - a.requests || a.identifier.localeCompare(b.identifier))
    .slice(0, options.topPatents ?? 10)

  return {
    periodDays: options.periodDays,
    totalRequests: total,
    cacheHits,
    cacheHitRate: hitRate(cacheHits, total),
    avgResponseTimeMs: total === 0 ? 0 : round2(totalDuration / total),
    statusCodes,
    sources,
    topPatents,
  }
}

/**
 * Requests and distinct clients per tier, busiest tier first
 */
export function summarizeByTier(entries: readonly UsageLogEntry[]): TierUsage[] {
  const tiers = new Map<Tier, { requests: number; clients: Set<string> }>()
  for (const entry of entries) {
    const bucket = tiers.get(entry.tier) ?? { requests: 0, clients: new Set<string>() }
    bucket.requests++
    if (entry.clientKeyHash) bucket.clients.add(entry.clientKeyHash)
    tiers.set(entry.tier, bucket)
  }

  return [...tiers.entries()]
    .map(([tier, bucket]) => ({ tier, requests: bucket.requests, uniqueClients: bucket.clients.size }))
    .sort((a, b) => b.requests - a.requests || a.tier.localeCompare(b.tier))
}

/**
 * Requests and cache hits per UTC day, oldest first
 */
export function summarizeTimeline(entries: readonly UsageLogEntry[]): DailyUsage[] {
  const days = new Map<string, { requests: number; cacheHits: number }>()
  for (const entry of entries) {
    const date = new Date(entry.createdAt).toISOString().slice(0, 10)
    const bucket = days.get(date) ?? { requests: 0, cacheHits: 0 }
    bucket.requests++
    if (entry.cacheHit) bucket.cacheHits++
    days.set(date, bucket)
  }

  return [...days.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, bucket]) => ({
      date,
      requests: bucket.requests,
      cacheHits: bucket.cacheHits,
      cacheHitRate: hitRate(bucket.cacheHits, bucket.requests),
    }))
}

/**
 * Maps a usage_overview row onto the summary shape summarizeUsage produces
 */
export function overviewRowToSummary(raw: unknown, periodDays: number): UsageSummary {
  const row = usageOverviewRowSchema.parse(raw)
  return {
    periodDays,
    totalRequests: row.total_requests,
    cacheHits: row.cache_hits,
    cacheHitRate: hitRate(row.cache_hits, row.total_requests),
    avgResponseTimeMs: round2(row.avg_response_time_ms),
    statusCodes: row.status_codes,
    sources: row.sources,
    topPatents: row.top_patents,
  }
}

export class InMemoryUsageRecorder implements UsageRecorder {
  private readonly entries: UsageLogEntry[] = []

  async record(entry: UsageLogEntry): Promise<void> {
    this.entries.push(Object.freeze({ ...entry }))
  }

  async list(since: Date): Promise<UsageLogEntry[]> {
    return this.entries.filter(entry => Date.parse(entry.createdAt) >= since.getTime())
  }

  async summarize(query: UsageQuery): Promise<UsageSummary> {
    return summarizeUsage(await this.list(query.since), query)
  }

  async summarizeByTier(since: Date): Promise<TierUsage[]> {
    return summarizeByTier(await this.list(since))
  }

  async summarizeTimeline(since: Date): Promise<DailyUsage[]> {
    return summarizeTimeline(await this.list(since))
  }
}

/**
 * Supabase-backed log (table request_log)
 * Aggregates run in the database (usage_overview, usage_by_tier, usage_timeline), so they see every row
 */
export class SupabaseUsageRecorder implements UsageRecorder {
  constructor(private readonly supabase: SupabaseClient) {}

  async record(entry: UsageLogEntry): Promise<void> {
    const row: RequestLogInsert = {
      identifier: entry.identifier,
      client_key_hash: entry.clientKeyHash,
      user_tier: entry.tier,
      cache_hit: entry.cacheHit,
      degraded: entry.degraded,
      source: entry.source,
      response_time_ms: Math.round(entry.durationMs),
      status_code: entry.statusCode,
      created_at: entry.createdAt,
    }

    const { error } = await this.supabase.from('request_log').insert(row)
    if (error) throw new Error(`request_log insert failed: ${error.message}`)
  }

  async summarize(query: UsageQuery): Promise<UsageSummary> {
    const { data, error } = await this.supabase.rpc('usage_overview', {
      p_since: query.since.toISOString(),
      p_top: query.topPatents,
    })
    if (error) throw new Error(`usage_overview failed: ${error.message}`)

    return overviewRowToSummary(Array.isArray(data) ? data[0] : data, query.periodDays)
  }

  async summarizeByTier(since: Date): Promise<TierUsage[]> {
    const { data, error } = await this.supabase.rpc('usage_by_tier', { p_since: since.toISOString() })
    if (error) throw new Error(`usage_by_tier failed: ${error.message}`)

    return usageByTierRowSchema.array().parse(data ?? []).map(row => ({
      tier: parseTier(row.user_tier),
      requests: row.requests,
      uniqueClients: row.unique_clients,
    }))
  }

  async summarizeTimeline(since: Date): Promise<DailyUsage[]> {
    const { data, error } = await this.supabase.rpc('usage_timeline', { p_since: since.toISOString() })
    if (error) throw new Error(`usage_timeline failed: ${error.message}`)

    return usageTimelineRowSchema.array().parse(data ?? []).map(row => ({
      date: row.day,
      requests: row.requests,
      cacheHits: row.cache_hits,
      cacheHitRate: hitRate(row.cache_hits, row.requests),
    }))
  }
}
