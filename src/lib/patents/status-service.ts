// Patent Status request pipeline
// Rate limit → normalize → lookup → usage log → response record
// Per-request failures come back as { ok: false, error }; nothing here throws to the caller

import { createHash } from 'node:crypto'
import type { PatentCacheStore } from '../cache/patent-cache'
import { parseTier, type Tier } from '../config'
import {
  PatentNotFoundError,
  RateLimitExceededError,
  ServiceDegradedError,
  UpstreamUnavailableError,
  toAppError,
  type AppError,
} from '../errors'
import { createChildLogger, type Logger } from '../logger'
import type { RateLimitDecision, RateLimiter } from '../rate-limit/rate-limiter'
import type {
  DailyUsage,
  TierUsage,
  UsageLogEntry,
  UsageRecorder,
  UsageSummary,
} from '../usage/usage-recorder'
import { identifierKey, normalize } from './identifier'
import type { LookupResult, PatentLookupService, RefreshReport } from './lookup'
import type { CanonicalIdentifier, PatentRecord, PatentSource, PatentStatusResponse } from './types'

const ANONYMOUS_CLIENT = 'anonymous'
const DAY_MS = 24 * 60 * 60 * 1000

export interface StatusRequest {
  patent: string
  clientKey?: string | null
  tier?: string | null
}

// Snake case: goes straight into response headers/bodies
export interface RateLimitInfo {
  limit: number | null
  remaining: number | null
  reset_at: string
}

export type StatusResult =
  | { ok: true; data: PatentStatusResponse; rateLimit: RateLimitInfo }
  | { ok: false; error: AppError; rateLimit: RateLimitInfo }

export interface HealthReport {
  status: 'healthy' | 'degraded'
  version: string
  cache: { reachable: boolean; entries: number | null }
  timestamp: string
}

export interface TierUsageReport {
  periodDays: number
  tiers: TierUsage[]
}

export interface UsageTimeline {
  periodDays: number
  timeline: DailyUsage[]
}

export interface PatentStatusServiceOptions {
  lookup: PatentLookupService
  cache: PatentCacheStore
  rateLimiter: RateLimiter
  usage: UsageRecorder
  appVersion: string
  refreshTopN: number
  now?: () => Date
  logger?: Logger
}

/**
 * Client keys are stored and logged only as SHA-256 hex digests
 */
export function hashClientKey(clientKey: string): string {
  return createHash('sha256').update(clientKey).digest('hex')
}

export function toStatusResponse(
  record: PatentRecord,
  flags: { cacheHit: boolean; degraded: boolean }
): PatentStatusResponse {
  return {
    identifier: record.identifier,
    status: record.status,
    expiry_date: record.expiryDate,
    jurisdictions: {
      primary: record.jurisdictions.primary,
      codes: [...record.jurisdictions.codes],
    },
    lapse_reason: record.lapseReason,
    source: record.source,
    fetched_at: record.fetchedAt,
    cache_hit: flags.cacheHit,
    degraded: flags.degraded,
  }
}

function toRateLimitInfo(decision: RateLimitDecision): RateLimitInfo {
  return {
    limit: decision.limit,
    remaining: decision.remaining,
    reset_at: decision.resetAt,
  }
}

interface Outcome {
  result: StatusResult
  identifier: string
  source: PatentSource | null
  cacheHit: boolean
  degraded: boolean
}

export class PatentStatusService {
  private readonly now: () => Date
  private readonly log: Logger

  constructor(private readonly options: PatentStatusServiceOptions) {
    this.now = options.now ?? (() => new Date())
    this.log = options.logger ?? createChildLogger({ module: 'status-service' })
  }

  async getStatus(request: StatusRequest): Promise<StatusResult> {
    const startedAt = this.now().getTime()
    const tier = parseTier(request.tier)
    const clientKeyHash = request.clientKey ? hashClientKey(request.clientKey) : null

    const outcome = await this.resolve(request.patent, tier, clientKeyHash ?? ANONYMOUS_CLIENT)
    const statusCode = outcome.result.ok ? 200 : outcome.result.error.statusCode

    await this.recordUsage({
      identifier: outcome.identifier,
      clientKeyHash,
      tier,
      cacheHit: outcome.cacheHit,
      degraded: outcome.degraded,
      source: outcome.source,
      durationMs: Math.max(this.now().getTime() - startedAt, 0),
      statusCode,
      createdAt: this.now().toISOString(),
    })

    return outcome.result
  }

  async getUsageOverview(days = 30, topPatents = 10): Promise<UsageSummary> {
    return this.options.usage.summarize({ since: this.daysAgo(days), periodDays: days, topPatents })
  }

  async getUsageByTier(days = 30): Promise<TierUsageReport> {
    return { periodDays: days, tiers: await this.options.usage.summarizeByTier(this.daysAgo(days)) }
  }

  async getUsageTimeline(days = 7): Promise<UsageTimeline> {
    return { periodDays: days, timeline: await this.options.usage.summarizeTimeline(this.daysAgo(days)) }
  }

  async checkHealth(): Promise<HealthReport> {
    let entries: number | null = null
    try {
      entries = await this.options.cache.count()
    } catch (error) {
      this.log.error({ err: error }, 'Health check could not reach the cache')
    }

    return {
      status: entries === null ? 'degraded' : 'healthy',
      version: this.options.appVersion,
      cache: { reachable: entries !== null, entries },
      timestamp: this.now().toISOString(),
    }
  }

  /**
   * Drops one identifier (any accepted spelling) or the whole cache
   */
  async clearCache(patent?: string): Promise<number> {
    const key = patent === undefined ? undefined : identifierKey(normalize(patent))
    return this.options.cache.clear(key)
  }

  async refreshPopular(limit = this.options.refreshTopN): Promise<RefreshReport> {
    return this.options.lookup.refreshStale(limit)
  }

  private async resolve(patent: string, tier: Tier, rateKey: string): Promise<Outcome> {
    const rawIdentifier = patent.trim()
    const decision = await this.options.rateLimiter.admit(rateKey, tier)
    const rateLimit = toRateLimitInfo(decision)
    const failure = (error: AppError, identifier: string, source: PatentSource | null = null): Outcome => ({
      result: { ok: false, error, rateLimit },
      identifier,
      source,
      cacheHit: false,
      degraded: false,
    })

    if (!decision.allowed) {
      return failure(new RateLimitExceededError(tier, decision.limit, decision.resetAt), rawIdentifier)
    }

    let id: CanonicalIdentifier
    try {
      id = normalize(patent)
    } catch (error) {
      const appError = toAppError(error)
      this.log.info({ patent: rawIdentifier, code: appError.code }, 'Rejected patent identifier')
      return failure(appError, rawIdentifier)
    }

    const key = identifierKey(id)
    let lookup: LookupResult
    try {
      lookup = await this.options.lookup.lookup(id)
    } catch (error) {
      this.log.error({ identifier: key, err: error }, 'Lookup failed unexpectedly')
      return failure(toAppError(error), key)
    }

    switch (lookup.kind) {
      case 'found':
        return {
          result: {
            ok: true,
            data: toStatusResponse(lookup.record, { cacheHit: lookup.cacheHit, degraded: lookup.degraded }),
            rateLimit,
          },
          identifier: key,
          source: lookup.record.source,
          cacheHit: lookup.cacheHit,
          degraded: lookup.degraded,
        }
      case 'not_found':
        return failure(new PatentNotFoundError(key, lookup.source), key, lookup.source)
      case 'unavailable': {
        const error = lookup.reason === 'service_degraded'
          ? new ServiceDegradedError(key, lookup.source, lookup.detail)
          : new UpstreamUnavailableError(key, lookup.source, lookup.detail)
        return failure(error, key, lookup.source)
      }
    }
  }

  private daysAgo(days: number): Date {
    return new Date(this.now().getTime() - days * DAY_MS)
  }

  private async recordUsage(entry: UsageLogEntry): Promise<void> {
    try {
      await this.options.usage.record(entry)
    } catch (error) {
      this.log.warn({ err: error, identifier: entry.identifier }, 'Failed to record usage')
    }
  }
}
