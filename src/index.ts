// Patent expiry service: public API and composition root

import { InMemoryPatentCache, SupabasePatentCache, type PatentCacheStore } from './lib/cache/patent-cache'
import { loadConfig, type AppConfig } from './lib/config'
import { logger } from './lib/logger'
import { PatentLookupService } from './lib/patents/lookup'
import { PatentStatusService } from './lib/patents/status-service'
import {
  InMemoryRateLimitStore,
  RateLimiter,
  SupabaseRateLimitStore,
  type RateLimitStore,
} from './lib/rate-limit/rate-limiter'
import { createAdapterRegistry } from './lib/search/adapters'
import { createClient } from './lib/supabase/server'
import { InMemoryUsageRecorder, SupabaseUsageRecorder, type UsageRecorder } from './lib/usage/usage-recorder'

export * from './lib/errors'
export { loadConfig, parseTier, TIERS } from './lib/config'
export type { AppConfig, Tier, TierLimits } from './lib/config'
export { logger, createChildLogger } from './lib/logger'
export { normalize, identifierKey, displayIdentifier } from './lib/patents/identifier'
export { createPatentRecord, calculateExpiryDate } from './lib/patents/record'
export { JURISDICTIONS } from './lib/patents/types'
export type {
  CacheEntry,
  CanonicalIdentifier,
  FetchResult,
  PatentRecord,
  PatentSource,
  PatentStatus,
  PatentStatusResponse,
  SourceAdapter,
  SupportedJurisdiction,
} from './lib/patents/types'
export { PatentLookupService } from './lib/patents/lookup'
export type { LookupResult, LookupState, RefreshReport } from './lib/patents/lookup'
export { PatentStatusService, hashClientKey, toStatusResponse } from './lib/patents/status-service'
export type {
  StatusRequest,
  StatusResult,
  RateLimitInfo,
  HealthReport,
  TierUsageReport,
  UsageTimeline,
} from './lib/patents/status-service'
export { InMemoryPatentCache, SupabasePatentCache, isStale } from './lib/cache/patent-cache'
export type { PatentCacheStore } from './lib/cache/patent-cache'
export { RateLimiter, InMemoryRateLimitStore, SupabaseRateLimitStore } from './lib/rate-limit/rate-limiter'
export type { RateLimitDecision, RateLimitStore, RateLimitWindow } from './lib/rate-limit/rate-limiter'
export {
  InMemoryUsageRecorder,
  SupabaseUsageRecorder,
  summarizeByTier,
  summarizeTimeline,
  summarizeUsage,
} from './lib/usage/usage-recorder'
export type {
  DailyUsage,
  TierUsage,
  UsageLogEntry,
  UsageQuery,
  UsageRecorder,
  UsageSummary,
} from './lib/usage/usage-recorder'
export { EPOClient } from './lib/search/epo'
export { USPTOClient } from './lib/search/uspto'
export { createAdapterRegistry } from './lib/search/adapters'
export type { AdapterRegistry } from './lib/search/adapters'

interface Stores {
  cache: PatentCacheStore
  rateLimits: RateLimitStore
  usage: UsageRecorder
}

function createStores(config: AppConfig): Stores {
  if (!config.supabase) {
    logger.warn('Supabase is not configured, using in-memory stores')
    return {
      cache: new InMemoryPatentCache(),
      rateLimits: new InMemoryRateLimitStore(),
      usage: new InMemoryUsageRecorder(),
    }
  }

  const supabase = createClient(config)
  return {
    cache: new SupabasePatentCache(supabase),
    rateLimits: new SupabaseRateLimitStore(supabase),
    usage: new SupabaseUsageRecorder(supabase),
  }
}

/**
 * Wires config, stores, adapters, limiter and orchestrator into the request pipeline
 */
export function createPatentStatusService(config: AppConfig = loadConfig()): PatentStatusService {
  const stores = createStores(config)
  const lookup = new PatentLookupService({
    cache: stores.cache,
    adapters: createAdapterRegistry(config),
    ttlDays: config.cache.ttlDays,
    retryBackoffMs: config.retryBackoffMs,
  })

  return new PatentStatusService({
    lookup,
    cache: stores.cache,
    rateLimiter: new RateLimiter(config.tierLimits, stores.rateLimits),
    usage: stores.usage,
    appVersion: config.appVersion,
    refreshTopN: config.cache.refreshTopN,
  })
}
