// Patent Lookup Orchestrator
//
// CacheCheck → HitFresh | HitStaleRefresh | Miss → AdapterFetch → CacheWrite → Done | Failed
//
// - Fresh hit: served from cache, no upstream call
// - Miss: one adapter (chosen by jurisdiction), one retry on transient failure, then unavailable
// - Stale hit: synchronous refresh; if it fails the stale record is served as degraded
// - NotFound is never cached
// - Cache outages degrade to direct upstream lookups, they never fail a request on their own

import { isStale, staleCutoff, type PatentCacheStore } from '../cache/patent-cache'
import { createChildLogger, type Logger } from '../logger'
import type { AdapterRegistry } from '../search/adapters'
import { withRetry } from '../search/retry'
import { identifierKey, normalize } from './identifier'
import type {
  CacheEntry,
  CanonicalIdentifier,
  FetchResult,
  PatentRecord,
  PatentSource,
  SourceAdapter,
} from './types'

export type LookupState = 'hit_fresh' | 'hit_stale_refreshed' | 'hit_stale_degraded' | 'miss'

export type LookupResult =
  | {
      kind: 'found'
      record: PatentRecord
      state: LookupState
      cacheHit: boolean
      refreshed: boolean
      degraded: boolean
    }
  | { kind: 'not_found'; source: PatentSource }
  | {
      kind: 'unavailable'
      reason: 'upstream_unavailable' | 'service_degraded'
      source: PatentSource
      detail: string
    }

export interface RefreshReport {
  checked: number
  refreshed: number
  notFound: number
  failed: number
}

export interface PatentLookupOptions {
  cache: PatentCacheStore
  adapters: AdapterRegistry
  ttlDays: number
  retryBackoffMs: number
  now?: () => Date
  logger?: Logger
}

const MISS_ATTEMPTS = 2

export class PatentLookupService {
  private readonly cache: PatentCacheStore
  private readonly adapters: AdapterRegistry
  private readonly ttlDays: number
  private readonly retryBackoffMs: number
  private readonly now: () => Date
  private readonly log: Logger

  constructor(options: PatentLookupOptions) {
    this.cache = options.cache
    this.adapters = options.adapters
    this.ttlDays = options.ttlDays
    this.retryBackoffMs = options.retryBackoffMs
    this.now = options.now ?? (() => new Date())
    this.log = options.logger ?? createChildLogger({ module: 'lookup' })
  }

  async lookup(id: CanonicalIdentifier): Promise<LookupResult> {
    const key = identifierKey(id)
    const adapter = this.adapters[id.jurisdiction]

    let entry: CacheEntry | null = null
    let cacheReadable = true
    try {
      entry = await this.cache.get(key)
    } catch (error) {
      cacheReadable = false
      this.log.error({ identifier: key, err: error }, 'Cache read failed, querying upstream directly')
    }

    if (entry && !isStale(entry, this.now(), this.ttlDays)) {
      this.log.debug({ identifier: key }, 'Cache hit (fresh)')
      await this.countRead(key)
      return {
        kind: 'found',
        record: entry.record,
        state: 'hit_fresh',
        cacheHit: true,
        refreshed: false,
        degraded: false,
      }
    }

    if (entry) {
      return this.refreshEntry(id, entry, adapter)
    }
    return this.fetchMiss(id, adapter, cacheReadable)
  }

  /**
   * Refreshes the most requested stale entries, one upstream call at a time
   */
  async refreshStale(limit: number): Promise<RefreshReport> {
    const candidates = await this.cache.listStale(staleCutoff(this.now(), this.ttlDays), limit)
    const report: RefreshReport = { checked: candidates.length, refreshed: 0, notFound: 0, failed: 0 }

    for (const entry of candidates) {
      let id: CanonicalIdentifier
      try {
        id = normalize(entry.key)
      } catch (error) {
        this.log.warn({ identifier: entry.key, err: error }, 'Cached key is not a valid identifier')
        report.failed++
        continue
      }

      const result = await this.adapters[id.jurisdiction].fetch(id)
      if (result.kind === 'found') {
        const stored = await this.store(entry.key, result.record)
        if (stored) report.refreshed++
        else report.failed++
      } else if (result.kind === 'not_found') {
        report.notFound++
      } else {
        report.failed++
      }
    }

    this.log.info({ ...report, limit }, 'Stale cache refresh finished')
    return report
  }

  private async fetchMiss(
    id: CanonicalIdentifier,
    adapter: SourceAdapter,
    cacheWritable: boolean
  ): Promise<LookupResult> {
    const key = identifierKey(id)
    this.log.debug({ identifier: key, source: adapter.source }, 'Cache miss')

    const { value: result, attempts } = await withRetry(() => adapter.fetch(id), {
      maxAttempts: MISS_ATTEMPTS,
      initialDelayMs: this.retryBackoffMs,
      backoffMultiplier: 1,
      shouldRetry: (value: FetchResult) => value.kind === 'transient_failure',
      onRetry: (value, attempt, delayMs) => {
        this.log.warn({ identifier: key, attempt, delayMs, result: value }, 'Transient upstream failure, retrying')
      },
    })

    switch (result.kind) {
      case 'found':
        if (cacheWritable) {
          await this.store(key, result.record)
        }
        return {
          kind: 'found',
          record: result.record,
          state: 'miss',
          cacheHit: false,
          refreshed: false,
          degraded: false,
        }
      case 'not_found':
        this.log.info({ identifier: key, source: result.source }, 'Patent not found upstream')
        return { kind: 'not_found', source: result.source }
      case 'transient_failure':
        this.log.error({ identifier: key, attempts, reason: result.reason }, 'Upstream unavailable')
        return { kind: 'unavailable', reason: 'upstream_unavailable', source: result.source, detail: result.reason }
      case 'auth_failure':
        this.log.error({ identifier: key, reason: result.reason }, 'Upstream rejected credentials')
        return { kind: 'unavailable', reason: 'service_degraded', source: result.source, detail: result.reason }
    }
  }

  private async refreshEntry(
    id: CanonicalIdentifier,
    entry: CacheEntry,
    adapter: SourceAdapter
  ): Promise<LookupResult> {
    const key = entry.key
    this.log.debug({ identifier: key, lastFetched: entry.lastFetched }, 'Cache hit (stale), refreshing')

    const result = await adapter.fetch(id)
    switch (result.kind) {
      case 'found':
        await this.store(key, result.record)
        return {
          kind: 'found',
          record: result.record,
          state: 'hit_stale_refreshed',
          cacheHit: true,
          refreshed: true,
          degraded: false,
        }
      case 'not_found':
        this.log.warn({ identifier: key, source: result.source }, 'Cached patent no longer found upstream')
        return { kind: 'not_found', source: result.source }
      case 'transient_failure':
      case 'auth_failure':
        this.log.warn({ identifier: key, reason: result.reason }, 'Refresh failed, serving stale record')
        await this.countRead(key)
        return {
          kind: 'found',
          record: entry.record,
          state: 'hit_stale_degraded',
          cacheHit: true,
          refreshed: false,
          degraded: true,
        }
    }
  }

  private async store(key: string, record: PatentRecord): Promise<boolean> {
    try {
      await this.cache.put(key, record)
      return true
    } catch (error) {
      this.log.error({ identifier: key, err: error }, 'Cache write failed, returning result anyway')
      return false
    }
  }

  private async countRead(key: string): Promise<void> {
    try {
      await this.cache.incrementFetchCount(key)
    } catch (error) {
      this.log.warn({ identifier: key, err: error }, 'Fetch counter update failed')
    }
  }
}
