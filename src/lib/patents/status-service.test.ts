import { createHash } from 'node:crypto'
import { describe, expect, it, vi } from 'vitest'
import { InMemoryPatentCache } from '../cache/patent-cache'
import type { TierLimits } from '../config'
import { RateLimitExceededError } from '../errors'
import { InMemoryRateLimitStore, RateLimiter } from '../rate-limit/rate-limiter'
import type { AdapterRegistry } from '../search/adapters'
import { InMemoryUsageRecorder } from '../usage/usage-recorder'
import { PatentLookupService } from './lookup'
import { createPatentRecord } from './record'
import { PatentStatusService, hashClientKey } from './status-service'
import type { CanonicalIdentifier, FetchOptions, FetchResult, PatentRecord } from './types'

const NOW = new Date('2026-10-18T12:00:00.000Z')
const LIMITS: TierLimits = { free: 2, starter: 1000, pro: 10000, enterprise: null }

const EP_RECORD: PatentRecord = createPatentRecord({
  identifier: 'EP1234567',
  status: 'Expired',
  expiryDate: '2021-11-04',
  jurisdictions: { primary: 'EP', codes: ['EP', 'DE'] },
  lapseReason: null,
  source: 'EPO',
  fetchedAt: '2026-10-18T12:00:00.000Z',
})

function setup(epoResults: FetchResult[] = []) {
  const epoFetch = vi.fn<(id: CanonicalIdentifier, options?: FetchOptions) => Promise<FetchResult>>()
  for (const result of epoResults) {
    epoFetch.mockResolvedValueOnce(result)
  }
  const usptoFetch = vi.fn<(id: CanonicalIdentifier, options?: FetchOptions) => Promise<FetchResult>>()
  const adapters: AdapterRegistry = {
    EP: { source: 'EPO', fetch: epoFetch },
    US: { source: 'USPTO', fetch: usptoFetch },
  }

  const cache = new InMemoryPatentCache(() => NOW)
  const usage = new InMemoryUsageRecorder()
  const now = () => NOW
  const service = new PatentStatusService({
    lookup: new PatentLookupService({ cache, adapters, ttlDays: 30, retryBackoffMs: 0, now }),
    cache,
    rateLimiter: new RateLimiter(LIMITS, new InMemoryRateLimitStore(), now),
    usage,
    appVersion: '1.2.3',
    refreshTopN: 100,
    now,
  })
  return { service, cache, usage, epoFetch }
}

describe('hashClientKey', () => {
  it('returns the SHA-256 hex digest', () => {
    const expected = createHash('sha256').update('test-key').digest('hex')
    expect(hashClientKey('test-key')).toBe(expected)
    expect(expected).toMatch(/^[0-9a-f]{64}$/)
  })
})

describe('PatentStatusService.getStatus', () => {
  it('returns the response record and rate-limit metadata', async () => {
    const { service, usage } = setup([{ kind: 'found', record: EP_RECORD }])

    const result = await service.getStatus({ patent: 'ep 1234567 b1', clientKey: 'test-key', tier: 'free' })

    expect(result).toEqual({
      ok: true,
      data: {
        identifier: 'EP1234567',
        status: 'Expired',
        expiry_date: '2021-11-04',
        jurisdictions: { primary: 'EP', codes: ['EP', 'DE'] },
        lapse_reason: null,
        source: 'EPO',
        fetched_at: '2026-10-18T12:00:00.000Z',
        cache_hit: false,
        degraded: false,
      },
      rateLimit: { limit: 2, remaining: 1, reset_at: '2026-11-01T00:00:00.000Z' },
    })

    expect(await usage.list(new Date(0))).toEqual([
      {
        identifier: 'EP1234567',
        clientKeyHash: hashClientKey('test-key'),
        tier: 'free',
        cacheHit: false,
        degraded: false,
        source: 'EPO',
        durationMs: 0,
        statusCode: 200,
        createdAt: '2026-10-18T12:00:00.000Z',
      },
    ])
  })

  it('serves the second request from cache', async () => {
    const { service, epoFetch } = setup([{ kind: 'found', record: EP_RECORD }])
    await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'pro' })

    const second = await service.getStatus({ patent: 'EP1234567B1', clientKey: 'test-key', tier: 'pro' })

    expect(second.ok && second.data.cache_hit).toBe(true)
    expect(epoFetch).toHaveBeenCalledTimes(1)
  })

  it('rejects a malformed identifier with a 400 and no upstream call', async () => {
    const { service, usage, epoFetch } = setup()

    const result = await service.getStatus({ patent: 'XX123', clientKey: 'test-key', tier: 'free' })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.statusCode).toBe(400)
      expect(result.error.toJSON()).toEqual({
        error: 'INVALID_IDENTIFIER_FORMAT',
        message: 'Invalid patent format',
        detail: "Patent 'XX123' has invalid format: jurisdiction 'XX' is not supported (supported: EP, US). Expected: EP1234567 or US7654321",
      })
    }
    expect(epoFetch).not.toHaveBeenCalled()
    expect((await usage.list(new Date(0)))[0]).toMatchObject({ identifier: 'XX123', statusCode: 400, source: null })
  })

  it('denies requests over the tier limit with the reset time', async () => {
    const { service, usage } = setup([
      { kind: 'found', record: EP_RECORD },
    ])
    await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'free' })
    await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'free' })

    const denied = await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'free' })

    expect(denied.ok).toBe(false)
    if (!denied.ok) {
      expect(denied.error).toBeInstanceOf(RateLimitExceededError)
      expect(denied.error.statusCode).toBe(429)
      expect(denied.rateLimit).toEqual({ limit: 2, remaining: 0, reset_at: '2026-11-01T00:00:00.000Z' })
    }
    const entries = await usage.list(new Date(0))
    expect(entries.map(entry => entry.statusCode)).toEqual([200, 200, 429])
  })

  it('limits each client key separately', async () => {
    const { service } = setup([{ kind: 'found', record: EP_RECORD }])
    await service.getStatus({ patent: 'EP1234567', clientKey: 'client-a', tier: 'free' })
    await service.getStatus({ patent: 'EP1234567', clientKey: 'client-a', tier: 'free' })

    const other = await service.getStatus({ patent: 'EP1234567', clientKey: 'client-b', tier: 'free' })
    expect(other.ok).toBe(true)
  })

  it('maps not found to a 404', async () => {
    const { service } = setup([{ kind: 'not_found', source: 'EPO' }])

    const result = await service.getStatus({ patent: 'EP0000001', clientKey: 'test-key', tier: 'pro' })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.toJSON()).toEqual({
        error: 'NOT_FOUND_UPSTREAM',
        message: 'Patent not found',
        detail: 'Patent EP0000001 not found in EPO',
      })
      expect(result.error.statusCode).toBe(404)
    }
  })

  it('maps an unavailable upstream to a 503', async () => {
    const failure: FetchResult = { kind: 'transient_failure', source: 'EPO', reason: 'EPO API error: HTTP 503', status: 503 }
    const { service } = setup([failure, failure])

    const result = await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'pro' })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('UPSTREAM_TRANSIENT_FAILURE')
      expect(result.error.statusCode).toBe(503)
      expect(result.error.toJSON().detail).toBe('EPO API error: HTTP 503')
    }
  })

  it('serves a stale record flagged as degraded when the refresh fails', async () => {
    const staleRecord = createPatentRecord({ ...EP_RECORD, fetchedAt: '2026-08-01T00:00:00.000Z' })
    const failure: FetchResult = { kind: 'transient_failure', source: 'EPO', reason: 'EPO API error: HTTP 503', status: 503 }
    const { service, cache, usage, epoFetch } = setup([failure])
    await cache.put('EP1234567', staleRecord)

    const result = await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'pro' })

    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.data.cache_hit).toBe(true)
      expect(result.data.degraded).toBe(true)
      expect(result.data.fetched_at).toBe('2026-08-01T00:00:00.000Z')
    }
    expect(epoFetch).toHaveBeenCalledTimes(1)
    expect((await usage.list(new Date(0)))[0]).toMatchObject({ statusCode: 200, cacheHit: true, degraded: true })
  })

  it('maps rejected credentials to a degraded service', async () => {
    const { service } = setup([{ kind: 'auth_failure', source: 'EPO', reason: 'EPO rejected the credential (HTTP 401)' }])

    const result = await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'pro' })

    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error.code).toBe('SERVICE_DEGRADED')
      expect(result.error.statusCode).toBe(503)
    }
  })

  it('still answers when the usage log cannot be written', async () => {
    const { service, usage } = setup([{ kind: 'found', record: EP_RECORD }])
    vi.spyOn(usage, 'record').mockRejectedValue(new Error('insert failed'))

    const result = await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'pro' })
    expect(result.ok).toBe(true)
  })

  it('buckets requests without a client key together', async () => {
    const { service, usage } = setup([{ kind: 'found', record: EP_RECORD }])
    await service.getStatus({ patent: 'EP1234567' })
    await service.getStatus({ patent: 'EP1234567' })

    const third = await service.getStatus({ patent: 'EP1234567' })

    expect(third.ok).toBe(false)
    expect((await usage.list(new Date(0)))[0]?.clientKeyHash).toBeNull()
  })
})

describe('PatentStatusService maintenance', () => {
  it('reports health with the cache size', async () => {
    const { service, cache } = setup()
    await cache.put('EP1234567', EP_RECORD)

    expect(await service.checkHealth()).toEqual({
      status: 'healthy',
      version: '1.2.3',
      cache: { reachable: true, entries: 1 },
      timestamp: '2026-10-18T12:00:00.000Z',
    })
  })

  it('reports degraded health when the cache is unreachable', async () => {
    const { service, cache } = setup()
    vi.spyOn(cache, 'count').mockRejectedValue(new Error('connection refused'))

    expect(await service.checkHealth()).toMatchObject({
      status: 'degraded',
      cache: { reachable: false, entries: null },
    })
  })

  it('clears a cache entry by any accepted spelling', async () => {
    const { service, cache } = setup()
    await cache.put('EP1234567', EP_RECORD)

    expect(await service.clearCache('ep 1234567 b1')).toBe(1)
    expect(await cache.count()).toBe(0)
  })

  it('refreshes popular stale entries', async () => {
    const { service, cache, epoFetch } = setup([{ kind: 'found', record: EP_RECORD }])
    await cache.put('EP1234567', createPatentRecord({ ...EP_RECORD, fetchedAt: '2026-08-01T00:00:00.000Z' }))

    expect(await service.refreshPopular()).toEqual({ checked: 1, refreshed: 1, notFound: 0, failed: 0 })
    expect(epoFetch).toHaveBeenCalledTimes(1)
    expect((await cache.get('EP1234567'))?.lastFetched).toBe('2026-10-18T12:00:00.000Z')
  })

  it('summarizes usage over a period', async () => {
    const { service } = setup([{ kind: 'found', record: EP_RECORD }])
    await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'pro' })
    await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'pro' })

    const overview = await service.getUsageOverview(7)

    expect(overview).toMatchObject({
      periodDays: 7,
      totalRequests: 2,
      cacheHits: 1,
      cacheHitRate: 50,
      statusCodes: { '200': 2 },
      sources: { EPO: 2 },
      topPatents: [{ identifier: 'EP1234567', requests: 2 }],
    })
  })

  it('breaks usage down by tier', async () => {
    const { service } = setup([{ kind: 'found', record: EP_RECORD }])
    await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'pro' })
    await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'pro' })
    await service.getStatus({ patent: 'EP1234567' })

    expect(await service.getUsageByTier()).toEqual({
      periodDays: 30,
      tiers: [
        { tier: 'pro', requests: 2, uniqueClients: 1 },
        { tier: 'free', requests: 1, uniqueClients: 0 },
      ],
    })
  })

  it('reports a daily timeline', async () => {
    const { service } = setup([{ kind: 'found', record: EP_RECORD }])
    await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'pro' })
    await service.getStatus({ patent: 'EP1234567', clientKey: 'test-key', tier: 'pro' })
    await service.getStatus({ patent: 'EP1234567' })

    expect(await service.getUsageTimeline()).toEqual({
      periodDays: 7,
      timeline: [{ date: '2026-10-18', requests: 3, cacheHits: 2, cacheHitRate: 66.67 }],
    })
  })
})
