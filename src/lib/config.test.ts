import { describe, expect, it } from 'vitest'
import { loadConfig, parseTier } from './config'
import { ConfigurationError } from './errors'

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadConfig({})
    expect(config.supabase).toBeNull()
    expect(config.epo).toEqual({ consumerKey: '', consumerSecret: '', baseUrl: 'https://ops.epo.org/3.2' })
    expect(config.uspto).toEqual({ apiKey: '', baseUrl: 'https://api.uspto.gov' })
    expect(config.cache).toEqual({ ttlDays: 30, refreshTopN: 100 })
    expect(config.tierLimits).toEqual({ free: 20, starter: 1000, pro: 10000, enterprise: null })
    expect(config.requestTimeoutMs).toBe(30000)
    expect(config.retryBackoffMs).toBe(500)
    expect(config.appVersion).toBe('1.0.0')
    expect(Object.isFrozen(config)).toBe(true)
  })

  it('reads overrides and treats blank values as unset', () => {
    const config = loadConfig({
      CACHE_TTL_DAYS: '7',
      RATE_LIMIT_FREE: '5',
      RETRY_BACKOFF_MS: '',
      USPTO_BASE_URL: 'https://uspto.test/',
      USPTO_API_KEY: 'test-key',
      SUPABASE_URL: 'https://db.test',
      SUPABASE_SERVICE_ROLE_KEY: 'test-secret',
    })
    expect(config.cache.ttlDays).toBe(7)
    expect(config.tierLimits.free).toBe(5)
    expect(config.retryBackoffMs).toBe(500)
    expect(config.uspto).toEqual({ apiKey: 'test-key', baseUrl: 'https://uspto.test' })
    expect(config.supabase).toEqual({ url: 'https://db.test', serviceRoleKey: 'test-secret' })
  })

  it('rejects invalid values', () => {
    expect(() => loadConfig({ CACHE_TTL_DAYS: 'soon' })).toThrow(ConfigurationError)
    expect(() => loadConfig({ EPO_BASE_URL: 'not a url' })).toThrow(ConfigurationError)
  })

  it('requires the service key alongside the Supabase URL', () => {
    expect(() => loadConfig({ SUPABASE_URL: 'https://db.test' })).toThrow(ConfigurationError)
  })
})

describe('parseTier', () => {
  it('maps known tiers case-insensitively', () => {
    expect(parseTier('PRO')).toBe('pro')
    expect(parseTier(' enterprise ')).toBe('enterprise')
  })

  it('treats basic as starter', () => {
    expect(parseTier('basic')).toBe('starter')
  })

  it('falls back to free', () => {
    expect(parseTier('gold')).toBe('free')
    expect(parseTier(undefined)).toBe('free')
    expect(parseTier(null)).toBe('free')
  })
})
