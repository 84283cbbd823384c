// Service configuration
// Read once at startup, validated with zod, then passed explicitly to every component

import { z } from 'zod'
import { ConfigurationError } from './errors'

export const TIERS = ['free', 'starter', 'pro', 'enterprise'] as const
export type Tier = (typeof TIERS)[number]

// null = not enforced numerically
export type TierLimits = Readonly<Record<Tier, number | null>>

export interface AppConfig {
  readonly appVersion: string
  readonly supabase: Readonly<{ url: string; serviceRoleKey: string }> | null
  readonly epo: Readonly<{ consumerKey: string; consumerSecret: string; baseUrl: string }>
  readonly uspto: Readonly<{ apiKey: string; baseUrl: string }>
  readonly cache: Readonly<{ ttlDays: number; refreshTopN: number }>
  readonly tierLimits: TierLimits
  readonly requestTimeoutMs: number
  readonly retryBackoffMs: number
}

// Blank env vars behave as unset so defaults still apply
const blankAsUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value

const optionalString = z.preprocess(blankAsUndefined, z.string().trim().optional())
const count = (fallback: number) =>
  z.preprocess(blankAsUndefined, z.coerce.number().int().nonnegative().default(fallback))

const envSchema = z.object({
  APP_VERSION: optionalString,
  SUPABASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  SUPABASE_SERVICE_ROLE_KEY: optionalString,
  EPO_CONSUMER_KEY: optionalString,
  EPO_CONSUMER_SECRET: optionalString,
  EPO_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().default('https://ops.epo.org/3.2')),
  USPTO_API_KEY: optionalString,
  USPTO_BASE_URL: z.preprocess(blankAsUndefined, z.string().url().default('https://api.uspto.gov')),
  CACHE_TTL_DAYS: count(30),
  CACHE_REFRESH_TOP_N: count(100),
  RATE_LIMIT_FREE: count(20),
  RATE_LIMIT_STARTER: count(1000),
  RATE_LIMIT_PRO: count(10000),
  REQUEST_TIMEOUT_MS: count(30000),
  RETRY_BACKOFF_MS: count(500),
})

/**
 * Builds the immutable configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    )
  }

  const values = parsed.data
  if (values.SUPABASE_URL && !values.SUPABASE_SERVICE_ROLE_KEY) {
    throw new ConfigurationError(['SUPABASE_SERVICE_ROLE_KEY: required when SUPABASE_URL is set'])
  }

  const supabase = values.SUPABASE_URL && values.SUPABASE_SERVICE_ROLE_KEY
    ? Object.freeze({ url: values.SUPABASE_URL, serviceRoleKey: values.SUPABASE_SERVICE_ROLE_KEY })
    : null

  return Object.freeze({
    appVersion: values.APP_VERSION || '1.0.0',
    supabase,
    epo: Object.freeze({
      consumerKey: values.EPO_CONSUMER_KEY || '',
      consumerSecret: values.EPO_CONSUMER_SECRET || '',
      baseUrl: values.EPO_BASE_URL.replace(/\/+$/, ''),
    }),
    uspto: Object.freeze({
      apiKey: values.USPTO_API_KEY || '',
      baseUrl: values.USPTO_BASE_URL.replace(/\/+$/, ''),
    }),
    cache: Object.freeze({
      ttlDays: values.CACHE_TTL_DAYS,
      refreshTopN: values.CACHE_REFRESH_TOP_N,
    }),
    tierLimits: Object.freeze({
      free: values.RATE_LIMIT_FREE,
      starter: values.RATE_LIMIT_STARTER,
      pro: values.RATE_LIMIT_PRO,
      enterprise: null,
    }),
    requestTimeoutMs: values.REQUEST_TIMEOUT_MS,
    retryBackoffMs: values.RETRY_BACKOFF_MS,
  })
}

/**
 * Maps a caller-supplied tier string onto a known tier
 * "basic" is the marketplace name for the starter plan; anything unknown is free
 */
export function parseTier(raw: string | null | undefined): Tier {
  const value = (raw || '').trim().toLowerCase()
  if (value === 'basic') return 'starter'
  const match = TIERS.find(tier => tier === value)
  return match ?? 'free'
}
