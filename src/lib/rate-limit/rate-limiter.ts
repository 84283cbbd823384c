// Monthly tiered rate limiting
// - One window per client key, starting on the first day of the current UTC month
// - Rollover happens before the admission check; denied requests are not counted
// - Enterprise has no numeric limit: requests are counted but never denied

import type { SupabaseClient } from '@supabase/supabase-js'
import { parseTier, type Tier, type TierLimits } from '../config'
import { createChildLogger } from '../logger'
import { admitRequestResultSchema, rateLimitWindowRowSchema } from '@/types/database'
import { KeyedMutex } from './keyed-mutex'

const log = createChildLogger({ module: 'rate-limiter' })

export interface RateLimitWindow {
  readonly clientKey: string
  readonly tier: Tier
  readonly windowStart: string // ISO, first instant of the month
  readonly requestCount: number
}

export interface AdmissionRequest {
  clientKey: string
  tier: Tier
  limit: number | null
  now: Date
}

export interface AdmissionOutcome {
  admitted: boolean
  window: RateLimitWindow
}

export type RateLimitDecision =
  | { allowed: true; limit: number | null; remaining: number | null; resetAt: string }
  | { allowed: false; limit: number; remaining: 0; resetAt: string }

export interface RateLimitStatus {
  limit: number | null
  remaining: number | null
  resetAt: string
  requestCount: number
}

export function startOfMonth(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), 1))
}

export function startOfNextMonth(now: Date): Date {
  return new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() + 1, 1))
}

/**
 * Rolls the window into the month of `now` when it belongs to an earlier one
 */
export function rollWindow(
  window: RateLimitWindow | null,
  clientKey: string,
  tier: Tier,
  now: Date
): RateLimitWindow {
  const currentStart = startOfMonth(now)
  if (!window || Date.parse(window.windowStart) < currentStart.getTime()) {
    return { clientKey, tier, windowStart: currentStart.toISOString(), requestCount: 0 }
  }
  return { ...window, tier }
}

/**
 * Pure admission step: rollover, compare, increment
 * Every store runs this (or its SQL twin) atomically per client key
 */
export function applyAdmission(window: RateLimitWindow | null, request: AdmissionRequest): AdmissionOutcome {
  const current = rollWindow(window, request.clientKey, request.tier, request.now)
  if (request.limit !== null && current.requestCount >= request.limit) {
    return { admitted: false, window: current }
  }
  return { admitted: true, window: { ...current, requestCount: current.requestCount + 1 } }
}

export interface RateLimitStore {
  /** Atomic read-rollover-compare-increment for one client key */
  admit(request: AdmissionRequest): Promise<AdmissionOutcome>
  peek(clientKey: string): Promise<RateLimitWindow | null>
}

/**
 * Process-local store; the keyed mutex makes admit atomic per client key
 */
export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly windows = new Map<string, RateLimitWindow>()
  private readonly mutex = new KeyedMutex()

  async admit(request: AdmissionRequest): Promise<AdmissionOutcome> {
    return this.mutex.runExclusive(request.clientKey, async () => {
      const existing = await this.read(request.clientKey)
      const outcome = applyAdmission(existing, request)
      await this.write(outcome.window)
      return outcome
    })
  }

  async peek(clientKey: string): Promise<RateLimitWindow | null> {
    return this.read(clientKey)
  }

  private async read(clientKey: string): Promise<RateLimitWindow | null> {
    return this.windows.get(clientKey) ?? null
  }

  private async write(window: RateLimitWindow): Promise<void> {
    this.windows.set(window.clientKey, Object.freeze({ ...window }))
  }
}

/**
 * Supabase-backed store (table rate_limit_windows)
 * admit_request locks the client's row, so admission is atomic across processes
 */
export class SupabaseRateLimitStore implements RateLimitStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async admit(request: AdmissionRequest): Promise<AdmissionOutcome> {
    const { data, error } = await this.supabase.rpc('admit_request', {
      p_client_key: request.clientKey,
      p_tier: request.tier,
      p_limit: request.limit,
      p_window_start: startOfMonth(request.now).toISOString(),
    })

    if (error) throw new Error(`admit_request failed: ${error.message}`)
    const row = admitRequestResultSchema.parse(Array.isArray(data) ? data[0] : data)
    return {
      admitted: row.is_admitted,
      window: {
        clientKey: request.clientKey,
        tier: request.tier,
        windowStart: new Date(row.current_window_start).toISOString(),
        requestCount: row.current_count,
      },
    }
  }

  async peek(clientKey: string): Promise<RateLimitWindow | null> {
    const { data, error } = await this.supabase
      .from('rate_limit_windows')
      .select('*')
      .eq('client_key', clientKey)
      .maybeSingle()

    if (error) throw new Error(`rate_limit_windows read failed: ${error.message}`)
    if (!data) return null

    const row = rateLimitWindowRowSchema.parse(data)
    return {
      clientKey: row.client_key,
      tier: parseTier(row.tier),
      windowStart: new Date(row.window_start).toISOString(),
      requestCount: row.request_count,
    }
  }
}

/**
 * Applies the tier table to a store and reports limit/remaining/reset for the response headers
 */
export class RateLimiter {
  constructor(
    private readonly limits: TierLimits,
    private readonly store: RateLimitStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  limitFor(tier: Tier): number | null {
    return this.limits[tier]
  }

  async admit(clientKey: string, tier: Tier): Promise<RateLimitDecision> {
    const now = this.now()
    const limit = this.limitFor(tier)
    const resetAt = startOfNextMonth(now).toISOString()

    let outcome: AdmissionOutcome
    try {
      outcome = await this.store.admit({ clientKey, tier, limit, now })
    } catch (error) {
      // A broken counter store must not take the lookup down with it
      log.error({ err: error, tier }, 'Rate limit store failed, admitting request')
      return { allowed: true, limit, remaining: null, resetAt }
    }

    if (!outcome.admitted && limit !== null) {
      log.info({ tier, limit, requestCount: outcome.window.requestCount }, 'Rate limit exceeded')
      return { allowed: false, limit, remaining: 0, resetAt }
    }

    return {
      allowed: true,
      limit,
      remaining: limit === null ? null : Math.max(limit - outcome.window.requestCount, 0),
      resetAt,
    }
  }

  /**
   * Current window without counting a request
   */
  async peek(clientKey: string, tier: Tier): Promise<RateLimitStatus> {
    const now = this.now()
    const limit = this.limitFor(tier)
    const window = rollWindow(await this.store.peek(clientKey), clientKey, tier, now)
    return {
      limit,
      remaining: limit === null ? null : Math.max(limit - window.requestCount, 0),
      resetAt: startOfNextMonth(now).toISOString(),
      requestCount: window.requestCount,
    }
  }
}
