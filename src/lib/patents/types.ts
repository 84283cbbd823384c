// Patent Status Types and Interfaces

export const JURISDICTIONS = ['EP', 'US'] as const
export type SupportedJurisdiction = (typeof JURISDICTIONS)[number]

export type PatentStatus = 'Granted' | 'Expired' | 'Lapsed' | 'Unknown'

export type PatentSource = 'EPO' | 'USPTO'

export interface CanonicalIdentifier {
  readonly jurisdiction: SupportedJurisdiction
  readonly number: string // digits only, e.g. "1234567"
  readonly kind: string | null // publication kind code, e.g. "B1"
}

export interface Jurisdictions {
  readonly primary: string
  readonly codes: readonly string[] // ordered, de-duplicated, primary first
}

export interface PatentRecord {
  readonly identifier: string // cache key form, e.g. "EP1234567"
  readonly status: PatentStatus
  readonly expiryDate: string | null // YYYY-MM-DD
  readonly jurisdictions: Jurisdictions
  readonly lapseReason: string | null
  readonly source: PatentSource
  readonly fetchedAt: string // ISO timestamp
}

export interface CacheEntry {
  readonly key: string
  readonly record: PatentRecord
  readonly fetchCount: number
  readonly lastFetched: string // ISO timestamp, changes only on refresh
  readonly createdAt: string
}

// Uniform failure taxonomy every source adapter reports in
export type FetchResult =
  | { kind: 'found'; record: PatentRecord }
  | { kind: 'not_found'; source: PatentSource }
  | { kind: 'transient_failure'; source: PatentSource; reason: string; status?: number }
  | { kind: 'auth_failure'; source: PatentSource; reason: string }

export interface FetchOptions {
  signal?: AbortSignal
}

/**
 * Capability shared by every upstream patent office
 */
export interface SourceAdapter {
  readonly source: PatentSource
  fetch(id: CanonicalIdentifier, options?: FetchOptions): Promise<FetchResult>
}

// Response record handed to the presentation layer
export interface PatentStatusResponse {
  identifier: string
  status: PatentStatus
  expiry_date: string | null
  jurisdictions: {
    primary: string
    codes: string[]
  }
  lapse_reason: string | null
  source: PatentSource
  fetched_at: string
  cache_hit: boolean
  degraded: boolean // true only when a stale record is served after a failed refresh
}
