// Patent Status Cache
// - Keyed by canonical identifier (jurisdiction + number)
// - Entries go stale after CACHE_TTL_DAYS but are never deleted by normal operation
// - fetch_count tracks popularity and drives the top-N refresh

import type { SupabaseClient } from '@supabase/supabase-js'
import { CacheUnavailableError } from '../errors'
import { createChildLogger } from '../logger'
import { createPatentRecord, patentRecordSchema } from '../patents/record'
import type { CacheEntry, PatentRecord } from '../patents/types'
import { patentCacheRowSchema } from '@/types/database'

const log = createChildLogger({ module: 'patent-cache' })

const DAY_MS = 24 * 60 * 60 * 1000

export interface PatentCacheStore {
  /** Pure read, counts nothing */
  get(key: string): Promise<CacheEntry | null>
  /** Upsert; resets lastFetched and bumps fetchCount by one */
  put(key: string, record: PatentRecord): Promise<CacheEntry>
  /** Returns the new count, or null when the key is not cached */
  incrementFetchCount(key: string): Promise<number | null>
  listTopRequested(limit: number): Promise<CacheEntry[]>
  /** Entries last fetched before `olderThan`, most requested first */
  listStale(olderThan: Date, limit: number): Promise<CacheEntry[]>
  /** Deletes one entry or everything; returns how many rows went */
  clear(key?: string): Promise<number>
  count(): Promise<number>
}

/**
 * Stale once more than ttlDays have passed since the last refresh
 */
export function isStale(entry: CacheEntry, now: Date, ttlDays: number): boolean {
  return now.getTime() - Date.parse(entry.lastFetched) > ttlDays * DAY_MS
}

export function staleCutoff(now: Date, ttlDays: number): Date {
  return new Date(now.getTime() - ttlDays * DAY_MS)
}

function byFetchCountDesc(a: CacheEntry, b: CacheEntry): number {
  return b.fetchCount - a.fetchCount || a.key.localeCompare(b.key)
}

/**
 * Process-local store, used when Supabase is not configured and in tests
 */
export class InMemoryPatentCache implements PatentCacheStore {
  private readonly entries = new Map<string, CacheEntry>()

  constructor(private readonly now: () => Date = () => new Date()) {}

  async get(key: string): Promise<CacheEntry | null> {
    return this.entries.get(key) ?? null
  }

  async put(key: string, record: PatentRecord): Promise<CacheEntry> {
    const existing = this.entries.get(key)
    let entry: CacheEntry

    if (!existing) {
      entry = {
        key,
        record,
        fetchCount: 1,
        lastFetched: record.fetchedAt,
        createdAt: this.now().toISOString(),
      }
    } else if (Date.parse(record.fetchedAt) < Date.parse(existing.record.fetchedAt)) {
      // A slower concurrent refresh lost the race; keep the newer record
      entry = { ...existing, fetchCount: existing.fetchCount + 1 }
    } else {
      entry = {
        ...existing,
        record,
        fetchCount: existing.fetchCount + 1,
        lastFetched: record.fetchedAt,
      }
    }

    const frozen = Object.freeze(entry)
    this.entries.set(key, frozen)
    return frozen
  }

  async incrementFetchCount(key: string): Promise<number | null> {
    const existing = this.entries.get(key)
    if (!existing) return null
    const fetchCount = existing.fetchCount + 1
    this.entries.set(key, Object.freeze({ ...existing, fetchCount }))
    return fetchCount
  }

  async listTopRequested(limit: number): Promise<CacheEntry[]> {
    return [...this.entries.values()].sort(byFetchCountDesc).slice(0, limit)
  }

  async listStale(olderThan: Date, limit: number): Promise<CacheEntry[]> {
    return [...this.entries.values()]
      .filter(entry => Date.parse(entry.lastFetched) < olderThan.getTime())
      .sort(byFetchCountDesc)
      .slice(0, limit)
  }

  async clear(key?: string): Promise<number> {
    if (key !== undefined) {
      return this.entries.delete(key) ? 1 : 0
    }
    const removed = this.entries.size
    this.entries.clear()
    return removed
  }

  async count(): Promise<number> {
    return this.entries.size
  }
}

/**
 * Maps a patent_cache row onto a CacheEntry, validating the stored record
 */
export function rowToCacheEntry(row: unknown): CacheEntry {
  const parsed = patentCacheRowSchema.parse(row)
  return Object.freeze({
    key: parsed.identifier,
    record: createPatentRecord(patentRecordSchema.parse(parsed.record)),
    fetchCount: parsed.fetch_count,
    lastFetched: parsed.last_fetched,
    createdAt: parsed.created_at,
  })
}

// RPCs returning a table come back as an array
function firstRow(data: unknown): unknown {
  return Array.isArray(data) ? data[0] : data
}

/**
 * Supabase-backed store (table patent_cache)
 * Upsert and counter run as SQL functions so concurrent writers cannot lose increments
 */
export class SupabasePatentCache implements PatentCacheStore {
  constructor(private readonly supabase: SupabaseClient) {}

  async get(key: string): Promise<CacheEntry | null> {
    const { data, error } = await this.supabase
      .from('patent_cache')
      .select('*')
      .eq('identifier', key)
      .maybeSingle()

    if (error) throw new CacheUnavailableError('read', error.message)
    return data ? this.toEntry(data, 'read') : null
  }

  async put(key: string, record: PatentRecord): Promise<CacheEntry> {
    const { data, error } = await this.supabase.rpc('put_patent_cache', {
      p_identifier: key,
      p_record: record,
      p_status: record.status,
      p_source: record.source,
      p_fetched_at: record.fetchedAt,
    })

    if (error) throw new CacheUnavailableError('write', error.message)
    const row = firstRow(data)
    if (!row) throw new CacheUnavailableError('write', `put_patent_cache returned no row for ${key}`)
    return this.toEntry(row, 'write')
  }

  async incrementFetchCount(key: string): Promise<number | null> {
    const { data, error } = await this.supabase.rpc('increment_patent_fetch_count', {
      p_identifier: key,
    })

    if (error) throw new CacheUnavailableError('counter update', error.message)
    return typeof data === 'number' ? data : null
  }

  async listTopRequested(limit: number): Promise<CacheEntry[]> {
    const { data, error } = await this.supabase
      .from('patent_cache')
      .select('*')
      .order('fetch_count', { ascending: false })
      .limit(limit)

    if (error) throw new CacheUnavailableError('read', error.message)
    return this.toEntries(data)
  }

  async listStale(olderThan: Date, limit: number): Promise<CacheEntry[]> {
    const { data, error } = await this.supabase
      .from('patent_cache')
      .select('*')
      .lt('last_fetched', olderThan.toISOString())
      .order('fetch_count', { ascending: false })
      .limit(limit)

    if (error) throw new CacheUnavailableError('read', error.message)
    return this.toEntries(data)
  }

  async clear(key?: string): Promise<number> {
    const query = this.supabase.from('patent_cache').delete({ count: 'exact' })
    const { count, error } = key !== undefined
      ? await query.eq('identifier', key)
      : await query.neq('identifier', '')

    if (error) throw new CacheUnavailableError('clear', error.message)
    log.info({ identifier: key ?? 'all', removed: count ?? 0 }, 'Patent cache cleared')
    return count ?? 0
  }

  async count(): Promise<number> {
    const { count, error } = await this.supabase
      .from('patent_cache')
      .select('*', { count: 'exact', head: true })

    if (error) throw new CacheUnavailableError('count', error.message)
    return count ?? 0
  }

  private toEntries(data: unknown): CacheEntry[] {
    if (!Array.isArray(data)) return []
    return data.map(row => this.toEntry(row, 'read'))
  }

  private toEntry(row: unknown, operation: string): CacheEntry {
    try {
      return rowToCacheEntry(row)
    } catch (error) {
      log.error({ err: error }, 'patent_cache row failed validation')
      throw new CacheUnavailableError(operation, error)
    }
  }
}
