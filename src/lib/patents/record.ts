// Patent Record construction
// - Validates the shape every source adapter and the cache agree on
// - Expiry arithmetic (utility: 20 years from filing, design: 15 years from grant)
// - Jurisdiction code normalization

import { z } from 'zod'
import type { Jurisdictions, PatentRecord } from './types'

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')

export const patentRecordSchema = z
  .object({
    identifier: z.string().min(1),
    status: z.enum(['Granted', 'Expired', 'Lapsed', 'Unknown']),
    expiryDate: isoDate.nullable(),
    jurisdictions: z.object({
      primary: z.string().length(2),
      codes: z.array(z.string().length(2)).min(1).readonly(),
    }),
    lapseReason: z.string().min(1).nullable(),
    source: z.enum(['EPO', 'USPTO']),
    fetchedAt: z.string().datetime({ offset: true }),
  })
  .refine(
    record =>
      (record.status !== 'Expired' && record.status !== 'Lapsed') ||
      record.expiryDate !== null ||
      record.lapseReason !== null,
    { message: 'Expired or Lapsed records need an expiry date or a lapse reason', path: ['status'] }
  )

export type PatentRecordInput = z.input<typeof patentRecordSchema>

/**
 * Validates and freezes a record
 * Throws ZodError when the input breaks the record invariants
 */
export function createPatentRecord(input: PatentRecordInput): PatentRecord {
  const parsed = patentRecordSchema.parse(input)
  return Object.freeze({
    ...parsed,
    jurisdictions: buildJurisdictions(parsed.jurisdictions.primary, parsed.jurisdictions.codes),
  })
}

// Country names and office aliases seen in upstream payloads
const JURISDICTION_ALIASES: Record<string, string> = {
  EPO: 'EP',
  'EUROPEAN PATENT OFFICE': 'EP',
  'UNITED STATES': 'US',
  USA: 'US',
  DEUTSCHLAND: 'DE',
  GERMANY: 'DE',
  FRANCE: 'FR',
  FRANKREICH: 'FR',
}

/**
 * Normalizes jurisdiction names/codes, keeping first-seen order and dropping duplicates
 */
export function parseJurisdictions(values: readonly string[]): string[] {
  const normalized: string[] = []
  for (const value of values) {
    const upper = value.trim().toUpperCase()
    if (!upper) continue
    const code = JURISDICTION_ALIASES[upper] ?? upper
    if (!normalized.includes(code)) {
      normalized.push(code)
    }
  }
  return normalized
}

/**
 * Ordered jurisdiction set with the primary office first
 */
export function buildJurisdictions(primary: string, codes: readonly string[] = []): Jurisdictions {
  const [primaryCode] = parseJurisdictions([primary])
  const rest = parseJurisdictions(codes).filter(code => code !== primaryCode)
  return Object.freeze({
    primary: primaryCode,
    codes: Object.freeze([primaryCode, ...rest]),
  })
}

/**
 * Adds whole years to a YYYY-MM-DD date; Feb 29 lands on Feb 28 in non-leap years
 */
export function addYears(date: string, years: number): string | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date)
  if (!match) return null

  const year = Number(match[1]) + years
  const month = Number(match[2])
  const day = Number(match[3])
  if (month < 1 || month > 12 || day < 1 || day > 31) return null

  const lastDayOfMonth = new Date(Date.UTC(year, month, 0)).getUTCDate()
  const clampedDay = Math.min(day, lastDayOfMonth)
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(clampedDay).padStart(2, '0')}`
}

/**
 * Accepts YYYYMMDD (EPO) or YYYY-MM-DD / ISO timestamps (USPTO) and returns YYYY-MM-DD
 */
export function toIsoDate(value: string | null | undefined): string | null {
  if (!value) return null
  const trimmed = value.trim()
  const compact = /^(\d{4})(\d{2})(\d{2})$/.exec(trimmed)
  if (compact) {
    return `${compact[1]}-${compact[2]}-${compact[3]}`
  }
  const dashed = /^(\d{4}-\d{2}-\d{2})/.exec(trimmed)
  return dashed ? dashed[1] : null
}

export type PatentKind = 'utility' | 'design'

/**
 * Theoretical expiry date: utility 20 years from filing, design 15 years from grant
 */
export function calculateExpiryDate(
  dates: { filingDate: string | null; grantDate: string | null },
  kind: PatentKind = 'utility'
): string | null {
  if (kind === 'design') {
    return dates.grantDate ? addYears(dates.grantDate, 15) : null
  }
  return dates.filingDate ? addYears(dates.filingDate, 20) : null
}

/**
 * True once the YYYY-MM-DD date lies strictly before the UTC day of `now`
 */
export function hasPassed(date: string, now: Date): boolean {
  return date < now.toISOString().slice(0, 10)
}
