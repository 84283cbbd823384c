// Patent Identifier Normalizer
// Turns user input ("ep 1.234.567 b1", "US-10,000,000") into a canonical, validated identifier

import { InvalidIdentifierFormatError } from '../errors'
import { JURISDICTIONS, type CanonicalIdentifier, type SupportedJurisdiction } from './types'

// Allowed digit counts for the numeric body, per jurisdiction
const BODY_LENGTH: Record<SupportedJurisdiction, { min: number; max: number }> = {
  EP: { min: 7, max: 7 },
  US: { min: 7, max: 8 },
}

const IDENTIFIER_PATTERN = /^([A-Z]{2})(\d+)([A-Z]\d?)?$/

function isSupportedJurisdiction(code: string): code is SupportedJurisdiction {
  return JURISDICTIONS.some(j => j === code)
}

/**
 * Parses a raw identifier string into its canonical form
 * Throws InvalidIdentifierFormatError when the input is not an EP or US publication number
 */
export function normalize(raw: string): CanonicalIdentifier {
  // Whitespace and punctuation carry no meaning in publication numbers
  const compact = raw.replace(/[\s\p{P}]/gu, '').toUpperCase()

  if (!compact) {
    throw new InvalidIdentifierFormatError(raw, 'identifier is empty')
  }

  const match = IDENTIFIER_PATTERN.exec(compact)
  if (!match) {
    throw new InvalidIdentifierFormatError(raw, 'expected a two-letter jurisdiction followed by digits')
  }

  const [, jurisdiction, digits, kind] = match
  if (!isSupportedJurisdiction(jurisdiction)) {
    throw new InvalidIdentifierFormatError(
      raw,
      `jurisdiction '${jurisdiction}' is not supported (supported: ${JURISDICTIONS.join(', ')})`
    )
  }

  // US numbers are unpadded ("US07654321" is US7654321); EP keeps its fixed 7 digits
  const number = jurisdiction === 'US' ? digits.replace(/^0+/, '') : digits
  const { min, max } = BODY_LENGTH[jurisdiction]
  if (number.length < min || number.length > max) {
    const expected = min === max ? `${min}` : `${min}-${max}`
    throw new InvalidIdentifierFormatError(
      raw,
      `${jurisdiction} numbers have ${expected} digits, got ${number.length}`
    )
  }

  return Object.freeze({
    jurisdiction,
    number,
    kind: kind ?? null,
  })
}

/**
 * Cache key form: jurisdiction + number, kind code left out
 */
export function identifierKey(id: CanonicalIdentifier): string {
  return `${id.jurisdiction}${id.number}`
}

/**
 * Human-readable form, e.g. "EP 1234567 B1"
 */
export function displayIdentifier(id: CanonicalIdentifier): string {
  return [id.jurisdiction, id.number, id.kind].filter(Boolean).join(' ')
}

