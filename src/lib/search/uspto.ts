// USPTO Open Data Portal (ODP) Client
// Looks up a granted US patent by number and derives its legal status
//
// IMPORTANT: Uses api.uspto.gov (not data.uspto.gov)
// - data.uspto.gov returns "Please use api.uspto.gov" error
// - api.uspto.gov requires GET with query params (not POST with JSON body)
//
// Authentication:
// 1. Create USPTO.gov account + ID.me verification
// 2. Get API key from "My ODP" page
// 3. Set environment variable: USPTO_API_KEY
// 4. Header: X-API-Key
//
// Status rules:
// - Status text mentioning "expired" => Expired (e.g. unpaid maintenance fees)
// - Status text mentioning "abandon" => Lapsed
// - Utility patents run 20 years from filing, design patents 15 years from grant

import { z } from 'zod'
import { createChildLogger } from '../logger'
import { identifierKey } from '../patents/identifier'
import {
  buildJurisdictions,
  calculateExpiryDate,
  createPatentRecord,
  hasPassed,
  toIsoDate,
  type PatentKind,
} from '../patents/record'
import type {
  CanonicalIdentifier,
  FetchOptions,
  FetchResult,
  PatentStatus,
  SourceAdapter,
} from '../patents/types'
import { fetchJson } from './retry'
import { StaticApiKey, requestWithCredential, toFetchFailure, type CredentialProvider } from './upstream'

const log = createChildLogger({ module: 'uspto' })

const SEARCH_ENDPOINT = '/api/v1/patent/applications/search'

const applicationMetaDataSchema = z.object({
  patentNumber: z.string().optional(),
  filingDate: z.string().optional(),
  grantDate: z.string().optional(),
  applicationStatusDescriptionText: z.string().optional(),
  applicationTypeLabelName: z.string().optional(),
  applicationTypeCategory: z.string().optional(),
}).passthrough()

const searchResponseSchema = z.object({
  count: z.number().optional(),
  patentFileWrapperDataBag: z.array(
    z.object({
      applicationNumberText: z.string().optional(),
      applicationMetaData: applicationMetaDataSchema.optional(),
    }).passthrough()
  ).optional(),
}).passthrough()

export type USPTOApplicationMetaData = z.infer<typeof applicationMetaDataSchema>

function patentKindOf(meta: USPTOApplicationMetaData): PatentKind {
  const label = `${meta.applicationTypeLabelName ?? ''} ${meta.applicationTypeCategory ?? ''}`.toLowerCase()
  return label.includes('design') ? 'design' : 'utility'
}

/**
 * Derives status, expiry and lapse reason from the application metadata
 */
export function deriveUSPTOStatus(
  meta: USPTOApplicationMetaData,
  now: Date
): { status: PatentStatus; expiryDate: string | null; lapseReason: string | null } {
  const statusText = meta.applicationStatusDescriptionText?.trim() || ''
  const lowered = statusText.toLowerCase()
  const expiryDate = calculateExpiryDate(
    { filingDate: toIsoDate(meta.filingDate), grantDate: toIsoDate(meta.grantDate) },
    patentKindOf(meta)
  )

  if (lowered.includes('expired')) {
    return { status: 'Expired', expiryDate, lapseReason: statusText }
  }
  if (lowered.includes('abandon')) {
    return { status: 'Lapsed', expiryDate, lapseReason: statusText }
  }
  if (meta.grantDate || meta.patentNumber) {
    if (expiryDate && hasPassed(expiryDate, now)) {
      return { status: 'Expired', expiryDate, lapseReason: null }
    }
    return { status: 'Granted', expiryDate, lapseReason: null }
  }
  return { status: 'Unknown', expiryDate, lapseReason: null }
}

export interface USPTOClientOptions {
  apiKey: string
  baseUrl: string
  timeoutMs: number
  credentials?: CredentialProvider
  now?: () => Date
}

/**
 * USPTO ODP source adapter
 */
export class USPTOClient implements SourceAdapter {
  readonly source = 'USPTO' as const
  private readonly credentials: CredentialProvider
  private readonly now: () => Date

  constructor(private readonly options: USPTOClientOptions) {
    this.credentials = options.credentials ?? new StaticApiKey(options.apiKey, 'USPTO_API_KEY')
    this.now = options.now ?? (() => new Date())
  }

  async fetch(id: CanonicalIdentifier, fetchOptions: FetchOptions = {}): Promise<FetchResult> {
    const key = identifierKey(id)
    const queryParams = new URLSearchParams({
      q: `applicationMetaData.patentNumber:${id.number}`,
      offset: '0',
      limit: '1',
    })
    const url = `${this.options.baseUrl}${SEARCH_ENDPOINT}?${queryParams.toString()}`

    log.debug({ identifier: key }, 'Searching USPTO applications')
    const result = await requestWithCredential(this.credentials, apiKey =>
      fetchJson(
        url,
        {
          method: 'GET',
          headers: {
            'X-API-Key': apiKey,
            Accept: 'application/json',
          },
          signal: fetchOptions.signal,
        },
        this.options.timeoutMs
      )
    )

    if (result.kind !== 'response' || !result.outcome.ok) {
      const failure = toFetchFailure(this.source, result)
      log.warn({ identifier: key, failure }, 'USPTO lookup did not return data')
      return failure
    }

    const parsed = searchResponseSchema.safeParse(result.outcome.body)
    if (!parsed.success) {
      log.error({ identifier: key, issues: parsed.error.issues.slice(0, 3) }, 'Unexpected USPTO payload')
      return { kind: 'transient_failure', source: this.source, reason: 'Unexpected USPTO payload shape' }
    }

    const meta = parsed.data.patentFileWrapperDataBag?.[0]?.applicationMetaData
    if (!meta) {
      return { kind: 'not_found', source: this.source }
    }

    const now = this.now()
    try {
      const record = createPatentRecord({
        identifier: key,
        ...deriveUSPTOStatus(meta, now),
        jurisdictions: buildJurisdictions('US'),
        source: this.source,
        fetchedAt: now.toISOString(),
      })
      return { kind: 'found', record }
    } catch (error) {
      log.error({ identifier: key, err: error }, 'USPTO data failed record validation')
      return { kind: 'transient_failure', source: this.source, reason: 'USPTO data failed record validation' }
    }
  }
}
