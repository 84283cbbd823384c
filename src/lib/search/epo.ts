// EPO Open Patent Services (OPS) Client
// Fetches bibliographic data for EP publications and derives legal status from it
//
// Authentication:
// 1. Register an app at https://developers.epo.org
// 2. Set EPO_CONSUMER_KEY and EPO_CONSUMER_SECRET
// 3. Tokens come from POST {base}/auth/accesstoken (client credentials, ~20 min lifetime)
//
// Status rules:
// - Expiry = application (filing) date + 20 years
// - A B-kind publication (B1/B2/B3) means the patent was granted
// - Granted and past expiry => Expired; never granted => Unknown (still pending or withdrawn)

import { z } from 'zod'
import { createChildLogger } from '../logger'
import { identifierKey } from '../patents/identifier'
import {
  buildJurisdictions,
  calculateExpiryDate,
  createPatentRecord,
  hasPassed,
  parseJurisdictions,
  toIsoDate,
} from '../patents/record'
import type {
  CanonicalIdentifier,
  FetchOptions,
  FetchResult,
  PatentStatus,
  SourceAdapter,
} from '../patents/types'
import { fetchJson } from './retry'
import {
  OAuthTokenProvider,
  requestWithCredential,
  toFetchFailure,
  type CredentialProvider,
} from './upstream'

const log = createChildLogger({ module: 'epo' })

// OPS JSON wraps text in { "$": "..." } and collapses single-element arrays into objects
const textNode = z.union([z.string(), z.object({ $: z.string() }).passthrough()])
  .transform(node => (typeof node === 'string' ? node : node.$))

function oneOrMany<T extends z.ZodTypeAny>(schema: T) {
  return z
    .union([z.array(schema), schema])
    .transform((value): z.output<T>[] => (Array.isArray(value) ? value : [value]))
}

const documentIdSchema = z.object({
  '@document-id-type': z.string().optional(),
  date: textNode.optional(),
}).passthrough()

const referenceSchema = z.object({
  'document-id': oneOrMany(documentIdSchema).optional(),
}).passthrough()

const exchangeDocumentSchema = z.object({
  '@kind': z.string().optional(),
  '@status': z.string().optional(),
  'bibliographic-data': z.object({
    'publication-reference': referenceSchema.optional(),
    'application-reference': referenceSchema.optional(),
    'designation-of-states': z.object({
      'designation-epc': z.object({
        'contracting-states': z.object({
          country: oneOrMany(textNode).optional(),
        }).passthrough().optional(),
      }).passthrough().optional(),
    }).passthrough().optional(),
  }).passthrough().optional(),
}).passthrough()

const biblioResponseSchema = z.object({
  'ops:world-patent-data': z.object({
    'exchange-documents': z.object({
      'exchange-document': oneOrMany(exchangeDocumentSchema),
    }).passthrough(),
  }).passthrough(),
})

type ExchangeDocument = z.infer<typeof exchangeDocumentSchema>

export interface EPOBiblioSummary {
  applicationDate: string | null // YYYY-MM-DD
  grantDate: string | null
  designatedStates: string[]
}

/**
 * Pulls application date, grant date and designated states out of the exchange documents
 */
export function summarizeBiblio(documents: ExchangeDocument[]): EPOBiblioSummary {
  let applicationDate: string | null = null
  let grantDate: string | null = null
  const states: string[] = []

  for (const doc of documents) {
    const biblio = doc['bibliographic-data']
    if (!biblio) continue

    if (!applicationDate) {
      const ids = biblio['application-reference']?.['document-id'] ?? []
      const epodoc = ids.find(id => id['@document-id-type'] === 'epodoc') ?? ids.find(id => id.date)
      applicationDate = toIsoDate(epodoc?.date)
    }

    // Publication date of the B document is the grant date
    if (!grantDate && doc['@kind']?.startsWith('B')) {
      const ids = biblio['publication-reference']?.['document-id'] ?? []
      grantDate = toIsoDate(ids.find(id => id.date)?.date)
    }

    const countries = biblio['designation-of-states']?.['designation-epc']?.['contracting-states']?.country
    if (countries) {
      states.push(...countries)
    }
  }

  return {
    applicationDate,
    grantDate,
    designatedStates: parseJurisdictions(states).filter(code => /^[A-Z]{2}$/.test(code)),
  }
}

export interface EPOClientOptions {
  consumerKey: string
  consumerSecret: string
  baseUrl: string
  timeoutMs: number
  credentials?: CredentialProvider
  now?: () => Date
}

/**
 * EPO OPS source adapter
 */
export class EPOClient implements SourceAdapter {
  readonly source = 'EPO' as const
  private readonly credentials: CredentialProvider
  private readonly now: () => Date

  constructor(private readonly options: EPOClientOptions) {
    this.now = options.now ?? (() => new Date())
    this.credentials = options.credentials ?? new OAuthTokenProvider({
      tokenUrl: `${options.baseUrl}/auth/accesstoken`,
      clientId: options.consumerKey,
      clientSecret: options.consumerSecret,
      timeoutMs: options.timeoutMs,
      now: this.now,
    })
  }

  async fetch(id: CanonicalIdentifier, fetchOptions: FetchOptions = {}): Promise<FetchResult> {
    const key = identifierKey(id)
    const url = `${this.options.baseUrl}/rest-services/published-data/publication/epodoc/${key}/biblio`

    log.debug({ identifier: key }, 'Fetching EPO bibliographic data')
    const result = await requestWithCredential(this.credentials, token =>
      fetchJson(
        url,
        {
          method: 'GET',
          headers: {
            Authorization: `Bearer ${token}`,
            Accept: 'application/json',
          },
          signal: fetchOptions.signal,
        },
        this.options.timeoutMs
      )
    )

    if (result.kind !== 'response' || !result.outcome.ok) {
      const failure = toFetchFailure(this.source, result)
      log.warn({ identifier: key, failure }, 'EPO lookup did not return data')
      return failure
    }

    const parsed = biblioResponseSchema.safeParse(result.outcome.body)
    if (!parsed.success) {
      log.error({ identifier: key, issues: parsed.error.issues.slice(0, 3) }, 'Unexpected EPO payload')
      return { kind: 'transient_failure', source: this.source, reason: 'Unexpected EPO payload shape' }
    }

    const documents = parsed.data['ops:world-patent-data']['exchange-documents']['exchange-document']
    const found = documents.filter(doc => doc['@status'] !== 'not found')
    if (found.length === 0) {
      return { kind: 'not_found', source: this.source }
    }

    return this.toRecord(key, summarizeBiblio(found))
  }

  private toRecord(key: string, summary: EPOBiblioSummary): FetchResult {
    const now = this.now()
    const expiryDate = calculateExpiryDate({ filingDate: summary.applicationDate, grantDate: summary.grantDate })

    let status: PatentStatus = 'Unknown'
    if (summary.grantDate) {
      status = expiryDate && hasPassed(expiryDate, now) ? 'Expired' : 'Granted'
    }

    try {
      const record = createPatentRecord({
        identifier: key,
        status,
        expiryDate,
        jurisdictions: buildJurisdictions('EP', summary.designatedStates),
        lapseReason: null,
        source: this.source,
        fetchedAt: now.toISOString(),
      })
      return { kind: 'found', record }
    } catch (error) {
      log.error({ identifier: key, err: error }, 'EPO data failed record validation')
      return { kind: 'transient_failure', source: this.source, reason: 'EPO data failed record validation' }
    }
  }
}
