// Upstream credentials and request plumbing shared by the EPO and USPTO clients
//
// Both offices reject stale credentials with 401/403. The rule is the same for both:
// drop the credential, acquire a fresh one, retry exactly once, then give up with auth_failure.

import { z } from 'zod'
import { createChildLogger } from '../logger'
import type { FetchResult, PatentSource } from '../patents/types'
import { fetchJson, isAuthStatus, isNotFoundStatus, type HttpOutcome } from './retry'

const log = createChildLogger({ module: 'upstream' })

export type CredentialResult =
  | { ok: true; value: string }
  | { ok: false; failure: 'auth' | 'transient'; reason: string }

export interface CredentialProvider {
  getCredential(): Promise<CredentialResult>
  /** Drops `rejected` if it is still the current credential */
  invalidate(rejected: string): void
}

/**
 * Fixed API key (USPTO). Refreshing it just means reading it again.
 */
export class StaticApiKey implements CredentialProvider {
  constructor(
    private readonly apiKey: string,
    private readonly envName: string
  ) {}

  async getCredential(): Promise<CredentialResult> {
    if (!this.apiKey) {
      return { ok: false, failure: 'auth', reason: `${this.envName} is not configured` }
    }
    return { ok: true, value: this.apiKey }
  }

  invalidate(): void {}
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.union([z.string(), z.number()]).optional(),
})

// Used when the token endpoint does not say how long the token lives
const DEFAULT_TOKEN_TTL_MS = 15 * 60 * 1000
// Renew a minute before the upstream would reject the token
const TOKEN_EXPIRY_MARGIN_MS = 60 * 1000

export interface OAuthTokenProviderOptions {
  tokenUrl: string
  clientId: string
  clientSecret: string
  timeoutMs: number
  now?: () => Date
}

/**
 * OAuth2 client-credentials bearer token (EPO OPS)
 * Concurrent callers share one in-flight token request.
 */
export class OAuthTokenProvider implements CredentialProvider {
  private token: string | null = null
  private expiresAt = 0
  private pending: Promise<CredentialResult> | null = null
  private readonly now: () => Date

  constructor(private readonly options: OAuthTokenProviderOptions) {
    this.now = options.now ?? (() => new Date())
  }

  async getCredential(): Promise<CredentialResult> {
    if (this.token && this.now().getTime() < this.expiresAt) {
      return { ok: true, value: this.token }
    }
    if (!this.pending) {
      this.pending = this.requestToken().finally(() => {
        this.pending = null
      })
    }
    return this.pending
  }

  invalidate(rejected: string): void {
    // A concurrent caller may already have replaced it
    if (this.token !== rejected) return
    this.token = null
    this.expiresAt = 0
  }

  private async requestToken(): Promise<CredentialResult> {
    const { tokenUrl, clientId, clientSecret, timeoutMs } = this.options
    if (!clientId || !clientSecret) {
      return { ok: false, failure: 'auth', reason: 'OAuth client credentials are not configured' }
    }

    const basic = Buffer.from(`${clientId}:${clientSecret}`).toString('base64')
    const outcome = await fetchJson(
      tokenUrl,
      {
        method: 'POST',
        headers: {
          Authorization: `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded',
          Accept: 'application/json',
        },
        body: new URLSearchParams({ grant_type: 'client_credentials' }).toString(),
      },
      timeoutMs
    )

    if (!outcome.ok) {
      if (outcome.status === null) {
        return { ok: false, failure: 'transient', reason: `Token request failed: ${outcome.error}` }
      }
      // 400 here means invalid_client, not a bad patent reference
      const failure = isAuthStatus(outcome.status) || outcome.status === 400 ? 'auth' : 'transient'
      return { ok: false, failure, reason: `Token request returned HTTP ${outcome.status}` }
    }

    const parsed = tokenResponseSchema.safeParse(outcome.body)
    if (!parsed.success) {
      return { ok: false, failure: 'transient', reason: 'Token response did not contain an access_token' }
    }

    const expiresInSeconds = Number(parsed.data.expires_in)
    const ttl = Number.isFinite(expiresInSeconds) && expiresInSeconds > 0
      ? Math.max(expiresInSeconds * 1000 - TOKEN_EXPIRY_MARGIN_MS, TOKEN_EXPIRY_MARGIN_MS)
      : DEFAULT_TOKEN_TTL_MS

    this.token = parsed.data.access_token
    this.expiresAt = this.now().getTime() + ttl
    log.info({ tokenUrl }, 'OAuth token obtained')
    return { ok: true, value: this.token }
  }
}

export type AuthorizedOutcome =
  | { kind: 'response'; outcome: HttpOutcome }
  | { kind: 'credential_failure'; failure: 'auth' | 'transient'; reason: string }

/**
 * Sends a request with the current credential, refreshing it once on 401/403
 */
export async function requestWithCredential(
  credentials: CredentialProvider,
  send: (credential: string) => Promise<HttpOutcome>
): Promise<AuthorizedOutcome> {
  const first = await credentials.getCredential()
  if (!first.ok) {
    return { kind: 'credential_failure', failure: first.failure, reason: first.reason }
  }

  const outcome = await send(first.value)
  if (outcome.ok || outcome.status === null || !isAuthStatus(outcome.status)) {
    return { kind: 'response', outcome }
  }

  log.warn({ status: outcome.status }, 'Credential rejected, refreshing and retrying once')
  credentials.invalidate(first.value)
  const second = await credentials.getCredential()
  if (!second.ok) {
    return { kind: 'credential_failure', failure: second.failure, reason: second.reason }
  }
  return { kind: 'response', outcome: await send(second.value) }
}

/**
 * Maps anything that is not a usable response onto the uniform failure taxonomy
 */
export function toFetchFailure(source: PatentSource, result: AuthorizedOutcome): FetchResult {
  if (result.kind === 'credential_failure') {
    return result.failure === 'auth'
      ? { kind: 'auth_failure', source, reason: result.reason }
      : { kind: 'transient_failure', source, reason: result.reason }
  }

  const { outcome } = result
  if (outcome.ok) {
    return { kind: 'transient_failure', source, reason: 'Unexpected response shape', status: outcome.status }
  }
  if (outcome.status === null) {
    return { kind: 'transient_failure', source, reason: outcome.error }
  }
  if (isAuthStatus(outcome.status)) {
    return { kind: 'auth_failure', source, reason: `${source} rejected the credential (HTTP ${outcome.status})` }
  }
  if (isNotFoundStatus(outcome.status)) {
    return { kind: 'not_found', source }
  }
  return {
    kind: 'transient_failure',
    source,
    reason: `${source} API error: HTTP ${outcome.status}`,
    status: outcome.status,
  }
}
