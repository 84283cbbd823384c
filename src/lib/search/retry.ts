// Retry utility and upstream HTTP helpers
// Adapters classify responses with these; the retry policy itself lives with the lookup orchestrator

export interface RetryOptions<T> {
  maxAttempts?: number       // default: 2
  initialDelayMs?: number    // default: 500
  maxDelayMs?: number        // default: 10000
  backoffMultiplier?: number // default: 1 (fixed backoff)
  shouldRetry: (value: T) => boolean
  onRetry?: (value: T, attempt: number, delayMs: number) => void
}

export interface RetryResult<T> {
  value: T
  attempts: number
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}

/**
 * Re-runs fn while its resolved value is retryable
 * Returns the last value together with the number of attempts made
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions<T>
): Promise<RetryResult<T>> {
  const {
    maxAttempts = 2,
    initialDelayMs = 500,
    maxDelayMs = 10000,
    backoffMultiplier = 1,
    shouldRetry,
    onRetry,
  } = options

  let delay = initialDelayMs
  let attempt = 1
  let value = await fn()

  while (attempt < maxAttempts && shouldRetry(value)) {
    onRetry?.(value, attempt, delay)
    if (delay > 0) {
      await sleep(delay)
    }
    delay = Math.min(delay * backoffMultiplier, maxDelayMs)
    attempt++
    value = await fn()
  }

  return { value, attempts: attempt }
}

/**
 * 401/403 mean the credential was rejected
 */
export function isAuthStatus(status: number): boolean {
  return status === 401 || status === 403
}

/**
 * 404 is the upstream saying the document does not exist; 400/410 reject the reference itself
 */
export function isNotFoundStatus(status: number): boolean {
  return status === 404 || status === 400 || status === 410
}

export type HttpOutcome =
  | { ok: true; status: number; body: unknown }
  | { ok: false; status: number; bodyText: string }
  | { ok: false; status: null; error: string }

/**
 * fetch with a timeout that never throws
 * A caller's signal is combined with the timeout, not substituted for it
 * Network errors and timeouts come back as { status: null }
 */
export async function fetchJson(
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<HttpOutcome> {
  try {
    const timeout = AbortSignal.timeout(timeoutMs)
    const response = await fetch(url, {
      ...init,
      signal: init.signal ? AbortSignal.any([init.signal, timeout]) : timeout,
    })

    if (!response.ok) {
      const bodyText = await response.text().catch(() => '')
      return { ok: false, status: response.status, bodyText }
    }

    const text = await response.text()
    try {
      const body: unknown = text ? JSON.parse(text) : null
      return { ok: true, status: response.status, body }
    } catch {
      return { ok: false, status: response.status, bodyText: `Unparsable JSON body: ${text.slice(0, 200)}` }
    }
  } catch (error) {
    const message = error instanceof Error
      ? (error.name === 'TimeoutError' ? `Request timed out after ${timeoutMs}ms` : error.message)
      : String(error)
    return { ok: false, status: null, error: message }
  }
}
