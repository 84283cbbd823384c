import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { fetchJson, isAuthStatus, isNotFoundStatus, withRetry } from './retry'

describe('withRetry', () => {
  it('returns the first value when it is not retryable', async () => {
    const fn = vi.fn(async () => 'ok')
    expect(await withRetry(fn, { shouldRetry: value => value !== 'ok', initialDelayMs: 0 })).toEqual({
      value: 'ok',
      attempts: 1,
    })
    expect(fn).toHaveBeenCalledTimes(1)
  })

  it('retries once by default and reports the last value', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockResolvedValueOnce('busy')
      .mockResolvedValueOnce('still busy')
      .mockResolvedValueOnce('ok')
    const onRetry = vi.fn()

    const result = await withRetry(fn, { shouldRetry: value => value !== 'ok', initialDelayMs: 0, onRetry })

    expect(result).toEqual({ value: 'still busy', attempts: 2 })
    expect(fn).toHaveBeenCalledTimes(2)
    expect(onRetry).toHaveBeenCalledWith('busy', 1, 0)
  })

  it('stops as soon as the value is acceptable', async () => {
    const fn = vi.fn<() => Promise<string>>().mockResolvedValueOnce('busy').mockResolvedValueOnce('ok')
    const result = await withRetry(fn, { maxAttempts: 5, shouldRetry: value => value !== 'ok', initialDelayMs: 0 })
    expect(result).toEqual({ value: 'ok', attempts: 2 })
  })
})

describe('status classification', () => {
  it('recognises credential rejections', () => {
    expect([401, 403].map(isAuthStatus)).toEqual([true, true])
    expect([400, 404, 429, 500].map(isAuthStatus)).toEqual([false, false, false, false])
  })

  it('recognises authoritative absence', () => {
    expect([400, 404, 410].map(isNotFoundStatus)).toEqual([true, true, true])
    expect([401, 429, 503].map(isNotFoundStatus)).toEqual([false, false, false])
  })
})

describe('fetchJson', () => {
  const fetchMock = vi.fn<typeof fetch>()

  beforeEach(() => {
    fetchMock.mockReset()
    vi.stubGlobal('fetch', fetchMock)
  })

  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('parses a JSON body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('{"a":1}', { status: 200 }))
    expect(await fetchJson('https://api.test/x', { method: 'GET' }, 1000)).toEqual({ ok: true, status: 200, body: { a: 1 } })
  })

  it('returns the body text of an error response', async () => {
    fetchMock.mockResolvedValueOnce(new Response('gateway timeout', { status: 504 }))
    expect(await fetchJson('https://api.test/x', {}, 1000)).toEqual({ ok: false, status: 504, bodyText: 'gateway timeout' })
  })

  it('flags an unparsable body', async () => {
    fetchMock.mockResolvedValueOnce(new Response('<html>', { status: 200 }))
    expect(await fetchJson('https://api.test/x', {}, 1000)).toEqual({
      ok: false,
      status: 200,
      bodyText: 'Unparsable JSON body: <html>',
    })
  })

  it('turns network errors into a null status', async () => {
    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'))
    expect(await fetchJson('https://api.test/x', {}, 1000)).toEqual({ ok: false, status: null, error: 'fetch failed' })
  })

  it('names timeouts', async () => {
    fetchMock.mockRejectedValueOnce(Object.assign(new Error('aborted'), { name: 'TimeoutError' }))
    expect(await fetchJson('https://api.test/x', {}, 250)).toEqual({
      ok: false,
      status: null,
      error: 'Request timed out after 250ms',
    })
  })

  it('passes a timeout signal when the caller gives none', async () => {
    fetchMock.mockResolvedValueOnce(new Response('null', { status: 200 }))
    await fetchJson('https://api.test/x', {}, 1000)
    expect(fetchMock.mock.calls[0]?.[1]?.signal).toBeInstanceOf(AbortSignal)
  })

  it('still times out when the caller passes its own signal', async () => {
    fetchMock.mockImplementationOnce((_url, init) => new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal
      signal?.addEventListener('abort', () => reject(signal.reason))
    }))

    const result = await fetchJson('https://api.test/x', { signal: new AbortController().signal }, 20)
    expect(result).toEqual({ ok: false, status: null, error: 'Request timed out after 20ms' })
  })

  it('aborts when the caller aborts', async () => {
    fetchMock.mockResolvedValueOnce(new Response('null', { status: 200 }))
    const controller = new AbortController()
    await fetchJson('https://api.test/x', { signal: controller.signal }, 1000)

    const passed = fetchMock.mock.calls[0]?.[1]?.signal
    expect(passed?.aborted).toBe(false)
    controller.abort()
    expect(passed?.aborted).toBe(true)
  })
})
