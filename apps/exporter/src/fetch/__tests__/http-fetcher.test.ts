import { afterEach, describe, expect, it, vi } from 'vitest'
import { HttpFetcher, isFatalStatus } from '../http-fetcher.js'
import type { FetchRequest } from '../types.js'
import { captureLogger } from '../../__tests__/capture-logger.js'

const request: FetchRequest = {
  url: 'https://api.example.com/products',
  timeoutMs: 1000,
  maxRetries: 3,
  retryDelayMs: 1000,
}

const products = [
  { title: 'Mug', price: 5 },
  { title: 'Lamp', price: 12.5 },
]

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  })
}

function abortError(): Error {
  const error = new Error('This operation was aborted')
  error.name = 'AbortError'
  return error
}

function connectionRefused(): Error {
  return new TypeError('fetch failed', {
    cause: Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:443'), { code: 'ECONNREFUSED' }),
  })
}

function createFetcher(fetchImpl: typeof fetch) {
  const { logger, entries } = captureLogger()
  const sleep = vi.fn((_ms: number) => Promise.resolve())
  const fetcher = new HttpFetcher({ logger, fetchImpl, sleep })
  return { fetcher, sleep, entries }
}

describe('HttpFetcher', () => {
  const originalFetch = globalThis.fetch

  afterEach(() => {
    globalThis.fetch = originalFetch
  })

  it('returns the records on the first successful attempt', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(jsonResponse(products))
    const { fetcher, sleep } = createFetcher(fetchSpy)

    const outcome = await fetcher.fetchRecords(request)

    expect(outcome).toMatchObject({ ok: true, records: products, attempts: 1 })
    expect(fetchSpy).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('sends the default headers with a GET request', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(jsonResponse([]))
    const { fetcher } = createFetcher(fetchSpy)

    await fetcher.fetchRecords(request)

    const [url, init] = fetchSpy.mock.calls[0]
    expect(url).toBe('https://api.example.com/products')
    expect(init).toMatchObject({
      method: 'GET',
      headers: { 'User-Agent': 'CatalogExporter/1.0', Accept: 'application/json' },
    })
  })

  it('uses the global fetch when no implementation is injected', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(jsonResponse(products))
    globalThis.fetch = fetchSpy
    const { logger } = captureLogger()

    const outcome = await new HttpFetcher({ logger, sleep: () => Promise.resolve() }).fetchRecords(request)

    expect(outcome.ok).toBe(true)
    expect(fetchSpy).toHaveBeenCalledTimes(1)
  })

  it('makes maxRetries + 1 attempts when every attempt times out', async () => {
    const fetchSpy = vi.fn().mockRejectedValue(abortError())
    const { fetcher, sleep } = createFetcher(fetchSpy)

    const outcome = await fetcher.fetchRecords(request)

    expect(outcome).toMatchObject({
      ok: false,
      attempts: 4,
      failure: { kind: 'TIMEOUT', message: 'Request timed out after 1000ms' },
    })
    expect(fetchSpy).toHaveBeenCalledTimes(4)
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 3000])
  })

  it('retries a server error and returns the later success', async () => {
    const fetchSpy = vi
      .fn()
      .mockResolvedValueOnce(new Response('fail', { status: 500, statusText: 'Server Error' }))
      .mockResolvedValueOnce(jsonResponse(products))
    const { fetcher, sleep } = createFetcher(fetchSpy)

    const outcome = await fetcher.fetchRecords(request)

    expect(outcome).toMatchObject({ ok: true, attempts: 2, records: products })
    expect(sleep).toHaveBeenCalledTimes(1)
    expect(sleep).toHaveBeenCalledWith(1000)
  })

  it('treats 429 as retryable', async () => {
    const fetchSpy = vi
      .fn()
      .mockResolvedValueOnce(new Response('slow down', { status: 429, statusText: 'Too Many Requests' }))
      .mockResolvedValueOnce(jsonResponse(products))
    const { fetcher } = createFetcher(fetchSpy)

    const outcome = await fetcher.fetchRecords(request)

    expect(outcome.ok).toBe(true)
    expect(fetchSpy).toHaveBeenCalledTimes(2)
  })

  it('stops immediately on a client error', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('missing', { status: 404, statusText: 'Not Found' }))
    const { fetcher, sleep } = createFetcher(fetchSpy)

    const outcome = await fetcher.fetchRecords(request)

    expect(outcome).toMatchObject({
      ok: false,
      attempts: 1,
      failure: { kind: 'FATAL_HTTP_STATUS', statusCode: 404, message: 'HTTP 404: Not Found' },
    })
    expect(fetchSpy).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('reports the last error kind after exhausting retries', async () => {
    const fetchSpy = vi
      .fn()
      .mockRejectedValueOnce(abortError())
      .mockResolvedValueOnce(new Response('down', { status: 503 }))
    const { fetcher } = createFetcher(fetchSpy)

    const outcome = await fetcher.fetchRecords({ ...request, maxRetries: 1 })

    expect(outcome).toMatchObject({
      ok: false,
      attempts: 2,
      failure: { kind: 'HTTP_STATUS', statusCode: 503, message: 'HTTP 503' },
    })
  })

  it('classifies connection failures as network errors', async () => {
    const fetchSpy = vi.fn().mockRejectedValue(connectionRefused())
    const { fetcher } = createFetcher(fetchSpy)

    const outcome = await fetcher.fetchRecords({ ...request, maxRetries: 0 })

    expect(outcome).toMatchObject({
      ok: false,
      attempts: 1,
      failure: { kind: 'NETWORK_ERROR', message: 'Connection error: ECONNREFUSED' },
    })
  })

  it('does not retry a request that could not be built', async () => {
    const fetchSpy = vi.fn().mockRejectedValue(new TypeError('Invalid URL'))
    const { fetcher, sleep } = createFetcher(fetchSpy)

    const outcome = await fetcher.fetchRecords(request)

    expect(outcome).toMatchObject({
      ok: false,
      attempts: 1,
      failure: { kind: 'REQUEST_FAILED', message: 'Request failed: Invalid URL' },
    })
    expect(fetchSpy).toHaveBeenCalledTimes(1)
    expect(sleep).not.toHaveBeenCalled()
  })

  it('cancels the body of a failed response before retrying', async () => {
    const failed = new Response('upstream unavailable', { status: 503 })
    const cancel = vi.spyOn(failed.body ?? new ReadableStream(), 'cancel')
    const fetchSpy = vi.fn().mockResolvedValueOnce(failed).mockResolvedValueOnce(jsonResponse(products))
    const { fetcher } = createFetcher(fetchSpy)

    const outcome = await fetcher.fetchRecords(request)

    expect(outcome).toMatchObject({ ok: true, attempts: 2 })
    expect(cancel).toHaveBeenCalledTimes(1)
  })

  it('fails without retrying on invalid JSON', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(new Response('<html>oops</html>', { status: 200 }))
    const { fetcher } = createFetcher(fetchSpy)

    const outcome = await fetcher.fetchRecords(request)

    expect(outcome).toMatchObject({
      ok: false,
      attempts: 1,
      failure: { kind: 'MALFORMED_PAYLOAD', message: 'Invalid JSON response' },
    })
    expect(fetchSpy).toHaveBeenCalledTimes(1)
  })

  it('fails without retrying when the payload is not an array of objects', async () => {
    const fetchSpy = vi
      .fn()
      .mockResolvedValueOnce(jsonResponse({ products }))
      .mockResolvedValueOnce(jsonResponse([{ title: 'ok' }, null]))
    const { fetcher } = createFetcher(fetchSpy)

    const envelope = await fetcher.fetchRecords(request)
    const withNull = await fetcher.fetchRecords(request)

    expect(envelope).toMatchObject({ ok: false, failure: { kind: 'MALFORMED_PAYLOAD' } })
    expect(withNull).toMatchObject({ ok: false, failure: { kind: 'MALFORMED_PAYLOAD' } })
    expect(fetchSpy).toHaveBeenCalledTimes(2)
  })

  it('aborts an attempt that exceeds the timeout', async () => {
    const fetchSpy = vi.fn(
      (_url: string | URL | Request, init?: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(abortError()))
        })
    )
    const { fetcher } = createFetcher(fetchSpy)

    const outcome = await fetcher.fetchRecords({ ...request, timeoutMs: 5, maxRetries: 0 })

    expect(outcome).toMatchObject({
      ok: false,
      attempts: 1,
      failure: { kind: 'TIMEOUT', message: 'Request timed out after 5ms' },
    })
  })

  it('logs one line per attempt and one per wait', async () => {
    const fetchSpy = vi
      .fn()
      .mockResolvedValueOnce(new Response('fail', { status: 502 }))
      .mockResolvedValueOnce(jsonResponse(products))
    const { fetcher, entries } = createFetcher(fetchSpy)

    await fetcher.fetchRecords(request)

    expect(entries.map((e) => [e.level, e.message, e.attempt])).toEqual([
      ['info', 'Fetching records', 1],
      ['warn', 'Fetch attempt failed, retrying', 1],
      ['info', 'Fetching records', 2],
      ['info', 'Fetched records', 2],
    ])
    expect(entries[1]).toMatchObject({ kind: 'HTTP_STATUS', statusCode: 502, backoffMs: 1000 })
  })
})

describe('isFatalStatus', () => {
  it('treats 4xx except 429 as fatal', () => {
    expect(isFatalStatus(400)).toBe(true)
    expect(isFatalStatus(404)).toBe(true)
    expect(isFatalStatus(499)).toBe(true)
    expect(isFatalStatus(429)).toBe(false)
    expect(isFatalStatus(500)).toBe(false)
    expect(isFatalStatus(304)).toBe(false)
  })
})
