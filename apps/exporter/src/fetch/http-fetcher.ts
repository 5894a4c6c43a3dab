/**
 * HTTP Fetcher
 *
 * Fetches the product list with a per-attempt timeout and bounded,
 * linearly backed-off retries. Retry decisions come from the pure
 * state machine in retry-state.ts; this class owns the I/O.
 */

import { setTimeout as delay } from 'node:timers/promises'
import type { ILogger } from '@catalog-exporter/logger'
import { classifyFetchError } from '../errors.js'
import {
  initialRetryState,
  resumeAfterBackoff,
  transitionRetryState,
  type TerminalRetryState,
} from './retry-state.js'
import type {
  AttemptResult,
  FetchOutcome,
  FetchRequest,
  RecordFetcher,
  Sleep,
} from './types.js'
import { DEFAULT_FETCH_HEADERS, RawRecordListSchema } from './types.js'

export interface HttpFetcherOptions {
  logger: ILogger

  /** Extra request headers, merged over the defaults */
  headers?: Record<string, string>

  /** Defaults to the global fetch */
  fetchImpl?: typeof fetch

  /** Defaults to a real timer */
  sleep?: Sleep

  /** Defaults to Date.now */
  now?: () => number
}

/**
 * HTTP status classification. 429 is the one 4xx worth retrying.
 */
export function isFatalStatus(statusCode: number): boolean {
  return statusCode >= 400 && statusCode <= 499 && statusCode !== 429
}

export class HttpFetcher implements RecordFetcher {
  private readonly logger: ILogger
  private readonly headers: Record<string, string>
  private readonly fetchImpl?: typeof fetch
  private readonly sleep: Sleep
  private readonly now: () => number

  constructor(options: HttpFetcherOptions) {
    this.logger = options.logger
    this.headers = { ...DEFAULT_FETCH_HEADERS, ...(options.headers ?? {}) }
    this.fetchImpl = options.fetchImpl
    this.sleep = options.sleep ?? ((ms) => delay(ms))
    this.now = options.now ?? Date.now
  }

  /**
   * Fetch the record list. Never throws; every failure is returned
   * as `{ ok: false }` with the kind of the last error.
   */
  async fetchRecords(request: FetchRequest): Promise<FetchOutcome> {
    const startTime = this.now()
    const policy = { maxRetries: request.maxRetries, retryDelayMs: request.retryDelayMs }
    const totalAttempts = request.maxRetries + 1

    let state = initialRetryState()

    for (;;) {
      this.logger.info('Fetching records', {
        attempt: state.attempt,
        maxAttempts: totalAttempts,
        url: request.url,
      })

      const result = await this.fetchOnce(request)
      const next = transitionRetryState(state, result, policy)

      if (next.phase !== 'failed_retryable') {
        this.logAttemptOutcome(next, totalAttempts)
        return this.toOutcome(next, startTime)
      }

      this.logger.warn('Fetch attempt failed, retrying', {
        attempt: next.attempt,
        maxAttempts: totalAttempts,
        kind: next.failure.kind,
        statusCode: next.failure.statusCode,
        reason: next.failure.message,
        backoffMs: next.backoffMs,
      })

      await this.sleep(next.backoffMs)
      state = resumeAfterBackoff(next)
    }
  }

  /**
   * Single fetch attempt (no retries).
   */
  private async fetchOnce(request: FetchRequest): Promise<AttemptResult> {
    const fetchFn = this.fetchImpl ?? globalThis.fetch
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), request.timeoutMs)

    try {
      let response: Response
      try {
        response = await fetchFn(request.url, {
          method: 'GET',
          headers: this.headers,
          signal: controller.signal,
          redirect: 'follow',
        })
      } catch (error) {
        return { ok: false, failure: classifyFetchError(error, request.timeoutMs) }
      }

      if (!response.ok) {
        // Release the connection before the retry
        await response.body?.cancel()
        const statusText = response.statusText ? `: ${response.statusText}` : ''
        return {
          ok: false,
          failure: {
            kind: isFatalStatus(response.status) ? 'FATAL_HTTP_STATUS' : 'HTTP_STATUS',
            statusCode: response.status,
            message: `HTTP ${response.status}${statusText}`,
          },
        }
      }

      let body: string
      try {
        body = await response.text()
      } catch (error) {
        // The body stream is still subject to the timeout
        return { ok: false, failure: classifyFetchError(error, request.timeoutMs) }
      }

      return this.parseBody(body, response.status)
    } finally {
      clearTimeout(timeoutId)
    }
  }

  private parseBody(body: string, statusCode: number): AttemptResult {
    let json: unknown
    try {
      json = JSON.parse(body)
    } catch {
      return {
        ok: false,
        failure: { kind: 'MALFORMED_PAYLOAD', statusCode, message: 'Invalid JSON response' },
      }
    }

    const parsed = RawRecordListSchema.safeParse(json)
    if (!parsed.success) {
      return {
        ok: false,
        failure: {
          kind: 'MALFORMED_PAYLOAD',
          statusCode,
          message: 'Expected a JSON array of objects',
        },
      }
    }

    return { ok: true, records: parsed.data, statusCode }
  }

  private logAttemptOutcome(state: TerminalRetryState, totalAttempts: number): void {
    if (state.phase === 'succeeded') {
      this.logger.info('Fetched records', {
        attempt: state.attempt,
        count: state.records.length,
      })
      return
    }

    const meta = {
      attempt: state.attempt,
      maxAttempts: totalAttempts,
      kind: state.failure.kind,
      statusCode: state.failure.statusCode,
      reason: state.failure.message,
    }
    if (state.exhausted) {
      this.logger.error('All fetch attempts failed', meta)
    } else {
      this.logger.error('Fetch failed with a non-retryable error', meta)
    }
  }

  private toOutcome(state: TerminalRetryState, startTime: number): FetchOutcome {
    const durationMs = this.now() - startTime
    if (state.phase === 'succeeded') {
      return { ok: true, records: state.records, attempts: state.attempt, durationMs }
    }
    return { ok: false, failure: state.failure, attempts: state.attempt, durationMs }
  }
}
