/**
 * Fetch Types
 *
 * Outcome, failure and retry policy types for the product API fetcher.
 */

import { z } from 'zod'

// ═══════════════════════════════════════════════════════════════════════════════
// Raw payload
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * One record as received from the API. No shape is assumed beyond
 * "a JSON object"; field checks happen in the validator.
 */
export type RawRecord = Record<string, unknown>

/**
 * The API must answer with an array of plain objects. Anything else
 * (an object envelope, an array of scalars, null entries) is malformed.
 */
export const RawRecordListSchema = z.array(z.record(z.string(), z.unknown()))

// ═══════════════════════════════════════════════════════════════════════════════
// Failures
// ═══════════════════════════════════════════════════════════════════════════════

export type RetryableFailureKind =
  | 'NETWORK_ERROR' // Connection refused/reset, DNS failure
  | 'TIMEOUT' // Attempt exceeded the per-request timeout
  | 'HTTP_STATUS' // 5xx, 429 and other non-2xx outside 4xx

export type FatalFailureKind =
  | 'FATAL_HTTP_STATUS' // 4xx except 429
  | 'MALFORMED_PAYLOAD' // Not JSON, or not an array of objects
  | 'REQUEST_FAILED' // Request could not be built or sent; no connection made

export type FetchFailureKind = RetryableFailureKind | FatalFailureKind

export interface FetchFailure {
  kind: FetchFailureKind
  message: string
  statusCode?: number
}

const RETRYABLE_KINDS: ReadonlySet<FetchFailureKind> = new Set<FetchFailureKind>([
  'NETWORK_ERROR',
  'TIMEOUT',
  'HTTP_STATUS',
])

export function isRetryableFailure(failure: FetchFailure): boolean {
  return RETRYABLE_KINDS.has(failure.kind)
}

/**
 * Result of a single HTTP attempt, before retry policy is applied.
 */
export type AttemptResult =
  | { ok: true; records: RawRecord[]; statusCode: number }
  | { ok: false; failure: FetchFailure }

// ═══════════════════════════════════════════════════════════════════════════════
// Outcome
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Final result of `fetchRecords`, consumed once by the pipeline.
 */
export type FetchOutcome =
  | { ok: true; records: RawRecord[]; attempts: number; durationMs: number }
  | { ok: false; failure: FetchFailure; attempts: number; durationMs: number }

export interface FetchRequest {
  url: string
  /** Per-attempt timeout */
  timeoutMs: number
  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  maxRetries: number
  /** Base delay; the wait before retry n is retryDelayMs × n */
  retryDelayMs: number
}

export interface RecordFetcher {
  fetchRecords(request: FetchRequest): Promise<FetchOutcome>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Retry policy
// ═══════════════════════════════════════════════════════════════════════════════

export interface RetryPolicy {
  maxRetries: number
  retryDelayMs: number
}

export const DEFAULT_FETCH_HEADERS = {
  'User-Agent': 'CatalogExporter/1.0',
  Accept: 'application/json',
}

/** Injected wait; tests pass a fake so no real time passes. */
export type Sleep = (ms: number) => Promise<void>
