/**
 * Retry State Machine
 *
 * attempting(n) ──ok──────────────▶ succeeded
 *      │
 *      ├──fatal──────────────────▶ failed_fatal (exhausted: false)
 *      ├──retryable, n ≤ max────▶ failed_retryable(n) ──resume──▶ attempting(n+1)
 *      └──retryable, n > max────▶ failed_fatal (exhausted: true)
 *
 * Transitions are pure. The fetcher owns the loop, the sleep and the I/O.
 */

import type { AttemptResult, FetchFailure, RawRecord, RetryPolicy } from './types.js'
import { isRetryableFailure } from './types.js'

export interface AttemptingState {
  phase: 'attempting'
  attempt: number
  lastError: FetchFailure | null
}

export interface FailedRetryableState {
  phase: 'failed_retryable'
  attempt: number
  failure: FetchFailure
  backoffMs: number
}

export interface SucceededState {
  phase: 'succeeded'
  attempt: number
  records: RawRecord[]
}

export interface FailedFatalState {
  phase: 'failed_fatal'
  attempt: number
  failure: FetchFailure
  /** True when the failure was retryable but no attempts remained */
  exhausted: boolean
}

export type RetryState = AttemptingState | FailedRetryableState | SucceededState | FailedFatalState

export type TerminalRetryState = SucceededState | FailedFatalState

export function initialRetryState(): AttemptingState {
  return { phase: 'attempting', attempt: 1, lastError: null }
}

/**
 * Linear backoff: the wait after attempt n is `retryDelayMs × n`.
 */
export function backoffDelayMs(attempt: number, policy: RetryPolicy): number {
  return policy.retryDelayMs * attempt
}

/**
 * Total wait across a run in which every attempt fails retryably.
 */
export function maxTotalBackoffMs(policy: RetryPolicy): number {
  return (policy.retryDelayMs * policy.maxRetries * (policy.maxRetries + 1)) / 2
}

export function transitionRetryState(
  state: AttemptingState,
  result: AttemptResult,
  policy: RetryPolicy
): SucceededState | FailedRetryableState | FailedFatalState {
  if (result.ok) {
    return { phase: 'succeeded', attempt: state.attempt, records: result.records }
  }

  if (!isRetryableFailure(result.failure)) {
    return { phase: 'failed_fatal', attempt: state.attempt, failure: result.failure, exhausted: false }
  }

  if (state.attempt <= policy.maxRetries) {
    return {
      phase: 'failed_retryable',
      attempt: state.attempt,
      failure: result.failure,
      backoffMs: backoffDelayMs(state.attempt, policy),
    }
  }

  return { phase: 'failed_fatal', attempt: state.attempt, failure: result.failure, exhausted: true }
}

export function resumeAfterBackoff(state: FailedRetryableState): AttemptingState {
  return { phase: 'attempting', attempt: state.attempt + 1, lastError: state.failure }
}

export function isTerminal(state: RetryState): state is TerminalRetryState {
  return state.phase === 'succeeded' || state.phase === 'failed_fatal'
}
