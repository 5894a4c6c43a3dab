/**
 * Error Classification
 *
 * Maps thrown errors onto the exporter's failure kinds and gives
 * every log line the same error envelope.
 */

import { ZodError } from 'zod'
import type { FetchFailure } from './fetch/types.js'

export const ERROR_CODES = {
  CONFIGURATION_ERROR: 'CONFIGURATION_ERROR',
  EXPORT_FAILED: 'EXPORT_FAILED',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

/**
 * Invalid run configuration (bad flag, bad env var). Never retried.
 */
export class ConfigError extends Error {
  readonly code = ERROR_CODES.CONFIGURATION_ERROR
  readonly issues: string[]

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigError'
    this.issues = issues
  }

  static fromZodError(error: ZodError): ConfigError {
    return new ConfigError(
      error.issues.map((issue) => {
        const path = issue.path.join('.')
        return path ? `${path}: ${issue.message}` : issue.message
      })
    )
  }
}

/**
 * The export sink could not write the output file.
 */
export class ExportError extends Error {
  readonly code = ERROR_CODES.EXPORT_FAILED
  readonly outputPath: string

  constructor(message: string, outputPath: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ExportError'
    this.outputPath = outputPath
  }
}

const TIMEOUT_ERROR_CODES = ['ETIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT']

function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined
  }
  return typeof error.code === 'string' ? error.code : undefined
}

/**
 * undici wraps socket errors as `TypeError('fetch failed', { cause })`;
 * the Node error code lives on the cause.
 */
function findErrorCode(error: unknown): string | undefined {
  const direct = errorCode(error)
  if (direct) return direct
  if (error instanceof Error) {
    return errorCode(error.cause)
  }
  return undefined
}

/**
 * Classify an error thrown by `fetch` during one attempt.
 *
 * Aborts and errors carrying a socket or DNS code are transport problems
 * and retryable. Anything else was raised before a connection existed
 * (a URL with credentials, an unsupported scheme) and fails the fetch.
 */
export function classifyFetchError(error: unknown, timeoutMs: number): FetchFailure {
  if (error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')) {
    return { kind: 'TIMEOUT', message: `Request timed out after ${timeoutMs}ms` }
  }

  const code = findErrorCode(error)
  if (code && TIMEOUT_ERROR_CODES.includes(code)) {
    return { kind: 'TIMEOUT', message: `Network timeout: ${code}` }
  }
  if (code) {
    return { kind: 'NETWORK_ERROR', message: `Connection error: ${code}` }
  }

  return { kind: 'REQUEST_FAILED', message: `Request failed: ${describeRequestError(error)}` }
}

function describeRequestError(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error)
  }
  // undici reports the real reason on the cause of its generic 'fetch failed'
  if (error.cause instanceof Error && error.cause.message) {
    return `${error.message} (${error.cause.message})`
  }
  return error.message
}

/**
 * Format any error for logging
 */
export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof ConfigError || error instanceof ExportError) {
    return {
      error_code: error.code,
      error_message: error.message,
      error_name: error.name,
    }
  }

  if (error instanceof Error) {
    const code = findErrorCode(error)
    return {
      error_message: error.message,
      error_name: error.name,
      ...(code !== undefined ? { error_code: code } : {}),
      error_stack: error.stack,
    }
  }

  return { error_message: String(error) }
}
