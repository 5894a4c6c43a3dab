/**
 * Run configuration
 *
 * Resolution order: CLI flags, then EXPORTER_* environment variables,
 * then defaults. The merged result is validated as a whole so every
 * problem is reported at once.
 */

import { z } from 'zod'
import { ConfigError } from '../errors.js'

export const DEFAULT_URL = 'https://fakestoreapi.com/products'
export const DEFAULT_OUTPUT = 'products.csv'
export const DEFAULT_TIMEOUT_SECONDS = 30
export const DEFAULT_MAX_RETRIES = 3
export const DEFAULT_RETRY_DELAY_SECONDS = 1

const booleanFromText = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform((value) => value === 'true' || value === '1' || value === 'yes'),
])

/** Unparseable values are left to the `.url()` check */
function isHttpUrl(value: string): boolean {
  if (!URL.canParse(value)) {
    return true
  }
  const { protocol } = new URL(value)
  return protocol === 'http:' || protocol === 'https:'
}

/** Largest delay a Node timer honours (2^31 - 1 ms), in whole seconds */
export const MAX_TIMER_SECONDS = 2147483

export const RunConfigSchema = z.object({
  url: z
    .string()
    .trim()
    .url('url must be a valid URL')
    .refine(isHttpUrl, 'url must use http or https'),
  outputPath: z.string().trim().min(1, 'outputPath must not be empty'),
  timeoutSeconds: z.coerce
    .number()
    .finite('timeoutSeconds must be finite')
    .positive('timeoutSeconds must be > 0')
    .max(MAX_TIMER_SECONDS, `timeoutSeconds must be <= ${MAX_TIMER_SECONDS}`),
  maxRetries: z.coerce.number().int('maxRetries must be an integer').min(0, 'maxRetries must be >= 0'),
  retryDelaySeconds: z.coerce
    .number()
    .finite('retryDelaySeconds must be finite')
    .min(0, 'retryDelaySeconds must be >= 0')
    .max(MAX_TIMER_SECONDS, `retryDelaySeconds must be <= ${MAX_TIMER_SECONDS}`),
  showStats: booleanFromText,
})

export type RunConfig = z.infer<typeof RunConfigSchema>

/** Values as they arrive from flags or the environment */
export interface RunConfigInput {
  url?: string
  outputPath?: string
  timeoutSeconds?: string | number
  maxRetries?: string | number
  retryDelaySeconds?: string | number
  showStats?: string | boolean
}

export const ENV_KEYS: Record<keyof RunConfigInput, string> = {
  url: 'EXPORTER_URL',
  outputPath: 'EXPORTER_OUTPUT',
  timeoutSeconds: 'EXPORTER_TIMEOUT_SECONDS',
  maxRetries: 'EXPORTER_MAX_RETRIES',
  retryDelaySeconds: 'EXPORTER_RETRY_DELAY_SECONDS',
  showStats: 'EXPORTER_SHOW_STATS',
}

/** Blank strings count as "not provided" so they fall through to the next source */
function provided<T>(value: T | undefined): T | undefined {
  if (typeof value === 'string' && value.trim() === '') {
    return undefined
  }
  return value
}

export function readEnvConfig(env: NodeJS.ProcessEnv = process.env): RunConfigInput {
  return {
    url: env[ENV_KEYS.url],
    outputPath: env[ENV_KEYS.outputPath],
    timeoutSeconds: env[ENV_KEYS.timeoutSeconds],
    maxRetries: env[ENV_KEYS.maxRetries],
    retryDelaySeconds: env[ENV_KEYS.retryDelaySeconds],
    showStats: env[ENV_KEYS.showStats],
  }
}

export function resolveRunConfig(
  flags: RunConfigInput,
  env: NodeJS.ProcessEnv = process.env
): RunConfig {
  const fromEnv = readEnvConfig(env)

  const merged = {
    url: provided(flags.url) ?? provided(fromEnv.url) ?? DEFAULT_URL,
    outputPath: provided(flags.outputPath) ?? provided(fromEnv.outputPath) ?? DEFAULT_OUTPUT,
    timeoutSeconds:
      provided(flags.timeoutSeconds) ?? provided(fromEnv.timeoutSeconds) ?? DEFAULT_TIMEOUT_SECONDS,
    maxRetries: provided(flags.maxRetries) ?? provided(fromEnv.maxRetries) ?? DEFAULT_MAX_RETRIES,
    retryDelaySeconds:
      provided(flags.retryDelaySeconds) ??
      provided(fromEnv.retryDelaySeconds) ??
      DEFAULT_RETRY_DELAY_SECONDS,
    showStats: provided(flags.showStats) ?? provided(fromEnv.showStats) ?? true,
  }

  const parsed = RunConfigSchema.safeParse(merged)
  if (!parsed.success) {
    throw ConfigError.fromZodError(parsed.error)
  }
  return parsed.data
}
