import type { ILogger } from '@catalog-exporter/logger'
import { componentLoggers, rootLogger } from '../config/logger.js'
import { resolveRunConfig, type RunConfig } from '../config/settings.js'
import { ConfigError } from '../errors.js'
import { CsvFileSink } from '../export/csv-sink.js'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import type { Sleep } from '../fetch/types.js'
import { runPipeline } from '../pipeline/run.js'
import { formatStatisticsReport } from '../pipeline/summary.js'
import { asString, parseFlags, type Flags } from './parse-flags.js'
import { createProgressReporter, type ProgressStream } from './progress.js'

export const EXIT_SUCCESS = 0
export const EXIT_FAILURE = 1
export const EXIT_USAGE = 2

const VALUE_FLAGS = ['url', 'output', 'timeout', 'retries', 'delay'] as const
const KNOWN_FLAGS = new Set<string>([...VALUE_FLAGS, 'no-stats', 'help'])

export interface CliDeps {
  env?: NodeJS.ProcessEnv
  stdout?: ProgressStream
  stderr?: ProgressStream
  logger?: ILogger
  fetchImpl?: typeof fetch
  sleep?: Sleep
}

export function usage(): string[] {
  return [
    'Catalog Exporter',
    '',
    'Fetches products from a JSON API, validates them and writes a CSV file.',
    '',
    'Usage: catalog-export [options]',
    '',
    'Options:',
    '  -u, --url <url>        API URL to fetch (env EXPORTER_URL)',
    '  -o, --output <path>    Output CSV path (env EXPORTER_OUTPUT)',
    '  -t, --timeout <sec>    Per-attempt timeout in seconds (env EXPORTER_TIMEOUT_SECONDS)',
    '  -r, --retries <n>      Retries after the first attempt (env EXPORTER_MAX_RETRIES)',
    '  -d, --delay <sec>      Base delay between retries (env EXPORTER_RETRY_DELAY_SECONDS)',
    '      --no-stats         Do not print the statistics block',
    '  -h, --help             Show this help',
    '',
    'Examples:',
    '  catalog-export --output data.csv',
    '  catalog-export --url https://api.example.com/products --timeout 60',
    '  catalog-export --retries 5 --delay 2',
  ]
}

function writeLines(stream: ProgressStream, lines: string[]): void {
  stream.write(`${lines.join('\n')}\n`)
}

/**
 * Returns the first usage problem, if any.
 */
export function findUsageError(flags: Flags): string | null {
  for (const key of Object.keys(flags)) {
    if (!KNOWN_FLAGS.has(key)) {
      return `Unknown option: ${key.length === 1 ? '-' : '--'}${key}`
    }
  }
  for (const key of VALUE_FLAGS) {
    if (flags[key] === true) {
      return `Option --${key} requires a value`
    }
  }
  return null
}

export function configFromFlags(flags: Flags, env: NodeJS.ProcessEnv): RunConfig {
  return resolveRunConfig(
    {
      url: asString(flags.url),
      outputPath: asString(flags.output),
      timeoutSeconds: asString(flags.timeout),
      maxRetries: asString(flags.retries),
      retryDelaySeconds: asString(flags.delay),
      showStats: flags['no-stats'] === true ? false : undefined,
    },
    env
  )
}

export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout
  const stderr = deps.stderr ?? process.stderr
  const log = componentLoggers(deps.logger ?? rootLogger)

  const flags = parseFlags(argv)
  if (flags.help === true) {
    writeLines(stdout, usage())
    return EXIT_SUCCESS
  }

  const usageError = findUsageError(flags)
  if (usageError) {
    writeLines(stderr, [usageError, 'Run with --help for usage.'])
    return EXIT_USAGE
  }

  let config: RunConfig
  try {
    config = configFromFlags(flags, deps.env ?? process.env)
  } catch (error) {
    if (error instanceof ConfigError) {
      log.cli.error('Invalid configuration', { issues: error.issues })
      writeLines(stderr, error.issues.map((issue) => `Invalid configuration: ${issue}`))
      return EXIT_USAGE
    }
    throw error
  }

  log.cli.info('Target URL', { url: config.url, outputPath: config.outputPath })

  const fetcher = new HttpFetcher({
    logger: log.fetch,
    fetchImpl: deps.fetchImpl,
    sleep: deps.sleep,
  })
  const sink = new CsvFileSink(config.outputPath, log.export)

  const report = await runPipeline(config, {
    fetcher,
    sink,
    logger: log.pipeline,
    onProgress: createProgressReporter(stderr),
  })

  if (report.status !== 'SUCCESS') {
    log.cli.error('Export failed', {
      kind: report.failure?.kind,
      reason: report.failure?.message,
    })
    return EXIT_FAILURE
  }

  if (config.showStats) {
    writeLines(stdout, formatStatisticsReport(report.statistics))
  }

  log.cli.info('Export completed', {
    durationSeconds: Number((report.durationMs / 1000).toFixed(2)),
    acceptedCount: report.acceptedCount,
    rejectedCount: report.rejectedCount,
  })
  return EXIT_SUCCESS
}
