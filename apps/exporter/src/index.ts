export { HttpFetcher, isFatalStatus, type HttpFetcherOptions } from './fetch/http-fetcher.js'
export * from './fetch/retry-state.js'
export * from './fetch/types.js'
export * from './process/validator.js'
export * from './process/statistics.js'
export * from './export/csv-sink.js'
export * from './pipeline/run.js'
export { formatStatisticsReport, logRunSummary } from './pipeline/summary.js'
export { resolveRunConfig, RunConfigSchema, type RunConfig } from './config/settings.js'
export { ConfigError, ExportError, classifyFetchError, formatErrorForLog } from './errors.js'
export { runCli } from './cli/index.js'
