/**
 * Export Pipeline
 *
 * fetch → validate each record → collect statistics → one write to the sink.
 *
 * The only exits are a fetch failure (nothing written), an export
 * failure (nothing written) and success. Rejected records never abort
 * the run.
 */

import type { ILogger } from '@catalog-exporter/logger'
import { ERROR_CODES, ExportError, formatErrorForLog } from '../errors.js'
import type { ExportSink } from '../export/csv-sink.js'
import type { FetchFailureKind, RecordFetcher } from '../fetch/types.js'
import { StatisticsCollector, type Statistics } from '../process/statistics.js'
import {
  validateRecord,
  type ProductRow,
  type RejectionReason,
  type ValidatorOptions,
} from '../process/validator.js'
import { logRunSummary } from './summary.js'

export interface PipelineConfig {
  url: string
  timeoutSeconds: number
  maxRetries: number
  retryDelaySeconds: number
}

export interface PipelineDeps {
  fetcher: RecordFetcher
  sink: ExportSink
  logger: ILogger
  statistics?: StatisticsCollector
  validator?: ValidatorOptions
  /** Called after each record is validated */
  onProgress?: (processed: number, total: number) => void
  now?: () => number
}

export type RunFailureKind = FetchFailureKind | typeof ERROR_CODES.EXPORT_FAILED

export type ExportStatus = 'WRITTEN' | 'FAILED' | 'SKIPPED'

export interface RunReport {
  status: 'SUCCESS' | 'FAILED'
  totalFetched: number
  acceptedCount: number
  rejectedCount: number
  rejectionsByReason: Partial<Record<RejectionReason, number>>
  statistics: Statistics
  exportStatus: ExportStatus
  outputPath: string
  fetchAttempts: number
  failure?: {
    kind: RunFailureKind
    message: string
  }
  durationMs: number
}

export async function runPipeline(config: PipelineConfig, deps: PipelineDeps): Promise<RunReport> {
  const now = deps.now ?? Date.now
  const startTime = now()
  const log = deps.logger
  const statistics = deps.statistics ?? new StatisticsCollector()

  log.info('Starting export run', { url: config.url, outputPath: deps.sink.location })

  const outcome = await deps.fetcher.fetchRecords({
    url: config.url,
    timeoutMs: config.timeoutSeconds * 1000,
    maxRetries: config.maxRetries,
    retryDelayMs: config.retryDelaySeconds * 1000,
  })

  const base = {
    outputPath: deps.sink.location,
    fetchAttempts: outcome.attempts,
  }

  if (!outcome.ok) {
    const report: RunReport = {
      ...base,
      status: 'FAILED',
      totalFetched: 0,
      acceptedCount: 0,
      rejectedCount: 0,
      rejectionsByReason: {},
      statistics: statistics.finalize(),
      exportStatus: 'SKIPPED',
      failure: { kind: outcome.failure.kind, message: outcome.failure.message },
      durationMs: now() - startTime,
    }
    logRunSummary(log, report)
    return report
  }

  const accepted: ProductRow[] = []
  const rejectionsByReason: Partial<Record<RejectionReason, number>> = {}
  let rejectedCount = 0
  const total = outcome.records.length

  outcome.records.forEach((raw, index) => {
    const result = validateRecord(raw, deps.validator)
    if (result.ok) {
      accepted.push(result.row)
      statistics.observe(result.row)
    } else {
      rejectedCount += 1
      rejectionsByReason[result.reason] = (rejectionsByReason[result.reason] ?? 0) + 1
      log.warn('Rejected record', { index, reason: result.reason, details: result.details })
    }
    deps.onProgress?.(index + 1, total)
  })

  const counts = {
    ...base,
    totalFetched: total,
    acceptedCount: accepted.length,
    rejectedCount,
    rejectionsByReason,
    statistics: statistics.finalize(),
  }

  if (accepted.length === 0) {
    const report: RunReport = {
      ...counts,
      status: 'FAILED',
      exportStatus: 'SKIPPED',
      failure: { kind: ERROR_CODES.EXPORT_FAILED, message: 'No products to save' },
      durationMs: now() - startTime,
    }
    logRunSummary(log, report)
    return report
  }

  try {
    await deps.sink.write(accepted)
  } catch (error) {
    if (!(error instanceof ExportError)) {
      log.error('Export sink threw an unexpected error', formatErrorForLog(error), error)
    }
    const report: RunReport = {
      ...counts,
      status: 'FAILED',
      exportStatus: 'FAILED',
      failure: {
        kind: ERROR_CODES.EXPORT_FAILED,
        message: error instanceof Error ? error.message : String(error),
      },
      durationMs: now() - startTime,
    }
    logRunSummary(log, report)
    return report
  }

  const report: RunReport = {
    ...counts,
    status: 'SUCCESS',
    exportStatus: 'WRITTEN',
    durationMs: now() - startTime,
  }
  logRunSummary(log, report)
  return report
}
