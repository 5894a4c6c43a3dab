/**
 * Run Summary
 *
 * One EXPORT_RUN_SUMMARY event per run, plus the human-readable
 * statistics block the CLI prints.
 */

import type { ILogger } from '@catalog-exporter/logger'
import { formatPrice } from '../export/csv-sink.js'
import type { Statistics } from '../process/statistics.js'
import type { RunReport } from './run.js'

export function logRunSummary(logger: ILogger, report: RunReport): void {
  const payload = {
    event_name: 'EXPORT_RUN_SUMMARY',
    status: report.status,
    totalFetched: report.totalFetched,
    acceptedCount: report.acceptedCount,
    rejectedCount: report.rejectedCount,
    rejectionsByReason: report.rejectionsByReason,
    exportStatus: report.exportStatus,
    outputPath: report.outputPath,
    fetchAttempts: report.fetchAttempts,
    statistics: report.statistics,
    durationMs: report.durationMs,
  }

  if (report.failure) {
    logger.error(`Export run failed: ${report.failure.message}`, {
      ...payload,
      failureKind: report.failure.kind,
    })
    return
  }

  if (report.rejectedCount > 0) {
    logger.warn('Export run completed with rejected records', payload)
    return
  }

  logger.info('Export run completed', payload)
}

export function formatStatisticsReport(statistics: Statistics): string[] {
  const rule = '='.repeat(50)
  const lines = [rule, 'EXPORT STATISTICS', rule, `Total Products: ${statistics.count}`]

  if (
    statistics.minPrice !== null &&
    statistics.maxPrice !== null &&
    statistics.averagePrice !== null
  ) {
    lines.push(`Price Range: ${formatPrice(statistics.minPrice)} - ${formatPrice(statistics.maxPrice)}`)
    lines.push(`Average Price: ${formatPrice(statistics.averagePrice)}`)
  }

  lines.push('Categories:')
  for (const [category, count] of Object.entries(statistics.categoryCounts)) {
    lines.push(`  - ${category}: ${count} items`)
  }
  lines.push(rule)

  return lines
}
