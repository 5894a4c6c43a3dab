/**
 * CSV Export Sink
 *
 * Writes validated rows to a CSV file in one shot. The file is staged
 * next to the target and renamed into place, so the target is either
 * the complete export or untouched.
 */

import { rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'
import { stringify } from 'csv-stringify/sync'
import type { ILogger } from '@catalog-exporter/logger'
import { ExportError } from '../errors.js'
import type { ProductRow } from '../process/validator.js'

export const CSV_HEADER = [
  'Title',
  'Price',
  'Category',
  'Description',
  'Image URL',
  'Rating',
  'Rating Count',
] as const

export interface ExportSink {
  /** Target written by a successful `write` */
  readonly location: string
  /**
   * Write every row, in order. Throws ExportError and leaves no
   * partial output on failure.
   */
  write(rows: readonly ProductRow[]): Promise<void>
}

export function formatPrice(price: number): string {
  return `$${price.toFixed(2)}`
}

export function toCsvRecord(row: ProductRow): string[] {
  return [
    row.title,
    formatPrice(row.price),
    row.category,
    row.description,
    row.imageUrl,
    row.rating === undefined ? '' : String(row.rating),
    row.ratingCount === undefined ? '' : String(row.ratingCount),
  ]
}

export function renderCsv(rows: readonly ProductRow[]): string {
  return stringify([[...CSV_HEADER], ...rows.map(toCsvRecord)])
}

export class CsvFileSink implements ExportSink {
  readonly location: string
  private readonly logger: ILogger

  constructor(outputPath: string, logger: ILogger) {
    this.location = outputPath
    this.logger = logger
  }

  async write(rows: readonly ProductRow[]): Promise<void> {
    const content = renderCsv(rows)
    const tempPath = join(
      dirname(this.location),
      `.${basename(this.location)}.${process.pid}.${Date.now()}.tmp`
    )

    try {
      await writeFile(tempPath, content, { encoding: 'utf-8', flag: 'wx' })
      await rename(tempPath, this.location)
    } catch (error) {
      await rm(tempPath, { force: true })
      const reason = describeFsError(error)
      this.logger.error('CSV export failed', { outputPath: this.location, reason }, error)
      throw new ExportError(`Cannot write ${this.location}: ${reason}`, this.location, { cause: error })
    }

    this.logger.info('Saved products', { count: rows.length, outputPath: this.location })
  }
}

function describeFsError(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    if (error.code === 'EACCES' || error.code === 'EPERM') {
      return 'permission denied'
    }
    if (error.code === 'ENOENT') {
      return 'directory does not exist'
    }
    if (error.code === 'EISDIR') {
      return 'target is a directory'
    }
  }
  return error instanceof Error ? error.message : String(error)
}
