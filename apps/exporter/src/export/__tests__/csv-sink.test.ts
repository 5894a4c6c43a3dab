import { mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { ExportError } from '../../errors.js'
import type { ProductRow } from '../../process/validator.js'
import { CsvFileSink, formatPrice, renderCsv, toCsvRecord } from '../csv-sink.js'
import { captureLogger } from '../../__tests__/capture-logger.js'

const HEADER = 'Title,Price,Category,Description,Image URL,Rating,Rating Count'

const rated: ProductRow = {
  title: 'Desk Lamp',
  price: 12.5,
  category: 'home',
  description: 'LED',
  imageUrl: 'https://img.example.com/lamp.jpg',
  rating: 4.2,
  ratingCount: 37,
}

const unrated: ProductRow = {
  title: 'Mug, large',
  price: 5,
  category: 'unknown',
  description: 'Says "hello"',
  imageUrl: '',
}

describe('formatPrice', () => {
  it('renders two decimals with a dollar sign', () => {
    expect(formatPrice(5)).toBe('$5.00')
    expect(formatPrice(109.95)).toBe('$109.95')
    expect(formatPrice(0)).toBe('$0.00')
  })
})

describe('toCsvRecord', () => {
  it('leaves rating columns empty when absent', () => {
    expect(toCsvRecord(unrated)).toEqual(['Mug, large', '$5.00', 'unknown', 'Says "hello"', '', '', ''])
  })

  it('includes rating columns when present', () => {
    expect(toCsvRecord(rated)).toEqual([
      'Desk Lamp',
      '$12.50',
      'home',
      'LED',
      'https://img.example.com/lamp.jpg',
      '4.2',
      '37',
    ])
  })
})

describe('renderCsv', () => {
  it('writes the header and quotes fields that need it', () => {
    expect(renderCsv([rated, unrated])).toBe(
      [
        HEADER,
        'Desk Lamp,$12.50,home,LED,https://img.example.com/lamp.jpg,4.2,37',
        '"Mug, large",$5.00,unknown,"Says ""hello""",,,',
        '',
      ].join('\n')
    )
  })
})

describe('CsvFileSink', () => {
  let dir: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'csv-sink-test-'))
  })

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true })
  })

  it('writes every row in order and leaves no temp file', async () => {
    const outputPath = join(dir, 'products.csv')
    const { logger, entries } = captureLogger()

    await new CsvFileSink(outputPath, logger).write([rated, unrated])

    const lines = readFileSync(outputPath, 'utf-8').trim().split('\n')
    expect(lines).toHaveLength(3)
    expect(lines[0]).toBe(HEADER)
    expect(lines[1].startsWith('Desk Lamp,')).toBe(true)
    expect(readdirSync(dir)).toEqual(['products.csv'])
    expect(entries.at(-1)).toMatchObject({ message: 'Saved products', count: 2 })
  })

  it('replaces an existing file', async () => {
    const outputPath = join(dir, 'products.csv')
    writeFileSync(outputPath, 'stale')
    const { logger } = captureLogger()

    await new CsvFileSink(outputPath, logger).write([unrated])

    expect(readFileSync(outputPath, 'utf-8').startsWith(HEADER)).toBe(true)
  })

  it('throws ExportError when the directory does not exist', async () => {
    const outputPath = join(dir, 'missing', 'products.csv')
    const { logger } = captureLogger()

    const write = new CsvFileSink(outputPath, logger).write([rated])

    await expect(write).rejects.toBeInstanceOf(ExportError)
    await expect(write).rejects.toThrow(`Cannot write ${outputPath}: directory does not exist`)
    expect(readdirSync(dir)).toEqual([])
  })

  it('leaves the target untouched and cleans up when the rename fails', async () => {
    const outputPath = join(dir, 'products.csv')
    mkdirSync(outputPath)
    const { logger, entries } = captureLogger()

    await expect(new CsvFileSink(outputPath, logger).write([rated])).rejects.toThrow(
      `Cannot write ${outputPath}: target is a directory`
    )

    expect(readdirSync(dir)).toEqual(['products.csv'])
    expect(readdirSync(outputPath)).toEqual([])
    expect(entries.at(-1)).toMatchObject({ level: 'error', message: 'CSV export failed' })
  })
})
