/**
 * Record Validator
 *
 * Turns one raw API record into a ProductRow or a rejection.
 *
 * Title and price are required: a record missing either is rejected,
 * never defaulted. Everything else is lenient: missing text fields get
 * defaults and an out-of-range rating sub-field is dropped on its own.
 */

import type { RawRecord } from '../fetch/types.js'

// ═══════════════════════════════════════════════════════════════════════════════
// Output Contract
// ═══════════════════════════════════════════════════════════════════════════════

export interface ProductRow {
  /** Trimmed, never empty */
  title: string

  /** Non-negative, as sent by the API */
  price: number

  /** "unknown" when the API omits it */
  category: string

  description: string

  imageUrl: string

  /** In [0, 5]; absent when missing or out of range */
  rating?: number

  /** Non-negative integer; absent when missing or invalid */
  ratingCount?: number
}

export type RejectionReason =
  | 'MISSING_TITLE' // Absent, non-textual or blank after trimming
  | 'INVALID_PRICE' // Absent, non-numeric or negative

export type ValidationResult =
  | { ok: true; row: ProductRow }
  | { ok: false; reason: RejectionReason; details: string }

export interface ValidatorOptions {
  /** Truncate titles longer than this. Off by default. */
  maxTitleLength?: number

  /** Truncate descriptions longer than this. */
  maxDescriptionLength?: number
}

export const DEFAULT_CATEGORY = 'unknown'
export const DEFAULT_MAX_DESCRIPTION_LENGTH = 200
export const MAX_RATING = 5

// ═══════════════════════════════════════════════════════════════════════════════
// Field coercion
// ═══════════════════════════════════════════════════════════════════════════════

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Strings and finite numbers count as text; everything else is missing.
 */
function asText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value.trim()
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value)
  }
  return undefined
}

// Plain decimals only: no hex/binary/octal prefixes, no exponents
const DECIMAL_PATTERN = /^-?(\d+(\.\d*)?|\.\d+)$/

/**
 * Numbers pass through; numeric-looking strings are parsed after
 * stripping whitespace, a currency sign and thousands separators.
 */
export function parseNumeric(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined
  }
  if (typeof value !== 'string') {
    return undefined
  }

  const cleaned = value.trim().replace(/^\$/, '').replace(/,/g, '')
  if (!DECIMAL_PATTERN.test(cleaned)) {
    return undefined
  }

  const parsed = Number.parseFloat(cleaned)
  return Number.isFinite(parsed) ? parsed : undefined
}

function truncate(value: string, maxLength: number | undefined): string {
  if (maxLength === undefined || value.length <= maxLength) {
    return value
  }
  return value.slice(0, maxLength)
}

function parseRating(value: unknown): number | undefined {
  const rate = parseNumeric(value)
  if (rate === undefined || rate < 0 || rate > MAX_RATING) {
    return undefined
  }
  return rate
}

function parseRatingCount(value: unknown): number | undefined {
  const count = parseNumeric(value)
  if (count === undefined || !Number.isInteger(count) || count < 0) {
    return undefined
  }
  return count
}

// ═══════════════════════════════════════════════════════════════════════════════
// Validation
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate and normalize one record. Pure.
 */
export function validateRecord(raw: RawRecord, options: ValidatorOptions = {}): ValidationResult {
  const title = asText(raw.title)
  if (!title) {
    return {
      ok: false,
      reason: 'MISSING_TITLE',
      details: raw.title === undefined ? 'title is missing' : 'title is empty or not text',
    }
  }

  const price = parseNumeric(raw.price)
  if (price === undefined) {
    return {
      ok: false,
      reason: 'INVALID_PRICE',
      details: raw.price === undefined ? 'price is missing' : 'price is not a number',
    }
  }
  if (price < 0) {
    return { ok: false, reason: 'INVALID_PRICE', details: 'price is negative' }
  }

  const row: ProductRow = {
    title: truncate(title, options.maxTitleLength),
    price,
    category: asText(raw.category) || DEFAULT_CATEGORY,
    description: truncate(
      asText(raw.description) ?? '',
      options.maxDescriptionLength ?? DEFAULT_MAX_DESCRIPTION_LENGTH
    ),
    imageUrl: asText(raw.image) ?? '',
  }

  if (isPlainObject(raw.rating)) {
    const rating = parseRating(raw.rating.rate)
    if (rating !== undefined) {
      row.rating = rating
    }
    const ratingCount = parseRatingCount(raw.rating.count)
    if (ratingCount !== undefined) {
      row.ratingCount = ratingCount
    }
  }

  return { ok: true, row }
}
