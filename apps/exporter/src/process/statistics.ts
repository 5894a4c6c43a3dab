import type { ProductRow } from './validator.js'

export interface Statistics {
  count: number
  minPrice: number | null
  maxPrice: number | null
  averagePrice: number | null
  /** Keyed by the exact category string */
  categoryCounts: Record<string, number>
}

/**
 * Running aggregates over accepted rows.
 */
export class StatisticsCollector {
  private count = 0
  private totalPrice = 0
  private minPrice: number | null = null
  private maxPrice: number | null = null
  private readonly categoryCounts = new Map<string, number>()

  observe(row: ProductRow): void {
    this.count += 1
    this.totalPrice += row.price
    this.minPrice = this.minPrice === null ? row.price : Math.min(this.minPrice, row.price)
    this.maxPrice = this.maxPrice === null ? row.price : Math.max(this.maxPrice, row.price)
    this.categoryCounts.set(row.category, (this.categoryCounts.get(row.category) ?? 0) + 1)
  }

  /**
   * Snapshot of the current aggregates. Safe to call repeatedly.
   */
  finalize(): Statistics {
    return {
      count: this.count,
      minPrice: this.minPrice,
      maxPrice: this.maxPrice,
      averagePrice: this.count > 0 ? this.totalPrice / this.count : null,
      categoryCounts: Object.fromEntries(this.categoryCounts),
    }
  }
}
