/**
 * Result types for the aggregation engine.
 *
 * Grouped results are arrays with a defined order rather than plain objects,
 * so iteration order never depends on key shape.
 */

/**
 * Order of grouped totals.
 * - `insertion`: first occurrence of the group in the record sequence
 * - `value`: total descending, ties keep first-occurrence order
 */
export type TotalsOrder = 'insertion' | 'value'

/**
 * @example
 * const food: CategoryTotal = { category: 'Food', total: 150, count: 2 }
 */
export interface CategoryTotal {
  category: string
  total: number
  /** Number of records in this category */
  count: number
}

/**
 * One (year, month) bucket. The invalid-date sentinel is bucket (0, 0).
 *
 * @example
 * const jan: PeriodTotal = { year: 2024, month: 1, total: 300, count: 2 }
 */
export interface PeriodTotal {
  year: number
  month: number
  total: number
  count: number
}

/**
 * Revenue summed per secondary key (e.g. product name) before ranking.
 */
export interface GroupTotal {
  key: string
  total: number
  /** Summed quantity where the record kind has one, otherwise the record count */
  quantity: number
  count: number
}

export interface AggregateSummary<T> {
  count: number
  total: number
  average: number
  categoryCount: number
  /** Highest-revenue record, null when empty */
  highest: T | null
  /** Lowest-revenue record, null when empty */
  lowest: T | null
}

/**
 * The engine's public surface. Shells and reporters go through this and
 * never touch the underlying storage.
 */
export interface Aggregator<T> {
  /** Appends a record. Throws RecordTypeError (no mutation) for anything else */
  add: (record: T) => void
  /** Removes and returns the record at `position`. Throws IndexOutOfRangeError */
  removeAt: (position: number) => T
  listAll: () => T[]
  count: () => number
  /** Distinct categories in first-seen order */
  categories: () => string[]
  filterByCategory: (name: string) => T[]
  filterByPeriod: (year: number, month: number) => T[]
  total: () => number
  totalByCategory: (order?: TotalsOrder) => CategoryTotal[]
  /** Summed revenue of one category, matched case-insensitively; 0 when absent */
  categoryTotal: (name: string) => number
  topN: (n: number) => T[]
  bottomN: (n: number) => T[]
  monthlyTrend: () => PeriodTotal[]
  average: () => number
  summary: () => AggregateSummary<T>
}

/**
 * Read-only slice of an aggregator handed to reporters.
 */
export type AggregatorView<T> = Omit<Aggregator<T>, 'add' | 'removeAt'>
