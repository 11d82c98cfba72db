import type { DateParts } from './date-parts.js'

export type RecordKind = 'expense' | 'sale'

/**
 * Everything the aggregation engine needs to know about a record kind.
 * Records themselves stay plain frozen objects; behaviour lives here.
 */
export interface RecordModel<T> {
  kind: RecordKind
  /** Runtime guard applied by `add` before any mutation */
  isRecord: (value: unknown) => value is T
  /** Monetary value attributed to one record */
  revenue: (record: T) => number
  /** Parsed date, or the invalid sentinel */
  dateParts: (record: T) => DateParts
  /** Category string as stored (trimmed, case preserved) */
  category: (record: T) => string
}
