import type { PeriodTotal } from '../aggregation/types.js'
import { formatMoney } from '../shared/output.js'

const MONTH_NAMES = [
  'Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun',
  'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec',
] as const

/**
 * Short month label, e.g. "Jan 2024". The invalid-date bucket has no label.
 */
export const formatPeriod = (period: Pick<PeriodTotal, 'year' | 'month'>): string => {
  if (period.month < 1 || period.month > 12) return 'Unknown date'
  return `${MONTH_NAMES[period.month - 1]} ${period.year}`
}

/**
 * One "  Jan 2024: $300.00" line per bucket, in the order given.
 */
export const formatTrendLines = (trend: PeriodTotal[], symbol: string): string[] =>
  trend.map((bucket) => `  ${formatPeriod(bucket)}: ${formatMoney(bucket.total, symbol)}`)
