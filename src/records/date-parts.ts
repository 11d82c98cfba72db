/**
 * Calendar date decomposition shared by every record kind.
 *
 * Dates are stored as strings and parsed on demand. Anything that does not
 * parse degrades to the INVALID_DATE_PARTS sentinel instead of throwing, so
 * grouping code sees it as its own bucket.
 */

export interface DateParts {
  year: number
  month: number
  day: number
}

/**
 * Field order of a date string.
 * - `ymd`: 2024-03-10 (expenses)
 * - `dmy`: 10-03-2024 (sales)
 */
export type DateOrder = 'ymd' | 'dmy'

export const INVALID_DATE_PARTS: Readonly<DateParts> = Object.freeze({ year: 0, month: 0, day: 0 })

const DIGITS = /^\d+$/

const toInt = (part: string): number | null => (DIGITS.test(part) ? Number(part) : null)

/**
 * Splits a hyphenated date into integer parts.
 *
 * @example
 * parseDateParts('2024-03-10') // => { year: 2024, month: 3, day: 10 }
 * parseDateParts('10-03-2024', 'dmy') // => { year: 2024, month: 3, day: 10 }
 * parseDateParts('March 10') // => { year: 0, month: 0, day: 0 }
 */
export const parseDateParts = (date: string, order: DateOrder = 'ymd'): DateParts => {
  const parts = date.trim().split('-')
  if (parts.length !== 3) return { ...INVALID_DATE_PARTS }

  const [a, b, c] = parts.map(toInt)
  if (a === null || b === null || c === null) return { ...INVALID_DATE_PARTS }

  const [year, month, day] = order === 'ymd' ? [a, b, c] : [c, b, a]
  if (month < 1 || month > 12 || day < 1 || day > 31) return { ...INVALID_DATE_PARTS }

  return { year, month, day }
}

const LONG_MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const

/**
 * Long form with a zero-padded day, e.g. "March 05 2024".
 */
export const formatLongDate = (parts: DateParts): string => {
  if (!isValidDateParts(parts)) return 'an unknown date'
  return `${LONG_MONTH_NAMES[parts.month - 1]} ${String(parts.day).padStart(2, '0')} ${parts.year}`
}

/**
 * Sales dates come as DD-MM-YYYY, but a leading four-digit year means the
 * ISO order was used instead.
 */
export const detectDateOrder = (date: string): DateOrder =>
  /^\d{4}-/.test(date.trim()) ? 'ymd' : 'dmy'

export const isValidDateParts = (parts: DateParts): boolean =>
  parts.year !== 0 || parts.month !== 0 || parts.day !== 0

/**
 * Period key in YYYY-MM format, or null for the sentinel.
 */
export const toPeriodKey = (parts: Pick<DateParts, 'year' | 'month'>): string | null => {
  if (parts.year === 0 && parts.month === 0) return null
  return `${String(parts.year).padStart(4, '0')}-${String(parts.month).padStart(2, '0')}`
}

/**
 * Loose shape check used by the interactive prompts before a record is built.
 */
export const looksLikeDate = (date: string, order: DateOrder): boolean =>
  order === 'ymd' ? /^\d{4}-\d{2}-\d{2}$/.test(date) : /^\d{2}-\d{2}-\d{4}$/.test(date)
