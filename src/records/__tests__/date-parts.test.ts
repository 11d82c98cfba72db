import { describe, it, expect } from 'vitest'
import {
  parseDateParts,
  detectDateOrder,
  isValidDateParts,
  toPeriodKey,
  looksLikeDate,
  formatLongDate,
  INVALID_DATE_PARTS,
} from '../date-parts.js'

describe('parseDateParts', () => {
  it('splits an ISO date into integers', () => {
    expect(parseDateParts('2024-03-10')).toEqual({ year: 2024, month: 3, day: 10 })
  })

  it('reads day-month-year order', () => {
    expect(parseDateParts('10-03-2024', 'dmy')).toEqual({ year: 2024, month: 3, day: 10 })
  })

  it('trims surrounding whitespace', () => {
    expect(parseDateParts('  2024-12-31 ')).toEqual({ year: 2024, month: 12, day: 31 })
  })

  it('returns the sentinel for the wrong number of parts', () => {
    expect(parseDateParts('2024-03')).toEqual({ year: 0, month: 0, day: 0 })
    expect(parseDateParts('2024/03/10')).toEqual({ year: 0, month: 0, day: 0 })
    expect(parseDateParts('')).toEqual({ year: 0, month: 0, day: 0 })
  })

  it('returns the sentinel for non-numeric parts', () => {
    expect(parseDateParts('2024-Mar-10')).toEqual(INVALID_DATE_PARTS)
    expect(parseDateParts('2024--10')).toEqual(INVALID_DATE_PARTS)
  })

  it('returns the sentinel for out-of-range month or day', () => {
    expect(parseDateParts('2024-13-01')).toEqual(INVALID_DATE_PARTS)
    expect(parseDateParts('2024-00-10')).toEqual(INVALID_DATE_PARTS)
    expect(parseDateParts('2024-01-32')).toEqual(INVALID_DATE_PARTS)
  })

  it('never hands out the shared sentinel object', () => {
    const parts = parseDateParts('nope')
    parts.year = 1999

    expect(INVALID_DATE_PARTS.year).toBe(0)
  })
})

describe('detectDateOrder', () => {
  it('detects a leading four-digit year', () => {
    expect(detectDateOrder('2024-01-05')).toBe('ymd')
  })

  it('falls back to day-month-year', () => {
    expect(detectDateOrder('05-01-2024')).toBe('dmy')
    expect(detectDateOrder('garbage')).toBe('dmy')
  })
})

describe('isValidDateParts', () => {
  it('is false only for the sentinel', () => {
    expect(isValidDateParts({ year: 0, month: 0, day: 0 })).toBe(false)
    expect(isValidDateParts({ year: 2024, month: 1, day: 1 })).toBe(true)
  })
})

describe('formatLongDate', () => {
  it('spells out the month and pads the day', () => {
    expect(formatLongDate({ year: 2024, month: 3, day: 5 })).toBe('March 05 2024')
    expect(formatLongDate({ year: 2023, month: 12, day: 31 })).toBe('December 31 2023')
  })

  it('names the sentinel as unknown', () => {
    expect(formatLongDate({ ...INVALID_DATE_PARTS })).toBe('an unknown date')
  })
})

describe('toPeriodKey', () => {
  it('formats YYYY-MM', () => {
    expect(toPeriodKey({ year: 2024, month: 3 })).toBe('2024-03')
  })

  it('returns null for the sentinel bucket', () => {
    expect(toPeriodKey({ year: 0, month: 0 })).toBeNull()
  })
})

describe('looksLikeDate', () => {
  it('checks the ISO shape', () => {
    expect(looksLikeDate('2024-03-10', 'ymd')).toBe(true)
    expect(looksLikeDate('2024-3-10', 'ymd')).toBe(false)
  })

  it('checks the day-first shape', () => {
    expect(looksLikeDate('10-03-2024', 'dmy')).toBe(true)
    expect(looksLikeDate('2024-03-10', 'dmy')).toBe(false)
  })
})
