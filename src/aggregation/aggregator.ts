import { IndexOutOfRangeError, RecordTypeError } from '../shared/errors.js'
import type { RecordModel } from '../records/types.js'
import { rank } from './ranking.js'
import type {
  Aggregator,
  AggregateSummary,
  CategoryTotal,
  PeriodTotal,
  TotalsOrder,
} from './types.js'

/**
 * Sums revenue per category, keyed by the category string as stored.
 */
const groupByCategory = <T>(records: readonly T[], model: RecordModel<T>): CategoryTotal[] => {
  const accumulator = new Map<string, CategoryTotal>()

  for (const record of records) {
    const category = model.category(record)
    const entry = accumulator.get(category)
    if (entry) {
      entry.total += model.revenue(record)
      entry.count += 1
    } else {
      accumulator.set(category, { category, total: model.revenue(record), count: 1 })
    }
  }

  return [...accumulator.values()]
}

/**
 * Sorts grouped totals by value, highest first. Ties stay in first-occurrence order.
 */
export const sortByTotal = <G extends { total: number }>(groups: G[]): G[] =>
  rank(groups, (g) => g.total, groups.length)

/**
 * Creates an empty in-memory aggregator for one record kind.
 *
 * The aggregator exclusively owns its record sequence. Queries return
 * snapshots; the only mutations are `add` and `removeAt`.
 *
 * @example
 * const manager = createAggregator(expenseModel)
 * manager.add(createExpense({ amount: 100, category: 'Food', date: '2024-01-05' }))
 * manager.total() // => 100
 */
export const createAggregator = <T>(model: RecordModel<T>): Aggregator<T> => {
  const records: T[] = []
  let categorySet = new Set<string>()

  const rebuildCategories = () => {
    categorySet = new Set(records.map(model.category))
  }

  const add = (record: T): void => {
    if (!model.isRecord(record)) {
      throw new RecordTypeError(model.kind)
    }
    records.push(record)
    categorySet.add(model.category(record))
  }

  const removeAt = (position: number): T => {
    if (!Number.isInteger(position) || position < 0 || position >= records.length) {
      throw new IndexOutOfRangeError(position, records.length)
    }
    const [removed] = records.splice(position, 1)
    // Removal may drop a category's last occurrence
    rebuildCategories()
    return removed
  }

  const listAll = (): T[] => [...records]

  const count = (): number => records.length

  const categories = (): string[] => [...categorySet]

  const filterByCategory = (name: string): T[] => {
    const wanted = name.trim().toLowerCase()
    return records.filter((r) => model.category(r).toLowerCase() === wanted)
  }

  const filterByPeriod = (year: number, month: number): T[] =>
    records.filter((r) => {
      const parts = model.dateParts(r)
      return parts.year === year && parts.month === month
    })

  const total = (): number => records.reduce((sum, r) => sum + model.revenue(r), 0)

  const totalByCategory = (order: TotalsOrder = 'insertion'): CategoryTotal[] => {
    const groups = groupByCategory(records, model)
    return order === 'value' ? sortByTotal(groups) : groups
  }

  const categoryTotal = (name: string): number =>
    filterByCategory(name).reduce((sum, r) => sum + model.revenue(r), 0)

  const topN = (n: number): T[] => rank(records, model.revenue, n, 'desc')

  const bottomN = (n: number): T[] => rank(records, model.revenue, n, 'asc')

  const monthlyTrend = (): PeriodTotal[] => {
    const buckets = new Map<string, PeriodTotal>()

    for (const record of records) {
      const { year, month } = model.dateParts(record)
      const key = `${year}-${month}`
      const bucket = buckets.get(key)
      if (bucket) {
        bucket.total += model.revenue(record)
        bucket.count += 1
      } else {
        buckets.set(key, { year, month, total: model.revenue(record), count: 1 })
      }
    }

    return [...buckets.values()].sort((a, b) => a.year - b.year || a.month - b.month)
  }

  const average = (): number => {
    if (records.length === 0) return 0
    return total() / records.length
  }

  const summary = (): AggregateSummary<T> => ({
    count: records.length,
    total: total(),
    average: average(),
    categoryCount: categorySet.size,
    highest: topN(1)[0] ?? null,
    lowest: bottomN(1)[0] ?? null,
  })

  return {
    add,
    removeAt,
    listAll,
    count,
    categories,
    filterByCategory,
    filterByPeriod,
    total,
    totalByCategory,
    categoryTotal,
    topN,
    bottomN,
    monthlyTrend,
    average,
    summary,
  }
}
