import type { AggregatorView, TotalsOrder } from '../aggregation/types.js'
import type { ExpenseRecord } from '../records/expense.js'
import { formatMoney, formatTable } from '../shared/output.js'
import { formatTrendLines } from './format.js'

export type ExpenseReportSource = AggregatorView<ExpenseRecord>

/**
 * Every expense as a numbered table, followed by the overall total.
 * Numbers are 1-based, matching the delete prompt.
 */
export const formatExpenseList = (source: ExpenseReportSource, symbol = '$'): string => {
  const expenses = source.listAll()
  if (expenses.length === 0) {
    return 'No expenses recorded yet! Add some expenses to get started.'
  }

  const rows = expenses.map((e, i) => [
    String(i + 1),
    e.date,
    e.category,
    formatMoney(e.amount, symbol),
    e.note,
  ])

  return [
    formatTable(['#', 'Date', 'Category', 'Amount', 'Note'], rows),
    '',
    `Total spent: ${formatMoney(source.total(), symbol)}`,
  ].join('\n')
}

/**
 * "Category: $12.00" per line, first-occurrence order.
 */
export const formatCategoryReport = (source: ExpenseReportSource, symbol = '$'): string =>
  source
    .totalByCategory('insertion')
    .map((c) => `${c.category}: ${formatMoney(c.total, symbol)}`)
    .join('\n')

export const formatCategoryTotals = (
  source: ExpenseReportSource,
  order: TotalsOrder = 'insertion',
  symbol = '$'
): string => {
  const totals = source.totalByCategory(order)
  if (totals.length === 0) return 'No expenses to analyze yet!'

  const rows = totals.map((c) => [c.category, formatMoney(c.total, symbol), String(c.count)])

  return [
    formatTable(['Category', 'Total', 'Count'], rows),
    '',
    `Total: ${formatMoney(source.total(), symbol)}`,
  ].join('\n')
}

export const formatMonthlySummary = (source: ExpenseReportSource, symbol = '$'): string => {
  const trend = source.monthlyTrend()
  if (trend.length === 0) return 'No expenses to summarize yet!'
  return formatTrendLines(trend, symbol).join('\n')
}

/**
 * @example
 * // #1  $200.00 - Bills (2024-01-20)
 * //      Note: electricity
 */
export const formatTopExpenses = (source: ExpenseReportSource, n: number, symbol = '$'): string => {
  const top = source.topN(n)
  if (top.length === 0) return 'No expenses yet!'

  return top
    .flatMap((e, i) => {
      const line = `#${i + 1}  ${formatMoney(e.amount, symbol)} - ${e.category} (${e.date})`
      return e.note ? [line, `     Note: ${e.note}`] : [line]
    })
    .join('\n')
}

export const formatFilteredExpenses = (
  source: ExpenseReportSource,
  category: string,
  symbol = '$'
): string => {
  const matches = source.filterByCategory(category)
  if (matches.length === 0) return `No expenses found for category: ${category}`

  const rows = matches.map((e, i) => [String(i + 1), e.date, formatMoney(e.amount, symbol), e.note])

  return [
    `Expenses in category: ${category}`,
    '',
    formatTable(['#', 'Date', 'Amount', 'Note'], rows),
    '',
    `Total for ${category}: ${formatMoney(source.categoryTotal(category), symbol)}`,
  ].join('\n')
}

const describeExpense = (e: ExpenseRecord, symbol: string): string =>
  `${formatMoney(e.amount, symbol)} (${e.category} on ${e.date})`

export const formatStatistics = (source: ExpenseReportSource, symbol = '$'): string => {
  const stats = source.summary()
  if (stats.count === 0) return 'No expenses to analyze!'

  const lines = [
    `Expenses recorded:  ${stats.count}`,
    `Total spent:        ${formatMoney(stats.total, symbol)}`,
    `Average expense:    ${formatMoney(stats.average, symbol)}`,
    `Categories:         ${stats.categoryCount}`,
  ]
  if (stats.highest && stats.lowest) {
    lines.push('')
    lines.push(`Highest expense:    ${describeExpense(stats.highest, symbol)}`)
    lines.push(`Lowest expense:     ${describeExpense(stats.lowest, symbol)}`)
  }
  return lines.join('\n')
}
