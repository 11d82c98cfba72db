import type { TotalsOrder } from '../aggregation/types.js'
import type { SalesAnalyticsView } from '../aggregation/sales-analytics.js'
import { saleRevenue } from '../records/sale.js'
import { formatMoney, formatTable } from '../shared/output.js'
import { formatTrendLines } from './format.js'

export const formatSalesList = (source: SalesAnalyticsView, symbol = 'TK'): string => {
  const sales = source.listAll()
  if (sales.length === 0) return 'No sales recorded yet!'

  const rows = sales.map((s, i) => [
    String(i + 1),
    s.saleId,
    s.product.name,
    s.product.category,
    String(s.quantity),
    formatMoney(saleRevenue(s), symbol),
    s.date,
  ])

  return [
    formatTable(['#', 'Sale', 'Product', 'Category', 'Units', 'Revenue', 'Date'], rows),
    '',
    `Total revenue: ${formatMoney(source.total(), symbol)}`,
  ].join('\n')
}

export const formatRevenueByCategory = (
  source: SalesAnalyticsView,
  order: TotalsOrder = 'value',
  symbol = 'TK'
): string => {
  const totals = source.revenueByCategory(order)
  if (totals.length === 0) return 'No sales to analyze yet!'

  const rows = totals.map((c) => [c.category, formatMoney(c.total, symbol), String(c.count)])
  return formatTable(['Category', 'Revenue', 'Sales'], rows)
}

/**
 * Product leaderboard by summed revenue.
 */
export const formatTopProducts = (source: SalesAnalyticsView, n: number, symbol = 'TK'): string => {
  const products = source.topProducts(n)
  if (products.length === 0) return 'No sales yet!'

  const rows = products.map((p, i) => [
    String(i + 1),
    p.key,
    String(p.quantity),
    formatMoney(p.total, symbol),
  ])
  return formatTable(['Rank', 'Product', 'Units', 'Revenue'], rows)
}

export const formatSalesTrend = (source: SalesAnalyticsView, symbol = 'TK'): string => {
  const trend = source.monthlyTrend()
  if (trend.length === 0) return 'No sales to summarize yet!'
  return formatTrendLines(trend, symbol).join('\n')
}

export const formatSalesSummary = (source: SalesAnalyticsView, symbol = 'TK'): string => {
  const stats = source.summary()
  if (stats.count === 0) return 'No sales to analyze!'

  const [best] = source.topProducts(1)
  const lines = [
    `Sales recorded:     ${stats.count}`,
    `Units sold:         ${source.unitsSold()}`,
    `Total revenue:      ${formatMoney(stats.total, symbol)}`,
    `Average sale:       ${formatMoney(stats.average, symbol)}`,
    `Categories:         ${stats.categoryCount}`,
  ]
  if (best) {
    lines.push(`Best product:       ${best.key} (${formatMoney(best.total, symbol)})`)
  }
  return lines.join('\n')
}
