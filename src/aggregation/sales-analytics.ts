import { saleModel, saleRevenue, type SaleRecord } from '../records/sale.js'
import { createAggregator } from './aggregator.js'
import { rank } from './ranking.js'
import type { Aggregator, CategoryTotal, GroupTotal, TotalsOrder } from './types.js'

export interface SalesAnalytics extends Aggregator<SaleRecord> {
  /** Revenue per catalog product name, first-occurrence order */
  revenueByProduct: () => GroupTotal[]
  /** Products ranked by summed revenue, highest first */
  topProducts: (n: number) => GroupTotal[]
  /** Products ranked by summed revenue, lowest first */
  bottomProducts: (n: number) => GroupTotal[]
  revenueByCategory: (order?: TotalsOrder) => CategoryTotal[]
  /** Total quantity sold across all sales */
  unitsSold: () => number
}

export type SalesAnalyticsView = Omit<SalesAnalytics, 'add' | 'removeAt'>

/**
 * Groups sales by product name and sums revenue and quantity per group.
 */
export const aggregateByProduct = (sales: readonly SaleRecord[]): GroupTotal[] => {
  const accumulator = new Map<string, GroupTotal>()

  for (const sale of sales) {
    const key = sale.product.name
    const entry = accumulator.get(key)
    if (entry) {
      entry.total += saleRevenue(sale)
      entry.quantity += sale.quantity
      entry.count += 1
    } else {
      accumulator.set(key, {
        key,
        total: saleRevenue(sale),
        quantity: sale.quantity,
        count: 1,
      })
    }
  }

  return [...accumulator.values()]
}

/**
 * Aggregator over sales with the grouped-ranking queries of the sales report.
 *
 * `topN`/`bottomN` still rank individual sales; `topProducts`/`bottomProducts`
 * rank per-product totals.
 *
 * @example
 * const analytics = createSalesAnalytics()
 * analytics.add(createSale({ saleId: 1, product: pen, quantity: 3, date: '05-01-2024' }))
 * analytics.topProducts(1) // => [{ key: 'Pen', total: 60, quantity: 3, count: 1 }]
 */
export const createSalesAnalytics = (): SalesAnalytics => {
  const base = createAggregator(saleModel)

  const revenueByProduct = (): GroupTotal[] => aggregateByProduct(base.listAll())

  const topProducts = (n: number): GroupTotal[] =>
    rank(revenueByProduct(), (g) => g.total, n, 'desc')

  const bottomProducts = (n: number): GroupTotal[] =>
    rank(revenueByProduct(), (g) => g.total, n, 'asc')

  const revenueByCategory = (order: TotalsOrder = 'value'): CategoryTotal[] =>
    base.totalByCategory(order)

  const unitsSold = (): number =>
    base.listAll().reduce((sum, sale) => sum + sale.quantity, 0)

  return {
    ...base,
    revenueByProduct,
    topProducts,
    bottomProducts,
    revenueByCategory,
    unitsSold,
  }
}

