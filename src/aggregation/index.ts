/**
 * Aggregation engine: grouped sums, stable rankings and monthly trends over
 * an owned sequence of records.
 */

export { createAggregator, sortByTotal } from './aggregator.js'
export { createExpenseManager } from './expense-manager.js'
export { createSalesAnalytics, aggregateByProduct } from './sales-analytics.js'
export { rank } from './ranking.js'

export type {
  TotalsOrder,
  CategoryTotal,
  PeriodTotal,
  GroupTotal,
  AggregateSummary,
  Aggregator,
  AggregatorView,
} from './types.js'
export type { ExpenseManager } from './expense-manager.js'
export type { SalesAnalytics, SalesAnalyticsView } from './sales-analytics.js'
export type { RankDirection } from './ranking.js'
