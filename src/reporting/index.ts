/**
 * Text reports over aggregator results.
 *
 * Reporters receive read-only views and only format what the engine
 * computed.
 */

export {
  formatExpenseList,
  formatCategoryReport,
  formatCategoryTotals,
  formatMonthlySummary,
  formatTopExpenses,
  formatFilteredExpenses,
  formatStatistics,
} from './expense-report.js'

export {
  formatSalesList,
  formatRevenueByCategory,
  formatTopProducts,
  formatSalesTrend,
  formatSalesSummary,
} from './sales-report.js'

export { formatPeriod, formatTrendLines } from './format.js'

export type { ExpenseReportSource } from './expense-report.js'
