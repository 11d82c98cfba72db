export {
  parseDateParts,
  detectDateOrder,
  isValidDateParts,
  toPeriodKey,
  looksLikeDate,
  formatLongDate,
  INVALID_DATE_PARTS,
} from './date-parts.js'
export {
  createExpense,
  isExpense,
  expenseModel,
  expenseDateParts,
  toExpenseView,
} from './expense.js'
export { createProduct, isProduct, describeProduct } from './product.js'
export { createSale, isSale, saleModel, saleRevenue, saleDateParts, describeSale } from './sale.js'

export type { DateParts, DateOrder } from './date-parts.js'
export type { ExpenseInput, ExpenseRecord, ExpenseView } from './expense.js'
export type { ProductInput, Product } from './product.js'
export type { SaleInput, SaleRecord } from './sale.js'
export type { RecordKind, RecordModel } from './types.js'
