import { expenseModel, type ExpenseRecord } from '../records/expense.js'
import { createAggregator } from './aggregator.js'
import type { Aggregator } from './types.js'

export type ExpenseManager = Aggregator<ExpenseRecord>

/**
 * Aggregator over personal expenses. Revenue is the expense amount.
 */
export const createExpenseManager = (): ExpenseManager => createAggregator(expenseModel)
