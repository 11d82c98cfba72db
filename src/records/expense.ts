import { z } from 'zod'
import { RecordValidationError } from '../shared/errors.js'
import { parseDateParts, type DateParts } from './date-parts.js'
import type { RecordModel } from './types.js'

const amountSchema = z
  .union([z.number(), z.string().trim().min(1)])
  .pipe(z.coerce.number().finite())

export const expenseInputSchema = z.object({
  amount: amountSchema,
  category: z.coerce.string().trim(),
  date: z.coerce.string().trim(),
  note: z.coerce.string().trim().default(''),
})

export type ExpenseInput = z.input<typeof expenseInputSchema>

export interface ExpenseRecord {
  readonly kind: 'expense'
  readonly amount: number
  readonly category: string
  /** YYYY-MM-DD, parsed on demand */
  readonly date: string
  readonly note: string
}

/**
 * Builds an immutable expense. Amount strings such as "49.99" are coerced;
 * anything that is not a finite number throws RecordValidationError.
 *
 * @example
 * createExpense({ amount: '49.99', category: ' Food ', date: '2024-03-10' })
 * // => { kind: 'expense', amount: 49.99, category: 'Food', date: '2024-03-10', note: '' }
 */
export const createExpense = (input: ExpenseInput): ExpenseRecord => {
  const result = expenseInputSchema.safeParse(input)
  if (!result.success) {
    throw new RecordValidationError('expense', result.error.issues)
  }
  return Object.freeze({ kind: 'expense' as const, ...result.data })
}

export const isExpense = (value: unknown): value is ExpenseRecord =>
  typeof value === 'object' &&
  value !== null &&
  'kind' in value &&
  value.kind === 'expense' &&
  'amount' in value &&
  typeof value.amount === 'number' &&
  'category' in value &&
  typeof value.category === 'string' &&
  'date' in value &&
  typeof value.date === 'string'

export const expenseDateParts = (expense: ExpenseRecord): DateParts =>
  parseDateParts(expense.date, 'ymd')

export const expenseModel: RecordModel<ExpenseRecord> = {
  kind: 'expense',
  isRecord: isExpense,
  revenue: (expense) => expense.amount,
  dateParts: expenseDateParts,
  category: (expense) => expense.category,
}

export interface ExpenseView {
  amount: number
  category: string
  date: string
  note: string
}

/**
 * Plain view of an expense, without the kind tag.
 */
export const toExpenseView = (expense: ExpenseRecord): ExpenseView => ({
  amount: expense.amount,
  category: expense.category,
  date: expense.date,
  note: expense.note,
})
