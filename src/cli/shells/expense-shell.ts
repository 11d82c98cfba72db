import * as p from '@clack/prompts'
import type { ExpenseManager } from '../../aggregation/expense-manager.js'
import { looksLikeDate } from '../../records/date-parts.js'
import { createExpense } from '../../records/expense.js'
import {
  formatCategoryTotals,
  formatExpenseList,
  formatFilteredExpenses,
  formatMonthlySummary,
  formatStatistics,
  formatTopExpenses,
} from '../../reporting/expense-report.js'
import { formatMoney } from '../../shared/output.js'
import { ask, removeOrNull, runMenuLoop, today, validateAmount, type MenuEntry } from './prompts.js'

export interface ExpenseShellSettings {
  currencySymbol: string
  topCount: number
  categories: string[]
  /** Used when the date prompt is left blank; defaults to today */
  defaultDate?: string
}

type ExpenseAction =
  | 'add'
  | 'list'
  | 'categories'
  | 'monthly'
  | 'top'
  | 'filter'
  | 'stats'
  | 'delete'

/**
 * Interactive expense tracker. Mutates the manager only through `add` and
 * `removeAt`; every view goes through the reporters.
 */
export const runExpenseShell = async (
  manager: ExpenseManager,
  settings: ExpenseShellSettings
): Promise<void> => {
  const symbol = settings.currencySymbol
  const defaultDate = settings.defaultDate ?? today()

  const addExpense = async () => {
    const amount = await ask({
      message: `Enter amount (${symbol})`,
      validate: validateAmount,
    })
    if (amount === null) return

    const category = await p.select<{ value: string; label: string }[], string>({
      message: 'Select a category',
      options: settings.categories.map((c) => ({ value: c, label: c })),
    })
    if (p.isCancel(category)) return

    const date = await ask({
      message: `Enter date (YYYY-MM-DD) or leave blank for ${defaultDate}`,
      placeholder: defaultDate,
      validate: (value = '') =>
        !value.trim() || looksLikeDate(value.trim(), 'ymd')
          ? undefined
          : 'Please use format YYYY-MM-DD (e.g., 2024-03-10)',
    })
    if (date === null) return

    const note = await ask({ message: 'Enter note (optional)' })
    if (note === null) return

    const expense = createExpense({ amount, category, date: date || defaultDate, note })
    manager.add(expense)
    p.log.success(`Added ${formatMoney(expense.amount, symbol)} for ${expense.category}`)
  }

  const filterByCategory = async () => {
    const known = manager.categories().sort()
    if (known.length === 0) {
      p.log.info('No expenses recorded yet!')
      return
    }

    const category = await p.select<{ value: string; label: string }[], string>({
      message: 'Filter by which category?',
      options: known.map((c) => ({ value: c, label: c })),
    })
    if (p.isCancel(category)) return

    p.note(formatFilteredExpenses(manager, category, symbol), 'Filter by category')
  }

  const deleteExpense = async () => {
    if (manager.count() === 0) {
      p.log.info('No expenses to delete!')
      return
    }

    p.note(formatExpenseList(manager, symbol), 'All expenses')
    const answer = await ask({
      message: 'Enter expense number to delete (or 0 to cancel)',
      validate: (value = '') =>
        Number.isInteger(Number(value)) && value.trim() !== '' ? undefined : 'Please enter a valid number!',
    })
    if (answer === null) return

    const position = Number(answer)
    if (position === 0) {
      p.log.info('Delete cancelled.')
      return
    }

    const removed = removeOrNull(manager, position - 1)
    if (!removed) {
      p.log.warn('Invalid expense number!')
      return
    }
    p.log.success(`Deleted expense: ${formatMoney(removed.amount, symbol)} - ${removed.category}`)
  }

  const show = (title: string, render: () => string) => async () => {
    p.note(render(), title)
  }

  const entries: MenuEntry<ExpenseAction>[] = [
    { value: 'add', label: 'Add new expense', run: addExpense },
    {
      value: 'list',
      label: 'View all expenses',
      run: show('All expenses', () => formatExpenseList(manager, symbol)),
    },
    {
      value: 'categories',
      label: 'View category totals',
      run: show('Spending by category', () => formatCategoryTotals(manager, 'insertion', symbol)),
    },
    {
      value: 'monthly',
      label: 'View monthly summary',
      run: show('Monthly spending summary', () => formatMonthlySummary(manager, symbol)),
    },
    {
      value: 'top',
      label: `View top ${settings.topCount} expenses`,
      run: show(`Top ${settings.topCount} highest expenses`, () =>
        formatTopExpenses(manager, settings.topCount, symbol)
      ),
    },
    { value: 'filter', label: 'Filter by category', run: filterByCategory },
    {
      value: 'stats',
      label: 'View statistics',
      run: show('Expense statistics', () => formatStatistics(manager, symbol)),
    },
    { value: 'delete', label: 'Delete expense', run: deleteExpense },
  ]

  p.intro('Personal Expense Tracker')
  await runMenuLoop('What would you like to do?', entries, 'Thank you for using Expense Tracker! Goodbye!')
}
