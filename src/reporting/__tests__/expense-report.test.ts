import { describe, it, expect, beforeEach } from 'vitest'
import {
  formatExpenseList,
  formatCategoryReport,
  formatCategoryTotals,
  formatMonthlySummary,
  formatTopExpenses,
  formatFilteredExpenses,
  formatStatistics,
} from '../expense-report.js'
import { createExpenseManager, type ExpenseManager } from '../../aggregation/expense-manager.js'
import { createMockExpense } from '../../test-utils/fixtures.js'

describe('expense reports', () => {
  let manager: ExpenseManager

  beforeEach(() => {
    manager = createExpenseManager()
  })

  const seed = () => {
    manager.add(createMockExpense({ amount: 100, category: 'Food', date: '2024-01-05' }))
    manager.add(createMockExpense({ amount: 50, category: 'Food', date: '2024-02-01' }))
    manager.add(
      createMockExpense({ amount: 200, category: 'Bills', date: '2024-01-20', note: 'electricity' })
    )
  }

  describe('formatExpenseList', () => {
    it('renders a numbered table and the total', () => {
      seed()

      expect(formatExpenseList(manager).split('\n')).toEqual([
        '#  Date        Category  Amount   Note',
        '-  ----------  --------  -------  -----------',
        '1  2024-01-05  Food      $100.00',
        '2  2024-02-01  Food      $50.00',
        '3  2024-01-20  Bills     $200.00  electricity',
        '',
        'Total spent: $350.00',
      ])
    })

    it('explains when there is nothing to list', () => {
      expect(formatExpenseList(manager)).toBe(
        'No expenses recorded yet! Add some expenses to get started.'
      )
    })
  })

  describe('formatCategoryReport', () => {
    it('prints one line per category', () => {
      seed()

      expect(formatCategoryReport(manager)).toBe('Food: $150.00\nBills: $200.00')
    })

    it('is empty for an empty manager', () => {
      expect(formatCategoryReport(manager)).toBe('')
    })
  })

  describe('formatCategoryTotals', () => {
    it('renders totals with counts', () => {
      seed()

      expect(formatCategoryTotals(manager).split('\n')).toEqual([
        'Category  Total    Count',
        '--------  -------  -----',
        'Food      $150.00  2',
        'Bills     $200.00  1',
        '',
        'Total: $350.00',
      ])
    })

    it('can sort by value', () => {
      seed()

      const lines = formatCategoryTotals(manager, 'value').split('\n')

      expect(lines[2]).toBe('Bills     $200.00  1')
      expect(lines[3]).toBe('Food      $150.00  2')
    })

    it('uses the configured currency symbol', () => {
      manager.add(createMockExpense({ amount: 5, category: 'Food' }))

      expect(formatCategoryTotals(manager, 'insertion', '€').split('\n').at(-1)).toBe('Total: €5.00')
    })

    it('explains when there is nothing to analyze', () => {
      expect(formatCategoryTotals(manager)).toBe('No expenses to analyze yet!')
    })
  })

  describe('formatMonthlySummary', () => {
    it('prints months in ascending order', () => {
      seed()

      expect(formatMonthlySummary(manager)).toBe('  Jan 2024: $300.00\n  Feb 2024: $50.00')
    })

    it('labels malformed dates', () => {
      manager.add(createMockExpense({ amount: 7, date: 'soon' }))

      expect(formatMonthlySummary(manager)).toBe('  Unknown date: $7.00')
    })
  })

  describe('formatTopExpenses', () => {
    it('ranks expenses and shows notes', () => {
      seed()

      expect(formatTopExpenses(manager, 2)).toBe(
        [
          '#1  $200.00 - Bills (2024-01-20)',
          '     Note: electricity',
          '#2  $100.00 - Food (2024-01-05)',
        ].join('\n')
      )
    })

    it('explains when there are no expenses', () => {
      expect(formatTopExpenses(manager, 5)).toBe('No expenses yet!')
    })
  })

  describe('formatFilteredExpenses', () => {
    it('lists matches and the category total', () => {
      seed()

      expect(formatFilteredExpenses(manager, 'food').split('\n')).toEqual([
        'Expenses in category: food',
        '',
        '#  Date        Amount   Note',
        '-  ----------  -------  ----',
        '1  2024-01-05  $100.00',
        '2  2024-02-01  $50.00',
        '',
        'Total for food: $150.00',
      ])
    })

    it('reports when nothing matches', () => {
      seed()

      expect(formatFilteredExpenses(manager, 'Travel')).toBe('No expenses found for category: Travel')
    })
  })

  describe('formatStatistics', () => {
    it('summarizes count, total, average and extremes', () => {
      seed()

      expect(formatStatistics(manager).split('\n')).toEqual([
        'Expenses recorded:  3',
        'Total spent:        $350.00',
        'Average expense:    $116.67',
        'Categories:         2',
        '',
        'Highest expense:    $200.00 (Bills on 2024-01-20)',
        'Lowest expense:     $50.00 (Food on 2024-02-01)',
      ])
    })

    it('explains when empty', () => {
      expect(formatStatistics(manager)).toBe('No expenses to analyze!')
    })
  })

  it('never mutates the manager', () => {
    seed()

    formatExpenseList(manager)
    formatCategoryTotals(manager, 'value')
    formatTopExpenses(manager, 3)
    formatStatistics(manager)

    expect(manager.listAll().map((e) => e.amount)).toEqual([100, 50, 200])
  })
})
