import { createExpense, type ExpenseInput, type ExpenseRecord } from '../records/expense.js'
import { createProduct, type Product, type ProductInput } from '../records/product.js'
import { createSale, type SaleInput, type SaleRecord } from '../records/sale.js'

/**
 * Creates an ExpenseRecord with sensible defaults
 */
export const createMockExpense = (overrides: Partial<ExpenseInput> = {}): ExpenseRecord =>
  createExpense({
    amount: 10,
    category: 'Food',
    date: '2024-01-15',
    note: '',
    ...overrides,
  })

/**
 * Creates a catalog Product
 */
export const createMockProduct = (overrides: Partial<ProductInput> = {}): Product =>
  createProduct({
    name: 'Test Product',
    category: 'General',
    price: 10,
    ...overrides,
  })

/**
 * Creates a SaleRecord; the product defaults to a fresh mock product
 */
export const createMockSale = (overrides: Partial<SaleInput> = {}): SaleRecord =>
  createSale({
    saleId: `sale-${Math.random().toString(36).slice(2, 8)}`,
    product: createMockProduct(),
    quantity: 1,
    date: '15-01-2024',
    ...overrides,
  })
