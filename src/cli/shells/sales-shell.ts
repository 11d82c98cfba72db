import * as p from '@clack/prompts'
import type { SalesAnalytics } from '../../aggregation/sales-analytics.js'
import type { Catalog } from '../../catalog/catalog.js'
import { looksLikeDate } from '../../records/date-parts.js'
import { createSale, describeSale } from '../../records/sale.js'
import {
  formatRevenueByCategory,
  formatSalesList,
  formatSalesSummary,
  formatSalesTrend,
  formatTopProducts,
} from '../../reporting/sales-report.js'
import { formatMoney } from '../../shared/output.js'
import {
  ask,
  removeOrNull,
  runMenuLoop,
  validateAmount,
  validatePositiveInteger,
  type MenuEntry,
} from './prompts.js'

export interface SalesShellSettings {
  currencySymbol: string
  topCount: number
}

type SalesAction =
  | 'product'
  | 'sale'
  | 'list'
  | 'categories'
  | 'top'
  | 'trend'
  | 'stats'
  | 'delete'

const validateSaleDate = (value = ''): string | undefined =>
  looksLikeDate(value.trim(), 'dmy') || looksLikeDate(value.trim(), 'ymd')
    ? undefined
    : 'Please use format DD-MM-YYYY (e.g., 10-03-2024)'

/**
 * Interactive sales analytics report over a product catalog.
 */
export const runSalesShell = async (
  analytics: SalesAnalytics,
  catalog: Catalog,
  settings: SalesShellSettings
): Promise<void> => {
  const symbol = settings.currencySymbol
  let nextSaleId = 1

  const addProduct = async () => {
    const name = await ask({ message: 'Product name', validate: (v = '') => (v.trim() ? undefined : 'Name is required') })
    if (name === null) return

    const category = await ask({ message: 'Product category' })
    if (category === null) return

    const price = await ask({ message: `Unit price (${symbol})`, validate: validateAmount })
    if (price === null) return

    const product = catalog.add({ name, category, price })
    p.log.success(`Added product ${product.name} at ${formatMoney(product.price, symbol)}`)
  }

  const recordSale = async () => {
    const products = catalog.list()
    if (products.length === 0) {
      p.log.warn('Add a product to the catalog first.')
      return
    }

    const productName = await p.select<{ value: string; label: string; hint: string }[], string>({
      message: 'Which product was sold?',
      options: products.map((prod) => ({
        value: prod.name,
        label: prod.name,
        hint: `${prod.category}, ${formatMoney(prod.price, symbol)}`,
      })),
    })
    if (p.isCancel(productName)) return
    const product = catalog.find(productName)
    if (!product) return

    const quantity = await ask({ message: 'Units sold', validate: validatePositiveInteger })
    if (quantity === null) return

    const date = await ask({ message: 'Sale date (DD-MM-YYYY)', validate: validateSaleDate })
    if (date === null) return

    const sale = createSale({ saleId: `S${nextSaleId}`, product, quantity, date })
    analytics.add(sale)
    nextSaleId += 1
    p.log.success(describeSale(sale))
  }

  const deleteSale = async () => {
    if (analytics.count() === 0) {
      p.log.info('No sales to delete!')
      return
    }

    p.note(formatSalesList(analytics, symbol), 'All sales')
    const answer = await ask({
      message: 'Enter sale number to delete (or 0 to cancel)',
      validate: (value = '') =>
        Number.isInteger(Number(value)) && value.trim() !== '' ? undefined : 'Please enter a valid number!',
    })
    if (answer === null) return

    const position = Number(answer)
    if (position === 0) {
      p.log.info('Delete cancelled.')
      return
    }

    const removed = removeOrNull(analytics, position - 1)
    if (!removed) {
      p.log.warn('Invalid sale number!')
      return
    }
    p.log.success(`Deleted sale ${removed.saleId} (${removed.product.name})`)
  }

  const show = (title: string, render: () => string) => async () => {
    p.note(render(), title)
  }

  const entries: MenuEntry<SalesAction>[] = [
    { value: 'product', label: 'Add product to catalog', run: addProduct },
    { value: 'sale', label: 'Record a sale', run: recordSale },
    { value: 'list', label: 'View all sales', run: show('All sales', () => formatSalesList(analytics, symbol)) },
    {
      value: 'categories',
      label: 'Revenue by category',
      run: show('Revenue by category', () => formatRevenueByCategory(analytics, 'value', symbol)),
    },
    {
      value: 'top',
      label: `Top ${settings.topCount} products`,
      run: show(`Top ${settings.topCount} products`, () =>
        formatTopProducts(analytics, settings.topCount, symbol)
      ),
    },
    { value: 'trend', label: 'Monthly revenue trend', run: show('Monthly revenue', () => formatSalesTrend(analytics, symbol)) },
    { value: 'stats', label: 'Sales statistics', run: show('Sales statistics', () => formatSalesSummary(analytics, symbol)) },
    { value: 'delete', label: 'Delete sale', run: deleteSale },
  ]

  p.intro('Sales Analytics')
  await runMenuLoop('What would you like to do?', entries, 'Goodbye!')
}
