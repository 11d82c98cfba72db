import { describe, it, expect, beforeEach } from 'vitest'
import {
  formatSalesList,
  formatRevenueByCategory,
  formatTopProducts,
  formatSalesTrend,
  formatSalesSummary,
} from '../sales-report.js'
import { createSalesAnalytics, type SalesAnalytics } from '../../aggregation/sales-analytics.js'
import { createMockProduct, createMockSale } from '../../test-utils/fixtures.js'

const pen = createMockProduct({ name: 'Pen', category: 'Stationery', price: 20 })
const mug = createMockProduct({ name: 'Mug', category: 'Kitchen', price: 120 })
const notebook = createMockProduct({ name: 'Notebook', category: 'Stationery', price: 50 })

describe('sales reports', () => {
  let analytics: SalesAnalytics

  beforeEach(() => {
    analytics = createSalesAnalytics()
  })

  const seed = () => {
    analytics.add(createMockSale({ saleId: 'S1', product: pen, quantity: 3, date: '05-01-2024' }))
    analytics.add(createMockSale({ saleId: 'S2', product: mug, quantity: 1, date: '18-01-2024' }))
    analytics.add(createMockSale({ saleId: 'S3', product: pen, quantity: 5, date: '02-02-2024' }))
    analytics.add(createMockSale({ saleId: 'S4', product: notebook, quantity: 1, date: '20-02-2024' }))
  }

  describe('formatSalesList', () => {
    it('renders each sale with its revenue', () => {
      analytics.add(createMockSale({ saleId: 'S1', product: pen, quantity: 3, date: '05-01-2024' }))
      analytics.add(createMockSale({ saleId: 'S2', product: mug, quantity: 1, date: '18-01-2024' }))

      expect(formatSalesList(analytics).split('\n')).toEqual([
        '#  Sale  Product  Category    Units  Revenue    Date',
        '-  ----  -------  ----------  -----  ---------  ----------',
        '1  S1    Pen      Stationery  3      60.00 TK   05-01-2024',
        '2  S2    Mug      Kitchen     1      120.00 TK  18-01-2024',
        '',
        'Total revenue: 180.00 TK',
      ])
    })

    it('explains when there are no sales', () => {
      expect(formatSalesList(analytics)).toBe('No sales recorded yet!')
    })
  })

  describe('formatRevenueByCategory', () => {
    it('sorts categories by revenue', () => {
      seed()

      expect(formatRevenueByCategory(analytics).split('\n')).toEqual([
        'Category    Revenue    Sales',
        '----------  ---------  -----',
        'Stationery  210.00 TK  3',
        'Kitchen     120.00 TK  1',
      ])
    })
  })

  describe('formatTopProducts', () => {
    it('ranks products by summed revenue', () => {
      seed()

      expect(formatTopProducts(analytics, 2).split('\n')).toEqual([
        'Rank  Product  Units  Revenue',
        '----  -------  -----  ---------',
        '1     Pen      8      160.00 TK',
        '2     Mug      1      120.00 TK',
      ])
    })

    it('explains when there are no sales', () => {
      expect(formatTopProducts(analytics, 3)).toBe('No sales yet!')
    })
  })

  describe('formatSalesTrend', () => {
    it('prints monthly revenue', () => {
      seed()

      expect(formatSalesTrend(analytics, '$')).toBe('  Jan 2024: $180.00\n  Feb 2024: $150.00')
    })
  })

  describe('formatSalesSummary', () => {
    it('summarizes sales and the best product', () => {
      seed()

      expect(formatSalesSummary(analytics).split('\n')).toEqual([
        'Sales recorded:     4',
        'Units sold:         10',
        'Total revenue:      330.00 TK',
        'Average sale:       82.50 TK',
        'Categories:         2',
        'Best product:       Pen (160.00 TK)',
      ])
    })

    it('explains when empty', () => {
      expect(formatSalesSummary(analytics)).toBe('No sales to analyze!')
    })
  })
})
