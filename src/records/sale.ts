import { z } from 'zod'
import { RecordValidationError } from '../shared/errors.js'
import { detectDateOrder, formatLongDate, parseDateParts, type DateParts } from './date-parts.js'
import { describeProduct, isProduct, type Product } from './product.js'
import type { RecordModel } from './types.js'

export const saleInputSchema = z.object({
  saleId: z.union([z.string(), z.number()]).transform((id) => String(id).trim()),
  product: z.custom<Product>(isProduct, { message: 'Expected a catalog product' }),
  quantity: z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite()),
  date: z.coerce.string().trim(),
})

export type SaleInput = z.input<typeof saleInputSchema>

export interface SaleRecord {
  readonly kind: 'sale'
  readonly saleId: string
  readonly product: Product
  readonly quantity: number
  /** DD-MM-YYYY (or YYYY-MM-DD), parsed on demand */
  readonly date: string
}

export const createSale = (input: SaleInput): SaleRecord => {
  const result = saleInputSchema.safeParse(input)
  if (!result.success) {
    throw new RecordValidationError('sale', result.error.issues)
  }
  return Object.freeze({ kind: 'sale' as const, ...result.data })
}

export const isSale = (value: unknown): value is SaleRecord =>
  typeof value === 'object' &&
  value !== null &&
  'kind' in value &&
  value.kind === 'sale' &&
  'quantity' in value &&
  typeof value.quantity === 'number' &&
  'date' in value &&
  typeof value.date === 'string' &&
  'product' in value &&
  isProduct(value.product)

/**
 * Revenue of one sale: quantity times the product's unit price.
 */
export const saleRevenue = (sale: SaleRecord): number => sale.quantity * sale.product.price

export const saleDateParts = (sale: SaleRecord): DateParts =>
  parseDateParts(sale.date, detectDateOrder(sale.date))

export const saleModel: RecordModel<SaleRecord> = {
  kind: 'sale',
  isRecord: isSale,
  revenue: saleRevenue,
  dateParts: saleDateParts,
  category: (sale) => sale.product.category,
}

/**
 * One-line description, e.g.
 * `Sale S1 -> Pen | Category: Stationery | Price: 20 x3 units = 60 On January 05 2024`
 */
export const describeSale = (sale: SaleRecord): string =>
  `Sale ${sale.saleId} -> ${describeProduct(sale.product)} x${sale.quantity} units = ${saleRevenue(sale)}` +
  ` On ${formatLongDate(saleDateParts(sale))}`
