import { z } from 'zod'
import { RecordValidationError } from '../shared/errors.js'

export const productInputSchema = z.object({
  name: z.coerce.string().trim().min(1),
  category: z.coerce.string().trim(),
  price: z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite()),
})

export type ProductInput = z.input<typeof productInputSchema>

/**
 * A named, priced, categorized catalog item. Sales reference products;
 * they never copy or own them.
 */
export interface Product {
  readonly name: string
  readonly category: string
  readonly price: number
}

export const createProduct = (input: ProductInput): Product => {
  const result = productInputSchema.safeParse(input)
  if (!result.success) {
    throw new RecordValidationError('product', result.error.issues)
  }
  return Object.freeze(result.data)
}

export const isProduct = (value: unknown): value is Product =>
  typeof value === 'object' &&
  value !== null &&
  'name' in value &&
  typeof value.name === 'string' &&
  'category' in value &&
  typeof value.category === 'string' &&
  'price' in value &&
  typeof value.price === 'number'

export const describeProduct = (product: Product): string =>
  `${product.name} | Category: ${product.category} | Price: ${product.price}`
