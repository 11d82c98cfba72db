import { DuplicateProductError } from '../shared/errors.js'
import { createProduct, type Product, type ProductInput } from '../records/product.js'

export interface Catalog {
  /** Adds a product. Names are unique, compared case-insensitively */
  add: (input: ProductInput) => Product
  find: (name: string) => Product | undefined
  list: () => Product[]
  categories: () => string[]
  size: () => number
}

const normalizeName = (name: string): string => name.trim().toLowerCase()

/**
 * In-memory product catalog referenced by sales.
 *
 * @example
 * const catalog = createCatalog()
 * const pen = catalog.add({ name: 'Pen', category: 'Stationery', price: 20 })
 * catalog.find('pen') === pen // => true
 */
export const createCatalog = (): Catalog => {
  const products = new Map<string, Product>()

  const add = (input: ProductInput): Product => {
    const product = createProduct(input)
    const key = normalizeName(product.name)
    if (products.has(key)) {
      throw new DuplicateProductError(product.name)
    }
    products.set(key, product)
    return product
  }

  const find = (name: string): Product | undefined => products.get(normalizeName(name))

  const list = (): Product[] => [...products.values()]

  const categories = (): string[] => [...new Set(list().map((p) => p.category))]

  const size = (): number => products.size

  return { add, find, list, categories, size }
}
