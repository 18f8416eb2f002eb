import type { NumericRange, Product, SourceSystem } from '@duka/schema'
import { assertPositiveCount } from './errors'
import { pick, randFloat, randInt, roundMoney, type Rng } from './random'

export type CatalogSeed = {
  category: string
  baseNames: readonly string[]
}

export const PRODUCT_CATALOG: readonly CatalogSeed[] = [
  { category: 'Electronics', baseNames: ['Smart TV 43"', 'Smartphone Model X', 'Bluetooth Speaker', 'Laptop Slim'] },
  { category: 'Grocery', baseNames: ['Maize Flour 2kg', 'Basmati Rice 5kg', 'Sugar 2kg', 'Milk 1L'] },
  { category: 'Furniture', baseNames: ['Dining Table', 'Office Chair', 'Sofa 3-seater', 'Coffee Table'] },
  { category: 'Clothing', baseNames: ['Kitenge Dress', 'Safari Boot', 'School Uniform', 'Sports Jersey'] },
  { category: 'Beverages', baseNames: ['Coca-Cola 500ml', 'Mineral Water 1L', 'Tusker Lager 500ml', 'Juice 1L'] },
]

export const PRODUCT_DESCRIPTORS = ['Classic', 'Pro', '2024 Edition', 'Limited', 'Value', 'Deluxe', 'Mini'] as const

export const SOURCE_SYSTEMS: readonly SourceSystem[] = ['CSV', 'API']

export type ProductOptions = {
  createdAt: Date
  price: NumericRange
  stockQuantity: NumericRange
  catalog?: readonly CatalogSeed[]
}

/**
 * Products with ids 1..count. The name is free text and may repeat.
 */
export function synthesizeProducts(count: number, rng: Rng, options: ProductOptions): Product[] {
  assertPositiveCount('Product count', count)
  const catalog = options.catalog ?? PRODUCT_CATALOG

  const products: Product[] = []
  for (let productId = 1; productId <= count; productId++) {
    const seed = pick(rng, catalog)
    const baseName = pick(rng, seed.baseNames)
    const descriptor = pick(rng, PRODUCT_DESCRIPTORS)

    products.push({
      productId,
      productName: `${baseName} ${descriptor}`,
      price: roundMoney(randFloat(rng, options.price.min, options.price.max)),
      stockQuantity: randInt(rng, options.stockQuantity.min, options.stockQuantity.max),
      sourceSystem: pick(rng, SOURCE_SYSTEMS),
      createdAt: options.createdAt,
    })
  }
  return products
}
