import { integer, pgTable, varchar } from 'drizzle-orm/pg-core'
import { createdAt, money } from './_common'

/**
 * products
 *
 * Catalog rows. Ids up to the staple cutoff are sampled more often when order
 * items are generated.
 */
export const products = pgTable('products', {
  productId: integer('product_id').primaryKey(),
  productName: varchar('product_name', { length: 300 }),
  price: money('price', 10),
  stockQuantity: integer('stock_quantity'),

  /** Origin system tag (`CSV` or `API`). */
  sourceSystem: varchar('source_system', { length: 50 }),

  createdAt: createdAt(),
})

export type ProductRow = typeof products.$inferSelect
export type NewProductRow = typeof products.$inferInsert
