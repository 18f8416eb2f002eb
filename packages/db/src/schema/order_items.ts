import { integer, pgTable } from 'drizzle-orm/pg-core'
import { money } from './_common'
import { orders } from './orders'
import { products } from './products'

/**
 * order_items
 *
 * `unit_price` is the point-of-sale price and is independent of
 * `products.price`. `subtotal = round(quantity * unit_price, 2)`.
 */
export const orderItems = pgTable('order_items', {
  orderItemId: integer('order_item_id').primaryKey(),
  orderId: integer('order_id').references(() => orders.orderId, { onDelete: 'cascade' }),
  productId: integer('product_id').references(() => products.productId),
  quantity: integer('quantity'),
  unitPrice: money('unit_price', 10),
  subtotal: money('subtotal', 12),
})

export type OrderItemRow = typeof orderItems.$inferSelect
export type NewOrderItemRow = typeof orderItems.$inferInsert
