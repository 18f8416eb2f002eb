import { date, integer, pgTable } from 'drizzle-orm/pg-core'
import { money } from './_common'
import { customers } from './customers'

export const orders = pgTable('orders', {
  orderId: integer('order_id').primaryKey(),
  customerId: integer('customer_id').references(() => customers.customerId, { onDelete: 'cascade' }),
  orderDate: date('order_date'),

  /** Sum of the order's item subtotals, rounded to cents. */
  totalAmount: money('total_amount', 12),
})

export type OrderRow = typeof orders.$inferSelect
export type NewOrderRow = typeof orders.$inferInsert
