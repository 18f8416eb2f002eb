import { asc, between, desc, eq, sql } from 'drizzle-orm'
import type { Database } from './client'
import { customers, type CustomerRow } from './schema/customers'
import { orderItems, type OrderItemRow } from './schema/order_items'
import { orders, type OrderRow } from './schema/orders'
import { products, type ProductRow } from './schema/products'

export type ProductFilter = {
  minPrice: number
  maxPrice: number
  limit: number
}

export type OrderDetailRow = {
  orderId: number
  firstName: string | null
  lastName: string | null
  productName: string | null
  quantity: number | null
  unitPrice: string | null
  subtotal: string | null
}

export type CustomerSpendRow = {
  customerId: number
  firstName: string | null
  lastName: string | null
  totalSpent: string
}

export type UnitsSoldRow = {
  productId: number
  productName: string | null
  unitsSold: number
}

/**
 * Read side of the dashboard: raw table views plus the three integrated
 * queries joining customers, orders, items and products.
 */
export interface DashboardQueries {
  listCustomers(limit: number): Promise<CustomerRow[]>
  listProducts(filter: ProductFilter): Promise<ProductRow[]>
  listOrders(limit: number): Promise<OrderRow[]>
  listOrderItems(limit: number): Promise<OrderItemRow[]>
  orderDetails(limit: number): Promise<OrderDetailRow[]>
  customerSpend(limit: number): Promise<CustomerSpendRow[]>
  unitsSold(limit: number): Promise<UnitsSoldRow[]>
}

export function createDashboardQueries(db: Database): DashboardQueries {
  return {
    listCustomers: async (limit) => db.select().from(customers).orderBy(asc(customers.customerId)).limit(limit),

    listProducts: async ({ minPrice, maxPrice, limit }) =>
      db
        .select()
        .from(products)
        .where(between(products.price, String(minPrice), String(maxPrice)))
        .orderBy(asc(products.productId))
        .limit(limit),

    listOrders: async (limit) => db.select().from(orders).orderBy(asc(orders.orderId)).limit(limit),

    listOrderItems: async (limit) =>
      db.select().from(orderItems).orderBy(asc(orderItems.orderItemId)).limit(limit),

    orderDetails: async (limit) =>
      db
        .select({
          orderId: orders.orderId,
          firstName: customers.firstName,
          lastName: customers.lastName,
          productName: products.productName,
          quantity: orderItems.quantity,
          unitPrice: orderItems.unitPrice,
          subtotal: orderItems.subtotal,
        })
        .from(orders)
        .innerJoin(customers, eq(orders.customerId, customers.customerId))
        .innerJoin(orderItems, eq(orders.orderId, orderItems.orderId))
        .innerJoin(products, eq(products.productId, orderItems.productId))
        .orderBy(asc(orders.orderId), asc(orderItems.orderItemId))
        .limit(limit),

    customerSpend: async (limit) => {
      const totalSpent = sql<string>`sum(${orders.totalAmount})`
      return db
        .select({
          customerId: customers.customerId,
          firstName: customers.firstName,
          lastName: customers.lastName,
          totalSpent,
        })
        .from(customers)
        .innerJoin(orders, eq(orders.customerId, customers.customerId))
        .groupBy(customers.customerId)
        .orderBy(desc(totalSpent))
        .limit(limit)
    },

    unitsSold: async (limit) => {
      const unitsSold = sql<number>`coalesce(sum(${orderItems.quantity}), 0)`.mapWith(Number)
      return db
        .select({
          productId: products.productId,
          productName: products.productName,
          unitsSold,
        })
        .from(products)
        .innerJoin(orderItems, eq(orderItems.productId, products.productId))
        .groupBy(products.productId, products.productName)
        .orderBy(desc(unitsSold))
        .limit(limit)
    },
  }
}
