import type { Customer, Order, OrderItem, Product } from '@duka/schema'
import type { Dataset } from './consistency'
import type { SinkRow, TableName } from './sink'

/** Column order per table; the primary key is always first. */
export const TABLE_COLUMNS = {
  products: ['product_id', 'product_name', 'price', 'stock_quantity', 'source_system', 'created_at'],
  customers: [
    'customer_id',
    'first_name',
    'last_name',
    'email',
    'phone',
    'address_line1',
    'address_line2',
    'city',
    'country',
    'created_at',
  ],
  orders: ['order_id', 'customer_id', 'order_date', 'total_amount'],
  order_items: ['order_item_id', 'order_id', 'product_id', 'quantity', 'unit_price', 'subtotal'],
} as const satisfies Record<TableName, readonly string[]>

/** Parents before children so foreign keys resolve on insert. */
export const INSERT_ORDER: readonly TableName[] = ['products', 'customers', 'orders', 'order_items']

export const productRow = (p: Product): SinkRow => [
  p.productId,
  p.productName,
  p.price,
  p.stockQuantity,
  p.sourceSystem,
  p.createdAt,
]

export const customerRow = (c: Customer): SinkRow => [
  c.customerId,
  c.firstName,
  c.lastName,
  c.email,
  c.phone,
  c.addressLine1,
  c.addressLine2,
  c.city,
  c.country,
  c.createdAt,
]

export const orderRow = (o: Order): SinkRow => [o.orderId, o.customerId, o.orderDate, o.totalAmount]

export const orderItemRow = (i: OrderItem): SinkRow => [
  i.orderItemId,
  i.orderId,
  i.productId,
  i.quantity,
  i.unitPrice,
  i.subtotal,
]

export function tableRows(dataset: Dataset, table: TableName): SinkRow[] {
  switch (table) {
    case 'products':
      return dataset.products.map(productRow)
    case 'customers':
      return dataset.customers.map(customerRow)
    case 'orders':
      return dataset.orders.map(orderRow)
    case 'order_items':
      return dataset.orderItems.map(orderItemRow)
    default: {
      const impossible: never = table
      throw new Error(`Unsupported table: ${String(impossible)}`)
    }
  }
}
