import type { Customer, Order, OrderItem, Product } from '@duka/schema'
import { ConsistencyViolation } from './errors'
import { roundMoney } from './random'

export type Dataset = {
  products: Product[]
  customers: Customer[]
  orders: Order[]
  orderItems: OrderItem[]
}

function denseIdProblems(table: string, ids: readonly number[]): string[] {
  const problems: string[] = []
  ids.forEach((id, index) => {
    if (id !== index + 1) {
      problems.push(`${table}: expected id ${index + 1} at position ${index}, found ${id}`)
    }
  })
  return problems
}

/**
 * Every invariant violation in the dataset, empty when consistent.
 */
export function findConsistencyProblems(dataset: Dataset): string[] {
  const problems = [
    ...denseIdProblems('products', dataset.products.map((p) => p.productId)),
    ...denseIdProblems('customers', dataset.customers.map((c) => c.customerId)),
    ...denseIdProblems('orders', dataset.orders.map((o) => o.orderId)),
    ...denseIdProblems('order_items', dataset.orderItems.map((i) => i.orderItemId)),
  ]

  const customerIds = new Set(dataset.customers.map((c) => c.customerId))
  const productIds = new Set(dataset.products.map((p) => p.productId))
  const orderIds = new Set(dataset.orders.map((o) => o.orderId))

  for (const product of dataset.products) {
    if (!(product.price > 0)) {
      problems.push(`products: product ${product.productId} price ${product.price} is not positive`)
    }
    if (!Number.isInteger(product.stockQuantity) || product.stockQuantity < 0) {
      problems.push(`products: product ${product.productId} stock ${product.stockQuantity} is not a non-negative integer`)
    }
  }

  for (const order of dataset.orders) {
    if (!customerIds.has(order.customerId)) {
      problems.push(`orders: order ${order.orderId} references missing customer ${order.customerId}`)
    }
  }

  const sums = new Map<number, number>()
  for (const item of dataset.orderItems) {
    if (!orderIds.has(item.orderId)) {
      problems.push(`order_items: item ${item.orderItemId} references missing order ${item.orderId}`)
    }
    if (!productIds.has(item.productId)) {
      problems.push(`order_items: item ${item.orderItemId} references missing product ${item.productId}`)
    }
    if (!Number.isInteger(item.quantity) || item.quantity < 1) {
      problems.push(`order_items: item ${item.orderItemId} quantity ${item.quantity} is not a positive integer`)
    }
    if (!(item.unitPrice > 0)) {
      problems.push(`order_items: item ${item.orderItemId} unit price ${item.unitPrice} is not positive`)
    }
    if (!(item.subtotal > 0)) {
      problems.push(`order_items: item ${item.orderItemId} subtotal ${item.subtotal} is not positive`)
    }
    if (item.subtotal !== roundMoney(item.quantity * item.unitPrice)) {
      problems.push(`order_items: item ${item.orderItemId} subtotal ${item.subtotal} != quantity x unit price`)
    }
    sums.set(item.orderId, (sums.get(item.orderId) ?? 0) + item.subtotal)
  }

  for (const order of dataset.orders) {
    const sum = sums.get(order.orderId)
    if (sum === undefined) {
      problems.push(`orders: order ${order.orderId} has no items`)
    } else if (order.totalAmount !== roundMoney(sum)) {
      problems.push(`orders: order ${order.orderId} total ${order.totalAmount} != item sum ${roundMoney(sum)}`)
    }
  }

  return problems
}

export function assertDatasetConsistency(dataset: Dataset): void {
  const problems = findConsistencyProblems(dataset)
  if (problems.length > 0) {
    throw new ConsistencyViolation(problems)
  }
}
