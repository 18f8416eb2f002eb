import { describe, it, expect } from 'vitest'
import { ConfigurationError, ConsistencyViolation } from '../errors'
import { reconcileTotals, synthesizeOrders, type OrderInput, type OrderOptions } from '../orders'
import { createRng, roundMoney } from '../random'

const options: OrderOptions = {
  orderDateStart: '2022-01-01',
  orderDateEnd: '2025-10-30',
  quantity: { min: 1, max: 5 },
  unitPrice: { min: 50, max: 10000 },
  stapleCutoff: 2,
  stapleWeight: 3,
  standardWeight: 1,
}

const ids = (n: number) => Array.from({ length: n }, (_, i) => i + 1)

function input(overrides: Partial<OrderInput> = {}): OrderInput {
  return {
    customerIds: ids(5),
    productIds: ids(5),
    orderCount: 5,
    itemCount: 5,
    rng: createRng(42),
    options,
    ...overrides,
  }
}

function itemsPerOrder(orderItems: { orderId: number }[]): Map<number, number> {
  const counts = new Map<number, number>()
  for (const item of orderItems) {
    counts.set(item.orderId, (counts.get(item.orderId) ?? 0) + 1)
  }
  return counts
}

describe('synthesizeOrders', () => {
  it('gives each of five orders exactly one item when item and order counts match', () => {
    const { orders, orderItems } = synthesizeOrders(input())

    expect(orders).toHaveLength(5)
    expect(orderItems).toHaveLength(5)
    expect(orderItems.map((item) => item.orderId)).toEqual([1, 2, 3, 4, 5])

    const totalOfOrders = orders.reduce((sum, order) => sum + order.totalAmount, 0)
    const totalOfItems = orderItems.reduce((sum, item) => sum + item.subtotal, 0)
    expect(roundMoney(totalOfOrders)).toBe(roundMoney(totalOfItems))
  })

  it('adds fill items after the mandatory pass', () => {
    const { orders, orderItems } = synthesizeOrders(input({ orderCount: 3, itemCount: 10 }))

    expect(orders).toHaveLength(3)
    expect(orderItems.map((item) => item.orderItemId)).toEqual(ids(10))
    expect(orderItems.slice(0, 3).map((item) => item.orderId)).toEqual([1, 2, 3])

    const counts = itemsPerOrder(orderItems)
    expect([...counts.keys()].sort()).toEqual([1, 2, 3])
    expect(Math.max(...counts.values())).toBeGreaterThan(1)
  })

  it('still gives every order one item when fewer items than orders are requested', () => {
    const { orders, orderItems } = synthesizeOrders(input({ orderCount: 5, itemCount: 2 }))

    expect(orderItems).toHaveLength(5)
    expect(orders.every((order) => itemsPerOrder(orderItems).get(order.orderId) === 1)).toBe(true)
  })

  it('reconciles each total from its item subtotals', () => {
    const { orders, orderItems } = synthesizeOrders(
      input({ customerIds: ids(20), productIds: ids(30), orderCount: 40, itemCount: 150 }),
    )

    for (const order of orders) {
      const sum = orderItems
        .filter((item) => item.orderId === order.orderId)
        .reduce((acc, item) => acc + item.subtotal, 0)
      expect(order.totalAmount).toBe(roundMoney(sum))
    }
  })

  it('keeps item fields inside their ranges and rounds the subtotal', () => {
    const { orderItems } = synthesizeOrders(input({ orderCount: 20, itemCount: 100 }))

    for (const item of orderItems) {
      expect(item.quantity).toBeGreaterThanOrEqual(1)
      expect(item.quantity).toBeLessThanOrEqual(5)
      expect(item.unitPrice).toBeGreaterThanOrEqual(50)
      expect(item.unitPrice).toBeLessThanOrEqual(10000)
      expect(item.subtotal).toBe(roundMoney(item.quantity * item.unitPrice))
      expect(item.productId).toBeGreaterThanOrEqual(1)
      expect(item.productId).toBeLessThanOrEqual(5)
    }
  })

  it('draws order dates inside the inclusive window', () => {
    const { orders } = synthesizeOrders(
      input({
        orderCount: 60,
        itemCount: 60,
        options: { ...options, orderDateStart: '2024-02-28', orderDateEnd: '2024-03-01' },
      }),
    )

    const dates = new Set(orders.map((order) => order.orderDate))
    expect([...dates].sort()).toEqual(['2024-02-28', '2024-02-29', '2024-03-01'])
  })

  it('only references customer ids it was given', () => {
    const customerIds = [4, 8, 15]
    const { orders } = synthesizeOrders(input({ customerIds, orderCount: 30, itemCount: 30 }))

    for (const order of orders) {
      expect(customerIds).toContain(order.customerId)
    }
  })

  it('samples only the staple tier when standard products weigh nothing', () => {
    const { orderItems } = synthesizeOrders(
      input({ productIds: ids(10), orderCount: 30, itemCount: 90, options: { ...options, standardWeight: 0 } }),
    )

    expect(new Set(orderItems.map((item) => item.productId))).toEqual(new Set([1, 2]))
  })

  it('fails fast on an empty product list', () => {
    expect(() => synthesizeOrders(input({ productIds: [] }))).toThrow(ConfigurationError)
    expect(() => synthesizeOrders(input({ productIds: [] }))).toThrow('Cannot generate order items without product ids')
  })

  it('fails fast on an empty customer list', () => {
    expect(() => synthesizeOrders(input({ customerIds: [] }))).toThrow('Cannot generate orders without customer ids')
  })

  it('rejects invalid counts and date windows', () => {
    expect(() => synthesizeOrders(input({ orderCount: 0 }))).toThrow(ConfigurationError)
    expect(() => synthesizeOrders(input({ itemCount: -1 }))).toThrow(ConfigurationError)
    expect(() =>
      synthesizeOrders(input({ options: { ...options, orderDateStart: '2025-01-02', orderDateEnd: '2025-01-01' } })),
    ).toThrow('orderDateEnd must not be before orderDateStart')
  })

  it('rejects a date that does not exist instead of rolling it over', () => {
    expect(() => synthesizeOrders(input({ options: { ...options, orderDateEnd: '2025-02-30' } }))).toThrow(
      'orderDateEnd must be a YYYY-MM-DD date, got "2025-02-30"',
    )

    const leapDay = { ...options, orderDateStart: '2024-02-29', orderDateEnd: '2024-02-29' }
    const { orders } = synthesizeOrders(input({ options: leapDay }))
    expect(orders.map((order) => order.orderDate)).toEqual(Array.from({ length: 5 }, () => '2024-02-29'))
  })

  it('is reproducible for a fixed seed', () => {
    expect(synthesizeOrders(input({ rng: createRng(9) }))).toEqual(synthesizeOrders(input({ rng: createRng(9) })))
  })
})

describe('reconcileTotals', () => {
  it('rounds the summed subtotals once', () => {
    const orders = reconcileTotals(
      [{ orderId: 1, customerId: 1, orderDate: '2024-01-01' }],
      [
        { orderItemId: 1, orderId: 1, productId: 1, quantity: 1, unitPrice: 0.1, subtotal: 0.1 },
        { orderItemId: 2, orderId: 1, productId: 1, quantity: 1, unitPrice: 0.2, subtotal: 0.2 },
      ],
    )

    expect(orders).toEqual([{ orderId: 1, customerId: 1, orderDate: '2024-01-01', totalAmount: 0.3 }])
  })

  it('refuses an order without items', () => {
    expect(() => reconcileTotals([{ orderId: 7, customerId: 1, orderDate: '2024-01-01' }], [])).toThrow(
      ConsistencyViolation,
    )
  })
})
