/**
 * End-to-end generation runs against the in-memory sink.
 */

import { describe, it, expect } from 'vitest'
import { parseGenerationConfig } from '../config'
import { findConsistencyProblems } from '../consistency'
import { ConfigurationError, SinkError } from '../errors'
import type { NameProvider } from '../names'
import { chunk, generateDataset, persistDataset } from '../pipeline'
import { roundMoney } from '../random'
import { MemorySink, type Sink, type TableName } from '../sink'
import { TABLE_COLUMNS } from '../tables'

const generatedAt = new Date('2025-01-01T00:00:00.000Z')

const small = parseGenerationConfig({
  customerCount: 5,
  productCount: 5,
  orderCount: 5,
  orderItemCount: 5,
  seed: 7,
  generatedAt,
})

const medium = parseGenerationConfig({
  customerCount: 50,
  productCount: 80,
  orderCount: 60,
  orderItemCount: 150,
  seed: 42,
  generatedAt,
  stapleCutoff: 20,
})

const dense = (n: number) => Array.from({ length: n }, (_, i) => i + 1)

describe('generateDataset', () => {
  it('gives five orders one item each with matching grand totals', () => {
    const dataset = generateDataset(small)

    expect(dataset.orders).toHaveLength(5)
    expect(dataset.orderItems).toHaveLength(5)
    for (const order of dataset.orders) {
      expect(dataset.orderItems.filter((item) => item.orderId === order.orderId)).toHaveLength(1)
    }

    const ordersTotal = dataset.orders.reduce((sum, order) => sum + order.totalAmount, 0)
    const itemsTotal = dataset.orderItems.reduce((sum, item) => sum + item.subtotal, 0)
    expect(roundMoney(ordersTotal)).toBe(roundMoney(itemsTotal))
  })

  it('produces dense ids and no invariant violations', () => {
    const dataset = generateDataset(medium)

    expect(dataset.products.map((p) => p.productId)).toEqual(dense(80))
    expect(dataset.customers.map((c) => c.customerId)).toEqual(dense(50))
    expect(dataset.orders.map((o) => o.orderId)).toEqual(dense(60))
    expect(dataset.orderItems.map((i) => i.orderItemId)).toEqual(dense(150))
    expect(findConsistencyProblems(dataset)).toEqual([])
  })

  it('is byte-identical across runs with the same config', () => {
    expect(JSON.stringify(generateDataset(medium))).toBe(JSON.stringify(generateDataset(medium)))
  })

  it('changes with the seed', () => {
    const other = parseGenerationConfig({ ...medium, seed: 43 })

    expect(JSON.stringify(generateDataset(other))).not.toBe(JSON.stringify(generateDataset(medium)))
  })

  it('stamps every product and customer with the run timestamp', () => {
    const dataset = generateDataset(small)

    expect(dataset.products.every((p) => p.createdAt.getTime() === generatedAt.getTime())).toBe(true)
    expect(dataset.customers.every((c) => c.createdAt.getTime() === generatedAt.getTime())).toBe(true)
  })

  it('draws customers from the bundled counties by default', () => {
    const dataset = generateDataset(medium)

    for (const customer of dataset.customers) {
      expect(customer.country).toBe('Kenya')
      expect(customer.addressLine2.endsWith(`, ${customer.city}`)).toBe(true)
    }
  })

  it('uses an injected name provider', () => {
    const provider: NameProvider = {
      regions: () => ['Nairobi'],
      nameForRegion: () => ({ firstName: 'Test', lastName: 'Customer' }),
    }
    const dataset = generateDataset(small, { nameProvider: provider })

    expect(dataset.customers.map((c) => c.email)).toEqual(dense(5).map((id) => `test.customer${id}@example.com`))
  })

  it('surfaces an unknown region from the name provider', () => {
    const provider: NameProvider = {
      regions: () => ['Atlantis'],
      nameForRegion: (region) => {
        throw new ConfigurationError(`Unknown region "${region}" for name generation`)
      },
    }

    expect(() => generateDataset(small, { nameProvider: provider })).toThrow(ConfigurationError)
  })
})

describe('persistDataset', () => {
  it('writes every table in foreign-key order in batches', async () => {
    const calls: Array<{ table: TableName; rows: number }> = []
    const memory = new MemorySink()
    const recording: Sink = {
      bulkInsert: (table, columns, rows) => {
        calls.push({ table, rows: rows.length })
        return memory.bulkInsert(table, columns, rows)
      },
    }

    const summary = await persistDataset(generateDataset(small), recording, { batchSize: 2 })

    expect(calls).toEqual([
      { table: 'products', rows: 2 },
      { table: 'products', rows: 2 },
      { table: 'products', rows: 1 },
      { table: 'customers', rows: 2 },
      { table: 'customers', rows: 2 },
      { table: 'customers', rows: 1 },
      { table: 'orders', rows: 2 },
      { table: 'orders', rows: 2 },
      { table: 'orders', rows: 1 },
      { table: 'order_items', rows: 2 },
      { table: 'order_items', rows: 2 },
      { table: 'order_items', rows: 1 },
    ])
    expect(summary.order_items).toEqual({ inserted: 5, skipped: 0 })
    expect(memory.columns('customers')).toEqual(TABLE_COLUMNS.customers)
  })

  it('maps records onto the table column order', async () => {
    const dataset = generateDataset(small)
    const sink = new MemorySink()
    await persistDataset(dataset, sink, { batchSize: 500 })

    const order = dataset.orders[0]
    expect(sink.rows('orders')[0]).toEqual([order.orderId, order.customerId, order.orderDate, order.totalAmount])
    expect(sink.rows('products')[0][5]).toEqual(generatedAt)
  })

  it('skips existing keys when the same run is persisted again', async () => {
    const dataset = generateDataset(small)
    const sink = new MemorySink()

    await persistDataset(dataset, sink, { batchSize: 3 })
    const rerun = await persistDataset(dataset, sink, { batchSize: 3 })

    expect(rerun).toEqual({
      products: { inserted: 0, skipped: 5 },
      customers: { inserted: 0, skipped: 5 },
      orders: { inserted: 0, skipped: 5 },
      order_items: { inserted: 0, skipped: 5 },
    })
    expect(sink.count('order_items')).toBe(5)
  })

  it('stops at the first sink failure', async () => {
    const attempted: TableName[] = []
    const failing: Sink = {
      bulkInsert: async (table, _columns, rows) => {
        attempted.push(table)
        if (table === 'orders') {
          throw new SinkError(table, 'connection reset')
        }
        return { inserted: rows.length, skipped: 0 }
      },
    }

    await expect(persistDataset(generateDataset(small), failing, { batchSize: 500 })).rejects.toThrow(
      'Bulk insert into orders failed: connection reset',
    )
    expect(attempted).toEqual(['products', 'customers', 'orders'])
  })

  it('rejects a non-positive batch size', async () => {
    await expect(persistDataset(generateDataset(small), new MemorySink(), { batchSize: 0 })).rejects.toThrow(
      ConfigurationError,
    )
  })
})

describe('chunk', () => {
  it('splits into fixed-size slices with a shorter tail', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]])
    expect(chunk([], 3)).toEqual([])
  })
})
