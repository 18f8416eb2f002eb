import type { GenerationConfig } from '@duka/schema'
import { assertDatasetConsistency, type Dataset } from './consistency'
import { synthesizeCustomers } from './customers'
import { assertPositiveCount } from './errors'
import { silentLog, type Log } from './logger'
import { createRegionNameProvider, loadCountyNameTable, type NameProvider } from './names'
import { synthesizeOrders } from './orders'
import { synthesizeProducts } from './products'
import { createRng, deriveSeed } from './random'
import { loadKenyanRegionData, type RegionData } from './regions'
import type { BulkInsertResult, Sink, TableName } from './sink'
import { INSERT_ORDER, TABLE_COLUMNS, tableRows } from './tables'

export type Collaborators = {
  /** Replaces the bundled county name table. */
  nameProvider?: NameProvider
  regionData?: RegionData
  log?: Log
}

/**
 * Builds all four batches and checks them before returning.
 *
 * Each synthesizer draws from its own stream derived from `config.seed`, so
 * the result depends only on the config, not on call order.
 */
export function generateDataset(config: GenerationConfig, collaborators: Collaborators = {}): Dataset {
  const log = collaborators.log ?? silentLog
  const nameProvider =
    collaborators.nameProvider ??
    createRegionNameProvider(loadCountyNameTable(), createRng(deriveSeed(config.seed, 'names')))
  const regionData = collaborators.regionData ?? loadKenyanRegionData()

  log(`Generating ${config.productCount} products...`)
  const products = synthesizeProducts(config.productCount, createRng(deriveSeed(config.seed, 'products')), {
    createdAt: config.generatedAt,
    price: config.productPrice,
    stockQuantity: config.stockQuantity,
  })

  log(`Generating ${config.customerCount} customers...`)
  const customers = synthesizeCustomers(config.customerCount, {
    rng: createRng(deriveSeed(config.seed, 'customers')),
    nameProvider,
    regionData,
    createdAt: config.generatedAt,
  })

  log(`Generating ${config.orderCount} orders and ${config.orderItemCount} order items...`)
  const { orders, orderItems } = synthesizeOrders({
    customerIds: customers.map((c) => c.customerId),
    productIds: products.map((p) => p.productId),
    orderCount: config.orderCount,
    itemCount: config.orderItemCount,
    rng: createRng(deriveSeed(config.seed, 'orders')),
    options: {
      orderDateStart: config.orderDateStart,
      orderDateEnd: config.orderDateEnd,
      quantity: config.quantity,
      unitPrice: config.unitPrice,
      stapleCutoff: config.stapleCutoff,
      stapleWeight: config.stapleWeight,
      standardWeight: config.standardWeight,
    },
  })

  const dataset: Dataset = { products, customers, orders, orderItems }
  assertDatasetConsistency(dataset)
  return dataset
}

export type PersistOptions = {
  batchSize: number
  log?: Log
}

export type PersistSummary = Record<TableName, BulkInsertResult>

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = []
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size))
  }
  return chunks
}

/**
 * Writes the dataset table by table in foreign-key order, one sink call per
 * chunk. A sink failure stops the run and propagates.
 */
export async function persistDataset(dataset: Dataset, sink: Sink, options: PersistOptions): Promise<PersistSummary> {
  assertPositiveCount('Batch size', options.batchSize)
  const log = options.log ?? silentLog
  const summary: PersistSummary = {
    products: { inserted: 0, skipped: 0 },
    customers: { inserted: 0, skipped: 0 },
    orders: { inserted: 0, skipped: 0 },
    order_items: { inserted: 0, skipped: 0 },
  }

  for (const table of INSERT_ORDER) {
    const rows = tableRows(dataset, table)
    log(`Inserting ${rows.length} rows into ${table}...`)
    for (const batch of chunk(rows, options.batchSize)) {
      const result = await sink.bulkInsert(table, TABLE_COLUMNS[table], batch)
      summary[table].inserted += result.inserted
      summary[table].skipped += result.skipped
    }
    log(`${table}: ${summary[table].inserted} inserted, ${summary[table].skipped} skipped`)
  }

  return summary
}
