import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres'
import { Pool } from 'pg'
import { customers } from './schema/customers'
import { orderItems } from './schema/order_items'
import { orders } from './schema/orders'
import { products } from './schema/products'

/**
 * Drizzle schema registry. Keys double as the persisted table names.
 */
export const tables = {
  customers,
  products,
  orders,
  order_items: orderItems,
}

export type Database = NodePgDatabase<typeof tables>

export type DatabaseHandle = {
  db: Database
  pool: Pool
}

export function createDatabase(connectionString: string | undefined): DatabaseHandle {
  if (!connectionString) {
    throw new Error('DATABASE_URL is required to connect to the database')
  }
  const pool = new Pool({ connectionString })
  return { pool, db: drizzle(pool, { schema: tables }) }
}

export async function checkDatabaseConnection(pool: Pool): Promise<boolean> {
  const client = await pool.connect()
  try {
    await client.query('SELECT 1')
    return true
  } finally {
    client.release()
  }
}
