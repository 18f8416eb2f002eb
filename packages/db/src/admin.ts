import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { sql } from 'drizzle-orm'
import type { SqlExecutor } from './executor'

export type { SqlExecutor } from './executor'

const schemaSqlPath = fileURLToPath(new URL('../sql/schema.sql', import.meta.url))

export function readSchemaSql(): string {
  return readFileSync(schemaSqlPath, 'utf8')
}

/** Creates the four tables when they do not exist yet. */
export async function ensureSchema(executor: SqlExecutor): Promise<void> {
  await executor.execute(sql.raw(readSchemaSql()))
}

/** Empties every table, children first through CASCADE. */
export async function resetTables(executor: SqlExecutor): Promise<void> {
  await executor.execute(sql.raw('TRUNCATE TABLE order_items, orders, customers, products RESTART IDENTITY CASCADE'))
}
