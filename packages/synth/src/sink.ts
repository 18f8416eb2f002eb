export type TableName = 'products' | 'customers' | 'orders' | 'order_items'

export type SinkValue = string | number | Date

export type SinkRow = readonly SinkValue[]

export type BulkInsertResult = {
  inserted: number
  skipped: number
}

/**
 * Persistence boundary for generated batches.
 *
 * Contract: insert-or-skip. The first column is the primary key; a row whose
 * key already exists is skipped and counted, never an error. Each call is
 * all-or-nothing. Failures surface as `SinkError`.
 */
export interface Sink {
  bulkInsert(table: TableName, columns: readonly string[], rows: readonly SinkRow[]): Promise<BulkInsertResult>
}

/**
 * In-process sink keyed by primary key. Used for dry runs and tests.
 */
export class MemorySink implements Sink {
  private readonly tables = new Map<TableName, Map<SinkValue, SinkRow>>()
  private readonly columnsByTable = new Map<TableName, readonly string[]>()

  async bulkInsert(table: TableName, columns: readonly string[], rows: readonly SinkRow[]): Promise<BulkInsertResult> {
    const existing = this.tables.get(table) ?? new Map<SinkValue, SinkRow>()
    let inserted = 0
    let skipped = 0

    for (const row of rows) {
      const key = row[0]
      if (existing.has(key)) {
        skipped++
        continue
      }
      existing.set(key, row)
      inserted++
    }

    this.tables.set(table, existing)
    this.columnsByTable.set(table, columns)
    return { inserted, skipped }
  }

  rows(table: TableName): SinkRow[] {
    return Array.from(this.tables.get(table)?.values() ?? [])
  }

  columns(table: TableName): readonly string[] {
    return this.columnsByTable.get(table) ?? []
  }

  count(table: TableName): number {
    return this.tables.get(table)?.size ?? 0
  }
}
