import { sql, type SQL } from 'drizzle-orm'
import { SinkError, type BulkInsertResult, type Sink, type SinkRow, type TableName } from '@duka/synth'
import type { SqlExecutor } from './executor'

/** Postgres refuses statements with more bind parameters than this. */
export const MAX_STATEMENT_PARAMETERS = 65535

/**
 * Single `INSERT ... ON CONFLICT DO NOTHING` statement for one batch.
 */
export function buildInsertOrSkip(table: TableName, columns: readonly string[], rows: readonly SinkRow[]): SQL {
  const columnList = sql.join(
    columns.map((column) => sql.identifier(column)),
    sql`, `,
  )
  const values = sql.join(
    rows.map((row) => sql`(${sql.join(row.map((value) => sql`${value}`), sql`, `)})`),
    sql`, `,
  )
  return sql`insert into ${sql.identifier(table)} (${columnList}) values ${values} on conflict do nothing`
}

/**
 * Postgres adapter for the generator's sink contract.
 *
 * One statement per call, so each batch commits or fails as a whole. Rows
 * whose primary key already exists are skipped by the database and reported
 * back through `rowCount`.
 */
export class PostgresSink implements Sink {
  constructor(private readonly executor: SqlExecutor) {}

  async bulkInsert(table: TableName, columns: readonly string[], rows: readonly SinkRow[]): Promise<BulkInsertResult> {
    if (rows.length === 0) {
      return { inserted: 0, skipped: 0 }
    }

    const malformed = rows.findIndex((row) => row.length !== columns.length)
    if (malformed !== -1) {
      throw new SinkError(
        table,
        `row ${malformed} has ${rows[malformed].length} values for ${columns.length} columns`,
      )
    }

    const parameters = rows.length * columns.length
    if (parameters > MAX_STATEMENT_PARAMETERS) {
      throw new SinkError(
        table,
        `batch of ${rows.length} rows needs ${parameters} parameters, more than the ${MAX_STATEMENT_PARAMETERS} one statement allows`,
      )
    }

    let rowCount: number | null
    try {
      const result = await this.executor.execute(buildInsertOrSkip(table, columns, rows))
      rowCount = result.rowCount
    } catch (error) {
      throw new SinkError(table, error instanceof Error ? error.message : String(error), error)
    }

    const inserted = rowCount ?? 0
    return { inserted, skipped: rows.length - inserted }
  }
}
