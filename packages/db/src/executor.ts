import type { SQL } from 'drizzle-orm'

/**
 * The slice of a drizzle database the write helpers need. A full
 * `NodePgDatabase` satisfies it; tests pass a recorder.
 */
export interface SqlExecutor {
  execute(query: SQL): PromiseLike<{ rowCount: number | null }>
}
