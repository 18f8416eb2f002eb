/**
 * Error taxonomy for dataset generation.
 *
 * - `ConfigurationError`: bad counts, unknown region, empty id lists, bad env. Fatal.
 * - `SinkError`: a bulk insert failed. Propagated as-is, never retried.
 * - `ConsistencyViolation`: generated batches break an invariant. Thrown before
 *   anything reaches the sink.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

export class SinkError extends Error {
  table: string

  constructor(table: string, message: string, cause?: unknown) {
    super(`Bulk insert into ${table} failed: ${message}`, { cause })
    this.name = 'SinkError'
    this.table = table
  }
}

export class ConsistencyViolation extends Error {
  problems: string[]

  constructor(problems: string[]) {
    const preview = problems.slice(0, 5).join('; ')
    const more = problems.length > 5 ? ` (+${problems.length - 5} more)` : ''
    super(`Generated dataset is inconsistent: ${preview}${more}`)
    this.name = 'ConsistencyViolation'
    this.problems = problems
  }
}

export function assertPositiveCount(label: string, count: number): void {
  if (!Number.isInteger(count) || count <= 0) {
    throw new ConfigurationError(`${label} must be a positive integer, got ${count}`)
  }
}
