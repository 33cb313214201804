import type { Statement } from '../statement/statement.js'

/**
 * Owner of an open database handle.
 *
 * Statements are prepared against the handle but never close it; the
 * connection's lifetime must cover every statement and result view derived
 * from it.
 */
export interface DatabaseConnection {
  /** Whether the handle is still open. */
  readonly open: boolean

  /** Prepare a single SQL statement. Throws PrepareError on failure. */
  prepareStatement(sql: string): Statement

  /** Execute SQL text without parameters, e.g. schema set-up. */
  exec(sql: string): void

  /** Execute a function inside a database transaction. Rolls back on error. */
  transaction<T>(fn: () => T): T

  /** Close the database connection. */
  close(): void
}
