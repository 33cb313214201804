import Database from 'better-sqlite3'
import type { DatabaseConnection } from './interface.js'
import type { DatabaseConfig, JournalMode } from '../types/config.js'
import { Statement } from '../statement/statement.js'
import { StatementError, engineMessage, toEngineCode } from '../statement/errors.js'
import { noopLogger, type Logger } from '../logging/logger.js'

export interface ConnectionOptions {
  readonly?: boolean
  fileMustExist?: boolean
  /** How long a write waits on a locked database, in milliseconds. */
  busyTimeoutMs?: number
  journalMode?: JournalMode
  foreignKeys?: boolean
  logger?: Logger
}

const MEMORY_PATH = ':memory:'

/**
 * better-sqlite3 connection that prepares typed statements.
 *
 * File-backed databases default to WAL journaling; in-memory and read-only
 * databases keep SQLite's journal mode. Foreign keys are enforced unless
 * disabled.
 *
 * An open read cursor keeps the whole connection busy, so `close()` resets
 * every statement prepared here that is still mid-read.
 */
export class SqliteConnection implements DatabaseConnection {
  private readonly db: Database.Database
  private readonly logger: Logger
  private readonly statements = new Set<Statement>()

  /**
   * @param path - Path to the SQLite database file, or ':memory:' for in-memory
   */
  constructor(
    readonly path: string,
    options: ConnectionOptions = {},
  ) {
    this.logger = options.logger ?? noopLogger
    const readOnly = options.readonly ?? false
    this.db = new Database(path, {
      readonly: readOnly,
      fileMustExist: options.fileMustExist ?? false,
      timeout: options.busyTimeoutMs ?? 5000,
    })
    if (!readOnly && path !== MEMORY_PATH) {
      this.db.pragma(`journal_mode = ${options.journalMode ?? 'wal'}`)
    }
    this.db.pragma(`foreign_keys = ${options.foreignKeys === false ? 'OFF' : 'ON'}`)
    this.logger.info('connection.opened', { path, readonly: readOnly })
  }

  static fromConfig(config: DatabaseConfig, logger?: Logger): SqliteConnection {
    return new SqliteConnection(config.path, {
      readonly: config.readonly,
      fileMustExist: config.fileMustExist,
      busyTimeoutMs: config.busyTimeoutMs,
      journalMode: config.journalMode,
      foreignKeys: config.foreignKeys,
      logger,
    })
  }

  get open(): boolean {
    return this.db.open
  }

  /** The underlying handle, for code that prepares statements itself. */
  get handle(): Database.Database {
    return this.db
  }

  prepareStatement(sql: string): Statement {
    const statement = new Statement(this.db, sql, this.logger)
    this.statements.add(statement)
    return statement
  }

  exec(sql: string): void {
    this.db.exec(sql)
  }

  transaction<T>(fn: () => T): T {
    const wrapped = this.db.transaction(fn)
    return wrapped()
  }

  /**
   * @throws StatementError (`CLOSE_FAILED`) when the handle stays busy, e.g.
   *   a read cursor opened on `handle` directly
   */
  close(): void {
    for (const statement of this.statements) {
      if (statement.cursorOpen) statement.reset()
    }
    this.statements.clear()
    try {
      this.db.close()
    } catch (err) {
      const engineCode = toEngineCode(err)
      this.logger.warn('connection.close_failed', { path: this.path, engineCode })
      throw new StatementError(
        'CLOSE_FAILED',
        engineCode,
        `Failed to close database "${this.path}": ${engineMessage(err)} (${engineCode})`,
      )
    }
    this.logger.info('connection.closed', { path: this.path })
  }
}
