import type Database from 'better-sqlite3'
import type { BindValue, ColumnKind, ColumnValue, ParameterValue } from '../types/values.js'
import { ok, fail, type Result } from '../types/result.js'
import { noopLogger, type Logger } from '../logging/logger.js'
import {
  BindError,
  PrepareError,
  StepError,
  engineMessage,
  toEngineCode,
} from './errors.js'
import { checkParameter, describeValue, toEngineValue, toParameter } from './values.js'
import { coerceColumn } from './coerce.js'
import { TypedResultView } from './result.js'

/** Metadata of the last completed write execution. */
export interface RunResult {
  changes: number
  lastInsertRowid: number | bigint
}

/**
 * idle: bound (or fresh), never stepped since the last reset.
 * rows: an engine cursor is open and a row may be current.
 * done: exhausted, failed, or a write that completed; steps return false.
 */
type StepState = 'idle' | 'rows' | 'done'

/**
 * One prepared SQLite statement with positional typed binding and typed
 * column extraction.
 *
 * Parameters bind at `parameterIndex` (1-based), which advances by one per
 * bound value and returns to 1 on `reset()`. Result views and cursors keep a
 * reference to the statement; iterating them steps this statement, so there
 * is exactly one step position per statement regardless of how many cursors
 * exist.
 *
 * better-sqlite3 hands parameters to SQLite when execution starts, so values
 * are validated at bind time and kept until the first step.
 */
export class Statement {
  private readonly handle: Database.Statement
  private readonly logger: Logger
  private readonly parameters: ParameterValue[] = []
  private boundBlobs: Uint8Array[] = []
  private nextParameterIndex = 1
  private state: StepState = 'idle'
  private cursor: IterableIterator<unknown> | undefined
  private currentRow: unknown[] | undefined
  private lastRunResult: RunResult | undefined

  /**
   * @param db - open better-sqlite3 connection, owned by the caller
   * @param sql - a single SQL statement
   * @throws PrepareError when the SQL does not compile or the connection is closed
   */
  constructor(
    db: Database.Database,
    readonly sql: string,
    logger: Logger = noopLogger,
  ) {
    this.logger = logger
    try {
      this.handle = db.prepare(sql)
    } catch (err) {
      const error = new PrepareError(sql, toEngineCode(err), engineMessage(err))
      logger.warn('statement.prepare_failed', { sql, engineCode: error.engineCode })
      throw error
    }
    if (this.handle.reader) {
      this.handle.raw(true)
      this.handle.safeIntegers(true)
    }
    logger.debug('statement.prepared', { sql, returnsData: this.handle.reader })
  }

  static prepare(db: Database.Database, sql: string, logger?: Logger): Statement {
    return new Statement(db, sql, logger)
  }

  static tryPrepare(db: Database.Database, sql: string, logger?: Logger): Result<Statement, PrepareError> {
    try {
      return ok(new Statement(db, sql, logger))
    } catch (err) {
      if (err instanceof PrepareError) return fail(err)
      throw err
    }
  }

  /** The 1-based index the next bound value will occupy. */
  get parameterIndex(): number {
    return this.nextParameterIndex
  }

  /** Blob payloads bound since the last reset, in bind order. */
  get retainedBlobs(): readonly Uint8Array[] {
    return this.boundBlobs
  }

  /** Whether the statement produces result rows. */
  get returnsData(): boolean {
    return this.handle.reader
  }

  /** Names of the result columns, in order. Empty for statements without rows. */
  get columnNames(): string[] {
    return this.handle.reader ? this.handle.columns().map((column) => column.name) : []
  }

  /**
   * Whether an engine cursor is open. better-sqlite3 keeps the whole
   * connection busy for writes and `close()` until it is finished or reset.
   */
  get cursorOpen(): boolean {
    return this.cursor !== undefined
  }

  get lastRun(): RunResult | undefined {
    return this.lastRunResult
  }

  /**
   * Bind values to consecutive parameters starting at `parameterIndex`.
   *
   * A failing value stops the sequence; values bound before it stay bound and
   * the index stays advanced past them. Call `reset()` before rebinding.
   *
   * @throws BindError naming the parameter index and the rejected value
   */
  bind(...values: BindValue[]): this {
    for (const value of values) {
      this.bindOne(value)
    }
    return this
  }

  tryBind(...values: BindValue[]): Result<this, BindError> {
    try {
      return ok(this.bind(...values))
    } catch (err) {
      if (err instanceof BindError) return fail(err)
      throw err
    }
  }

  /**
   * Return to the pre-execution state: close the engine cursor, unbind all
   * parameters and release retained blobs. Safe at any point.
   */
  reset(): this {
    this.closeCursor()
    this.state = 'idle'
    this.parameters.length = 0
    this.boundBlobs = []
    this.nextParameterIndex = 1
    this.logger.debug('statement.reset', { sql: this.sql })
    return this
  }

  /**
   * Run the statement to completion, discarding any rows, then reset.
   *
   * On failure the statement is left as it was (bindings included) so the
   * caller can inspect it; reset before retrying.
   *
   * @throws StepError on an engine failure
   * @throws BindError when the engine rejects the bound parameter count
   */
  executeAndReset(): this {
    let discarded = 0
    while (this.step()) {
      discarded++
    }
    this.logger.debug('statement.executed', {
      sql: this.sql,
      discardedRows: discarded,
      changes: this.lastRunResult?.changes,
    })
    return this.reset()
  }

  tryExecuteAndReset(): Result<this, StepError | BindError> {
    try {
      return ok(this.executeAndReset())
    } catch (err) {
      if (err instanceof StepError || err instanceof BindError) return fail(err)
      throw err
    }
  }

  /**
   * Typed view over the result rows. Column `i` is read as `columns[i]`.
   * Nothing is stepped until the view's first cursor is created.
   */
  executeQuery<C extends ColumnKind[]>(...columns: C): TypedResultView<C> {
    return new TypedResultView(this, columns)
  }

  /**
   * Advance by one row.
   *
   * @internal Driven by RowCursor and executeAndReset.
   * @returns true when a row is current; false once exhausted or when a
   *   statement without rows has completed
   */
  step(): boolean {
    if (this.state === 'done') return false
    try {
      if (this.state === 'idle') {
        const completed = this.start()
        if (completed) return false
      }
      const next = this.cursor?.next()
      if (!next || next.done) {
        this.finish()
        return false
      }
      if (!Array.isArray(next.value)) {
        this.finish()
        throw new StepError('SQLITE_MISMATCH', 'engine returned a row that is not an array', this.sql)
      }
      this.currentRow = next.value
      return true
    } catch (err) {
      this.finish()
      throw this.failure(err)
    }
  }

  /**
   * Read one column of the current row as the declared kind.
   *
   * @internal Callers must only read after step() returned true; RowCursor
   *   guarantees this.
   */
  obtainColumnValue(index: number, kind: ColumnKind): ColumnValue {
    return coerceColumn(this.currentRow?.[index], kind)
  }

  private bindOne(value: BindValue): void {
    const index = this.nextParameterIndex
    const tagged = toParameter(value)
    let engineCode: string | undefined
    let detail: string | undefined
    if (!this.handle.database.open) {
      engineCode = 'SQLITE_MISUSE'
      detail = 'the database connection is not open'
    } else if (this.state !== 'idle') {
      engineCode = 'SQLITE_MISUSE'
      detail = 'statement must be reset before binding'
    } else if (!tagged) {
      engineCode = 'SQLITE_MISMATCH'
      detail = 'unsupported parameter type'
    } else {
      engineCode = checkParameter(tagged)
    }

    if (engineCode !== undefined || !tagged) {
      const error = new BindError(index, describeValue(value), engineCode ?? 'SQLITE_MISMATCH', detail)
      this.logger.warn('statement.bind_failed', {
        sql: this.sql,
        parameterIndex: index,
        engineCode: error.engineCode,
      })
      throw error
    }

    this.parameters.push(tagged)
    if (tagged.kind === 'blob') {
      this.boundBlobs.push(tagged.value)
    }
    this.nextParameterIndex++
    this.logger.debug('statement.bound', {
      sql: this.sql,
      parameterIndex: index,
      kind: tagged.kind,
      value: describeValue(tagged),
    })
  }

  /** Hand the parameters to the engine. Returns true when a write completed. */
  private start(): boolean {
    const params = this.parameters.map(toEngineValue)
    try {
      if (this.handle.reader) {
        this.cursor = this.handle.iterate(...params)
        this.state = 'rows'
        return false
      }
      const result = this.handle.run(...params)
      this.lastRunResult = { changes: result.changes, lastInsertRowid: result.lastInsertRowid }
      this.state = 'done'
      return true
    } catch (err) {
      if (err instanceof RangeError) throw this.parameterCountError(err)
      throw err
    }
  }

  private parameterCountError(err: RangeError): BindError {
    const tooFew = /too few/i.test(err.message)
    const last = this.parameters[this.parameters.length - 1]
    if (tooFew || !last) {
      return new BindError(this.nextParameterIndex, '<unbound>', 'SQLITE_RANGE', err.message)
    }
    return new BindError(this.parameters.length, describeValue(last), 'SQLITE_RANGE', err.message)
  }

  private failure(err: unknown): StepError | BindError {
    const error =
      err instanceof StepError || err instanceof BindError
        ? err
        : new StepError(toEngineCode(err), engineMessage(err), this.sql)
    this.logger.warn('statement.step_failed', {
      sql: this.sql,
      code: error.code,
      engineCode: error.engineCode,
    })
    return error
  }

  private finish(): void {
    this.closeCursor()
    this.state = 'done'
  }

  private closeCursor(): void {
    this.cursor?.return?.()
    this.cursor = undefined
    this.currentRow = undefined
  }
}
