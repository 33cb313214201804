/** Typed statement error codes for downstream error handling */
export type StatementErrorCode =
  | 'PREPARE_FAILED'
  | 'BIND_FAILED'
  | 'STEP_FAILED'
  | 'ITERATION_PROTOCOL'
  | 'CLOSE_FAILED'

/**
 * SQLite result code name, e.g. `SQLITE_RANGE` or `SQLITE_CONSTRAINT_UNIQUE`.
 * Extended codes are kept as the engine reports them.
 */
export type EngineCode = string

/** Base class of every failure raised by a statement or its result cursors. */
export class StatementError extends Error {
  constructor(
    public readonly code: StatementErrorCode,
    public readonly engineCode: EngineCode,
    message: string,
  ) {
    super(message)
    this.name = 'StatementError'
  }
}

/** The SQL text could not be compiled, or the connection is unusable. */
export class PrepareError extends StatementError {
  constructor(
    public readonly sql: string,
    engineCode: EngineCode,
    detail: string,
  ) {
    super('PREPARE_FAILED', engineCode, `Failed to prepare statement "${sql}": ${detail} (${engineCode})`)
    this.name = 'PrepareError'
  }
}

/** The engine rejected a parameter value. Recoverable by reset and rebind. */
export class BindError extends StatementError {
  constructor(
    public readonly parameterIndex: number,
    public readonly valueDescription: string,
    engineCode: EngineCode,
    detail?: string,
  ) {
    super(
      'BIND_FAILED',
      engineCode,
      `Error when binding parameter ${parameterIndex} to value '${valueDescription}'` +
        (detail ? `: ${detail}` : '') +
        `. Return code: ${engineCode}`,
    )
    this.name = 'BindError'
  }
}

/** Execution failed mid-step. The in-flight result sequence is unusable until reset. */
export class StepError extends StatementError {
  constructor(
    engineCode: EngineCode,
    public readonly detail: string,
    public readonly sql: string,
  ) {
    super('STEP_FAILED', engineCode, `Error processing SQLite statement "${sql}": ${detail} (${engineCode})`)
    this.name = 'StepError'
  }
}

/**
 * A result cursor was advanced or read past the end of its result set.
 * This is a programming error, not a data condition.
 */
export class IterationProtocolError extends StatementError {
  constructor(message: string) {
    super('ITERATION_PROTOCOL', 'SQLITE_MISUSE', message)
    this.name = 'IterationProtocolError'
  }
}

/**
 * Map a driver exception to a SQLite result code name.
 *
 * better-sqlite3 raises `SqliteError` (carrying `code`) for engine failures,
 * `RangeError` for parameter count mismatches and `TypeError` for misuse such
 * as a closed connection or a busy statement.
 */
export function toEngineCode(err: unknown): EngineCode {
  if (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('SQLITE_')
  ) {
    return err.code
  }
  if (err instanceof RangeError) return 'SQLITE_RANGE'
  if (err instanceof TypeError) return 'SQLITE_MISUSE'
  return 'SQLITE_ERROR'
}

/** Diagnostic text of a driver exception. */
export function engineMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
