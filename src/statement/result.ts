import type { ColumnKind, RowOf } from '../types/values.js'
import type { Statement } from './statement.js'
import { IterationProtocolError } from './errors.js'
import { matchesKind } from './coerce.js'

function isRowOf<C extends readonly ColumnKind[]>(row: unknown, columns: C): row is RowOf<C> {
  return (
    Array.isArray(row) &&
    row.length === columns.length &&
    columns.every((kind, index) => matchesKind(row[index], kind))
  )
}

/**
 * Forward-only cursor over the rows of a statement.
 *
 * A cursor is a statement plus a row position. Creating a non-end cursor
 * steps the statement once, so a cursor over an empty result set starts out
 * equal to the end sentinel. Advancing one cursor moves the statement for
 * every cursor over it.
 */
export class RowCursor<C extends readonly ColumnKind[]> {
  static readonly END = -1

  private rowPosition: number

  constructor(
    private readonly statement: Statement,
    private readonly columns: C,
    position: number,
  ) {
    this.rowPosition = position
    if (this.rowPosition !== RowCursor.END) {
      this.stepForward()
    }
  }

  /** Number of rows stepped so far, or END. */
  get position(): number {
    return this.rowPosition
  }

  get atEnd(): boolean {
    return this.rowPosition === RowCursor.END
  }

  /**
   * Move to the next row, or to the end sentinel when there is none.
   *
   * @throws IterationProtocolError when already at the end
   * @throws StepError when the engine fails
   */
  advance(): this {
    if (this.atEnd) {
      throw new IterationProtocolError('Cannot increment result iterator beyond result set!')
    }
    this.stepForward()
    return this
  }

  /**
   * The current row as a tuple of the declared column types. Reading does
   * not step; repeated reads of the same position are equal.
   *
   * @throws IterationProtocolError at the end sentinel
   */
  get value(): RowOf<C> {
    if (this.atEnd) {
      throw new IterationProtocolError('Cannot read a row from a result iterator at the end of its result set')
    }
    const row = this.columns.map((kind, index) => this.statement.obtainColumnValue(index, kind))
    if (!isRowOf(row, this.columns)) {
      throw new IterationProtocolError(`Row at position ${this.rowPosition} does not match its declared columns`)
    }
    return row
  }

  equals(other: RowCursor<readonly ColumnKind[]>): boolean {
    return this.statement === other.statement && this.rowPosition === other.rowPosition
  }

  private stepForward(): void {
    if (this.statement.step()) {
      this.rowPosition++
    } else {
      this.rowPosition = RowCursor.END
    }
  }
}

/**
 * Lazily stepped, single-pass sequence of typed rows.
 *
 * The view keeps its statement alive. It buffers nothing: every row is read
 * from the statement while it is current. A second `begin()` after a partial
 * pass continues where the statement stands; call `reset()` on the statement
 * and bind again to run the query anew.
 *
 * A view left partly read (a `for...of` ended by `break`, a cursor not
 * advanced to the end) keeps its engine cursor open. Until the statement is
 * reset, writes on the same connection fail with `StepError`
 * (`SQLITE_MISUSE`) and closing the raw handle fails; other reads still run.
 */
export class TypedResultView<C extends readonly ColumnKind[]> implements Iterable<RowOf<C>> {
  constructor(
    private readonly statement: Statement,
    readonly columns: C,
  ) {}

  begin(): RowCursor<C> {
    return new RowCursor(this.statement, this.columns, 0)
  }

  end(): RowCursor<C> {
    return new RowCursor(this.statement, this.columns, RowCursor.END)
  }

  *[Symbol.iterator](): Generator<RowOf<C>, void, undefined> {
    const end = this.end()
    for (const cursor = this.begin(); !cursor.equals(end); cursor.advance()) {
      yield cursor.value
    }
  }
}
