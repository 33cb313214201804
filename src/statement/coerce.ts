import type { ColumnKind, ColumnValue } from '../types/values.js'

const LEADING_INTEGER = /^\s*[+-]?\d+/
const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
/** Significant digits SQLite prints for REAL values. */
const REAL_DIGITS = 15
const utf8 = new TextDecoder()
const utf8Encoder = new TextEncoder()

/** Storage classes a raw row cell can hold once safe integers are enabled. */
type Cell = bigint | number | string | Uint8Array | null

function toCell(raw: unknown): Cell {
  if (
    raw === null ||
    typeof raw === 'bigint' ||
    typeof raw === 'number' ||
    typeof raw === 'string' ||
    raw instanceof Uint8Array
  ) {
    return raw
  }
  return null
}

function clampInt64(value: bigint): bigint {
  if (value < INT64_MIN) return INT64_MIN
  if (value > INT64_MAX) return INT64_MAX
  return value
}

function leadingInteger(text: string): bigint {
  const match = LEADING_INTEGER.exec(text)
  return match ? clampInt64(BigInt(match[0].trim())) : 0n
}

/** Reals truncate toward zero and saturate at the int64 limits. */
function realToInt64(value: number): bigint {
  if (Number.isNaN(value)) return 0n
  if (value <= -(2 ** 63)) return INT64_MIN
  if (value >= 2 ** 63) return INT64_MAX
  return BigInt(Math.trunc(value))
}

/**
 * Render a REAL the way SQLite's `%!.15g` does: 15 significant digits with
 * trailing zeros dropped, always a fractional part, and exponent form
 * (`1.0e+15`, `1.0e-07`) when the exponent is below -4 or at least 15.
 */
function realToText(value: number): string {
  if (Number.isNaN(value)) return ''
  if (!Number.isFinite(value)) return value > 0 ? 'Inf' : '-Inf'
  const sign = value < 0 ? '-' : ''
  const scientific = Math.abs(value).toExponential(REAL_DIGITS - 1)
  const marker = scientific.indexOf('e')
  const exponent = Number(scientific.slice(marker + 1))
  const digits = scientific.slice(0, marker).replace('.', '').replace(/0+$/, '') || '0'

  if (exponent < -4 || exponent >= REAL_DIGITS) {
    const fraction = digits.slice(1) || '0'
    const power = String(Math.abs(exponent)).padStart(2, '0')
    return `${sign}${digits.charAt(0)}.${fraction}e${exponent < 0 ? '-' : '+'}${power}`
  }
  if (exponent < 0) {
    return `${sign}0.${'0'.repeat(-exponent - 1)}${digits}`
  }
  const whole = digits.slice(0, exponent + 1).padEnd(exponent + 1, '0')
  const fraction = digits.slice(exponent + 1) || '0'
  return `${sign}${whole}.${fraction}`
}

function toInt64(cell: Cell): bigint {
  if (cell === null) return 0n
  if (typeof cell === 'bigint') return cell
  if (typeof cell === 'number') return realToInt64(cell)
  if (typeof cell === 'string') return leadingInteger(cell)
  return leadingInteger(utf8.decode(cell))
}

function toDouble(cell: Cell): number {
  if (cell === null) return 0
  if (typeof cell === 'number') return cell
  if (typeof cell === 'bigint') return Number(cell)
  const parsed = parseFloat(typeof cell === 'string' ? cell : utf8.decode(cell))
  return Number.isNaN(parsed) ? 0 : parsed
}

function toText(cell: Cell): string {
  if (cell === null) return ''
  if (typeof cell === 'string') return cell
  if (typeof cell === 'bigint') return cell.toString()
  if (typeof cell === 'number') return realToText(cell)
  return utf8.decode(cell)
}

function toBlob(cell: Cell): Uint8Array {
  if (cell === null) return new Uint8Array(0)
  if (cell instanceof Uint8Array) return Uint8Array.from(cell)
  return utf8Encoder.encode(toText(cell))
}

/**
 * Convert one raw row cell to the declared column kind, following the
 * conversions SQLite applies in its `sqlite3_column_*` accessors.
 *
 * Blob results are always fresh copies owned by the caller.
 */
export function coerceColumn(raw: unknown, kind: ColumnKind): ColumnValue {
  const cell = toCell(raw)
  switch (kind) {
    case 'int':
      return Number(BigInt.asIntN(32, toInt64(cell)))
    case 'time':
      return toInt64(cell)
    case 'double':
      return toDouble(cell)
    case 'text':
      return toText(cell)
    case 'blob':
      return toBlob(cell)
  }
}

/** Whether a coerced value has the TypeScript type of the given kind. */
export function matchesKind(value: unknown, kind: ColumnKind): boolean {
  switch (kind) {
    case 'int':
      return typeof value === 'number' && Number.isInteger(value)
    case 'time':
      return typeof value === 'bigint'
    case 'double':
      return typeof value === 'number'
    case 'text':
      return typeof value === 'string'
    case 'blob':
      return value instanceof Uint8Array
  }
}
