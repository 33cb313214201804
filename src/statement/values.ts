import { COLUMN_KINDS, type BindValue, type ParameterValue } from '../types/values.js'

const INT32_MIN = -(2 ** 31)
const INT32_MAX = 2 ** 31 - 1
const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n
const NANOS_PER_MILLI = 1_000_000n

/** Constructors for each semantic parameter type. */
export const param = {
  int: (value: number): ParameterValue => ({ kind: 'int', value }),
  time: (value: bigint): ParameterValue => ({ kind: 'time', value }),
  double: (value: number): ParameterValue => ({ kind: 'double', value }),
  text: (value: string): ParameterValue => ({ kind: 'text', value }),
  blob: (value: Uint8Array): ParameterValue => ({ kind: 'blob', value }),
}

function isInt32(value: number): boolean {
  return Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX
}

function isParameterValue(value: object): value is ParameterValue {
  return 'kind' in value && 'value' in value && COLUMN_KINDS.some((kind) => kind === value.kind)
}

/**
 * Tag a bare value with its semantic type.
 *
 * Numbers that are 32-bit integers bind as `int`, every other number as
 * `double`. A `Date` becomes a nanosecond `time` value.
 * Returns undefined for values outside the supported set.
 */
export function toParameter(value: BindValue): ParameterValue | undefined {
  switch (typeof value) {
    case 'number':
      return isInt32(value) ? param.int(value) : param.double(value)
    case 'bigint':
      return param.time(value)
    case 'string':
      return param.text(value)
    case 'object':
      if (value instanceof Uint8Array) return param.blob(value)
      if (value instanceof Date) {
        const millis = value.getTime()
        return Number.isNaN(millis) ? undefined : param.time(BigInt(millis) * NANOS_PER_MILLI)
      }
      if (value !== null && isParameterValue(value)) return value
      return undefined
    default:
      return undefined
  }
}

/** Render a value for diagnostics. */
export function describeValue(value: ParameterValue | BindValue): string {
  const tagged = toParameter(value)
  if (!tagged) return String(value)
  switch (tagged.kind) {
    case 'int':
    case 'time':
    case 'double':
      return String(tagged.value)
    case 'text':
      return tagged.value
    case 'blob':
      return `<blob ${tagged.value.byteLength} bytes>`
  }
}

/**
 * Check a tagged value against the range of its semantic type.
 *
 * @returns the SQLite result code the engine would report, or undefined when
 *   the value is bindable
 */
export function checkParameter(value: ParameterValue): string | undefined {
  switch (value.kind) {
    case 'int':
      return typeof value.value === 'number' && isInt32(value.value) ? undefined : 'SQLITE_MISMATCH'
    case 'time':
      if (typeof value.value !== 'bigint') return 'SQLITE_MISMATCH'
      return value.value >= INT64_MIN && value.value <= INT64_MAX ? undefined : 'SQLITE_RANGE'
    case 'double':
      return typeof value.value === 'number' ? undefined : 'SQLITE_MISMATCH'
    case 'text':
      return typeof value.value === 'string' ? undefined : 'SQLITE_MISMATCH'
    case 'blob':
      return value.value instanceof Uint8Array ? undefined : 'SQLITE_MISMATCH'
  }
}

/**
 * Native representation handed to better-sqlite3.
 *
 * Integers bind as bigint so they are stored as INTEGER rather than REAL.
 * Blobs are wrapped, not copied: the caller's bytes are what the engine reads.
 */
export function toEngineValue(value: ParameterValue): bigint | number | string | Buffer {
  switch (value.kind) {
    case 'int':
      return BigInt(value.value)
    case 'time':
      return value.value
    case 'double':
      return value.value
    case 'text':
      return value.value
    case 'blob':
      return Buffer.from(value.value.buffer, value.value.byteOffset, value.value.byteLength)
  }
}
