import { InvalidArgumentError } from 'commander'
import { Value } from '@sinclair/typebox/value'
import { ColumnKind, type ColumnValue, type ParameterValue } from '../types/values.js'
import { checkParameter } from '../statement/values.js'

const HEX = /^(?:[0-9a-fA-F]{2})*$/
const INTEGER = /^[+-]?\d+$/

function parseInteger(text: string, spec: string): bigint {
  if (!INTEGER.test(text)) {
    throw new InvalidArgumentError(`"${spec}" does not hold an integer.`)
  }
  return BigInt(text)
}

/**
 * Parse a `kind:value` parameter spec, e.g. `int:42`, `text:hello`,
 * `blob:cafe`. Text takes everything after the first colon verbatim.
 */
export function parseParameter(spec: string): ParameterValue {
  const colon = spec.indexOf(':')
  if (colon < 0) {
    throw new InvalidArgumentError(`"${spec}" is not of the form kind:value.`)
  }
  const kind = spec.slice(0, colon)
  const text = spec.slice(colon + 1)
  let value: ParameterValue
  switch (kind) {
    case 'int':
      value = { kind: 'int', value: Number(parseInteger(text, spec)) }
      break
    case 'time':
      value = { kind: 'time', value: parseInteger(text, spec) }
      break
    case 'double': {
      const parsed = Number(text)
      if (text.trim() === '' || Number.isNaN(parsed)) {
        throw new InvalidArgumentError(`"${spec}" does not hold a number.`)
      }
      value = { kind: 'double', value: parsed }
      break
    }
    case 'text':
      value = { kind: 'text', value: text }
      break
    case 'blob':
      if (!HEX.test(text)) {
        throw new InvalidArgumentError(`"${spec}" does not hold an even-length hex string.`)
      }
      value = { kind: 'blob', value: Uint8Array.from(Buffer.from(text, 'hex')) }
      break
    default:
      throw new InvalidArgumentError(`Unknown parameter kind "${kind}".`)
  }
  if (checkParameter(value) !== undefined) {
    throw new InvalidArgumentError(`"${spec}" is out of range for ${kind}.`)
  }
  return value
}

/** Option collector for repeated `--param` flags. */
export function collectParameter(spec: string, previous: ParameterValue[]): ParameterValue[] {
  return [...previous, parseParameter(spec)]
}

/** Parse a comma-separated list of column kinds, e.g. `int,text`. */
export function parseColumns(list: string): ColumnKind[] {
  const kinds: ColumnKind[] = []
  for (const entry of list.split(',')) {
    const kind = entry.trim()
    if (!Value.Check(ColumnKind, kind)) {
      throw new InvalidArgumentError(`Unknown column kind "${kind}".`)
    }
    kinds.push(kind)
  }
  return kinds
}

/** Render a column value as a table cell. Blobs print as lowercase hex. */
export function formatCell(value: ColumnValue): string {
  if (value instanceof Uint8Array) return Buffer.from(value).toString('hex')
  return String(value)
}
