import { Type, type Static } from '@sinclair/typebox'

/** Declared type of a result column */
export const ColumnKind = Type.Union([
  Type.Literal('int'),
  Type.Literal('time'),
  Type.Literal('double'),
  Type.Literal('text'),
  Type.Literal('blob'),
])
export type ColumnKind = Static<typeof ColumnKind>

export const COLUMN_KINDS: readonly ColumnKind[] = ['int', 'time', 'double', 'text', 'blob']

/** TypeScript representation of each column kind */
export interface ColumnTypeMap {
  int: number
  time: bigint
  double: number
  text: string
  blob: Uint8Array
}

export type ColumnValue<K extends ColumnKind = ColumnKind> = ColumnTypeMap[K]

/** Fixed-arity row tuple for an ordered list of column kinds */
export type RowOf<C extends readonly ColumnKind[]> = {
  -readonly [I in keyof C]: C[I] extends ColumnKind ? ColumnTypeMap[C[I]] : never
}

/** A parameter value tagged with its semantic type */
export type ParameterValue =
  | { kind: 'int'; value: number }
  | { kind: 'time'; value: bigint }
  | { kind: 'double'; value: number }
  | { kind: 'text'; value: string }
  | { kind: 'blob'; value: Uint8Array }

/** Untagged values accepted by bind; see toParameter for how each is tagged */
export type BindValue = ParameterValue | number | bigint | string | Uint8Array | Date
