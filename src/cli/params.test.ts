import { describe, it, expect } from 'vitest'
import { InvalidArgumentError } from 'commander'
import { collectParameter, formatCell, parseColumns, parseParameter } from './params.js'

describe('parseParameter', () => {
  it('should parse each parameter kind', () => {
    expect(parseParameter('int:-42')).toEqual({ kind: 'int', value: -42 })
    expect(parseParameter('time:1700000000000000000')).toEqual({ kind: 'time', value: 1_700_000_000_000_000_000n })
    expect(parseParameter('double:2.5')).toEqual({ kind: 'double', value: 2.5 })
    expect(parseParameter('text:a:b c')).toEqual({ kind: 'text', value: 'a:b c' })
    expect(parseParameter('text:')).toEqual({ kind: 'text', value: '' })
    expect(parseParameter('blob:CAfe')).toEqual({ kind: 'blob', value: new Uint8Array([0xca, 0xfe]) })
  })

  it('should reject malformed specs', () => {
    expect(() => parseParameter('42')).toThrow(InvalidArgumentError)
    expect(() => parseParameter('int:4.2')).toThrow('"int:4.2" does not hold an integer.')
    expect(() => parseParameter('int:2147483648')).toThrow('"int:2147483648" is out of range for int.')
    expect(() => parseParameter('double:')).toThrow('"double:" does not hold a number.')
    expect(() => parseParameter('blob:abc')).toThrow('"blob:abc" does not hold an even-length hex string.')
    expect(() => parseParameter('uuid:x')).toThrow('Unknown parameter kind "uuid".')
  })

  it('should collect repeated parameters in order', () => {
    const collected = collectParameter('text:b', collectParameter('int:1', []))
    expect(collected).toEqual([
      { kind: 'int', value: 1 },
      { kind: 'text', value: 'b' },
    ])
  })
})

describe('parseColumns', () => {
  it('should parse a comma-separated list of kinds', () => {
    expect(parseColumns('int, text,blob')).toEqual(['int', 'text', 'blob'])
  })

  it('should reject unknown kinds', () => {
    expect(() => parseColumns('int,float')).toThrow('Unknown column kind "float".')
  })
})

describe('formatCell', () => {
  it('should render values as table cells', () => {
    expect(formatCell(7)).toBe('7')
    expect(formatCell(9_007_199_254_740_993n)).toBe('9007199254740993')
    expect(formatCell('x')).toBe('x')
    expect(formatCell(new Uint8Array([0, 255]))).toBe('00ff')
  })
})
