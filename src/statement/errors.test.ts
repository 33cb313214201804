import { describe, it, expect } from 'vitest'
import {
  BindError,
  IterationProtocolError,
  PrepareError,
  StatementError,
  StepError,
  toEngineCode,
} from './errors.js'

describe('statement errors', () => {
  it('should name the parameter index and value in BindError', () => {
    const err = new BindError(2, 'hello', 'SQLITE_RANGE')
    expect(err).toBeInstanceOf(StatementError)
    expect(err.name).toBe('BindError')
    expect(err.code).toBe('BIND_FAILED')
    expect(err.message).toBe("Error when binding parameter 2 to value 'hello'. Return code: SQLITE_RANGE")
  })

  it('should carry the SQL text in PrepareError and StepError', () => {
    const prepare = new PrepareError('SELEC 1', 'SQLITE_ERROR', 'near "SELEC": syntax error')
    expect(prepare.message).toBe('Failed to prepare statement "SELEC 1": near "SELEC": syntax error (SQLITE_ERROR)')
    const step = new StepError('SQLITE_BUSY', 'database is locked', 'DELETE FROM t')
    expect(step.sql).toBe('DELETE FROM t')
    expect(step.detail).toBe('database is locked')
    expect(step.code).toBe('STEP_FAILED')
  })

  it('should mark iteration protocol violations as misuse', () => {
    const err = new IterationProtocolError('past the end')
    expect(err.code).toBe('ITERATION_PROTOCOL')
    expect(err.engineCode).toBe('SQLITE_MISUSE')
  })
})

describe('toEngineCode', () => {
  it('should keep SQLite codes reported by the driver', () => {
    const err = Object.assign(new Error('constraint failed'), { code: 'SQLITE_CONSTRAINT_UNIQUE' })
    expect(toEngineCode(err)).toBe('SQLITE_CONSTRAINT_UNIQUE')
  })

  it('should map driver range and type errors', () => {
    expect(toEngineCode(new RangeError('Too many parameter values were provided'))).toBe('SQLITE_RANGE')
    expect(toEngineCode(new TypeError('The database connection is not open'))).toBe('SQLITE_MISUSE')
  })

  it('should fall back to SQLITE_ERROR', () => {
    expect(toEngineCode(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe('SQLITE_ERROR')
    expect(toEngineCode('boom')).toBe('SQLITE_ERROR')
  })
})
