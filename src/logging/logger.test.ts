import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, readFileSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { createLogger, loggerFromConfig, noopLogger } from './logger.js'

const fixedClock = () => new Date('2026-01-02T03:04:05.000Z')

describe('createLogger', () => {
  it('should write one JSON object per record', () => {
    const lines: string[] = []
    const logger = createLogger({ level: 'info', write: (line) => lines.push(line), now: fixedClock })
    logger.info('hello', { count: 2 })
    expect(lines).toEqual(['{"time":"2026-01-02T03:04:05.000Z","level":"info","msg":"hello","count":2}'])
  })

  it('should drop records below the configured level', () => {
    const lines: string[] = []
    const logger = createLogger({ level: 'warn', write: (line) => lines.push(line), now: fixedClock })
    logger.debug('noise')
    logger.info('noise')
    logger.warn('careful')
    logger.error('broken')
    expect(lines.map((line) => JSON.parse(line).level)).toEqual(['warn', 'error'])
  })

  it('should drop everything at silent', () => {
    const lines: string[] = []
    const logger = createLogger({ level: 'silent', write: (line) => lines.push(line) })
    logger.error('broken')
    expect(lines).toEqual([])
  })

  it('should encode bigint and byte fields', () => {
    const lines: string[] = []
    const logger = createLogger({ level: 'debug', write: (line) => lines.push(line), now: fixedClock })
    logger.debug('bound', { stamp: 5n, payload: new Uint8Array(4) })
    expect(JSON.parse(lines[0])).toEqual({
      time: '2026-01-02T03:04:05.000Z',
      level: 'debug',
      msg: 'bound',
      stamp: '5',
      payload: '<4 bytes>',
    })
  })

  it('should accept calls on the no-op logger', () => {
    expect(() => noopLogger.error('ignored', { a: 1 })).not.toThrow()
  })
})

describe('file sink', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sqlstep-log-test-'))
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  it('should append records to the configured file', () => {
    const path = join(tempDir, 'sqlstep.jsonl')
    const logger = loggerFromConfig({ level: 'info', path })
    logger.info('first')
    logger.warn('second')
    const records = readFileSync(path, 'utf-8')
      .trim()
      .split('\n')
      .map((line) => JSON.parse(line).msg)
    expect(records).toEqual(['first', 'second'])
  })
})
