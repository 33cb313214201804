import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { writeFileSync, mkdtempSync, rmSync } from 'node:fs'
import { join } from 'node:path'
import { tmpdir } from 'node:os'
import { loadConfig, ConfigError } from './loader.js'

describe('loadConfig', () => {
  let tempDir: string
  let configPath: string

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'sqlstep-config-test-'))
    configPath = join(tempDir, 'sqlstep.config.json')
  })

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true })
  })

  describe('successful loading', () => {
    it('should return the defaults without a config file', () => {
      const config = loadConfig(undefined, {})
      expect(config.database).toEqual({
        path: ':memory:',
        readonly: false,
        fileMustExist: false,
        journalMode: 'wal',
        foreignKeys: true,
        busyTimeoutMs: 5000,
      })
      expect(config.logging.level).toBe('warn')
      expect(config.logging.path).toBeUndefined()
    })

    it('should override defaults with user-specified values', () => {
      writeFileSync(
        configPath,
        JSON.stringify({ database: { path: 'data/app.db', journalMode: 'delete' }, logging: { level: 'debug' } }),
      )
      const config = loadConfig(configPath, {})
      expect(config.database.path).toBe('data/app.db')
      expect(config.database.journalMode).toBe('delete')
      expect(config.database.busyTimeoutMs).toBe(5000)
      expect(config.logging.level).toBe('debug')
    })

    it('should return a frozen config', () => {
      const config = loadConfig(undefined, {})
      expect(Object.isFrozen(config)).toBe(true)
      expect(Object.isFrozen(config.database)).toBe(true)
    })
  })

  describe('environment variable overrides', () => {
    it('should override nested config with double underscore (SQLSTEP_DATABASE__BUSYTIMEOUTMS)', () => {
      const config = loadConfig(undefined, { SQLSTEP_DATABASE__BUSYTIMEOUTMS: '100' })
      expect(config.database.busyTimeoutMs).toBe(100)
    })

    it('should coerce boolean env vars (SQLSTEP_DATABASE__FOREIGNKEYS=false)', () => {
      const config = loadConfig(undefined, { SQLSTEP_DATABASE__FOREIGNKEYS: 'false' })
      expect(config.database.foreignKeys).toBe(false)
    })

    it('should let env vars win over the config file', () => {
      writeFileSync(configPath, JSON.stringify({ logging: { level: 'error' } }))
      const config = loadConfig(configPath, { SQLSTEP_LOGGING__LEVEL: 'info', OTHER_VAR: 'ignored' })
      expect(config.logging.level).toBe('info')
    })

    it('should reject env vars that name no configuration field', () => {
      expect(() => loadConfig(undefined, { SQLSTEP_DATABASE__POOLSIZE: '4' })).toThrow(
        'Unknown configuration key in environment: SQLSTEP_DATABASE__POOLSIZE',
      )
      expect(() => loadConfig(undefined, { SQLSTEP_DATABASE__PATH__NAME: 'x' })).toThrow(ConfigError)
    })

    it('should add optional fields from env vars', () => {
      const config = loadConfig(undefined, { SQLSTEP_LOGGING__PATH: '/tmp/sqlstep.jsonl' })
      expect(config.logging.path).toBe('/tmp/sqlstep.jsonl')
    })
  })

  describe('validation errors', () => {
    it('should reject an unknown journal mode with a field path', () => {
      writeFileSync(configPath, JSON.stringify({ database: { journalMode: 'bogus' } }))
      try {
        loadConfig(configPath, {})
        expect.unreachable('loadConfig should fail')
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError)
        if (err instanceof ConfigError) {
          expect(err.fields.some((f) => f.path === '/database/journalMode')).toBe(true)
          expect(err.message).toContain('Configuration invalid:')
        }
      }
    })

    it('should reject a negative busy timeout', () => {
      expect(() => loadConfig(undefined, { SQLSTEP_DATABASE__BUSYTIMEOUTMS: '-1' })).toThrow(ConfigError)
    })

    it('should report a missing file', () => {
      const missing = join(tempDir, 'missing.json')
      expect(() => loadConfig(missing, {})).toThrow(`Configuration file not found: ${missing}`)
    })

    it('should report invalid JSON', () => {
      writeFileSync(configPath, '{ not json')
      expect(() => loadConfig(configPath, {})).toThrow(`Invalid JSON in configuration file: ${configPath}`)
    })

    it('should reject a file that is not a JSON object', () => {
      writeFileSync(configPath, '[]')
      expect(() => loadConfig(configPath, {})).toThrow(
        `Configuration file must contain a JSON object: ${configPath}`,
      )
    })
  })
})
