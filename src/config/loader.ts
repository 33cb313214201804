import { readFileSync } from 'node:fs'
import { TypeGuard, type TSchema } from '@sinclair/typebox'
import { Value } from '@sinclair/typebox/value'
import { SqlstepConfigSchema, type SqlstepConfig } from '../types/config.js'
import { DEFAULT_CONFIG, ENV_PREFIX } from './defaults.js'

/**
 * Configuration validation error with field-level details.
 */
export class ConfigError extends Error {
  public readonly fields: Array<{ path: string; message: string }>

  constructor(message: string, fields: Array<{ path: string; message: string }> = []) {
    super(message)
    this.name = 'ConfigError'
    this.fields = fields
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Deep merge source into target. Source values override target values.
 * Arrays from source replace target arrays (no concatenation).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result = { ...target }
  for (const key of Object.keys(source)) {
    const sourceVal = source[key]
    const targetVal = result[key]
    if (isRecord(sourceVal) && isRecord(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal)
    } else {
      result[key] = sourceVal
    }
  }
  return result
}

/**
 * Coerce string values to appropriate types.
 * Environment variables are always strings; this converts numeric strings
 * and boolean strings to their proper types.
 */
function coerceValue(value: string): string | number | boolean {
  // Boolean coercion
  if (value.toLowerCase() === 'true') return true
  if (value.toLowerCase() === 'false') return false

  // Numeric coercion (integers and floats)
  if (/^\d+$/.test(value)) return parseInt(value, 10)
  if (/^\d+\.\d+$/.test(value)) return parseFloat(value)

  return value
}

/**
 * Map a lowercased env path such as `database__busytimeoutms` onto the
 * schema's property keys. Returns undefined when a segment names no property.
 */
function resolveEnvPath(segments: string[]): string[] | undefined {
  let schema: TSchema = SqlstepConfigSchema
  const keys: string[] = []
  for (const segment of segments) {
    if (!TypeGuard.IsObject(schema)) return undefined
    const key = Object.keys(schema.properties).find((k) => k.toLowerCase() === segment)
    if (key === undefined) return undefined
    keys.push(key)
    schema = schema.properties[key]
  }
  return keys
}

function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  let current = obj
  for (const key of path.slice(0, -1)) {
    const next = current[key]
    if (isRecord(next)) {
      current = next
    } else {
      const created: Record<string, unknown> = {}
      current[key] = created
      current = created
    }
  }
  current[path[path.length - 1]] = value
}

/**
 * Apply SQLSTEP_ prefixed environment variable overrides to config.
 * Double underscores (__) indicate nested paths, matched case-insensitively:
 *   SQLSTEP_DATABASE__BUSYTIMEOUTMS=100 -> config.database.busyTimeoutMs = 100
 *
 * @throws ConfigError for a variable that names no configuration field
 */
function applyEnvOverrides(
  config: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue
    const path = resolveEnvPath(key.slice(ENV_PREFIX.length).toLowerCase().split('__'))
    if (path === undefined) {
      throw new ConfigError(`Unknown configuration key in environment: ${key}`)
    }
    setNestedValue(config, path, coerceValue(value))
  }
  return config
}

/**
 * Recursively freeze an object and all nested objects.
 */
function deepFreeze<T extends Record<string, unknown>>(obj: T): Readonly<T> {
  Object.freeze(obj)
  for (const value of Object.values(obj)) {
    if (isRecord(value) && !Object.isFrozen(value)) {
      deepFreeze(value)
    }
  }
  return obj
}

/** Read and parse a JSON configuration file. */
function readConfigFile(configPath: string): Record<string, unknown> {
  let rawContent: string
  try {
    rawContent = readFileSync(configPath, 'utf-8')
  } catch (err) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found: ${configPath}`)
    }
    throw new ConfigError(`Failed to read configuration file: ${configPath}`)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(rawContent)
  } catch {
    throw new ConfigError(`Invalid JSON in configuration file: ${configPath}`)
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`Configuration file must contain a JSON object: ${configPath}`)
  }
  return parsed
}

/**
 * Load, validate, and return a frozen SqlstepConfig.
 *
 * Pipeline: read file (when given) -> merge defaults -> apply env overrides
 *           -> validate against TypeBox schema -> freeze
 *
 * @param configPath - Path to sqlstep.config.json; defaults only when omitted
 * @param env - Environment to read SQLSTEP_ overrides from
 * @throws ConfigError with field-level details on validation failure
 */
export function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): SqlstepConfig {
  const userConfig = configPath === undefined ? {} : readConfigFile(configPath)

  // Deep clone so the frozen result never shares objects with DEFAULT_CONFIG
  const merged: unknown = JSON.parse(JSON.stringify(deepMerge({ ...DEFAULT_CONFIG }, userConfig)))
  if (!isRecord(merged)) {
    throw new ConfigError('Configuration must be a JSON object')
  }
  const config = applyEnvOverrides(merged, env)

  if (!Value.Check(SqlstepConfigSchema, config)) {
    const errors = [...Value.Errors(SqlstepConfigSchema, config)]
    const fields = errors.map((e) => ({
      path: e.path,
      message: e.message,
    }))
    const fieldMessages = fields.map((f) => `  - ${f.path}: ${f.message}`).join('\n')
    throw new ConfigError(`Configuration invalid:\n${fieldMessages}`, fields)
  }

  return deepFreeze(config)
}
