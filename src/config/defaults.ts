import type { SqlstepConfig } from '../types/config.js'

/** Default configuration values matching TypeBox schema defaults */
export const DEFAULT_CONFIG: SqlstepConfig = {
  database: {
    path: ':memory:',
    readonly: false,
    fileMustExist: false,
    journalMode: 'wal',
    foreignKeys: true,
    busyTimeoutMs: 5000,
  },
  logging: {
    level: 'warn',
  },
}

/** Prefix of environment variables that override configuration values. */
export const ENV_PREFIX = 'SQLSTEP_'
