// Values
export { ColumnKind, COLUMN_KINDS } from './values.js'
export type {
  ColumnTypeMap,
  ColumnValue,
  RowOf,
  ParameterValue,
  BindValue,
} from './values.js'

// Configuration
export { SqlstepConfigSchema, JournalMode, LogLevel } from './config.js'
export type { SqlstepConfig, DatabaseConfig, LoggingConfig } from './config.js'

// Results
export { ok, fail } from './result.js'
export type { Result } from './result.js'
