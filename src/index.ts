export {
  Statement,
  TypedResultView,
  RowCursor,
  StatementError,
  PrepareError,
  BindError,
  StepError,
  IterationProtocolError,
  toEngineCode,
  param,
  toParameter,
  describeValue,
  coerceColumn,
} from './statement/index.js'
export type { RunResult, StatementErrorCode, EngineCode } from './statement/index.js'

export { SqliteConnection } from './storage/index.js'
export type { DatabaseConnection, ConnectionOptions } from './storage/index.js'

export { loadConfig, ConfigError, DEFAULT_CONFIG } from './config/index.js'

export { createLogger, loggerFromConfig, noopLogger } from './logging/index.js'
export type { Logger, LoggerOptions, LogFields } from './logging/index.js'

export * from './types/index.js'
