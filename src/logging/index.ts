export { createLogger, loggerFromConfig, noopLogger } from './logger.js'
export type { Logger, LoggerOptions, LogFields } from './logger.js'
