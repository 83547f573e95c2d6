/**
 * Utilities
 */

export { defaultIdGenerator, sequentialIdGenerator } from './ids'
export type { IdGenerator } from './ids'
export { ConsoleLogger, silentLogger, createLogger } from './logger'
export type { Logger, LoggerOptions, LogLevel } from './logger'
