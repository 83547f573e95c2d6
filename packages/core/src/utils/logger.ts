/**
 * Logger
 *
 * Minimal leveled logger. The core only ever receives a `Logger`, so callers
 * can plug in their own; `createLogger` gives the console implementation.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void
  info(message: string, data?: Record<string, unknown>): void
  warn(message: string, data?: Record<string, unknown>): void
  error(message: string, data?: Record<string, unknown>): void
  /** Create a logger with an additional context segment */
  child(context: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  context?: string
  silent?: boolean
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

/**
 * Console-backed logger.
 */
export class ConsoleLogger implements Logger {
  private readonly level: LogLevel
  private readonly context: string
  private readonly silent: boolean

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? (process.env.DEBUG ? 'debug' : 'info')
    this.context = options.context ?? ''
    this.silent = options.silent ?? false
  }

  /**
   * Format a message with context and level
   */
  format(level: LogLevel, message: string, data?: Record<string, unknown>): string {
    const ctx = this.context ? ` (${this.context})` : ''
    let output = `[${level}]${ctx} ${message}`
    if (data) {
      output += `\n${JSON.stringify(data, null, 2)}`
    }
    return output
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level]
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.log(this.format('debug', message, data))
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.log(this.format('info', message, data))
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) {
      console.warn(this.format('warn', message, data))
    }
  }

  error(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('error')) {
      console.error(this.format('error', message, data))
    }
  }

  child(context: string): Logger {
    return new ConsoleLogger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
    })
  }
}

/**
 * Logger that drops everything. Default for the core.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
}

/**
 * Create a console logger for a context.
 */
export function createLogger(context: string, options: Omit<LoggerOptions, 'context'> = {}): Logger {
  return new ConsoleLogger({ ...options, context })
}
