/**
 * Logger
 *
 * Leveled console logger used by the lifecycle manager and providers.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface LoggerOptions {
  level?: LogLevel
  context?: string
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

export class Logger {
  readonly level: LogLevel
  readonly context: string

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'warn'
    this.context = options.context ?? ''
  }

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return levelPriority[level] >= levelPriority[this.level]
  }

  private format(level: string, message: string, data?: Record<string, unknown>): string {
    const ctx = this.context ? ` (${this.context})` : ''
    const output = `[${level}]${ctx} ${message}`
    return data ? `${output} ${JSON.stringify(data)}` : output
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) {
      console.debug(this.format('debug', message, data))
    }
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.shouldLog('info')) {
      console.info(this.format('info', message, data))
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

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
    })
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options)
}
