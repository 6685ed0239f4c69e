/**
 * Leveled console logger for the converter.
 *
 * Levels: ERROR, WARN, INFO, DEBUG, TRACE. The default level comes from
 * VC0CSV_LOG_LEVEL and can be overridden per instance.
 */

import chalk from "chalk"

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
  TRACE = 4
}

export interface LoggerOptions {
  level?: LogLevel
  prefix?: string
  enableColors?: boolean
  enableTimestamp?: boolean
}

export const LOG_LEVEL_ENV = "VC0CSV_LOG_LEVEL"

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.ERROR]: "ERROR",
  [LogLevel.WARN]: "WARN",
  [LogLevel.INFO]: "INFO",
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.TRACE]: "TRACE"
}

const LOG_LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.ERROR]: chalk.red,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.INFO]: chalk.cyan,
  [LogLevel.DEBUG]: chalk.gray,
  [LogLevel.TRACE]: chalk.dim
}

export class Logger {
  private level: LogLevel
  private prefix: string
  private enableColors: boolean
  private enableTimestamp: boolean

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? levelFromEnv()
    this.prefix = options.prefix ?? ""
    this.enableColors = options.enableColors ?? true
    this.enableTimestamp = options.enableTimestamp ?? false
  }

  setLevel(level: LogLevel): void {
    this.level = level
  }

  getLevel(): LogLevel {
    return this.level
  }

  shouldLog(level: LogLevel): boolean {
    return level <= this.level
  }

  private format(level: LogLevel, message: string): string {
    const parts: string[] = []

    if (this.enableTimestamp) {
      const timestamp = new Date().toISOString()
      parts.push(this.enableColors ? chalk.dim(timestamp) : timestamp)
    }

    const levelStr = `[${LOG_LEVEL_NAMES[level]}]`.padEnd(7)
    parts.push(this.enableColors ? LOG_LEVEL_COLORS[level](levelStr) : levelStr)

    if (this.prefix) {
      const prefixStr = `[${this.prefix}]`
      parts.push(this.enableColors ? chalk.magenta(prefixStr) : prefixStr)
    }

    parts.push(message)

    return parts.join(" ")
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.shouldLog(LogLevel.ERROR)) return
    console.error(this.format(LogLevel.ERROR, message), ...args)
  }

  warn(message: string, ...args: unknown[]): void {
    if (!this.shouldLog(LogLevel.WARN)) return
    console.warn(this.format(LogLevel.WARN, message), ...args)
  }

  info(message: string, ...args: unknown[]): void {
    if (!this.shouldLog(LogLevel.INFO)) return
    console.log(this.format(LogLevel.INFO, message), ...args)
  }

  debug(message: string, ...args: unknown[]): void {
    if (!this.shouldLog(LogLevel.DEBUG)) return
    console.log(this.format(LogLevel.DEBUG, message), ...args)
  }

  /**
   * Most verbose level. Used for per-fragment rejections, which are expected
   * noise in real captures.
   */
  trace(message: string, ...args: unknown[]): void {
    if (!this.shouldLog(LogLevel.TRACE)) return
    console.log(this.format(LogLevel.TRACE, message), ...args)
  }

  /**
   * Create a child logger sharing this logger's settings, with a nested prefix
   */
  child(prefix: string): Logger {
    const childPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix
    return new Logger({
      level: this.level,
      prefix: childPrefix,
      enableColors: this.enableColors,
      enableTimestamp: this.enableTimestamp
    })
  }

  /**
   * Log a message followed by one indented `key: value` line per field
   */
  logFields(level: LogLevel, message: string, fields: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return

    console.log(this.format(level, message))

    for (const [key, value] of Object.entries(fields)) {
      const keyStr = this.enableColors ? chalk.cyan(`  ${key}:`) : `  ${key}:`
      console.log(`${keyStr} ${String(value)}`)
    }
  }
}

function levelFromEnv(): LogLevel {
  const envLevel = process.env[LOG_LEVEL_ENV]
  if (!envLevel) return LogLevel.INFO
  return tryParseLogLevel(envLevel) ?? LogLevel.INFO
}

/**
 * Parse a level name case-insensitively, or undefined when it is not one
 */
export function tryParseLogLevel(level: string): LogLevel | undefined {
  switch (level.trim().toUpperCase()) {
    case "ERROR":
      return LogLevel.ERROR
    case "WARN":
      return LogLevel.WARN
    case "INFO":
      return LogLevel.INFO
    case "DEBUG":
      return LogLevel.DEBUG
    case "TRACE":
      return LogLevel.TRACE
    default:
      return undefined
  }
}

export const defaultLogger = new Logger()
