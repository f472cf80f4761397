import chalk from 'chalk'

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  [LogLevel.DEBUG]: chalk.blue,
  [LogLevel.INFO]: chalk.green,
  [LogLevel.WARN]: chalk.yellow,
  [LogLevel.ERROR]: chalk.red,
}

export interface LoggerOptions {
  /** Overrides LOG_LEVEL and the test-mode silence. */
  minLevel?: LogLevel
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value)
}

/**
 * LOG_LEVEL wins when set. Otherwise tests stay quiet and everything else
 * logs from INFO up.
 */
function resolveMinLevel(): LogLevel | null {
  const configured = process.env.LOG_LEVEL?.toUpperCase()
  if (configured && isLogLevel(configured)) {
    return configured
  }
  if (process.env.NODE_ENV === 'test') {
    return null
  }
  return LogLevel.INFO
}

function formatArg(arg: unknown): string {
  if (arg instanceof Error) {
    return arg.stack || arg.message
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg, null, 2)
    } catch {
      return String(arg)
    }
  }
  return String(arg)
}

export class Logger {
  private readonly module: string
  private readonly minLevel?: LogLevel

  constructor(module: string, options: LoggerOptions = {}) {
    this.module = module
    this.minLevel = options.minLevel
  }

  private shouldLog(level: LogLevel): boolean {
    const minLevel = this.minLevel ?? resolveMinLevel()
    if (minLevel === null) return false
    return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel]
  }

  private log(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) return

    const timestamp = new Date().toISOString()
    const prefix = `${chalk.gray(`[${timestamp}]`)} ${LEVEL_COLORS[level](`[${level}]`)} ${chalk.cyan(`[${this.module}]`)}`
    const line = [prefix, message, ...args.map(formatArg)].join(' ')

    if (level === LogLevel.ERROR) {
      console.error(line)
    } else if (level === LogLevel.WARN) {
      console.warn(line)
    } else {
      console.log(line)
    }
  }

  debug(message: string, ...args: unknown[]) {
    this.log(LogLevel.DEBUG, message, args)
  }

  info(message: string, ...args: unknown[]) {
    this.log(LogLevel.INFO, message, args)
  }

  warn(message: string, ...args: unknown[]) {
    this.log(LogLevel.WARN, message, args)
  }

  error(message: string, ...args: unknown[]) {
    this.log(LogLevel.ERROR, message, args)
  }
}

export function createLogger(module: string, options: LoggerOptions = {}): Logger {
  return new Logger(module, options)
}
