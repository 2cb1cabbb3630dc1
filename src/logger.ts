// Leveled logger for codec diagnostics

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogEntry {
  level: LogLevel
  message: string
  timestamp: number
  context?: Record<string, unknown>
}

// Stored entries kept per logger; older ones are dropped first
export const DEFAULT_MAX_LOG_ENTRIES = 1000

export class Logger {
  private static instance: Logger | undefined
  private logLevel: LogLevel
  private maxEntries: number
  private logs: LogEntry[] = []

  constructor(level: LogLevel = LogLevel.INFO, maxEntries: number = DEFAULT_MAX_LOG_ENTRIES) {
    this.logLevel = level
    this.maxEntries = Math.max(0, Math.floor(maxEntries))
  }

  // Shared default used when a caller passes no logger
  static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger()
    }
    return Logger.instance
  }

  setLogLevel(level: LogLevel): void {
    this.logLevel = level
  }

  getLogLevel(): LogLevel {
    return this.logLevel
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.logLevel
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return
    }
    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      context,
    }
    if (this.maxEntries > 0) {
      if (this.logs.length >= this.maxEntries) {
        this.logs.splice(0, this.logs.length - this.maxEntries + 1)
      }
      this.logs.push(entry)
    }

    const levelName = LogLevel[level]
    const timestamp = new Date(entry.timestamp).toISOString()
    const contextStr = context ? ` ${JSON.stringify(context)}` : ''

    console.log(`[${timestamp}] ${levelName}: ${message}${contextStr}`)
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context)
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, context)
  }

  getLogs(): LogEntry[] {
    return [...this.logs]
  }

  clearLogs(): void {
    this.logs = []
  }
}
