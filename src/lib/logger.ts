/**
 * Leveled console logger for the engine.
 *
 * The threshold comes from `WORKLOG_LOG_LEVEL` (debug | info | warn | error, default warn).
 * Every entry is also kept in a bounded history, whatever the threshold, so callers can
 * show what happened during the last run.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface LogEntry {
  level: LogLevel
  message: string
  data?: unknown
  timestamp: string
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 }

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error'
}

export class Logger {
  private threshold: LogLevel
  private history: LogEntry[] = []

  constructor(
    level?: LogLevel,
    private readonly maxHistorySize = 200
  ) {
    const fromEnv = process.env.WORKLOG_LOG_LEVEL?.toLowerCase()
    this.threshold = level ?? (isLogLevel(fromEnv) ? fromEnv : 'warn')
  }

  setLevel(level: LogLevel): void {
    this.threshold = level
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    const entry: LogEntry = { level, message, data, timestamp: new Date().toISOString() }
    this.history.push(entry)
    if (this.history.length > this.maxHistorySize) this.history.shift()

    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) return

    const line = `[worklog] [${level.toUpperCase()}] ${message}`
    const extra = data === undefined ? [] : [data]
    switch (level) {
      case 'debug':
        console.debug(line, ...extra)
        break
      case 'info':
        console.info(line, ...extra)
        break
      case 'warn':
        console.warn(line, ...extra)
        break
      case 'error':
        console.error(line, ...extra)
        break
    }
  }

  debug(message: string, data?: unknown): void {
    this.log('debug', message, data)
  }

  info(message: string, data?: unknown): void {
    this.log('info', message, data)
  }

  warn(message: string, data?: unknown): void {
    this.log('warn', message, data)
  }

  error(message: string, error?: unknown): void {
    const data = error instanceof Error ? { message: error.message, stack: error.stack } : error
    this.log('error', message, data)
  }

  getHistory(level?: LogLevel): LogEntry[] {
    return level ? this.history.filter(e => e.level === level) : [...this.history]
  }

  clearHistory(): void {
    this.history = []
  }
}

export const logger = new Logger()
