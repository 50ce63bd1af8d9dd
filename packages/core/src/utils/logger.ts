/**
 * Logger Utility
 *
 * Structured, namespaced logging with environment-aware verbosity. Every
 * entry is also handed to a pluggable aggregator (in-memory by default, a
 * JSON-lines file when a log directory is configured).
 */

import { appendFileSync, mkdirSync } from 'fs'
import { join } from 'path'

/**
 * Log severity levels
 */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/**
 * Structured log entry
 */
export interface LogEntry {
  level: LogLevel
  timestamp: string
  namespace?: string
  message: string
  context?: Record<string, unknown>
  error?: Error
}

/**
 * Log aggregator interface
 */
export interface LogAggregator {
  /** Add a log entry to the aggregator */
  add(entry: LogEntry): void
  /** Get all retained logs */
  getLogs(): LogEntry[]
}

/**
 * Logger interface
 */
export interface Logger {
  warn: (message: string, context?: Record<string, unknown>) => void
  error: (message: string, error?: Error, context?: Record<string, unknown>) => void
  info: (message: string, context?: Record<string, unknown>) => void
  debug: (message: string, context?: Record<string, unknown>) => void
}

/**
 * In-memory log aggregator (bounded)
 */
export class MemoryLogAggregator implements LogAggregator {
  private logs: LogEntry[] = []
  private maxSize: number

  constructor(maxSize = 10000) {
    this.maxSize = maxSize
  }

  add(entry: LogEntry): void {
    this.logs.push(entry)
    if (this.logs.length > this.maxSize) {
      this.logs.shift()
    }
  }

  getLogs(): LogEntry[] {
    return [...this.logs]
  }

  clear(): void {
    this.logs = []
  }
}

/**
 * Appends every entry as one JSON line to `<logDir>/cvmatch.log`, keeping
 * the most recent entries in memory as well. A failed write is reported once
 * on stderr and never reaches the caller of the logger.
 */
export class FileLogAggregator extends MemoryLogAggregator {
  readonly filePath: string
  private writeFailed = false

  constructor(logDir: string, fileName = 'cvmatch.log', maxSize = 1000) {
    super(maxSize)
    mkdirSync(logDir, { recursive: true })
    this.filePath = join(logDir, fileName)
  }

  override add(entry: LogEntry): void {
    super.add(entry)
    try {
      appendFileSync(this.filePath, formatLogEntry(entry, true) + '\n', 'utf-8')
    } catch (error) {
      if (!this.writeFailed) {
        this.writeFailed = true
        const reason = error instanceof Error ? error.message : String(error)
        console.error(`[cvmatch] Cannot write log file ${this.filePath}: ${reason}`)
      }
    }
  }

  /** True once an append to the log file has failed */
  get hasWriteFailed(): boolean {
    return this.writeFailed
  }
}

/**
 * Global log aggregator instance
 */
let globalAggregator: LogAggregator = new MemoryLogAggregator()

/**
 * Set the global log aggregator
 */
export function setLogAggregator(aggregator: LogAggregator): void {
  globalAggregator = aggregator
}

/**
 * Get the global log aggregator
 */
export function getLogAggregator(): LogAggregator {
  return globalAggregator
}

/**
 * Format log entry for output
 */
export function formatLogEntry(entry: LogEntry, useJson: boolean): string {
  if (useJson) {
    return JSON.stringify({
      level: LogLevel[entry.level],
      timestamp: entry.timestamp,
      namespace: entry.namespace,
      message: entry.message,
      context: entry.context,
      error: entry.error
        ? {
            message: entry.error.message,
            stack: entry.error.stack,
          }
        : undefined,
    })
  }

  const prefix = entry.namespace ? `[cvmatch:${entry.namespace}]` : '[cvmatch]'
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : ''
  return `${prefix} ${entry.message}${contextStr}`
}

/**
 * Create a logger instance
 */
function createLoggerInstance(namespace?: string): Logger {
  const useJson = process.env.LOG_FORMAT === 'json'
  const minLevel = process.env.LOG_LEVEL ? parseInt(process.env.LOG_LEVEL, 10) : LogLevel.WARN

  const shouldLog = (level: LogLevel): boolean => {
    // Test runs keep stdout clean; errors still show
    if (process.env.NODE_ENV === 'test' && level === LogLevel.WARN) {
      return false
    }
    if (level === LogLevel.DEBUG || level === LogLevel.INFO) {
      return !!process.env.DEBUG
    }
    return level >= minLevel
  }

  const createLogEntry = (
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: Error
  ): LogEntry => ({
    level,
    timestamp: new Date().toISOString(),
    namespace,
    message,
    context,
    error,
  })

  return {
    warn: (message: string, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.WARN, message, context)
      if (shouldLog(LogLevel.WARN)) {
        console.warn(formatLogEntry(entry, useJson))
      }
      globalAggregator.add(entry)
    },

    error: (message: string, error?: Error, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.ERROR, message, context, error)
      if (shouldLog(LogLevel.ERROR)) {
        console.error(formatLogEntry(entry, useJson))
        if (error && !useJson) {
          console.error(error)
        }
      }
      globalAggregator.add(entry)
    },

    info: (message: string, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.INFO, message, context)
      if (shouldLog(LogLevel.INFO)) {
        console.info(formatLogEntry(entry, useJson))
      }
      globalAggregator.add(entry)
    },

    debug: (message: string, context?: Record<string, unknown>) => {
      const entry = createLogEntry(LogLevel.DEBUG, message, context)
      if (shouldLog(LogLevel.DEBUG)) {
        console.debug(formatLogEntry(entry, useJson))
      }
      globalAggregator.add(entry)
    },
  }
}

/**
 * Default logger instance
 *
 * Environment variables:
 * - NODE_ENV=test: Suppress warn output
 * - DEBUG=true: Enable info and debug output
 * - LOG_FORMAT=json: Output logs in JSON format
 * - LOG_LEVEL=0-3: Minimum log level to output
 *
 * @example
 * ```typescript
 * logger.info('Ranked candidates', { count: 3 })
 * logger.error('Similarity failed', new Error('dimension mismatch'))
 * ```
 */
export const logger: Logger = createLoggerInstance()

/**
 * Create a namespaced logger
 *
 * @example
 * ```typescript
 * const log = createLogger('SkillExtractor')
 * log.warn('No text provided for skill extraction')
 * ```
 */
export function createLogger(namespace: string): Logger {
  return createLoggerInstance(namespace)
}

/**
 * No-op logger for testing or silent operation
 */
export const silentLogger: Logger = {
  warn: () => {},
  error: () => {},
  info: () => {},
  debug: () => {},
}
