import { mkdirSync, mkdtempSync, readFileSync, rmSync } from 'fs'
import { tmpdir } from 'os'
import { join } from 'path'
import { describe, it, expect, beforeEach, vi, afterEach, type MockInstance } from 'vitest'
import {
  logger,
  createLogger,
  silentLogger,
  LogLevel,
  getLogAggregator,
  setLogAggregator,
  MemoryLogAggregator,
  FileLogAggregator,
  formatLogEntry,
  type LogAggregator,
} from '../src/utils/logger.js'

describe('Logger', () => {
  let consoleWarnSpy: MockInstance<typeof console.warn>
  let consoleErrorSpy: MockInstance<typeof console.error>
  let consoleInfoSpy: MockInstance<typeof console.info>
  let consoleDebugSpy: MockInstance<typeof console.debug>
  let originalAggregator: LogAggregator
  let aggregator: MemoryLogAggregator

  const lastLog = () => {
    const logs = getLogAggregator().getLogs()
    return logs[logs.length - 1]
  }

  const firstErrorLine = (): string => String(consoleErrorSpy.mock.calls[0]?.[0])

  beforeEach(() => {
    consoleWarnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {})
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    consoleInfoSpy = vi.spyOn(console, 'info').mockImplementation(() => {})
    consoleDebugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {})

    process.env.NODE_ENV = 'test'
    delete process.env.DEBUG
    delete process.env.LOG_FORMAT
    delete process.env.LOG_LEVEL

    originalAggregator = getLogAggregator()
    aggregator = new MemoryLogAggregator()
    setLogAggregator(aggregator)
  })

  afterEach(() => {
    vi.restoreAllMocks()
    setLogAggregator(originalAggregator)
  })

  describe('Basic Logging', () => {
    it('should log error messages in test mode', () => {
      logger.error('Test error')
      expect(consoleErrorSpy).toHaveBeenCalledWith(
        expect.stringContaining('[cvmatch] Test error')
      )
    })

    it('should suppress warn messages in test mode', () => {
      logger.warn('Test warning')
      expect(consoleWarnSpy).not.toHaveBeenCalled()
    })

    it('should suppress info and debug messages without DEBUG', () => {
      logger.info('Test info')
      logger.debug('Test debug')
      expect(consoleInfoSpy).not.toHaveBeenCalled()
      expect(consoleDebugSpy).not.toHaveBeenCalled()
    })

    it('should log info and debug messages with DEBUG=true', () => {
      process.env.DEBUG = 'true'
      const debugLogger = createLogger('test')
      debugLogger.info('Test info')
      debugLogger.debug('Test debug')
      expect(consoleInfoSpy).toHaveBeenCalledWith('[cvmatch:test] Test info')
      expect(consoleDebugSpy).toHaveBeenCalledWith('[cvmatch:test] Test debug')
    })
  })

  describe('Context Injection', () => {
    it('should include context in log entries', () => {
      logger.error('Error with context', undefined, { cvId: 'CV_1', stage: 'match' })
      expect(lastLog()?.context).toEqual({ cvId: 'CV_1', stage: 'match' })
    })

    it('should include error object in log entries', () => {
      const error = new Error('Tagger failure')
      logger.error('Failed to analyse', error)
      expect(lastLog()?.error).toBe(error)
    })

    it('should format context in human-readable output', () => {
      process.env.NODE_ENV = 'development'
      const devLogger = createLogger('test')
      devLogger.warn('Warning with context', { flags: 1 })
      expect(consoleWarnSpy).toHaveBeenCalledWith('[cvmatch:test] Warning with context {"flags":1}')
    })
  })

  describe('Structured JSON Logging', () => {
    it('should output JSON format when LOG_FORMAT=json', () => {
      process.env.LOG_FORMAT = 'json'
      const jsonLogger = createLogger('test')
      jsonLogger.error('JSON error', new Error('test'))

      const parsed: unknown = JSON.parse(firstErrorLine())
      expect(parsed).toMatchObject({
        level: 'ERROR',
        namespace: 'test',
        message: 'JSON error',
        error: { message: 'test' },
      })
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1)
    })

    it('should include timestamp in JSON format', () => {
      process.env.LOG_FORMAT = 'json'
      createLogger('test').error('Test')
      expect(JSON.parse(firstErrorLine())).toMatchObject({
        timestamp: expect.stringMatching(/^\d{4}-\d{2}-\d{2}T/),
      })
    })
  })

  describe('Log Levels', () => {
    it('should respect LOG_LEVEL environment variable', () => {
      process.env.LOG_LEVEL = String(LogLevel.ERROR)
      process.env.NODE_ENV = 'development'
      const levelLogger = createLogger('test')

      levelLogger.warn('Should not log')
      levelLogger.error('Should log')

      expect(consoleWarnSpy).not.toHaveBeenCalled()
      expect(consoleErrorSpy).toHaveBeenCalled()
    })

    it('should handle numeric log levels correctly', () => {
      expect(LogLevel.DEBUG).toBe(0)
      expect(LogLevel.INFO).toBe(1)
      expect(LogLevel.WARN).toBe(2)
      expect(LogLevel.ERROR).toBe(3)
    })
  })

  describe('Namespaced Logger', () => {
    it('should maintain namespace in aggregated logs', () => {
      createLogger('SkillExtractor').warn('Test')
      expect(lastLog()?.namespace).toBe('SkillExtractor')
    })
  })

  describe('Silent Logger', () => {
    it('should not output or aggregate anything', () => {
      silentLogger.warn('Silent warn')
      silentLogger.error('Silent error')
      expect(consoleErrorSpy).not.toHaveBeenCalled()
      expect(aggregator.getLogs()).toEqual([])
    })
  })

  describe('Log Aggregation', () => {
    it('should aggregate suppressed entries too', () => {
      logger.warn('Warn message')
      logger.error('Error message')
      logger.info('Info message')

      expect(aggregator.getLogs().map((entry) => entry.level)).toEqual([
        LogLevel.WARN,
        LogLevel.ERROR,
        LogLevel.INFO,
      ])
    })

    it('should limit aggregator size', () => {
      const bounded = new MemoryLogAggregator(3)
      setLogAggregator(bounded)
      for (let i = 0; i < 5; i++) {
        logger.warn(`Warn ${i}`)
      }
      expect(bounded.getLogs().map((entry) => entry.message)).toEqual([
        'Warn 2',
        'Warn 3',
        'Warn 4',
      ])
    })

    it('should provide copies of logs to prevent external mutation', () => {
      logger.warn('Original')
      const logs1 = aggregator.getLogs()
      const logs2 = aggregator.getLogs()
      expect(logs1).not.toBe(logs2)
      expect(logs1).toEqual(logs2)
    })

    it('should allow setting a custom aggregator', () => {
      const custom: LogAggregator = { add: vi.fn(), getLogs: vi.fn(() => []) }
      setLogAggregator(custom)
      logger.warn('Routed')
      expect(custom.add).toHaveBeenCalledWith(expect.objectContaining({ message: 'Routed' }))
    })
  })

  describe('FileLogAggregator', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'cvmatch-logs-'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('should append entries as JSON lines', () => {
      const fileAggregator = new FileLogAggregator(join(dir, 'nested'))
      setLogAggregator(fileAggregator)

      createLogger('Ranker').warn('first', { n: 1 })
      createLogger('Ranker').info('second')

      const lines = readFileSync(fileAggregator.filePath, 'utf-8').trim().split('\n')
      expect(lines).toHaveLength(2)
      expect(JSON.parse(lines[0] ?? '')).toMatchObject({
        level: 'WARN',
        namespace: 'Ranker',
        message: 'first',
        context: { n: 1 },
      })
      expect(fileAggregator.filePath).toBe(join(dir, 'nested', 'cvmatch.log'))
    })

    it('should keep logging in memory when the file cannot be written', () => {
      const fileAggregator = new FileLogAggregator(dir)
      mkdirSync(fileAggregator.filePath)
      setLogAggregator(fileAggregator)

      const log = createLogger('SkillExtractor')
      expect(() => log.warn('first')).not.toThrow()
      expect(() => log.error('second', new Error('boom'))).not.toThrow()

      expect(fileAggregator.hasWriteFailed).toBe(true)
      expect(fileAggregator.getLogs().map((entry) => entry.message)).toEqual(['first', 'second'])
      expect(firstErrorLine()).toMatch(/^\[cvmatch\] Cannot write log file .*cvmatch\.log: EISDIR/)
    })
  })

  describe('formatLogEntry', () => {
    it('should format without a namespace', () => {
      expect(
        formatLogEntry(
          { level: LogLevel.WARN, timestamp: '2024-01-01T00:00:00.000Z', message: 'plain' },
          false
        )
      ).toBe('[cvmatch] plain')
    })
  })
})
