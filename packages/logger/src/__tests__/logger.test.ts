import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  createLogger,
  formatPretty,
  getLogFormat,
  getLogLevel,
  setLogFormat,
  setLogLevel,
  setLogSink,
  type LogEntry,
  type LogLevel,
} from '../index.js'

describe('logger', () => {
  let lines: Array<{ level: LogLevel; line: string; entry: LogEntry }>

  beforeEach(() => {
    lines = []
    setLogSink((level, line, entry) => lines.push({ level, line, entry }))
    setLogFormat('json')
    setLogLevel('debug')
  })

  afterEach(() => {
    setLogSink(undefined)
    setLogFormat(undefined)
    setLogLevel(undefined)
  })

  it('emits JSON entries with service, message and metadata', () => {
    createLogger('harvester').info('run started', { sourceId: 'example-fsbo' })

    expect(lines).toHaveLength(1)
    const payload = JSON.parse(lines[0].line) as Record<string, unknown>
    expect(payload.level).toBe('info')
    expect(payload.service).toBe('harvester')
    expect(payload.message).toBe('run started')
    expect(payload.sourceId).toBe('example-fsbo')
    expect(typeof payload.timestamp).toBe('string')
  })

  it('drops entries below the configured level', () => {
    setLogLevel('warn')
    const logger = createLogger('harvester')

    logger.debug('hidden')
    logger.info('hidden')
    logger.warn('shown')
    logger.error('shown too')

    expect(lines.map((l) => l.level)).toEqual(['warn', 'error'])
  })

  it('builds nested component paths for string children', () => {
    const logger = createLogger('harvester').child('fetch').child('retry', { attempt: 2 })
    logger.info('retrying')

    expect(lines[0].entry.component).toBe('fetch:retry')
    expect(lines[0].entry.attempt).toBe(2)
  })

  it('merges context for object children without changing the component', () => {
    const logger = createLogger('harvester').child('orchestrator').child({ runId: 'r1' })
    logger.info('tick', { step: 'fetch' })

    expect(lines[0].entry.component).toBe('orchestrator')
    expect(lines[0].entry.runId).toBe('r1')
    expect(lines[0].entry.step).toBe('fetch')
  })

  it('serializes Error and non-Error values', () => {
    const logger = createLogger('harvester')
    logger.error('boom', {}, new TypeError('bad input'))
    logger.warn('odd', {}, 'plain string')

    expect(lines[0].entry.error?.name).toBe('TypeError')
    expect(lines[0].entry.error?.message).toBe('bad input')
    expect(lines[1].entry.error).toEqual({ name: 'UnknownError', message: 'plain string' })
  })

  it('falls back to environment defaults when overrides are cleared', () => {
    const previousLevel = process.env.LOG_LEVEL
    const previousFormat = process.env.LOG_FORMAT
    setLogLevel(undefined)
    setLogFormat(undefined)
    process.env.LOG_LEVEL = 'ERROR'
    process.env.LOG_FORMAT = 'pretty'

    try {
      expect(getLogLevel()).toBe('error')
      expect(getLogFormat()).toBe('pretty')

      process.env.LOG_LEVEL = 'loud'
      expect(getLogLevel()).toBe('info')
    } finally {
      process.env.LOG_LEVEL = previousLevel
      process.env.LOG_FORMAT = previousFormat
      if (previousLevel === undefined) delete process.env.LOG_LEVEL
      if (previousFormat === undefined) delete process.env.LOG_FORMAT
    }
  })

  it('formats pretty lines with the component path and metadata', () => {
    const line = formatPretty({
      timestamp: '2024-01-01T00:00:00.000Z',
      level: 'info',
      service: 'harvester',
      component: 'export',
      message: 'wrote file',
      rows: 3,
    })

    expect(line).toContain('[harvester:export]')
    expect(line).toContain('wrote file')
    expect(line).toContain('{"rows":3}')
  })
})
