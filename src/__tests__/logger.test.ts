import { describe, it, expect, vi, afterEach } from 'vitest'

import { Logger, LogLevel, parseLogLevel } from '../logger.js'

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should drop messages below the configured level', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined)
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const logger = new Logger()

    logger.setLevel(LogLevel.WARN)
    logger.debug('hidden')
    logger.warn('shown')

    expect(logger.getLevel()).toBe(LogLevel.WARN)
    expect(debug).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn.mock.calls[0][0]).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] WARN  shown$/)
  })

  it('should parse level names case-insensitively', () => {
    expect(parseLogLevel(' Error ')).toBe(LogLevel.ERROR)
    expect(parseLogLevel('trace')).toBeNull()
  })
})
