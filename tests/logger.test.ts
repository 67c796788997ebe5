/**
 * Logger 测试
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { createLogger, isLogMode, logError, setLogLevel, setLogMode } from '../src/shared/logger.js'

afterEach(() => {
  vi.restoreAllMocks()
  setLogMode('foreground')
})

describe('createLogger', () => {
  it('should drop messages below the current level', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
    setLogLevel('warn')

    const logger = createLogger('runner')
    logger.info('hidden')
    logger.warn('shown')

    expect(stderr).toHaveBeenCalledTimes(1)
    expect(String(stderr.mock.calls[0]?.[0])).toContain('shown')
  })

  it('should keep stdout free for data', () => {
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {})
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
    setLogLevel('debug')

    createLogger('matrix').info('expanded')

    expect(stdout).not.toHaveBeenCalled()
    expect(stderr).toHaveBeenCalledTimes(1)
  })

  it('should include the scope in background mode only', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
    setLogLevel('debug')
    const logger = createLogger('matrix')

    setLogMode('foreground')
    logger.info('first')
    setLogMode('background')
    logger.info('second')

    expect(String(stderr.mock.calls[0]?.[0])).not.toContain('[matrix]')
    expect(String(stderr.mock.calls[1]?.[0])).toContain('[matrix]')
  })

  it('should print nothing when silent', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
    setLogLevel('silent')
    createLogger('x').error('quiet')
    expect(stderr).not.toHaveBeenCalled()
  })
})

describe('isLogMode', () => {
  it('should accept only the two log modes', () => {
    expect(isLogMode('background')).toBe(true)
    expect(isLogMode('foreground')).toBe(true)
    expect(isLogMode('ci')).toBe(false)
  })
})

describe('logError', () => {
  it('should append the message and pass defined context', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {})
    setLogLevel('error')

    logError(createLogger('pipeline'), 'Case failed', 'boom', { caseId: 'abc', side: undefined })

    expect(String(stderr.mock.calls[0]?.[0])).toContain('Case failed: boom')
    expect(stderr.mock.calls[0]?.[1]).toEqual({ caseId: 'abc' })
  })
})
