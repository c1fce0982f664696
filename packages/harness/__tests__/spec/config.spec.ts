/**
 * Configuration & Logging Tests
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import { ConfigurationError, Logger, createLogger, loadHarnessConfig, parseHarnessConfig } from '../../src'

describe('Harness configuration', () => {
  it('should apply defaults', () => {
    expect(parseHarnessConfig({})).toEqual({ logLevel: 'warn', nameProperty: 'name' })
  })

  it('should read settings from the environment', () => {
    const config = loadHarnessConfig({
      GRAPHCHECK_LOG_LEVEL: 'debug',
      GRAPHCHECK_DATA_DIR: '/tmp/graphs',
      GRAPHCHECK_NAME_PROPERTY: 'title',
    })

    expect(config).toEqual({ logLevel: 'debug', dataDir: '/tmp/graphs', nameProperty: 'title' })
  })

  it('should treat blank variables as unset', () => {
    expect(loadHarnessConfig({ GRAPHCHECK_LOG_LEVEL: '', GRAPHCHECK_DATA_DIR: '  ' })).toEqual({
      logLevel: 'warn',
      nameProperty: 'name',
    })
  })

  it('should list every invalid setting', () => {
    let error: unknown
    try {
      parseHarnessConfig({ logLevel: 'loud', nameProperty: '' })
    } catch (thrown) {
      error = thrown
    }

    expect(error).toBeInstanceOf(ConfigurationError)
    if (!(error instanceof ConfigurationError)) return
    expect(error.issues).toHaveLength(2)
    expect(error.issues[0]).toMatch(/^logLevel: /)
    expect(error.issues[1]).toMatch(/^nameProperty: /)
    expect(error.message).toMatch(/^Invalid harness configuration: logLevel: /)
  })
})

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should drop messages below its level', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined)
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    const logger = createLogger({ level: 'warn' })

    logger.info('hidden')
    logger.warn('shown')

    expect(info).not.toHaveBeenCalled()
    expect(warn).toHaveBeenCalledWith('[warn] shown')
  })

  it('should prefix context and append data', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined)
    const logger = new Logger({ level: 'debug', context: 'harness' }).child('memory')

    logger.debug('opened', { graph: 'suite-test' })

    expect(logger.context).toBe('harness:memory')
    expect(debug).toHaveBeenCalledWith('[debug] (harness:memory) opened {"graph":"suite-test"}')
  })

  it('should log nothing when silent', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    createLogger({ level: 'silent' }).error('hidden')
    expect(error).not.toHaveBeenCalled()
  })
})
