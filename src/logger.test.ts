import { afterEach, describe, expect, it, vi } from 'vitest'
import { ConsoleLogger, MemoryLogger } from './logger'

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('hides dim lines unless verbose and sends problems to stderr', () => {
    const out = vi.spyOn(console, 'log').mockImplementation(() => undefined)
    const err = vi.spyOn(console, 'error').mockImplementation(() => undefined)

    const quiet = new ConsoleLogger()
    quiet.log('details', 'dim')
    quiet.log('progress')
    quiet.log('careful', 'warn')

    expect(out).toHaveBeenCalledTimes(1)
    expect(out.mock.calls[0]?.[0]).toMatch(/ — progress$/)
    expect(err).toHaveBeenCalledTimes(1)
    expect(err.mock.calls[0]?.[0]).toMatch(/ — careful$/)

    new ConsoleLogger(true).log('details', 'dim')
    expect(out).toHaveBeenCalledTimes(2)
  })
})

describe('MemoryLogger', () => {
  it('filters messages by level', () => {
    const logger = new MemoryLogger()
    logger.log('a')
    logger.log('b', 'warn')
    expect(logger.messages()).toEqual(['a', 'b'])
    expect(logger.messages('warn')).toEqual(['b'])
  })
})
