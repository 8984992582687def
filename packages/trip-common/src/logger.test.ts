import { afterEach, describe, expect, it, vi } from 'vitest'
import { createLogger } from './logger'

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('prefixes messages with the scope', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {})
    createLogger('ingest').info('batch 1 done')
    expect(log).toHaveBeenCalledTimes(1)
    expect(String(log.mock.calls[0][0])).toContain('[ingest]')
    expect(String(log.mock.calls[0][0])).toMatch(/batch 1 done$/)
  })

  it('appends the error message', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {})
    createLogger('analytics').error('Query failed', new Error('disk I/O error'))
    expect(String(error.mock.calls[0][0])).toMatch(/Query failed: disk I\/O error$/)
  })
})
