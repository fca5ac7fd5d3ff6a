import { describe, it, expect } from 'vitest'
import { BotError } from '../error.js'
import { getErrorMessage, ensureError } from '../assertError.js'

describe('BotError', () => {
  it('should carry code, category and cause', () => {
    const cause = new TypeError('fetch failed')
    const error = BotError.requestFailed('Send', cause)

    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('BotError')
    expect(error.code).toBe('REQUEST_FAILED')
    expect(error.category).toBe('NETWORK')
    expect(error.message).toBe('Send failed: fetch failed')
    expect(error.cause).toBe(cause)
  })

  it('should build messages from the factory arguments', () => {
    expect(BotError.serverError(502, 'bad gateway').message).toBe('Server returned 502: bad gateway')
    expect(BotError.requestFailed('Edit', 'refused').message).toBe('Edit failed: refused')
    expect(BotError.invalidPayload('not JSON').message).toBe('Malformed response: not JSON')
    expect(BotError.fileNotFound('a.png').code).toBe('FILE_NOT_FOUND')
  })

  it('should pass existing BotErrors through unknown()', () => {
    const original = BotError.fileNotFound('a.png')
    expect(BotError.unknown(original)).toBe(original)

    const wrapped = BotError.unknown('something odd')
    expect(wrapped.code).toBe('UNKNOWN')
    expect(wrapped.message).toBe('something odd')
  })

  it('should include code, message and suggestion in format()', () => {
    const output = BotError.configInvalid('apiKey is required').format()
    expect(output).toContain('code: CONFIG_INVALID')
    expect(output).toContain('Invalid config: apiKey is required')
    expect(output).toContain('CHATPOLL_* environment variables')
  })
})

describe('assertError helpers', () => {
  it('should extract messages from any thrown value', () => {
    expect(getErrorMessage(new Error('x'))).toBe('x')
    expect(getErrorMessage('y')).toBe('y')
    expect(getErrorMessage(42)).toBe('42')
  })

  it('should wrap non-errors', () => {
    const error = new Error('keep')
    expect(ensureError(error)).toBe(error)
    expect(ensureError('text').message).toBe('text')
  })
})
