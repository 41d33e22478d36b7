import { BuildParamError } from '../src/errors'
import { calculateBackoff, RetryStrategy } from '../src/retry-strategy'
import { createAxiosError } from './helpers/mock-factory'

jest.mock('../src/logger')

describe('retry-strategy', () => {
  describe('calculateBackoff', () => {
    it('should double the delay per attempt without jitter', () => {
      expect(calculateBackoff({ baseDelayMs: 100, attempt: 0, jitter: false })).toBe(100)
      expect(calculateBackoff({ baseDelayMs: 100, attempt: 3, jitter: false })).toBe(800)
    })

    it('should keep jittered delays between half and the full delay', () => {
      const delay = calculateBackoff({ baseDelayMs: 100, attempt: 1 })
      expect(delay).toBeGreaterThanOrEqual(100)
      expect(delay).toBeLessThanOrEqual(200)
    })
  })

  describe('RetryStrategy', () => {
    const strategy = new RetryStrategy({ maxRetries: 3, baseDelayMs: 0 })

    it('should retry network errors, timeouts, rate limits and server errors', () => {
      expect(strategy.shouldRetry(new Error('socket hang up'))).toBe(true)
      expect(strategy.shouldRetry(createAxiosError('Timeout', 408))).toBe(true)
      expect(strategy.shouldRetry(createAxiosError('Too Many Requests', 429))).toBe(true)
      expect(strategy.shouldRetry(createAxiosError('Internal Server Error', 500))).toBe(true)
    })

    it('should not retry other client errors', () => {
      expect(strategy.shouldRetry(createAxiosError('Not Found', 404))).toBe(false)
    })

    it('should not retry input errors raised by the client itself', () => {
      expect(strategy.shouldRetry(new BuildParamError('bad tag'))).toBe(false)
    })

    it('should return the first successful result', async () => {
      const fn = jest.fn()
        .mockRejectedValueOnce(new Error('socket hang up'))
        .mockResolvedValueOnce('OK')
      await expect(strategy.withRetry(fn)).resolves.toBe('OK')
      expect(fn).toHaveBeenCalledTimes(2)
    })

    it('should give up after maxRetries attempts', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('socket hang up'))
      await expect(strategy.withRetry(fn)).rejects.toThrow('socket hang up')
      expect(fn).toHaveBeenCalledTimes(3)
    })
  })
})
