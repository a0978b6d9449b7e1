import { describe, it, expect, vi } from 'vitest'

import { CancelledError, NonTransientError, TransientError } from '../errors.js'
import { RetryPolicy } from '../http/retryPolicy.js'

const noDelay = { baseDelayMs: 0, maxDelayMs: 0, jitter: 0 }

describe('RetryPolicy', () => {
  describe('delayFor', () => {
    it('should double the delay up to the maximum', () => {
      const policy = new RetryPolicy({ baseDelayMs: 100, maxDelayMs: 350, jitter: 0 })

      expect([1, 2, 3, 4].map((attempt) => policy.delayFor(attempt))).toEqual([100, 200, 350, 350])
    })

    it('should spread the delay by the jitter factor', () => {
      const low = new RetryPolicy({ baseDelayMs: 1000, jitter: 0.2 }, () => 0)
      const high = new RetryPolicy({ baseDelayMs: 1000, jitter: 0.2 }, () => 1)

      expect(low.delayFor(1)).toBe(800)
      expect(high.delayFor(1)).toBe(1200)
    })
  })

  it('should reject an invalid attempt budget', () => {
    expect(() => new RetryPolicy({ maxAttempts: 0 })).toThrow(RangeError)
  })

  it('should return the first successful result', async () => {
    const policy = new RetryPolicy(noDelay)
    const operation = vi
      .fn()
      .mockRejectedValueOnce(new TransientError('timeout'))
      .mockResolvedValueOnce('page')

    await expect(policy.execute(operation)).resolves.toBe('page')
    expect(operation).toHaveBeenCalledTimes(2)
    expect(operation).toHaveBeenNthCalledWith(2, 2)
  })

  it('should give up after maxAttempts transient failures', async () => {
    const policy = new RetryPolicy({ ...noDelay, maxAttempts: 3 })
    const failure = new TransientError('HTTP 503', { status: 503 })
    const operation = vi.fn().mockRejectedValue(failure)

    await expect(policy.execute(operation)).rejects.toBe(failure)
    expect(operation).toHaveBeenCalledTimes(3)
  })

  it('should not retry non-transient failures', async () => {
    const policy = new RetryPolicy(noDelay)
    const operation = vi.fn().mockRejectedValue(new NonTransientError('HTTP 404', 404))

    await expect(policy.execute(operation)).rejects.toBeInstanceOf(NonTransientError)
    expect(operation).toHaveBeenCalledTimes(1)
  })

  it('should count throttling against its own budget', async () => {
    const policy = new RetryPolicy({ ...noDelay, maxAttempts: 1, maxThrottleRetries: 2 })
    const throttled = new TransientError('HTTP 429', { status: 429, throttled: true, retryAfterMs: 0 })
    const operation = vi
      .fn()
      .mockRejectedValueOnce(throttled)
      .mockRejectedValueOnce(throttled)
      .mockResolvedValueOnce('ok')

    await expect(policy.execute(operation)).resolves.toBe('ok')
    expect(operation).toHaveBeenCalledTimes(3)
  })

  it('should stop once the throttle budget is spent', async () => {
    const policy = new RetryPolicy({ ...noDelay, maxThrottleRetries: 1 })
    const throttled = new TransientError('HTTP 429', { status: 429, throttled: true, retryAfterMs: 0 })
    const operation = vi.fn().mockRejectedValue(throttled)

    await expect(policy.execute(operation)).rejects.toBe(throttled)
    expect(operation).toHaveBeenCalledTimes(2)
  })

  it('should honor Retry-After before retrying a throttled call', async () => {
    vi.useFakeTimers()
    try {
      const policy = new RetryPolicy(noDelay)
      const operation = vi
        .fn()
        .mockRejectedValueOnce(new TransientError('HTTP 429', { throttled: true, retryAfterMs: 2000 }))
        .mockResolvedValueOnce('ok')

      const result = policy.execute(operation)
      await vi.advanceTimersByTimeAsync(1999)
      expect(operation).toHaveBeenCalledTimes(1)
      await vi.advanceTimersByTimeAsync(1)
      await expect(result).resolves.toBe('ok')
      expect(operation).toHaveBeenCalledTimes(2)
    } finally {
      vi.useRealTimers()
    }
  })

  it('should stop waiting when cancelled', async () => {
    const policy = new RetryPolicy({ baseDelayMs: 60_000, maxDelayMs: 60_000, jitter: 0 })
    const controller = new AbortController()
    const operation = vi.fn().mockImplementation(async () => {
      setTimeout(() => controller.abort(), 0)
      throw new TransientError('timeout')
    })

    await expect(policy.execute(operation, controller.signal)).rejects.toBeInstanceOf(CancelledError)
    expect(operation).toHaveBeenCalledTimes(1)
  })
})
