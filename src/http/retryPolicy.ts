import { TransientError } from '../errors.js'
import { logger } from '../logger.js'
import { sleep, throwIfCancelled } from '../utils/helpers.js'

export interface RetryPolicyOptions {
  /** Attempts allowed for ordinary transient failures, first try included */
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  /** Fraction (0..1) by which each delay is randomly stretched or shrunk */
  jitter: number
  /** Extra attempts allowed for throttling answers (429), on top of maxAttempts */
  maxThrottleRetries: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicyOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
  jitter: 0.2,
  maxThrottleRetries: 3,
}

/**
 * Exponential backoff shared by the page fetcher and the geocoder.
 * Only TransientError is retried; everything else goes straight back to the caller.
 */
export class RetryPolicy {
  readonly options: RetryPolicyOptions
  private readonly random: () => number

  constructor(options: Partial<RetryPolicyOptions> = {}, random: () => number = Math.random) {
    this.options = { ...DEFAULT_RETRY_POLICY, ...options }
    this.random = random

    if (!Number.isInteger(this.options.maxAttempts) || this.options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be an integer >= 1, got ${this.options.maxAttempts}`)
    }
  }

  /**
   * Backoff before retry number `attempt` (1-based)
   */
  delayFor(attempt: number): number {
    const { baseDelayMs, maxDelayMs, jitter } = this.options
    const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, attempt - 1))
    const spread = exponential * jitter * (this.random() * 2 - 1)
    return Math.max(0, Math.round(exponential + spread))
  }

  /**
   * Runs `operation` until it succeeds, throws a non-transient error, or a budget runs out.
   * The error of the last attempt is rethrown as is.
   * @param operation - Receives the 1-based attempt number
   * @param signal - Aborts waiting between attempts
   */
  async execute<T>(
    operation: (attempt: number) => Promise<T>,
    signal?: AbortSignal,
    label: string = 'operation',
  ): Promise<T> {
    let attempt = 0
    let transientFailures = 0
    let throttledFailures = 0

    for (;;) {
      throwIfCancelled(signal)
      attempt++

      try {
        return await operation(attempt)
      } catch (error) {
        if (!(error instanceof TransientError)) throw error

        let waitMs: number
        if (error.throttled) {
          throttledFailures++
          if (throttledFailures > this.options.maxThrottleRetries) throw error
          waitMs = error.retryAfterMs ?? this.delayFor(throttledFailures)
          logger.warn(
            `Throttled on ${label}. Waiting ${waitMs / 1000} seconds before retrying (${throttledFailures}/${this.options.maxThrottleRetries}).`,
          )
        } else {
          transientFailures++
          if (transientFailures >= this.options.maxAttempts) throw error
          waitMs = this.delayFor(transientFailures)
          logger.info(
            `Retrying ${label} in ${waitMs} ms after: ${error.message} (${transientFailures}/${this.options.maxAttempts - 1} retries used)`,
          )
        }

        await sleep(waitMs, signal)
      }
    }
  }
}
