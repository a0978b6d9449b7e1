import pLimit, { type LimitFunction } from 'p-limit'
import { RateLimiterMemory, RateLimiterQueue } from 'rate-limiter-flexible'

import { CancelledError } from '../errors.js'
import { logger } from '../logger.js'

export interface RateLimiterOptions {
  /** Sustained request rate, > 0 */
  requestsPerSecond: number
  /** Ceiling on permits held at once, integer >= 1 */
  maxConcurrency: number
}

/**
 * Proof of a granted slot; hand it back through release()
 */
export interface Permit {
  readonly id: number
}

/**
 * Bounds outgoing requests by rate and by concurrency.
 * Both waits are FIFO, so callers are served in the order they asked.
 */
export class RateLimiter {
  private readonly slots: LimitFunction
  private readonly tokens: RateLimiterQueue
  private readonly held = new Map<number, () => void>()
  private nextPermitId = 1

  constructor(options: RateLimiterOptions) {
    if (!(options.requestsPerSecond > 0) || !Number.isFinite(options.requestsPerSecond)) {
      throw new RangeError(`requestsPerSecond must be > 0, got ${options.requestsPerSecond}`)
    }
    if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
      throw new RangeError(`maxConcurrency must be an integer >= 1, got ${options.maxConcurrency}`)
    }

    this.slots = pLimit(options.maxConcurrency)
    // One token per 1/rps seconds: consecutive requests are never closer than that
    const bucket = new RateLimiterMemory({
      points: 1,
      duration: 1 / options.requestsPerSecond,
    })
    this.tokens = new RateLimiterQueue(bucket)
  }

  /** Permits currently held */
  get inFlight(): number {
    return this.held.size
  }

  /** Callers waiting for a concurrency slot */
  get waiting(): number {
    return this.slots.pendingCount
  }

  /**
   * Waits for a concurrency slot, then for a rate token
   * @param signal - Cancels the wait; anything already taken is given back
   */
  async acquire(signal?: AbortSignal): Promise<Permit> {
    if (signal?.aborted) throw new CancelledError()

    const releaseSlot = await this.waitForSlot(signal)

    try {
      await this.tokens.removeTokens(1)
    } catch (error) {
      releaseSlot()
      throw error
    }

    if (signal?.aborted) {
      releaseSlot()
      throw new CancelledError()
    }

    const permit: Permit = { id: this.nextPermitId++ }
    this.held.set(permit.id, releaseSlot)
    return permit
  }

  /**
   * Frees the concurrency slot behind a permit. Releasing twice is a no-op.
   */
  release(permit: Permit): void {
    const releaseSlot = this.held.get(permit.id)
    if (!releaseSlot) {
      logger.debug(`Permit ${permit.id} released more than once`)
      return
    }
    this.held.delete(permit.id)
    releaseSlot()
  }

  /**
   * Rejects as soon as `signal` aborts; a slot granted afterwards is handed straight back
   */
  private waitForSlot(signal?: AbortSignal): Promise<() => void> {
    const slot = this.takeSlot()
    if (!signal) return slot

    return new Promise((resolve, reject) => {
      const onAbort = () => reject(new CancelledError())
      signal.addEventListener('abort', onAbort, { once: true })
      void slot.then((releaseSlot) => {
        signal.removeEventListener('abort', onAbort)
        if (signal.aborted) {
          releaseSlot()
          reject(new CancelledError())
        } else {
          resolve(releaseSlot)
        }
      })
    })
  }

  private takeSlot(): Promise<() => void> {
    return new Promise((resolve) => {
      // The limited task stays pending until the permit is released
      void this.slots(() => new Promise<void>((release) => resolve(() => release())))
    })
  }
}
