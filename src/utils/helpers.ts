import { createHash } from 'node:crypto'

import { CancelledError } from '../errors.js'

/**
 * Collapses runs of whitespace and trims the result
 */
export function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * SHA-256 of the JSON form of the given values, in order
 */
export function contentHash(values: unknown[]): string {
  return createHash('sha256').update(JSON.stringify(values)).digest('hex')
}

/**
 * Waits for `ms` milliseconds. Rejects with CancelledError as soon as `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) return Promise.reject(new CancelledError())

  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer)
      reject(new CancelledError())
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Throws CancelledError when the signal has already aborted
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) throw new CancelledError()
}
