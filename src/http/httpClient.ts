import axios, { type AxiosInstance } from 'axios'

import {
  CancelledError,
  CrawlerError,
  NonTransientError,
  TransientError,
} from '../errors.js'

/**
 * The slice of axios the crawler needs; tests hand in a fake with the same shape
 */
export type HttpClient = Pick<AxiosInstance, 'get'>

const TRANSIENT_ERROR_CODES = new Set([
  'ECONNABORTED',
  'ETIMEDOUT',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'EAI_AGAIN',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'ERR_NETWORK',
])

/**
 * Creates the shared axios instance
 * @param userAgent - Sent with every request
 * @param timeoutMs - Per-attempt timeout
 */
export function createHttpClient(userAgent: string, timeoutMs: number): HttpClient {
  return axios.create({
    timeout: timeoutMs,
    headers: { 'User-Agent': userAgent },
    maxRedirects: 5,
  })
}

/**
 * Reads a Retry-After header: either delta-seconds or an HTTP date
 * @returns Milliseconds to wait, or null when the header is absent or unreadable
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return Math.max(0, value * 1000)
  if (typeof value !== 'string' || value.trim() === '') return null

  const trimmed = value.trim()
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000

  const date = Date.parse(trimmed)
  if (Number.isNaN(date)) return null
  return Math.max(0, date - now)
}

/**
 * Maps a non-2xx HTTP status to the retry taxonomy
 */
export function failureFromStatus(
  status: number,
  url: string,
  retryAfter?: unknown,
): TransientError | NonTransientError {
  if (status === 429) {
    return new TransientError(`HTTP 429 from ${url}`, {
      status,
      throttled: true,
      retryAfterMs: parseRetryAfter(retryAfter),
    })
  }
  if (status >= 500) return new TransientError(`HTTP ${status} from ${url}`, { status })
  return new NonTransientError(`HTTP ${status} from ${url}`, status)
}

/**
 * Maps anything thrown by an axios call to the retry taxonomy
 */
export function failureFromRequestError(
  error: unknown,
  url: string,
  signal?: AbortSignal,
): CrawlerError {
  if (signal?.aborted || axios.isCancel(error)) return new CancelledError(`Request to ${url} cancelled`)
  if (error instanceof CrawlerError) return error

  if (axios.isAxiosError(error)) {
    if (error.response) {
      return failureFromStatus(error.response.status, url, error.response.headers['retry-after'])
    }
    if (error.code === 'ERR_INVALID_URL') {
      return new NonTransientError(`Malformed URL ${url}`, null, { cause: error })
    }
    if (error.code === undefined || TRANSIENT_ERROR_CODES.has(error.code)) {
      return new TransientError(`${error.code ?? 'Network error'} for ${url}: ${error.message}`, {}, {
        cause: error,
      })
    }
    return new NonTransientError(`${error.code} for ${url}: ${error.message}`, null, { cause: error })
  }

  const message = error instanceof Error ? error.message : String(error)
  return new NonTransientError(`Request to ${url} failed: ${message}`, null, { cause: error })
}
