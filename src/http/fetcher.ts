import {
  AccessDeniedError,
  NonTransientError,
  PageFailedError,
  TransientError,
} from '../errors.js'
import { logger } from '../logger.js'
import type { AccessPolicy } from './accessPolicy.js'
import { failureFromRequestError, failureFromStatus, type HttpClient } from './httpClient.js'
import type { RateLimiter } from './rateLimiter.js'
import type { RetryPolicy } from './retryPolicy.js'

export interface FetchResult {
  status: number
  body: string
  url: string
}

/**
 * What the pipeline needs from a page fetcher
 */
export interface PageFetcher {
  fetch(url: string, signal?: AbortSignal): Promise<FetchResult>
}

export interface FetcherOptions {
  timeoutMs: number
  /** Value for the Cookie header, or empty for anonymous crawling */
  sessionCookie?: string
}

/**
 * Builds the Cookie header value from configuration. A bare value gets the cookie name prepended.
 */
export function buildSessionCookie(value: string, cookieName: string): string {
  const trimmed = value.trim()
  if (!trimmed) return ''
  return trimmed.includes('=') ? trimmed : `${cookieName}=${trimmed}`
}

/**
 * Polite HTTP GET: robots.txt check, rate/concurrency permit, timeout and retries.
 */
export class Fetcher implements PageFetcher {
  constructor(
    private readonly http: HttpClient,
    private readonly accessPolicy: AccessPolicy,
    private readonly rateLimiter: RateLimiter,
    private readonly retryPolicy: RetryPolicy,
    private readonly options: FetcherOptions,
  ) {}

  /**
   * Fetches one page
   * @throws AccessDeniedError when robots.txt forbids the URL
   * @throws PageFailedError when the page could not be retrieved
   * @throws CancelledError when `signal` aborts
   */
  async fetch(url: string, signal?: AbortSignal): Promise<FetchResult> {
    if (!URL.canParse(url)) {
      throw new PageFailedError(url, new NonTransientError(`Malformed URL ${url}`), 0)
    }

    if (!(await this.accessPolicy.isAllowed(url))) {
      logger.warn(`Skipping ${url}: disallowed by robots.txt`)
      throw new AccessDeniedError(url)
    }

    let attempts = 0
    try {
      return await this.retryPolicy.execute(
        (attempt) => {
          attempts = attempt
          return this.attempt(url, signal)
        },
        signal,
        url,
      )
    } catch (error) {
      if (error instanceof TransientError || error instanceof NonTransientError) {
        logger.error(`Giving up on ${url} after ${attempts} attempt(s): ${error.message}`)
        throw new PageFailedError(url, error, attempts)
      }
      throw error
    }
  }

  private async attempt(url: string, signal?: AbortSignal): Promise<FetchResult> {
    const permit = await this.rateLimiter.acquire(signal)
    try {
      logger.debug(`GET ${url}`)
      const headers: Record<string, string> = {}
      if (this.options.sessionCookie) headers.Cookie = this.options.sessionCookie

      const response = await this.http.get(url, {
        timeout: this.options.timeoutMs,
        responseType: 'text',
        headers,
        signal,
        validateStatus: () => true,
      })

      if (response.status >= 200 && response.status < 300) {
        const body = typeof response.data === 'string' ? response.data : String(response.data ?? '')
        return { status: response.status, body, url }
      }

      throw failureFromStatus(response.status, url, response.headers['retry-after'])
    } catch (error) {
      if (error instanceof TransientError || error instanceof NonTransientError) throw error
      throw failureFromRequestError(error, url, signal)
    } finally {
      this.rateLimiter.release(permit)
    }
  }
}
