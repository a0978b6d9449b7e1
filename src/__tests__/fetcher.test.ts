import { AxiosError } from 'axios'
import { describe, it, expect, vi, beforeEach } from 'vitest'

import {
  AccessDeniedError,
  CancelledError,
  NonTransientError,
  PageFailedError,
  TransientError,
} from '../errors.js'
import { AccessPolicy } from '../http/accessPolicy.js'
import { buildSessionCookie, Fetcher } from '../http/fetcher.js'
import { failureFromRequestError, parseRetryAfter } from '../http/httpClient.js'
import { RateLimiter } from '../http/rateLimiter.js'
import { RetryPolicy } from '../http/retryPolicy.js'

const SITE = 'https://forum.test'
const PAGE = `${SITE}/forum/threads/pond.1/`

function response(status: number, data: string = '', headers: Record<string, string> = {}) {
  return { status, data, headers }
}

describe('Fetcher', () => {
  const http = { get: vi.fn() }
  const pages = vi.fn()

  const createFetcher = (sessionCookie = '') =>
    new Fetcher(
      http,
      new AccessPolicy(http, {
        siteUrl: SITE,
        userAgent: 'PondCrawler/1.0',
        timeoutMs: 1000,
        refreshIntervalMs: 60_000,
      }),
      new RateLimiter({ requestsPerSecond: 1000, maxConcurrency: 2 }),
      new RetryPolicy({ maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitter: 0 }),
      { timeoutMs: 1000, sessionCookie },
    )

  beforeEach(() => {
    vi.clearAllMocks()
    pages.mockReset()
    http.get.mockImplementation(async (url: string) =>
      url === `${SITE}/robots.txt` ? response(200, 'User-agent: *\nDisallow: /private/') : pages(url),
    )
  })

  it('should return the page body', async () => {
    pages.mockResolvedValue(response(200, '<html>pond</html>'))

    const result = await createFetcher().fetch(PAGE)

    expect(result).toEqual({ status: 200, body: '<html>pond</html>', url: PAGE })
  })

  it('should send the session cookie with every page request', async () => {
    pages.mockResolvedValue(response(200, 'ok'))

    await createFetcher('xf_session=test-session').fetch(PAGE)

    expect(http.get).toHaveBeenCalledWith(
      PAGE,
      expect.objectContaining({
        responseType: 'text',
        timeout: 1000,
        headers: { Cookie: 'xf_session=test-session' },
      }),
    )
  })

  it('should refuse URLs robots.txt disallows without requesting them', async () => {
    await expect(createFetcher().fetch(`${SITE}/private/page`)).rejects.toBeInstanceOf(
      AccessDeniedError,
    )
    expect(pages).not.toHaveBeenCalled()
  })

  it('should retry server errors', async () => {
    pages.mockResolvedValueOnce(response(503)).mockResolvedValueOnce(response(200, 'ok'))

    const result = await createFetcher().fetch(PAGE)

    expect(result.body).toBe('ok')
    expect(pages).toHaveBeenCalledTimes(2)
  })

  it('should retry after 429 with Retry-After', async () => {
    pages
      .mockResolvedValueOnce(response(429, '', { 'retry-after': '0' }))
      .mockResolvedValueOnce(response(200, 'ok'))

    await expect(createFetcher().fetch(PAGE)).resolves.toMatchObject({ body: 'ok' })
    expect(pages).toHaveBeenCalledTimes(2)
  })

  it('should retry dropped connections', async () => {
    pages
      .mockRejectedValueOnce(new AxiosError('socket hang up', 'ECONNRESET'))
      .mockResolvedValueOnce(response(200, 'ok'))

    await expect(createFetcher().fetch(PAGE)).resolves.toMatchObject({ body: 'ok' })
  })

  it('should fail at once on a client error', async () => {
    pages.mockResolvedValue(response(404))

    const error = await createFetcher()
      .fetch(PAGE)
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(PageFailedError)
    if (!(error instanceof PageFailedError)) return
    expect(error.attempts).toBe(1)
    expect(error.failure).toBeInstanceOf(NonTransientError)
    expect(error.failure.status).toBe(404)
  })

  it('should fail after the retry budget is spent', async () => {
    pages.mockResolvedValue(response(500))

    const error = await createFetcher()
      .fetch(PAGE)
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(PageFailedError)
    if (!(error instanceof PageFailedError)) return
    expect(error.attempts).toBe(3)
    expect(error.failure).toBeInstanceOf(TransientError)
    expect(pages).toHaveBeenCalledTimes(3)
  })

  it('should reject malformed URLs without any request', async () => {
    const error = await createFetcher()
      .fetch('not a url')
      .catch((e: unknown) => e)

    expect(error).toBeInstanceOf(PageFailedError)
    expect(http.get).not.toHaveBeenCalled()
  })

  it('should not wrap cancellation', async () => {
    const controller = new AbortController()
    controller.abort()

    await expect(createFetcher().fetch(PAGE, controller.signal)).rejects.toBeInstanceOf(
      CancelledError,
    )
    expect(pages).not.toHaveBeenCalled()
  })
})

describe('buildSessionCookie', () => {
  it('should prefix a bare value with the cookie name', () => {
    expect(buildSessionCookie(' test-session ', 'xf_session')).toBe('xf_session=test-session')
  })

  it('should keep a full cookie string as is', () => {
    expect(buildSessionCookie('a=1; b=2', 'xf_session')).toBe('a=1; b=2')
  })

  it('should be empty without a value', () => {
    expect(buildSessionCookie('  ', 'xf_session')).toBe('')
  })
})

describe('http error mapping', () => {
  it('should read Retry-After in seconds and as a date', () => {
    const now = Date.parse('2024-05-01T10:00:00.000Z')

    expect(parseRetryAfter('5', now)).toBe(5000)
    expect(parseRetryAfter('Wed, 01 May 2024 10:00:30 GMT', now)).toBe(30_000)
    expect(parseRetryAfter('soon', now)).toBeNull()
    expect(parseRetryAfter(undefined, now)).toBeNull()
  })

  it('should treat unknown error codes as permanent', () => {
    const error = failureFromRequestError(new AxiosError('bad', 'ERR_BAD_OPTION'), PAGE)
    expect(error).toBeInstanceOf(NonTransientError)
  })

  it('should treat timeouts as transient', () => {
    const error = failureFromRequestError(new AxiosError('timeout', 'ECONNABORTED'), PAGE)
    expect(error).toBeInstanceOf(TransientError)
  })
})
