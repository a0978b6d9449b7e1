export type ErrorKind =
  | 'AccessDenied'
  | 'Transient'
  | 'NonTransient'
  | 'PageFailed'
  | 'LowConfidence'
  | 'GeocodeProvider'
  | 'Cancelled'
  | 'Config'

/**
 * Base class for every failure the crawler raises on purpose
 */
export abstract class CrawlerError extends Error {
  abstract readonly kind: ErrorKind

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = this.constructor.name
  }
}

/**
 * robots.txt does not allow the crawler to fetch the URL. Never retried.
 */
export class AccessDeniedError extends CrawlerError {
  readonly kind = 'AccessDenied'

  constructor(readonly url: string) {
    super(`Blocked by robots.txt: ${url}`)
  }
}

/**
 * A failure worth retrying: timeouts, dropped connections, 5xx and 429.
 * `throttled` marks a 429 (or a provider quota answer), which has its own retry budget.
 */
export class TransientError extends CrawlerError {
  readonly kind = 'Transient'
  readonly status: number | null
  readonly throttled: boolean
  readonly retryAfterMs: number | null

  constructor(
    message: string,
    details: { status?: number | null; throttled?: boolean; retryAfterMs?: number | null } = {},
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.status = details.status ?? null
    this.throttled = details.throttled ?? false
    this.retryAfterMs = details.retryAfterMs ?? null
  }
}

export class NonTransientError extends CrawlerError {
  readonly kind = 'NonTransient'
  readonly status: number | null

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super(message, options)
    this.status = status
  }
}

/**
 * A page could not be fetched: either a non-transient failure or the retry budget ran out
 */
export class PageFailedError extends CrawlerError {
  readonly kind = 'PageFailed'

  constructor(
    readonly url: string,
    readonly failure: TransientError | NonTransientError,
    readonly attempts: number,
  ) {
    super(`Failed to fetch ${url} after ${attempts} attempt(s): ${failure.message}`, {
      cause: failure,
    })
  }
}

export class CancelledError extends CrawlerError {
  readonly kind = 'Cancelled'

  constructor(message = 'Operation cancelled') {
    super(message)
  }
}

export type GeocodeFailureReason = 'LowConfidence' | 'ProviderFailure'

export class GeocodeError extends CrawlerError {
  readonly kind: 'LowConfidence' | 'GeocodeProvider'

  constructor(
    readonly placeName: string,
    readonly reason: GeocodeFailureReason,
    message: string,
    readonly confidence: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.kind = reason === 'LowConfidence' ? 'LowConfidence' : 'GeocodeProvider'
  }
}

export class ConfigError extends CrawlerError {
  readonly kind = 'Config'
}

/**
 * Extracts a readable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}
