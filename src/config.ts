import { ConfigError } from './errors.js'
import { buildSessionCookie } from './http/fetcher.js'
import type { RetryPolicyOptions } from './http/retryPolicy.js'
import type { GeocoderName } from './geocoding/providers.js'
import { LogLevel, parseLogLevel } from './logger.js'

type EnvSource = Record<string, string | undefined>

/**
 * Everything the crawler reads from the environment, already parsed
 */
export interface CrawlerConfig {
  forumRootUrl: string
  maxForumPages: number
  maxTopicPages: number
  fetchIntervalSeconds: number
  maxConcurrency: number
  requestsPerSecond: number
  httpTimeoutMs: number
  /** Ready-to-send Cookie header value, empty when no session is configured */
  sessionCookie: string
  userAgent: string
  robotsRefreshMs: number
  retry: RetryPolicyOptions
  geocoder: {
    provider: GeocoderName
    apiKey: string
    region: string
    ttlDays: number
    negativeTtlMs: number
    minConfidence: number
  }
  dbPath: string
  logLevel: LogLevel
}

const DEFAULT_FORUM_ROOT_URL = 'https://www.rusfishing.ru/forum/forums/platnyye-prudy.63/'

const GEOCODERS: readonly GeocoderName[] = ['google', 'yandex', 'none']

function isGeocoderName(value: string): value is GeocoderName {
  return GEOCODERS.some((name) => name === value)
}

function stringEnv(env: EnvSource, name: string, defaultValue: string): string {
  const value = env[name]?.trim()
  return value ? value : defaultValue
}

function parseNumericEnv(
  env: EnvSource,
  name: string,
  defaultValue: number,
  { min = 1, integer = true }: { min?: number; integer?: boolean } = {},
): number {
  const raw = env[name]?.trim()
  if (!raw) return defaultValue
  const num = Number(raw)
  if (!Number.isFinite(num) || (integer && !Number.isInteger(num))) {
    throw new ConfigError(`${name} must be ${integer ? 'an integer' : 'a number'}, got '${raw}'`)
  }
  if (num < min) {
    throw new ConfigError(`${name} must be at least ${min}, got ${num}`)
  }
  return num
}

function parseFloatEnv(env: EnvSource, name: string, defaultValue: number, min: number): number {
  return parseNumericEnv(env, name, defaultValue, { min, integer: false })
}

function parseUrlEnv(env: EnvSource, name: string, defaultValue: string): string {
  const value = stringEnv(env, name, defaultValue)
  if (!URL.canParse(value)) {
    throw new ConfigError(`${name} is not a valid URL: '${value}'`)
  }
  const { protocol } = new URL(value)
  if (protocol !== 'http:' && protocol !== 'https:') {
    throw new ConfigError(`${name} must be an http(s) URL, got '${value}'`)
  }
  return value
}

/**
 * Reads the crawler configuration. Callers load `.env` first.
 * @throws ConfigError when a value is present but invalid
 */
export function loadConfig(env: EnvSource = process.env): CrawlerConfig {
  const requestsPerSecond = parseFloatEnv(env, 'REQUESTS_PER_SECOND', 1.5, 0)
  if (requestsPerSecond === 0) {
    throw new ConfigError('REQUESTS_PER_SECOND must be greater than 0')
  }

  const minConfidence = parseFloatEnv(env, 'MIN_GEO_CONFIDENCE', 0.4, 0)
  if (minConfidence > 1) {
    throw new ConfigError(`MIN_GEO_CONFIDENCE must be between 0 and 1, got ${minConfidence}`)
  }

  const provider = stringEnv(env, 'GEOCODER_PROVIDER', 'yandex').toLowerCase()
  if (!isGeocoderName(provider)) {
    throw new ConfigError(
      `GEOCODER_PROVIDER must be one of ${GEOCODERS.join(', ')}, got '${provider}'`,
    )
  }
  const apiKey =
    provider === 'google'
      ? stringEnv(env, 'GOOGLE_GEOCODING_API_KEY', '')
      : provider === 'yandex'
        ? stringEnv(env, 'YANDEX_GEOCODER_API_KEY', '')
        : ''

  const logLevelName = stringEnv(env, 'LOG_LEVEL', 'info')
  const logLevel = parseLogLevel(logLevelName)
  if (logLevel === null) {
    throw new ConfigError(`LOG_LEVEL must be one of debug, info, warn, error, got '${logLevelName}'`)
  }

  return {
    forumRootUrl: parseUrlEnv(env, 'FORUM_ROOT_URL', DEFAULT_FORUM_ROOT_URL),
    maxForumPages: parseNumericEnv(env, 'MAX_FORUM_PAGES', 3),
    maxTopicPages: parseNumericEnv(env, 'MAX_TOPIC_PAGES', 2),
    fetchIntervalSeconds: parseNumericEnv(env, 'FETCH_INTERVAL_SECONDS', 1800),
    maxConcurrency: parseNumericEnv(env, 'MAX_CONCURRENCY', 3),
    requestsPerSecond,
    httpTimeoutMs: parseFloatEnv(env, 'HTTP_TIMEOUT_SECONDS', 20, 0.001) * 1000,
    sessionCookie: buildSessionCookie(
      stringEnv(env, 'FORUM_SESSION_COOKIE', ''),
      stringEnv(env, 'FORUM_SESSION_COOKIE_NAME', 'xf_session'),
    ),
    userAgent: stringEnv(env, 'CRAWLER_USER_AGENT', 'PondCrawler/1.0 (+respects robots.txt)'),
    robotsRefreshMs: parseNumericEnv(env, 'ROBOTS_REFRESH_SECONDS', 3600) * 1000,
    retry: {
      maxAttempts: parseNumericEnv(env, 'RETRY_MAX_ATTEMPTS', 3),
      baseDelayMs: parseNumericEnv(env, 'RETRY_BASE_DELAY_MS', 1000, { min: 0 }),
      maxDelayMs: parseNumericEnv(env, 'RETRY_MAX_DELAY_MS', 30000, { min: 0 }),
      jitter: 0.2,
      maxThrottleRetries: parseNumericEnv(env, 'RETRY_MAX_THROTTLE', 3, { min: 0 }),
    },
    geocoder: {
      provider,
      apiKey,
      region: stringEnv(env, 'GEOCODE_REGION', 'Россия'),
      ttlDays: parseFloatEnv(env, 'GEOCODE_TTL_DAYS', 30, 0),
      negativeTtlMs: parseNumericEnv(env, 'GEOCODE_NEGATIVE_TTL_MINUTES', 60, { min: 0 }) * 60_000,
      minConfidence,
    },
    dbPath: stringEnv(env, 'DB_PATH', './ponds.db'),
    logLevel,
  }
}
