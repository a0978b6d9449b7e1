import { ConfigError, NonTransientError, TransientError } from '../errors.js'
import { logger } from '../logger.js'
import {
  failureFromRequestError,
  failureFromStatus,
  type HttpClient,
} from '../http/httpClient.js'
import type { Coordinates } from '../types/types.js'

export interface GeocodeCandidate {
  coordinates: Coordinates
  /** 0..1, derived from the provider's precision indicator */
  confidence: number
  provider: string
}

/**
 * One remote geocoding service. Throws TransientError / NonTransientError on failure,
 * returns null when the service found nothing.
 */
export interface GeocodeProvider {
  readonly name: string
  geocode(query: string, signal?: AbortSignal): Promise<GeocodeCandidate | null>
}

export type GeocoderName = 'google' | 'yandex' | 'none'

export interface ProviderOptions {
  apiKey: string
  timeoutMs: number
  /** Appended to every query to keep results inside one country */
  region: string
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function field(value: unknown, ...path: string[]): unknown {
  let current = value
  for (const key of path) {
    if (!isRecord(current)) return undefined
    current = current[key]
  }
  return current
}

function withRegion(query: string, region: string): string {
  return region ? `${query}, ${region}` : query
}

abstract class HttpGeocodeProvider implements GeocodeProvider {
  abstract readonly name: string
  protected abstract readonly endpoint: string

  constructor(
    protected readonly http: HttpClient,
    protected readonly options: ProviderOptions,
  ) {}

  async geocode(query: string, signal?: AbortSignal): Promise<GeocodeCandidate | null> {
    let payload: unknown
    try {
      const response = await this.http.get(this.endpoint, {
        params: this.params(query),
        timeout: this.options.timeoutMs,
        signal,
        validateStatus: () => true,
      })
      if (response.status < 200 || response.status >= 300) {
        throw failureFromStatus(response.status, this.endpoint, response.headers['retry-after'])
      }
      payload = response.data
    } catch (error) {
      if (error instanceof TransientError || error instanceof NonTransientError) throw error
      throw failureFromRequestError(error, this.endpoint, signal)
    }

    return this.pick(query, payload)
  }

  protected abstract params(query: string): Record<string, string | number>

  protected abstract pick(query: string, payload: unknown): GeocodeCandidate | null
}

const GOOGLE_LOCATION_TYPE_SCORE: Record<string, number> = {
  ROOFTOP: 1.0,
  RANGE_INTERPOLATED: 0.8,
  GEOMETRIC_CENTER: 0.6,
  APPROXIMATE: 0.4,
}

/**
 * Google Geocoding API. Confidence comes from geometry.location_type.
 */
export class GoogleGeocoder extends HttpGeocodeProvider {
  readonly name = 'google'
  protected readonly endpoint = 'https://maps.googleapis.com/maps/api/geocode/json'

  protected params(query: string): Record<string, string | number> {
    return {
      address: withRegion(query, this.options.region),
      key: this.options.apiKey,
      language: 'ru',
    }
  }

  protected pick(query: string, payload: unknown): GeocodeCandidate | null {
    const status = field(payload, 'status')
    if (status === 'ZERO_RESULTS') return null
    if (status === 'OVER_QUERY_LIMIT') {
      throw new TransientError('Google geocoder quota exceeded', { throttled: true })
    }
    if (status !== 'OK') {
      throw new NonTransientError(`Google geocoder answered ${String(status)}`)
    }

    const results = field(payload, 'results')
    if (!Array.isArray(results) || results.length === 0) return null
    if (results.length > 1) {
      logger.info(`Google geocoder returned ${results.length} candidates for '${query}'`)
    }

    let best: GeocodeCandidate | null = null
    for (const result of results) {
      const lat = field(result, 'geometry', 'location', 'lat')
      const lon = field(result, 'geometry', 'location', 'lng')
      if (typeof lat !== 'number' || typeof lon !== 'number') continue

      const locationType = field(result, 'geometry', 'location_type')
      const confidence =
        typeof locationType === 'string' ? (GOOGLE_LOCATION_TYPE_SCORE[locationType] ?? 0.1) : 0.4
      if (!best || confidence > best.confidence) {
        best = { coordinates: { lat, lon }, confidence, provider: this.name }
      }
    }
    return best
  }
}

const YANDEX_PRECISION_SCORE: Record<string, number> = {
  exact: 1.0,
  number: 0.9,
  near: 0.8,
  street: 0.6,
  other: 0.4,
}

/**
 * Yandex Geocoder HTTP API. Confidence comes from GeocoderMetaData.precision.
 */
export class YandexGeocoder extends HttpGeocodeProvider {
  readonly name = 'yandex'
  protected readonly endpoint = 'https://geocode-maps.yandex.ru/1.x/'

  protected params(query: string): Record<string, string | number> {
    return {
      apikey: this.options.apiKey,
      format: 'json',
      lang: 'ru_RU',
      results: 5,
      geocode: withRegion(query, this.options.region),
    }
  }

  protected pick(query: string, payload: unknown): GeocodeCandidate | null {
    const members = field(payload, 'response', 'GeoObjectCollection', 'featureMember')
    if (!Array.isArray(members) || members.length === 0) return null
    if (members.length > 1) {
      logger.info(`Yandex geocoder returned ${members.length} candidates for '${query}'`)
    }

    let best: GeocodeCandidate | null = null
    for (const member of members) {
      const pos = field(member, 'GeoObject', 'Point', 'pos')
      if (typeof pos !== 'string') continue

      // "lon lat"
      const [lon, lat] = pos.trim().split(/\s+/).map(Number)
      if (!Number.isFinite(lat) || !Number.isFinite(lon)) continue

      const precision = field(member, 'GeoObject', 'metaDataProperty', 'GeocoderMetaData', 'precision')
      const confidence =
        typeof precision === 'string' ? (YANDEX_PRECISION_SCORE[precision] ?? 0.3) : 0.4
      if (!best || confidence > best.confidence) {
        best = { coordinates: { lat, lon }, confidence, provider: this.name }
      }
    }
    return best
  }
}

/**
 * Builds the provider named by configuration
 * @returns null for 'none', which switches geocoding off
 */
export function createGeocodeProvider(
  name: GeocoderName,
  http: HttpClient,
  options: ProviderOptions,
): GeocodeProvider | null {
  if (name === 'none') return null
  if (!options.apiKey) {
    throw new ConfigError(`GEOCODER_PROVIDER=${name} needs an API key`)
  }
  return name === 'google' ? new GoogleGeocoder(http, options) : new YandexGeocoder(http, options)
}
