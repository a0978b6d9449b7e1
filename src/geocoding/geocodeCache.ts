import { CancelledError, GeocodeError, errorMessage } from '../errors.js'
import type { RetryPolicy } from '../http/retryPolicy.js'
import { logger } from '../logger.js'
import type { Coordinates } from '../types/types.js'
import { cleanText } from '../utils/helpers.js'
import type { GeocodeCandidate, GeocodeProvider } from './providers.js'

const DAY_MS = 24 * 60 * 60 * 1000

export interface GeocodeCacheOptions {
  ttlDays: number
  /** Results scoring below this are rejected */
  minConfidence: number
  /** How long a rejected lookup is remembered before the provider is asked again */
  negativeTtlMs: number
}

export interface GeocodeResolution {
  coordinates: Coordinates
  confidence: number
  provider: string
}

type CacheEntry =
  | { kind: 'hit'; result: GeocodeResolution; expiresAt: number }
  | { kind: 'rejected'; confidence: number | null; expiresAt: number }

/**
 * Trimmed, whitespace-collapsed, lower-cased
 */
export function normalizePlaceName(placeName: string): string {
  return cleanText(placeName).toLocaleLowerCase()
}

/**
 * The only way the crawler talks to a geocoding provider. Results are cached per normalized
 * place name; concurrent lookups of one name share a single provider call.
 */
export class GeocodeCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly inFlight = new Map<string, Promise<CacheEntry>>()
  private calls = 0

  constructor(
    private readonly provider: GeocodeProvider,
    private readonly retryPolicy: RetryPolicy,
    private readonly options: GeocodeCacheOptions,
    private readonly now: () => number = Date.now,
  ) {}

  /** Provider calls made so far (one per lookup, retries not counted) */
  get providerCalls(): number {
    return this.calls
  }

  get providerName(): string {
    return this.provider.name
  }

  /**
   * @throws GeocodeError with reason LowConfidence when nothing good enough was found
   * @throws GeocodeError with reason ProviderFailure when the provider could not be reached
   * @throws CancelledError when `signal` aborts
   */
  async resolve(placeName: string, signal?: AbortSignal): Promise<GeocodeResolution> {
    const key = normalizePlaceName(placeName)
    if (!key) {
      throw new GeocodeError(placeName, 'LowConfidence', 'Empty place name', null)
    }

    const cached = this.entries.get(key)
    if (cached && cached.expiresAt > this.now()) {
      logger.debug(`Geocode cache hit for '${key}'`)
      return this.unwrap(placeName, cached)
    }

    let pending = this.inFlight.get(key)
    if (!pending) {
      pending = this.lookup(key, cleanText(placeName), signal).finally(() => {
        this.inFlight.delete(key)
      })
      this.inFlight.set(key, pending)
    }

    return this.unwrap(placeName, await pending)
  }

  /**
   * Drops entries that have expired
   */
  prune(): number {
    const now = this.now()
    let removed = 0
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(key)
        removed++
      }
    }
    return removed
  }

  private async lookup(key: string, query: string, signal?: AbortSignal): Promise<CacheEntry> {
    this.calls++
    let candidate: GeocodeCandidate | null
    try {
      candidate = await this.retryPolicy.execute(
        () => this.provider.geocode(query, signal),
        signal,
        `geocode '${query}'`,
      )
    } catch (error) {
      if (error instanceof CancelledError) throw error
      throw new GeocodeError(
        query,
        'ProviderFailure',
        `Geocoding '${query}' with ${this.provider.name} failed: ${errorMessage(error)}`,
        null,
        { cause: error },
      )
    }

    const now = this.now()
    let entry: CacheEntry
    if (candidate && candidate.confidence >= this.options.minConfidence) {
      entry = {
        kind: 'hit',
        result: {
          coordinates: candidate.coordinates,
          confidence: candidate.confidence,
          provider: candidate.provider,
        },
        expiresAt: now + this.options.ttlDays * DAY_MS,
      }
    } else {
      entry = {
        kind: 'rejected',
        confidence: candidate?.confidence ?? null,
        expiresAt: now + this.options.negativeTtlMs,
      }
    }

    this.entries.set(key, entry)
    return entry
  }

  private unwrap(placeName: string, entry: CacheEntry): GeocodeResolution {
    if (entry.kind === 'hit') return entry.result

    const message =
      entry.confidence === null
        ? `No geocode result for '${placeName}'`
        : `Geocode confidence ${entry.confidence} for '${placeName}' is below ${this.options.minConfidence}`
    throw new GeocodeError(placeName, 'LowConfidence', message, entry.confidence)
  }
}
