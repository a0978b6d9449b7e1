import { randomUUID } from 'node:crypto'

import pLimit from 'p-limit'

import type { CrawlerConfig } from './config.js'
import { Database } from './database.js'
import { Deduplicator } from './dedup/deduplicator.js'
import {
  AccessDeniedError,
  CancelledError,
  CrawlerError,
  GeocodeError,
  errorMessage,
} from './errors.js'
import { GeocodeCache } from './geocoding/geocodeCache.js'
import { createGeocodeProvider } from './geocoding/providers.js'
import { AccessPolicy } from './http/accessPolicy.js'
import { Fetcher, type PageFetcher } from './http/fetcher.js'
import { createHttpClient } from './http/httpClient.js'
import { RateLimiter } from './http/rateLimiter.js'
import { RetryPolicy } from './http/retryPolicy.js'
import { logger } from './logger.js'
import { XenForoListingParser, type ForumListingParser } from './parsing/forumListingParser.js'
import { topicPageUrl } from './parsing/markup.js'
import { titleAsPlaceName, type PlaceNamePolicy } from './parsing/placeName.js'
import { XenForoTopicPageParser, type TopicPageParser } from './parsing/topicPageParser.js'
import type {
  CrawlerOptions,
  CrawlRun,
  ForumStore,
  PipelineState,
  RunStage,
  RunTrigger,
  Topic,
  TopicPageParseResult,
  TopicStub,
} from './types/types.js'
import { throwIfCancelled } from './utils/helpers.js'

const DAY_MS = 24 * 60 * 60 * 1000

export interface PipelineDependencies {
  store: ForumStore
  fetcher: PageFetcher
  listingParser: ForumListingParser
  topicParser: TopicPageParser
  deduplicator: Deduplicator
  /** null switches the geocoding stage off */
  geocoder: GeocodeCache | null
  placeNamePolicy: PlaceNamePolicy
  options: CrawlerOptions
  /** Receives every finished run */
  onReport?: (run: CrawlRun) => void
  now?: () => Date
}

function emptyRun(trigger: RunTrigger, startedAt: Date): CrawlRun {
  return {
    runId: randomUUID(),
    trigger,
    startedAt,
    finishedAt: null,
    status: 'completed',
    pagesFetched: 0,
    pagesSkipped: 0,
    topicsSeen: 0,
    topicsUpserted: 0,
    postsUpserted: 0,
    postsUnchanged: 0,
    postsSkippedDeleted: 0,
    geocodeCalls: 0,
    geocodeUpdated: 0,
    geocodeRejected: 0,
    parseWarnings: 0,
    errors: [],
  }
}

function summarize(run: CrawlRun): string {
  return (
    `Run ${run.runId} (${run.trigger}) ${run.status}: ` +
    `pages=${run.pagesFetched} skipped=${run.pagesSkipped} topics=${run.topicsSeen} ` +
    `topicsUpserted=${run.topicsUpserted} postsUpserted=${run.postsUpserted} ` +
    `postsUnchanged=${run.postsUnchanged} postsDeleted=${run.postsSkippedDeleted} ` +
    `geocodeCalls=${run.geocodeCalls} geocoded=${run.geocodeUpdated} ` +
    `rejected=${run.geocodeRejected} warnings=${run.parseWarnings} errors=${run.errors.length}`
  )
}

/**
 * One crawl of the forum section: listing pages, then every topic's pages, then geocoding of
 * stale topics. Holds no state between runs beyond what the store and the geocode cache keep.
 */
export class IngestionPipeline {
  private currentState: PipelineState = 'Idle'
  private readonly store: ForumStore
  private readonly fetcher: PageFetcher
  private readonly listingParser: ForumListingParser
  private readonly topicParser: TopicPageParser
  private readonly deduplicator: Deduplicator
  private readonly geocoder: GeocodeCache | null
  private readonly placeNamePolicy: PlaceNamePolicy
  private readonly options: CrawlerOptions
  private readonly onReport?: (run: CrawlRun) => void
  private readonly now: () => Date

  constructor(deps: PipelineDependencies) {
    this.store = deps.store
    this.fetcher = deps.fetcher
    this.listingParser = deps.listingParser
    this.topicParser = deps.topicParser
    this.deduplicator = deps.deduplicator
    this.geocoder = deps.geocoder
    this.placeNamePolicy = deps.placeNamePolicy
    this.options = deps.options
    this.onReport = deps.onReport
    this.now = deps.now ?? (() => new Date())
  }

  /**
   * Wires the production pipeline from configuration and opens the database
   * @throws ConfigError when the selected geocoder has no API key
   */
  public static async create(
    config: CrawlerConfig,
    onReport?: (run: CrawlRun) => void,
  ): Promise<IngestionPipeline> {
    const http = createHttpClient(config.userAgent, config.httpTimeoutMs)
    const retryPolicy = new RetryPolicy(config.retry)

    const provider = createGeocodeProvider(config.geocoder.provider, http, {
      apiKey: config.geocoder.apiKey,
      timeoutMs: config.httpTimeoutMs,
      region: config.geocoder.region,
    })
    const geocoder = provider
      ? new GeocodeCache(provider, retryPolicy, {
          ttlDays: config.geocoder.ttlDays,
          minConfidence: config.geocoder.minConfidence,
          negativeTtlMs: config.geocoder.negativeTtlMs,
        })
      : null

    const accessPolicy = new AccessPolicy(http, {
      siteUrl: config.forumRootUrl,
      userAgent: config.userAgent,
      timeoutMs: config.httpTimeoutMs,
      refreshIntervalMs: config.robotsRefreshMs,
    })
    const rateLimiter = new RateLimiter({
      requestsPerSecond: config.requestsPerSecond,
      maxConcurrency: config.maxConcurrency,
    })
    const fetcher = new Fetcher(http, accessPolicy, rateLimiter, retryPolicy, {
      timeoutMs: config.httpTimeoutMs,
      sessionCookie: config.sessionCookie,
    })

    const store = await Database.create(config.dbPath)

    return new IngestionPipeline({
      store,
      fetcher,
      listingParser: new XenForoListingParser(),
      topicParser: new XenForoTopicPageParser(),
      deduplicator: new Deduplicator(),
      geocoder,
      placeNamePolicy: titleAsPlaceName,
      options: {
        forumRootUrl: config.forumRootUrl,
        maxForumPages: config.maxForumPages,
        maxTopicPages: config.maxTopicPages,
        maxConcurrency: config.maxConcurrency,
        geocodeTtlDays: config.geocoder.ttlDays,
      },
      onReport,
    })
  }

  get state(): PipelineState {
    return this.currentState
  }

  /**
   * Executes one run. Never throws: failures end up in the returned report.
   * @param signal - Aborting it ends the run with status `cancelled`; committed writes stay
   */
  async run(trigger: RunTrigger = 'manual', signal?: AbortSignal): Promise<CrawlRun> {
    const run = emptyRun(trigger, this.now())

    if (this.currentState !== 'Idle') {
      logger.warn(`Run ${run.runId} refused, pipeline is in state ${this.currentState}`)
      run.status = 'failed'
      run.errors.push({ stage: 'listing', kind: 'Busy', message: 'Another run is in progress' })
      run.finishedAt = this.now()
      return run
    }

    logger.info(`Run ${run.runId} started (${trigger})`)
    const callsBefore = this.geocoder?.providerCalls ?? 0
    let stage: RunStage = 'listing'

    try {
      this.currentState = 'ListingFetch'
      const stubs = await this.fetchListing(run, signal)

      if (stubs === null) {
        run.status = 'failed'
      } else {
        stage = 'topic'
        this.currentState = 'TopicFetch'
        await this.processTopics(stubs, run, signal)

        if (this.geocoder) {
          stage = 'geocode'
          this.currentState = 'GeocodePending'
          await this.geocodeStale(this.geocoder, run, signal)
        }
      }
    } catch (error) {
      if (error instanceof CancelledError || signal?.aborted) {
        run.status = 'cancelled'
      } else {
        run.status = 'failed'
        run.errors.push({ stage, kind: 'Unexpected', message: errorMessage(error) })
        logger.error(`Run ${run.runId} failed during ${stage}: ${errorMessage(error)}`)
      }
    } finally {
      this.currentState = 'Reporting'
      run.geocodeCalls = (this.geocoder?.providerCalls ?? 0) - callsBefore
      run.finishedAt = this.now()
      this.report(run)
      this.currentState = 'Idle'
    }

    return run
  }

  /**
   * Closes the underlying store
   */
  async close(): Promise<void> {
    await this.store.close()
  }

  /**
   * @returns Unique topic stubs, or null when the first page could not be read
   */
  private async fetchListing(run: CrawlRun, signal?: AbortSignal): Promise<TopicStub[] | null> {
    const stubs = new Map<string, TopicStub>()
    const visited = new Set<string>()
    let url: string | null = this.options.forumRootUrl

    for (let page = 1; url && page <= this.options.maxForumPages; page++) {
      if (visited.has(url)) break
      visited.add(url)
      logger.debug(`Listing page ${page}: ${url}`)

      let html: string
      try {
        html = (await this.fetcher.fetch(url, signal)).body
        run.pagesFetched++
      } catch (error) {
        if (error instanceof CancelledError) throw error
        this.recordFailure(run, 'listing', url, error)
        if (page === 1) return null
        break
      }

      const result = this.listingParser.parse(html, url)
      this.recordWarnings(run, url, result.warnings)
      for (const stub of result.records) {
        if (!stubs.has(stub.externalId)) stubs.set(stub.externalId, stub)
      }
      url = result.nextPageUrl
    }

    logger.info(`Found ${stubs.size} topics on ${visited.size} listing page(s)`)
    return [...stubs.values()]
  }

  private async processTopics(
    stubs: TopicStub[],
    run: CrawlRun,
    signal?: AbortSignal,
  ): Promise<void> {
    run.topicsSeen = stubs.length
    await this.inPool(stubs, (stub) => this.processTopic(stub, run, signal), signal)
  }

  private async processTopic(stub: TopicStub, run: CrawlRun, signal?: AbortSignal): Promise<void> {
    throwIfCancelled(signal)
    try {
      const seenAt = this.now()
      const placeName = this.placeNamePolicy(stub.title)
      const existing = await this.store.findTopic(stub.externalId)
      const plan = this.deduplicator.planTopic(stub, placeName, existing, seenAt)

      if (plan.action === 'write') {
        await this.store.upsertTopic(plan.record)
        run.topicsUpserted++
        logger.debug(`Topic ${stub.externalId} ${plan.classification.toLowerCase()}`)
      } else {
        await this.store.touchTopic(stub.externalId, seenAt)
      }

      await this.crawlTopicPages(stub, run, signal)
    } catch (error) {
      if (error instanceof CancelledError) throw error
      this.recordFailure(run, 'topic', stub.url, error)
    }
  }

  /**
   * Reads the newest maxTopicPages pages of a thread, oldest first. The first page is always
   * fetched because its page navigation tells where the thread ends.
   */
  private async crawlTopicPages(stub: TopicStub, run: CrawlRun, signal?: AbortSignal): Promise<void> {
    const first = await this.fetchTopicPage(stub, stub.url, run, signal)
    if (!first) return

    const lastPage = first.lastPage
    const startPage = Math.max(1, lastPage - this.options.maxTopicPages + 1)
    logger.debug(`Topic ${stub.externalId} has ${lastPage} page(s), reading from page ${startPage}`)

    if (startPage === 1) await this.storeTopicPage(stub.url, first, run, signal)

    for (let page = Math.max(2, startPage); page <= lastPage; page++) {
      const url = topicPageUrl(stub.url, page)
      const result = await this.fetchTopicPage(stub, url, run, signal)
      if (!result) return
      await this.storeTopicPage(url, result, run, signal)
    }
  }

  /**
   * @returns The parsed page, or null when it could not be fetched
   */
  private async fetchTopicPage(
    stub: TopicStub,
    url: string,
    run: CrawlRun,
    signal?: AbortSignal,
  ): Promise<TopicPageParseResult | null> {
    logger.debug(`Topic ${stub.externalId}: ${url}`)
    let html: string
    try {
      html = (await this.fetcher.fetch(url, signal)).body
      run.pagesFetched++
    } catch (error) {
      if (error instanceof CancelledError) throw error
      this.recordFailure(run, 'topic', url, error)
      return null
    }
    return this.topicParser.parse(html, url, stub.externalId)
  }

  private async storeTopicPage(
    url: string,
    result: TopicPageParseResult,
    run: CrawlRun,
    signal?: AbortSignal,
  ): Promise<void> {
    this.recordWarnings(run, url, result.warnings)

    // Posts of one topic are written in page order
    for (const post of result.records) {
      throwIfCancelled(signal)
      const existing = await this.store.findPost(post.externalId)
      const plan = this.deduplicator.planPost(post, existing, this.now())
      if (plan.action === 'write') {
        await this.store.upsertPost(plan.record)
        run.postsUpserted++
      } else if (plan.reason === 'deleted') {
        run.postsSkippedDeleted++
      } else {
        run.postsUnchanged++
      }
    }
  }

  private async geocodeStale(
    geocoder: GeocodeCache,
    run: CrawlRun,
    signal?: AbortSignal,
  ): Promise<void> {
    geocoder.prune()
    const staleBefore = new Date(this.now().getTime() - this.options.geocodeTtlDays * DAY_MS)
    const topics = await this.store.topicsNeedingGeocode(staleBefore)
    if (topics.length === 0) return

    logger.info(`Geocoding ${topics.length} topic(s) with ${geocoder.providerName}`)
    await this.inPool(topics, (topic) => this.geocodeTopic(geocoder, topic, run, signal), signal)
  }

  private async geocodeTopic(
    geocoder: GeocodeCache,
    topic: Topic,
    run: CrawlRun,
    signal?: AbortSignal,
  ): Promise<void> {
    throwIfCancelled(signal)
    try {
      const resolution = await geocoder.resolve(topic.placeName, signal)
      await this.store.upsertTopic({
        ...topic,
        coordinates: resolution.coordinates,
        geocodeConfidence: resolution.confidence,
        geocodeProvider: resolution.provider,
        geocodedAt: this.now(),
      })
      run.geocodeUpdated++
    } catch (error) {
      if (error instanceof CancelledError) throw error
      if (error instanceof GeocodeError && error.reason === 'LowConfidence') {
        run.geocodeRejected++
        logger.info(`Topic ${topic.externalId} left without coordinates: ${error.message}`)
        return
      }
      this.recordFailure(run, 'geocode', topic.url, error)
    }
  }

  /**
   * Runs `work` over `items` with at most maxConcurrency in flight, waiting for all of them
   * even when one is cancelled
   */
  private async inPool<T>(
    items: T[],
    work: (item: T) => Promise<void>,
    signal?: AbortSignal,
  ): Promise<void> {
    const limit = pLimit(this.options.maxConcurrency)
    const results = await Promise.allSettled(items.map((item) => limit(() => work(item))))
    throwIfCancelled(signal)
    for (const result of results) {
      if (result.status === 'rejected') throw result.reason
    }
  }

  private recordFailure(run: CrawlRun, stage: RunStage, url: string, error: unknown): void {
    if (error instanceof AccessDeniedError) {
      run.pagesSkipped++
    } else {
      logger.error(`[${stage}] ${url}: ${errorMessage(error)}`)
    }
    run.errors.push({
      stage,
      kind: error instanceof CrawlerError ? error.kind : 'Unexpected',
      url,
      message: errorMessage(error),
    })
  }

  private recordWarnings(run: CrawlRun, url: string, warnings: string[]): void {
    for (const warning of warnings) {
      logger.warn(`${url}: ${warning}`)
    }
    run.parseWarnings += warnings.length
  }

  private report(run: CrawlRun): void {
    logger.info(summarize(run))
    if (!this.onReport) return
    try {
      this.onReport(run)
    } catch (error) {
      logger.error(`Run report handler failed: ${errorMessage(error)}`)
    }
  }
}
