/**
 * A latitude/longitude pair in decimal degrees
 */
export interface Coordinates {
  lat: number
  lon: number
}

/**
 * A topic link found on a forum listing page
 */
export interface TopicStub {
  /** Stable thread id taken from the thread URL */
  externalId: string
  title: string
  url: string
}

/**
 * A forum thread about one pond, as stored
 */
export interface Topic {
  /** Stable thread id, never reassigned */
  externalId: string
  title: string
  /** Name handed to the geocoder */
  placeName: string
  url: string
  coordinates: Coordinates | null
  geocodeConfidence: number | null
  geocodeProvider: string | null
  geocodedAt: Date | null
  lastSeenAt: Date
  /** Hash of the source-owned fields, used to detect changes between crawls */
  contentHash: string
}

/**
 * A file linked or embedded in a post. Only the metadata is kept; files are not downloaded.
 */
export interface PostAttachment {
  /** Absolute URL, unique per post */
  sourceUrl: string
  fileName: string
  isImage: boolean
}

/**
 * A message extracted from a topic page
 */
export interface ParsedPost {
  externalId: string
  topicExternalId: string
  author: string
  body: string
  /** null when the page carried no usable timestamp */
  postedAt: Date | null
  url: string
  attachments: PostAttachment[]
}

/**
 * A post as stored. `deleted` and `deletedAt` belong to the moderation side
 * and are only carried through by the crawler.
 */
export interface Post extends ParsedPost {
  fetchedAt: Date
  contentHash: string
  deleted: boolean
  deletedAt: Date | null
}

/**
 * Storage contract used by the ingestion pipeline. Every call is atomic per record
 * and may be issued concurrently from several workers.
 */
export interface ForumStore {
  findTopic(externalId: string): Promise<Topic | null>
  findPost(externalId: string): Promise<Post | null>
  upsertTopic(topic: Topic): Promise<void>
  /** Writes the post together with its attachments, keyed by (post, source URL) */
  upsertPost(post: Post): Promise<void>
  /** Refreshes last_seen_at without rewriting an unchanged topic */
  touchTopic(externalId: string, seenAt: Date): Promise<void>
  /** Topics without coordinates, or geocoded before `staleBefore` */
  topicsNeedingGeocode(staleBefore: Date): Promise<Topic[]>
  close(): Promise<void>
}

export type PipelineState = 'Idle' | 'ListingFetch' | 'TopicFetch' | 'GeocodePending' | 'Reporting'

export type RunTrigger = 'interval' | 'manual' | 'startup'

export type RunStatus = 'completed' | 'failed' | 'cancelled'

export type RunStage = 'listing' | 'topic' | 'geocode'

export interface RunError {
  stage: RunStage
  kind: string
  url?: string
  message: string
}

/**
 * Summary of one pipeline run, handed to observability once the run ends
 */
export interface CrawlRun {
  runId: string
  trigger: RunTrigger
  startedAt: Date
  finishedAt: Date | null
  status: RunStatus
  pagesFetched: number
  /** Pages robots.txt did not allow */
  pagesSkipped: number
  topicsSeen: number
  topicsUpserted: number
  postsUpserted: number
  postsUnchanged: number
  postsSkippedDeleted: number
  /** Remote geocoding provider calls */
  geocodeCalls: number
  geocodeUpdated: number
  geocodeRejected: number
  parseWarnings: number
  errors: RunError[]
}

/**
 * Options for controlling crawler behavior
 */
export interface CrawlerOptions {
  forumRootUrl: string
  maxForumPages: number
  maxTopicPages: number
  maxConcurrency: number
  geocodeTtlDays: number
}

/**
 * Command line options for the crawler
 */
export interface CommandLineOptions {
  /** Forum section URL, overrides FORUM_ROOT_URL */
  url?: string
  /** Path to the database file */
  dbPath?: string
  /** Run the pipeline once and exit */
  once?: boolean
  /** Enable verbose logging */
  verbose?: boolean
}

/**
 * Output of an HTML page parser
 */
export interface PageParseResult<T> {
  records: T[]
  /** Absolute URL of the following page, or null on the last page */
  nextPageUrl: string | null
  /** Fields that had to be replaced by placeholders */
  warnings: string[]
}

export interface TopicPageParseResult extends PageParseResult<ParsedPost> {
  /** Highest page number in the thread's page navigation, 1 for single-page threads */
  lastPage: number
}
