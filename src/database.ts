import { DuckDBInstance, type DuckDBConnection, type DuckDBValue } from '@duckdb/node-api'
import pLimit, { type LimitFunction } from 'p-limit'

import type { ForumStore, Post, PostAttachment, Topic } from './types/types.js'

type Row = Record<string, DuckDBValue>

const TOPIC_COLUMNS = `
  external_id, title, place_name, url, lat, lon, geocode_confidence, geocode_provider,
  epoch_ms(geocoded_at) AS geocoded_at_ms, epoch_ms(last_seen_at) AS last_seen_at_ms, content_hash
`

const POST_COLUMNS = `
  external_id, topic_external_id, author, body, epoch_ms(posted_at) AS posted_at_ms, url,
  epoch_ms(fetched_at) AS fetched_at_ms, content_hash, deleted, epoch_ms(deleted_at) AS deleted_at_ms
`

function columnError(column: string, value: DuckDBValue | undefined): Error {
  return new Error(`Unexpected value in column ${column}: ${String(value)}`)
}

function text(row: Row, column: string): string {
  const value = row[column]
  if (typeof value !== 'string') throw columnError(column, value)
  return value
}

function optionalText(row: Row, column: string): string | null {
  const value = row[column]
  if (value === null || value === undefined) return null
  return text(row, column)
}

function optionalNumber(row: Row, column: string): number | null {
  const value = row[column]
  if (value === null || value === undefined) return null
  if (typeof value === 'number') return value
  if (typeof value === 'bigint') return Number(value)
  throw columnError(column, value)
}

function optionalDate(row: Row, column: string): Date | null {
  const millis = optionalNumber(row, column)
  return millis === null ? null : new Date(millis)
}

function requiredDate(row: Row, column: string): Date {
  const date = optionalDate(row, column)
  if (!date) throw columnError(column, row[column])
  return date
}

function iso(date: Date | null): string | null {
  return date ? date.toISOString() : null
}

function toTopic(row: Row): Topic {
  const lat = optionalNumber(row, 'lat')
  const lon = optionalNumber(row, 'lon')
  return {
    externalId: text(row, 'external_id'),
    title: text(row, 'title'),
    placeName: text(row, 'place_name'),
    url: text(row, 'url'),
    coordinates: lat !== null && lon !== null ? { lat, lon } : null,
    geocodeConfidence: optionalNumber(row, 'geocode_confidence'),
    geocodeProvider: optionalText(row, 'geocode_provider'),
    geocodedAt: optionalDate(row, 'geocoded_at_ms'),
    lastSeenAt: requiredDate(row, 'last_seen_at_ms'),
    contentHash: text(row, 'content_hash'),
  }
}

function flag(row: Row, column: string): boolean {
  const value = row[column]
  if (typeof value !== 'boolean') throw columnError(column, value)
  return value
}

function toAttachment(row: Row): PostAttachment {
  return {
    sourceUrl: text(row, 'source_url'),
    fileName: text(row, 'file_name'),
    isImage: flag(row, 'is_image'),
  }
}

function toPost(row: Row, attachments: PostAttachment[]): Post {
  return {
    externalId: text(row, 'external_id'),
    topicExternalId: text(row, 'topic_external_id'),
    author: text(row, 'author'),
    body: text(row, 'body'),
    postedAt: optionalDate(row, 'posted_at_ms'),
    url: text(row, 'url'),
    fetchedAt: requiredDate(row, 'fetched_at_ms'),
    contentHash: text(row, 'content_hash'),
    deleted: flag(row, 'deleted'),
    deletedAt: optionalDate(row, 'deleted_at_ms'),
    attachments,
  }
}

/**
 * Topic and post storage in DuckDB, keyed by the forum's external ids.
 * Calls are serialized on one connection, so concurrent workers can share an instance.
 */
export class Database implements ForumStore {
  private readonly exclusive: LimitFunction = pLimit(1)

  private constructor(
    private readonly db: DuckDBInstance,
    private readonly connection: DuckDBConnection,
  ) {}

  /**
   * Opens (or creates) the database file and makes sure the schema exists
   * @param dbPath - Path to the DuckDB database file
   */
  public static async create(dbPath: string = './ponds.db'): Promise<Database> {
    const db = await DuckDBInstance.create(dbPath)
    const connection = await db.connect()
    const instance = new Database(db, connection)
    await instance.init()
    return instance
  }

  private async init(): Promise<void> {
    // deleted / deleted_at are maintained by the moderation tools, never by the crawler
    await this.connection.run(`
      CREATE TABLE IF NOT EXISTS topic (
        external_id VARCHAR PRIMARY KEY,
        title VARCHAR NOT NULL,
        place_name VARCHAR NOT NULL,
        url VARCHAR NOT NULL,
        lat DOUBLE,
        lon DOUBLE,
        geocode_confidence DOUBLE,
        geocode_provider VARCHAR,
        geocoded_at TIMESTAMPTZ,
        last_seen_at TIMESTAMPTZ NOT NULL,
        content_hash VARCHAR NOT NULL
      );

      CREATE TABLE IF NOT EXISTS post (
        external_id VARCHAR PRIMARY KEY,
        topic_external_id VARCHAR NOT NULL,
        author VARCHAR NOT NULL,
        body VARCHAR NOT NULL,
        posted_at TIMESTAMPTZ,
        url VARCHAR NOT NULL,
        fetched_at TIMESTAMPTZ NOT NULL,
        content_hash VARCHAR NOT NULL,
        deleted BOOLEAN NOT NULL DEFAULT FALSE,
        deleted_at TIMESTAMPTZ
      );

      CREATE TABLE IF NOT EXISTS post_attachment (
        post_external_id VARCHAR NOT NULL,
        source_url VARCHAR NOT NULL,
        file_name VARCHAR NOT NULL,
        is_image BOOLEAN NOT NULL DEFAULT FALSE,
        PRIMARY KEY (post_external_id, source_url)
      );
    `)
  }

  /**
   * Finds a topic by its forum thread id
   * @returns The topic, if found, or null
   */
  async findTopic(externalId: string): Promise<Topic | null> {
    const rows = await this.query(
      `
          SELECT ${TOPIC_COLUMNS}
          FROM topic
          WHERE external_id = ?
          LIMIT 1
      `,
      [externalId],
    )
    return rows.length > 0 ? toTopic(rows[0]) : null
  }

  /**
   * Finds a post by its forum post id
   * @returns The post, if found, or null
   */
  async findPost(externalId: string): Promise<Post | null> {
    const rows = await this.query(
      `
          SELECT ${POST_COLUMNS}
          FROM post
          WHERE external_id = ?
          LIMIT 1
      `,
      [externalId],
    )
    if (rows.length === 0) return null

    const attachments = await this.query(
      `
          SELECT source_url, file_name, is_image
          FROM post_attachment
          WHERE post_external_id = ?
          ORDER BY source_url
      `,
      [externalId],
    )
    return toPost(rows[0], attachments.map(toAttachment))
  }

  /**
   * Inserts a topic or replaces every column of the stored one
   */
  async upsertTopic(topic: Topic): Promise<void> {
    await this.execute(
      `
          INSERT INTO topic (external_id, title, place_name, url, lat, lon, geocode_confidence,
                             geocode_provider, geocoded_at, last_seen_at, content_hash)
          VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?::TIMESTAMPTZ, ?::TIMESTAMPTZ, ?)
          ON CONFLICT (external_id) DO UPDATE
          SET title              = excluded.title,
              place_name         = excluded.place_name,
              url                = excluded.url,
              lat                = excluded.lat,
              lon                = excluded.lon,
              geocode_confidence = excluded.geocode_confidence,
              geocode_provider   = excluded.geocode_provider,
              geocoded_at        = excluded.geocoded_at,
              last_seen_at       = excluded.last_seen_at,
              content_hash       = excluded.content_hash
      `,
      [
        topic.externalId,
        topic.title,
        topic.placeName,
        topic.url,
        topic.coordinates?.lat ?? null,
        topic.coordinates?.lon ?? null,
        topic.geocodeConfidence,
        topic.geocodeProvider,
        iso(topic.geocodedAt),
        iso(topic.lastSeenAt),
        topic.contentHash,
      ],
    )
  }

  /**
   * Inserts a post, or updates the source-owned columns of the stored one, then upserts its
   * attachments by source URL, all in one transaction. The soft-delete columns are only set on insert.
   */
  async upsertPost(post: Post): Promise<void> {
    await this.transaction(async () => {
      await this.connection.run(
        `
            INSERT INTO post (external_id, topic_external_id, author, body, posted_at, url,
                              fetched_at, content_hash, deleted, deleted_at)
            VALUES (?, ?, ?, ?, ?::TIMESTAMPTZ, ?, ?::TIMESTAMPTZ, ?, FALSE, NULL)
            ON CONFLICT (external_id) DO UPDATE
            SET author       = excluded.author,
                body         = excluded.body,
                posted_at    = excluded.posted_at,
                url          = excluded.url,
                fetched_at   = excluded.fetched_at,
                content_hash = excluded.content_hash
        `,
        [
          post.externalId,
          post.topicExternalId,
          post.author,
          post.body,
          iso(post.postedAt),
          post.url,
          iso(post.fetchedAt),
          post.contentHash,
        ],
      )

      for (const attachment of post.attachments) {
        await this.connection.run(
          `
              INSERT INTO post_attachment (post_external_id, source_url, file_name, is_image)
              VALUES (?, ?, ?, ?)
              ON CONFLICT (post_external_id, source_url) DO UPDATE
              SET file_name = excluded.file_name,
                  is_image  = excluded.is_image
          `,
          [post.externalId, attachment.sourceUrl, attachment.fileName, attachment.isImage],
        )
      }
    })
  }

  /**
   * Updates last_seen_at for a topic that was crawled but did not change
   */
  async touchTopic(externalId: string, seenAt: Date): Promise<void> {
    await this.execute(
      `
          UPDATE topic
          SET last_seen_at = ?::TIMESTAMPTZ
          WHERE external_id = ?
      `,
      [seenAt.toISOString(), externalId],
    )
  }

  /**
   * Topics without coordinates or with coordinates older than `staleBefore`
   */
  async topicsNeedingGeocode(staleBefore: Date): Promise<Topic[]> {
    const rows = await this.query(
      `
          SELECT ${TOPIC_COLUMNS}
          FROM topic
          WHERE lat IS NULL
             OR lon IS NULL
             OR geocoded_at IS NULL
             OR geocoded_at < ?::TIMESTAMPTZ
          ORDER BY last_seen_at DESC
      `,
      [staleBefore.toISOString()],
    )
    return rows.map(toTopic)
  }

  /**
   * Executes a custom SQL query with parameters.
   * @returns Rows as column-name keyed objects
   */
  async query(sql: string, params: DuckDBValue[] = []): Promise<Row[]> {
    return this.exclusive(async () => {
      const reader = await this.connection.runAndReadAll(sql, params)
      return reader.getRowObjects()
    })
  }

  private async execute(sql: string, params: DuckDBValue[]): Promise<void> {
    await this.exclusive(async () => {
      await this.connection.run(sql, params)
    })
  }

  private async transaction(work: () => Promise<void>): Promise<void> {
    await this.exclusive(async () => {
      await this.connection.run('BEGIN TRANSACTION')
      try {
        await work()
        await this.connection.run('COMMIT')
      } catch (error) {
        await this.connection.run('ROLLBACK')
        throw error
      }
    })
  }

  /**
   * Closes the database connection.
   */
  async close(): Promise<void> {
    await this.exclusive(async () => {
      this.connection.closeSync()
      this.db.closeSync()
    })
  }
}
