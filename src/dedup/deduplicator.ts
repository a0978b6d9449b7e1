import { logger } from '../logger.js'
import type { ParsedPost, Post, Topic, TopicStub } from '../types/types.js'
import { contentHash } from '../utils/helpers.js'

export type Classification = 'New' | 'Changed' | 'Unchanged'

/**
 * What to do with one incoming record. `write` is the full record to upsert.
 */
export type UpsertDecision<T> =
  | { action: 'write'; classification: 'New' | 'Changed'; record: T }
  | { action: 'skip'; classification: 'Changed' | 'Unchanged'; reason: 'unchanged' | 'deleted' }

export function topicContentHash(topic: Pick<Topic, 'title' | 'url' | 'placeName'>): string {
  return contentHash([topic.title, topic.url, topic.placeName])
}

export function postContentHash(post: ParsedPost): string {
  return contentHash([
    post.topicExternalId,
    post.author,
    post.body,
    post.postedAt ? post.postedAt.toISOString() : null,
    post.url,
    post.attachments.map((attachment) => attachment.sourceUrl).sort(),
  ])
}

/**
 * Compares freshly parsed records with their stored versions so that re-crawls only write
 * what actually changed. Never writes anything itself.
 */
export class Deduplicator {
  /**
   * @param incomingHash - Content hash of the parsed record
   * @param existing - Stored version with the same external id, if any
   */
  classify(incomingHash: string, existing: { contentHash: string } | null): Classification {
    if (!existing) return 'New'
    return existing.contentHash === incomingHash ? 'Unchanged' : 'Changed'
  }

  /**
   * Geocode fields of a stored topic are carried over; only the geocoding stage replaces them.
   */
  planTopic(
    stub: TopicStub,
    placeName: string,
    existing: Topic | null,
    seenAt: Date,
  ): UpsertDecision<Topic> {
    const hash = topicContentHash({ title: stub.title, url: stub.url, placeName })
    const classification = this.classify(hash, existing)

    if (classification === 'Unchanged') {
      return { action: 'skip', classification, reason: 'unchanged' }
    }

    return {
      action: 'write',
      classification,
      record: {
        externalId: stub.externalId,
        title: stub.title,
        placeName,
        url: stub.url,
        coordinates: existing?.coordinates ?? null,
        geocodeConfidence: existing?.geocodeConfidence ?? null,
        geocodeProvider: existing?.geocodeProvider ?? null,
        geocodedAt: existing?.geocodedAt ?? null,
        lastSeenAt: seenAt,
        contentHash: hash,
      },
    }
  }

  /**
   * A post deleted by a moderator is left alone even when its source content changed.
   */
  planPost(incoming: ParsedPost, existing: Post | null, fetchedAt: Date): UpsertDecision<Post> {
    const hash = postContentHash(incoming)
    const classification = this.classify(hash, existing)

    if (classification === 'Unchanged') {
      return { action: 'skip', classification, reason: 'unchanged' }
    }

    if (existing?.deleted) {
      logger.warn(
        `Post ${incoming.externalId} changed at the source but is deleted locally, not updating`,
      )
      return { action: 'skip', classification: 'Changed', reason: 'deleted' }
    }

    return {
      action: 'write',
      classification,
      record: {
        ...incoming,
        fetchedAt,
        contentHash: hash,
        deleted: existing?.deleted ?? false,
        deletedAt: existing?.deletedAt ?? null,
      },
    }
  }
}
