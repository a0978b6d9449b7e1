import { describe, it, expect } from 'vitest'

import { Deduplicator, postContentHash, topicContentHash } from '../dedup/deduplicator.js'
import type { ParsedPost, Post, Topic, TopicStub } from '../types/types.js'

const seenAt = new Date('2024-05-02T08:00:00.000Z')

const stub: TopicStub = {
  externalId: 't1',
  title: 'Pond A',
  url: 'https://forum.test/threads/pond-a.1/',
}

const parsedPost: ParsedPost = {
  externalId: 'p1',
  topicExternalId: 't1',
  author: 'ivan',
  body: 'Carp are biting',
  postedAt: new Date('2024-05-01T10:00:00.000Z'),
  url: 'https://forum.test/posts/1/',
  attachments: [],
}

function storedTopic(overrides: Partial<Topic> = {}): Topic {
  return {
    ...stub,
    placeName: 'Pond A',
    coordinates: { lat: 55.7, lon: 37.6 },
    geocodeConfidence: 0.9,
    geocodeProvider: 'yandex',
    geocodedAt: new Date('2024-05-01T12:00:00.000Z'),
    lastSeenAt: new Date('2024-05-01T12:00:00.000Z'),
    contentHash: topicContentHash({ title: stub.title, url: stub.url, placeName: 'Pond A' }),
    ...overrides,
  }
}

function storedPost(overrides: Partial<Post> = {}): Post {
  return {
    ...parsedPost,
    fetchedAt: new Date('2024-05-01T12:00:00.000Z'),
    contentHash: postContentHash(parsedPost),
    deleted: false,
    deletedAt: null,
    ...overrides,
  }
}

describe('Deduplicator', () => {
  const deduplicator = new Deduplicator()

  describe('classify', () => {
    it('should classify by presence and hash', () => {
      expect(deduplicator.classify('a', null)).toBe('New')
      expect(deduplicator.classify('a', { contentHash: 'a' })).toBe('Unchanged')
      expect(deduplicator.classify('a', { contentHash: 'b' })).toBe('Changed')
    })
  })

  describe('planTopic', () => {
    it('should write a new topic without coordinates', () => {
      const plan = deduplicator.planTopic(stub, 'Pond A', null, seenAt)

      expect(plan).toEqual({
        action: 'write',
        classification: 'New',
        record: {
          externalId: 't1',
          title: 'Pond A',
          placeName: 'Pond A',
          url: stub.url,
          coordinates: null,
          geocodeConfidence: null,
          geocodeProvider: null,
          geocodedAt: null,
          lastSeenAt: seenAt,
          contentHash: topicContentHash({ title: 'Pond A', url: stub.url, placeName: 'Pond A' }),
        },
      })
    })

    it('should skip an unchanged topic', () => {
      const plan = deduplicator.planTopic(stub, 'Pond A', storedTopic(), seenAt)
      expect(plan).toEqual({ action: 'skip', classification: 'Unchanged', reason: 'unchanged' })
    })

    it('should keep the stored geocode when the title changes', () => {
      const renamed = { ...stub, title: 'Pond A (closed)' }
      const plan = deduplicator.planTopic(renamed, 'Pond A (closed)', storedTopic(), seenAt)

      expect(plan.action).toBe('write')
      if (plan.action !== 'write') return
      expect(plan.classification).toBe('Changed')
      expect(plan.record.coordinates).toEqual({ lat: 55.7, lon: 37.6 })
      expect(plan.record.geocodeConfidence).toBe(0.9)
      expect(plan.record.title).toBe('Pond A (closed)')
    })
  })

  describe('planPost', () => {
    it('should write a new post as not deleted', () => {
      const plan = deduplicator.planPost(parsedPost, null, seenAt)

      expect(plan).toEqual({
        action: 'write',
        classification: 'New',
        record: {
          ...parsedPost,
          fetchedAt: seenAt,
          contentHash: postContentHash(parsedPost),
          deleted: false,
          deletedAt: null,
        },
      })
    })

    it('should skip a post whose content did not change', () => {
      const plan = deduplicator.planPost(parsedPost, storedPost(), seenAt)
      expect(plan).toEqual({ action: 'skip', classification: 'Unchanged', reason: 'unchanged' })
    })

    it('should never touch a post deleted locally', () => {
      const existing = storedPost({
        contentHash: 'old-hash',
        deleted: true,
        deletedAt: new Date('2024-05-01T15:00:00.000Z'),
      })
      const edited = { ...parsedPost, body: 'Carp are biting, edited' }

      const plan = deduplicator.planPost(edited, existing, seenAt)

      expect(plan).toEqual({ action: 'skip', classification: 'Changed', reason: 'deleted' })
    })

    it('should update a changed post', () => {
      const edited = { ...parsedPost, body: 'Carp are biting, edited' }
      const plan = deduplicator.planPost(edited, storedPost(), seenAt)

      expect(plan.action).toBe('write')
      if (plan.action !== 'write') return
      expect(plan.classification).toBe('Changed')
      expect(plan.record.body).toBe('Carp are biting, edited')
      expect(plan.record.contentHash).toBe(postContentHash(edited))
    })
  })

  describe('content hashes', () => {
    it('should change when a source-owned field changes', () => {
      expect(postContentHash({ ...parsedPost, author: 'petr' })).not.toBe(
        postContentHash(parsedPost),
      )
    })

    it('should change when an attachment is added but not when attachments are reordered', () => {
      const carp = { sourceUrl: 'https://forum.test/attachments/carp-jpg.7/', fileName: 'carp.jpg', isImage: true }
      const map = { sourceUrl: 'https://forum.test/attachments/map-pdf.8/', fileName: 'map.pdf', isImage: false }

      expect(postContentHash({ ...parsedPost, attachments: [carp] })).not.toBe(
        postContentHash(parsedPost),
      )
      expect(postContentHash({ ...parsedPost, attachments: [carp, map] })).toBe(
        postContentHash({ ...parsedPost, attachments: [map, carp] }),
      )
    })

    it('should treat a missing timestamp differently from a present one', () => {
      expect(postContentHash({ ...parsedPost, postedAt: null })).not.toBe(
        postContentHash(parsedPost),
      )
    })
  })
})
