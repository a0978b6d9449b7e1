import * as cheerio from 'cheerio'

import type { PageParseResult, TopicStub } from '../types/types.js'
import { cleanText } from '../utils/helpers.js'
import { findNextPageUrl, resolveUrl } from './markup.js'

export const UNTITLED_TOPIC = '(untitled)'

const TOPIC_LINK_SELECTOR = "a[data-tp-primary='on'], a.structItem-title, .structItem-title a"

/**
 * Turns a forum section page into topic stubs. Threads on other hosts are left out.
 */
export interface ForumListingParser {
  parse(html: string, pageUrl: string): PageParseResult<TopicStub>
}

/**
 * Thread id from a XenForo thread URL (`/threads/some-slug.123/`), falling back to the last
 * path segment for URLs without a numeric suffix
 */
export function extractTopicExternalId(url: string): string {
  const { pathname } = new URL(url)
  const match = pathname.match(/\.(\d+)(?:\/|$)/)
  if (match) return match[1]
  const segments = pathname.split('/').filter(Boolean)
  return segments[segments.length - 1] ?? pathname
}

/**
 * Cuts a thread URL down to the thread itself, dropping `page-N`, `unread` and similar suffixes
 */
export function canonicalTopicUrl(url: string): string {
  const parsed = new URL(url)
  const match = parsed.pathname.match(/^(.*\/threads\/[^/]*\.\d+)(?:\/|$)/)
  if (match) parsed.pathname = `${match[1]}/`
  parsed.search = ''
  parsed.hash = ''
  return parsed.toString()
}

export class XenForoListingParser implements ForumListingParser {
  parse(html: string, pageUrl: string): PageParseResult<TopicStub> {
    const $ = cheerio.load(html)
    const topics = new Map<string, TopicStub>()
    const warnings: string[] = []
    const { origin } = new URL(pageUrl)

    for (const element of $(TOPIC_LINK_SELECTOR).toArray()) {
      const link = $(element)
      const href = link.attr('href')
      if (!href) continue

      const resolved = resolveUrl(pageUrl, href)
      if (!resolved || !resolved.includes('/threads/')) continue
      if (new URL(resolved).origin !== origin) continue

      const url = canonicalTopicUrl(resolved)
      const externalId = extractTopicExternalId(url)
      if (topics.has(externalId)) continue

      let title = cleanText(link.text())
      if (!title) {
        title = UNTITLED_TOPIC
        warnings.push(`Topic ${externalId} on ${pageUrl} has no title`)
      }

      topics.set(externalId, { externalId, title, url })
    }

    return { records: [...topics.values()], nextPageUrl: findNextPageUrl($, pageUrl), warnings }
  }
}
