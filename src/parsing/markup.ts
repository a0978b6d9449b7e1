import type { CheerioAPI } from 'cheerio'

import { cleanText } from '../utils/helpers.js'

/**
 * Resolves `href` against the page it was found on
 * @returns The absolute URL without fragment, or null when it cannot be resolved
 */
export function resolveUrl(pageUrl: string, href: string): string | null {
  if (!URL.canParse(href, pageUrl)) return null
  const url = new URL(href, pageUrl)
  url.hash = ''
  return url.toString()
}

/**
 * XenForo pagination: the "next" jump button, or the <link rel="next"> hint in the head
 */
export function findNextPageUrl($: CheerioAPI, pageUrl: string): string | null {
  const href =
    $('a.pageNav-jump--next').first().attr('href') ?? $('link[rel="next"]').first().attr('href')
  if (!href) return null

  const next = resolveUrl(pageUrl, href)
  const current = resolveUrl(pageUrl, pageUrl)
  return next && next !== current ? next : null
}

/**
 * Parses the timestamp formats XenForo puts on <time>: unix seconds or ISO 8601,
 * including offsets written without a colon (+0300)
 */
export function parseTimestamp(value: string): Date | null {
  const trimmed = cleanText(value)
  if (!trimmed) return null

  if (/^\d{9,11}$/.test(trimmed)) return new Date(Number(trimmed) * 1000)

  const normalized = trimmed.replace(/([+-]\d{2})(\d{2})$/, '$1:$2')
  const time = Date.parse(normalized)
  return Number.isNaN(time) ? null : new Date(time)
}

const PAGE_NAV_LINK_SELECTOR = '.pageNav a[href], .pageNavSimple a[href], a.pageNav-jump[href]'

/**
 * Highest `page-N` the page navigation links to. Links in post bodies are not considered.
 */
export function findLastPageNumber($: CheerioAPI): number {
  let last = 1
  for (const element of $(PAGE_NAV_LINK_SELECTOR).toArray()) {
    const match = $(element).attr('href')?.match(/\/page-(\d+)/)
    if (match) last = Math.max(last, Number(match[1]))
  }
  return last
}

/**
 * URL of page `page` of a thread: the thread URL itself for page 1, `<thread>/page-N` after that
 */
export function topicPageUrl(topicUrl: string, page: number): string {
  if (page <= 1) return topicUrl
  const url = new URL(topicUrl)
  url.pathname = `${url.pathname.replace(/\/page-\d+\/?$/, '/').replace(/\/?$/, '/')}page-${page}`
  url.hash = ''
  return url.toString()
}
