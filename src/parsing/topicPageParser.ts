import { extname } from 'node:path'

import * as cheerio from 'cheerio'

import type { ParsedPost, PostAttachment, TopicPageParseResult } from '../types/types.js'
import { cleanText } from '../utils/helpers.js'
import { findLastPageNumber, findNextPageUrl, parseTimestamp, resolveUrl } from './markup.js'

export const UNKNOWN_AUTHOR = 'unknown'

const MESSAGE_SELECTOR = 'article.message, div.message'
const AUTHOR_SELECTOR = 'a.username, h4.message-name, span.username'
const CONTENT_SELECTOR = 'div.bbWrapper, article.message-body, div.message-content'
const PERMALINK_SELECTOR = "a[href*='/posts/'], a.u-concealed"
// Attachment lists and link previews are not part of the message text
const NON_TEXT_SELECTOR =
  '.attachment, .attachments, .message-attachments, .js-attachmentInfo, .bbCodeBlock--unfurl'
const ATTACHMENT_LINK_SELECTOR = "a[href*='/attachments/']"
const ATTACHMENT_IMAGE_SELECTOR = "img[src*='/attachments/']"
const IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.gif', '.webp', '.bmp'])

/**
 * Turns one page of a topic into posts, in page order
 */
export interface TopicPageParser {
  parse(html: string, pageUrl: string, topicExternalId: string): TopicPageParseResult
}

function firstDigits(value: string | undefined): string | null {
  const match = value?.match(/(\d+)/)
  return match ? match[1] : null
}

function lastPathSegment(url: string): string {
  const segments = new URL(url).pathname.split('/').filter(Boolean)
  return segments[segments.length - 1] ?? ''
}

function isImageFileName(name: string): boolean {
  return IMAGE_EXTENSIONS.has(extname(name.toLowerCase()))
}

interface AttachmentLink {
  href: string | undefined
  text: string
}

/**
 * Attachment links first, then inline attachment images not already linked
 */
function collectAttachments(
  pageUrl: string,
  links: AttachmentLink[],
  imageSources: Array<string | undefined>,
): PostAttachment[] {
  const attachments = new Map<string, PostAttachment>()

  for (const { href, text } of links) {
    const sourceUrl = href ? resolveUrl(pageUrl, href) : null
    if (!sourceUrl || attachments.has(sourceUrl)) continue
    const fileName = cleanText(text) || lastPathSegment(sourceUrl) || 'attachment.bin'
    attachments.set(sourceUrl, { sourceUrl, fileName, isImage: isImageFileName(fileName) })
  }

  for (const src of imageSources) {
    const sourceUrl = src ? resolveUrl(pageUrl, src) : null
    if (!sourceUrl || attachments.has(sourceUrl)) continue
    const fileName = lastPathSegment(sourceUrl) || 'attachment.jpg'
    attachments.set(sourceUrl, { sourceUrl, fileName, isImage: true })
  }

  return [...attachments.values()]
}

export class XenForoTopicPageParser implements TopicPageParser {
  parse(html: string, pageUrl: string, topicExternalId: string): TopicPageParseResult {
    const $ = cheerio.load(html)
    const posts = new Map<string, ParsedPost>()
    const warnings: string[] = []
    const pageBase = resolveUrl(pageUrl, pageUrl) ?? pageUrl

    for (const element of $(MESSAGE_SELECTOR).toArray()) {
      const message = $(element)
      const externalId = firstDigits(message.attr('id')) ?? firstDigits(message.attr('data-content'))
      if (!externalId) {
        warnings.push(`Message without an id on ${pageUrl} dropped`)
        continue
      }
      if (posts.has(externalId)) continue

      let author = cleanText(
        message.attr('data-author') ?? message.find(AUTHOR_SELECTOR).first().text(),
      )
      if (!author) {
        author = UNKNOWN_AUTHOR
        warnings.push(`Post ${externalId} has no author`)
      }

      const time = message.find('time').first()
      const postedAt = parseTimestamp(
        time.attr('data-time') ?? time.attr('datetime') ?? time.attr('title') ?? time.text(),
      )
      if (!postedAt) warnings.push(`Post ${externalId} has no readable timestamp`)

      const attachments = collectAttachments(
        pageUrl,
        message
          .find(ATTACHMENT_LINK_SELECTOR)
          .toArray()
          .map((link) => ({ href: $(link).attr('href'), text: $(link).text() })),
        message
          .find(ATTACHMENT_IMAGE_SELECTOR)
          .toArray()
          .map((image) => $(image).attr('src')),
      )

      let body = ''
      const content = message.find(CONTENT_SELECTOR).first()
      if (content.length > 0) {
        content.find(NON_TEXT_SELECTOR).remove()
        content.find('br').replaceWith(' ')
        // Text of neighbouring elements is separated the way it reads (<p>a</p><p>b</p> is "a b")
        content.find('*').before(' ').after(' ')
        body = cleanText(content.text())
      } else {
        warnings.push(`Post ${externalId} has no message body`)
      }

      const permalink = message.find(PERMALINK_SELECTOR).first().attr('href')
      const url =
        (permalink ? resolveUrl(pageUrl, permalink) : null) ?? `${pageBase}#post-${externalId}`

      posts.set(externalId, { externalId, topicExternalId, author, body, postedAt, url, attachments })
    }

    return {
      records: [...posts.values()],
      nextPageUrl: findNextPageUrl($, pageUrl),
      lastPage: findLastPageNumber($),
      warnings,
    }
  }
}
