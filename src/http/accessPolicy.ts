import { errorMessage } from '../errors.js'
import { logger } from '../logger.js'
import type { HttpClient } from './httpClient.js'

interface RobotsRule {
  allow: boolean
  pattern: string
  matcher: RegExp
}

interface RobotsGroup {
  agents: string[]
  rules: RobotsRule[]
}

function compilePattern(pattern: string): RegExp {
  const anchored = pattern.endsWith('$')
  const body = anchored ? pattern.slice(0, -1) : pattern
  const source = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*')
  return new RegExp(`^${source}${anchored ? '$' : ''}`)
}

/**
 * Splits robots.txt into user-agent groups. Consecutive User-agent lines share one group.
 */
export function parseRobotsTxt(text: string): RobotsGroup[] {
  const groups: RobotsGroup[] = []
  let current: RobotsGroup | null = null
  let collectingAgents = false

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim()
    const separator = line.indexOf(':')
    if (separator === -1) continue

    const field = line.slice(0, separator).trim().toLowerCase()
    const value = line.slice(separator + 1).trim()

    if (field === 'user-agent') {
      if (!current || !collectingAgents) {
        current = { agents: [], rules: [] }
        groups.push(current)
      }
      current.agents.push(value.toLowerCase())
      collectingAgents = true
      continue
    }

    if (field === 'allow' || field === 'disallow') {
      collectingAgents = false
      // Rules before any User-agent line belong to nobody
      if (!current || !value) continue
      current.rules.push({ allow: field === 'allow', pattern: value, matcher: compilePattern(value) })
    }
  }

  return groups
}

/**
 * Rules from one robots.txt, evaluated for one user agent
 */
export class RobotsRules {
  private readonly rules: RobotsRule[]

  constructor(groups: RobotsGroup[], userAgent: string) {
    const token = userAgent.split(/[/\s]/)[0].toLowerCase()
    const specific = groups.filter((group) =>
      group.agents.some((agent) => agent !== '*' && agent !== '' && token.includes(agent)),
    )
    const chosen = specific.length > 0 ? specific : groups.filter((group) => group.agents.includes('*'))
    this.rules = chosen.flatMap((group) => group.rules)
  }

  static allowAll(): RobotsRules {
    return new RobotsRules([], '*')
  }

  /**
   * The longest matching pattern decides; on a tie Allow wins. No match means allowed.
   * @param path - Path plus query string
   */
  isAllowed(path: string): boolean {
    let best: RobotsRule | null = null
    for (const rule of this.rules) {
      if (!rule.matcher.test(path)) continue
      if (
        !best ||
        rule.pattern.length > best.pattern.length ||
        (rule.pattern.length === best.pattern.length && rule.allow && !best.allow)
      ) {
        best = rule
      }
    }
    return best ? best.allow : true
  }
}

export interface AccessPolicyOptions {
  /** Any URL on the crawled site; robots.txt is read from its origin */
  siteUrl: string
  userAgent: string
  timeoutMs: number
  /** How long a loaded robots.txt stays in use */
  refreshIntervalMs: number
  /** How long to keep denying after robots.txt could not be retrieved */
  failureRetryMs?: number
}

interface LoadedRules {
  rules: RobotsRules | null
  expiresAt: number
}

/**
 * Decides whether the crawler may fetch a URL according to the site's robots.txt.
 * When the file cannot be retrieved every path is denied until the next attempt.
 */
export class AccessPolicy {
  private readonly robotsUrl: string
  private loaded: LoadedRules | null = null
  private loading: Promise<LoadedRules> | null = null

  constructor(
    private readonly http: HttpClient,
    private readonly options: AccessPolicyOptions,
    private readonly now: () => number = Date.now,
  ) {
    this.robotsUrl = new URL('/robots.txt', options.siteUrl).toString()
  }

  /**
   * @param url - Absolute URL, or a path on the crawled site
   */
  async isAllowed(url: string): Promise<boolean> {
    const target = new URL(url, this.options.siteUrl)
    const { rules } = await this.currentRules()

    if (!rules) {
      logger.warn(`robots.txt unavailable, treating ${target.toString()} as disallowed`)
      return false
    }

    return rules.isAllowed(`${target.pathname}${target.search}`)
  }

  private async currentRules(): Promise<LoadedRules> {
    if (this.loaded && this.loaded.expiresAt > this.now()) return this.loaded
    if (!this.loading) {
      this.loading = this.load().finally(() => {
        this.loading = null
      })
    }
    this.loaded = await this.loading
    return this.loaded
  }

  private async load(): Promise<LoadedRules> {
    const failureRetryMs = this.options.failureRetryMs ?? 60_000
    logger.debug(`Loading ${this.robotsUrl}`)

    try {
      const response = await this.http.get(this.robotsUrl, {
        timeout: this.options.timeoutMs,
        responseType: 'text',
        validateStatus: () => true,
      })
      const { status } = response

      if (status >= 200 && status < 300) {
        const text = typeof response.data === 'string' ? response.data : ''
        const rules = new RobotsRules(parseRobotsTxt(text), this.options.userAgent)
        logger.info(`Loaded robots.txt from ${this.robotsUrl}`)
        return { rules, expiresAt: this.now() + this.options.refreshIntervalMs }
      }

      // A missing robots.txt means no restrictions; auth errors and server trouble do not
      if (status >= 400 && status < 500 && status !== 401 && status !== 403 && status !== 429) {
        logger.info(`No robots.txt at ${this.robotsUrl} (HTTP ${status}), all paths allowed`)
        return { rules: RobotsRules.allowAll(), expiresAt: this.now() + this.options.refreshIntervalMs }
      }

      logger.warn(`robots.txt at ${this.robotsUrl} answered HTTP ${status}`)
      return { rules: null, expiresAt: this.now() + failureRetryMs }
    } catch (error) {
      logger.warn(`Could not read ${this.robotsUrl}: ${errorMessage(error)}`)
      return { rules: null, expiresAt: this.now() + failureRetryMs }
    }
  }
}
