/**
 * Robots.txt Compliance Cache
 *
 * Policy rules:
 * 1. One robots.txt fetch per origin (scheme + host + port), cached for the process lifetime
 * 2. Rules from the group naming our agent win over the `*` group
 * 3. Allow/Disallow: the longest matching rule wins, Allow wins a tie
 * 4. `*` matches any run of characters, a trailing `$` anchors the end
 * 5. Fail-open: a missing, unreachable or non-2xx robots.txt allows everything
 */

import type { ILogger } from '@sirat/logger'
import type { RobotsPolicy } from './types.js'
import { DEFAULT_USER_AGENT } from './types.js'
import { originOf } from '../utils/url.js'
import { loggers } from '../config/logger.js'

interface Rule {
  allow: boolean
  pattern: string
  regex: RegExp
}

/**
 * Parsed policy for one origin. `null` rules means robots.txt was unavailable.
 */
interface OriginPolicy {
  rules: Rule[] | null
}

export interface RobotsCacheOptions {
  /** Request timeout in ms (default: 10000) */
  fetchTimeoutMs?: number
  /** Full User-Agent header sent when fetching robots.txt */
  userAgent?: string
  /** Product token matched against `User-agent:` lines (default: first token of userAgent) */
  agentToken?: string
  logger?: ILogger
}

const UNAVAILABLE: OriginPolicy = { rules: null }

function compileRule(allow: boolean, pattern: string): Rule {
  const anchored = pattern.endsWith('$')
  const body = anchored ? pattern.slice(0, -1) : pattern
  const escaped = body
    .split('*')
    .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*')
  return { allow, pattern, regex: new RegExp(`^${escaped}${anchored ? '$' : ''}`) }
}

/**
 * Parse robots.txt into the rule list that applies to `agentToken`.
 */
export function parseRobotsTxt(text: string, agentToken: string): Rule[] {
  const token = agentToken.toLowerCase()
  const ours: Rule[] = []
  const global: Rule[] = []
  let sawOurGroup = false

  let groupAgents: string[] = []
  let inRules = false

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim()
    if (!line) continue

    const colonIndex = line.indexOf(':')
    if (colonIndex === -1) continue

    const directive = line.slice(0, colonIndex).trim().toLowerCase()
    const value = line.slice(colonIndex + 1).trim()

    if (directive === 'user-agent') {
      // A user-agent line after rules starts a new group
      if (inRules) {
        groupAgents = []
        inRules = false
      }
      groupAgents.push(value.toLowerCase())
      continue
    }

    if (directive !== 'allow' && directive !== 'disallow') continue
    inRules = true

    // Empty Disallow means allow everything; nothing to record
    if (!value) continue

    const rule = compileRule(directive === 'allow', value)
    if (groupAgents.some((agent) => agent !== '' && agent !== '*' && token.includes(agent))) {
      sawOurGroup = true
      ours.push(rule)
    } else if (groupAgents.includes('*')) {
      global.push(rule)
    }
  }

  return sawOurGroup ? ours : global
}

/**
 * Decide a path against a rule list.
 */
export function isPathAllowed(rules: Rule[], path: string): boolean {
  let best: Rule | null = null

  for (const rule of rules) {
    if (!rule.regex.test(path)) continue
    if (
      best === null ||
      rule.pattern.length > best.pattern.length ||
      (rule.pattern.length === best.pattern.length && rule.allow)
    ) {
      best = rule
    }
  }

  return best === null || best.allow
}

export class RobotsCache implements RobotsPolicy {
  private readonly cache = new Map<string, Promise<OriginPolicy>>()
  private readonly fetchTimeoutMs: number
  private readonly userAgent: string
  private readonly agentToken: string
  private readonly log: ILogger

  constructor(options: RobotsCacheOptions = {}) {
    this.fetchTimeoutMs = options.fetchTimeoutMs ?? 10000
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT
    this.agentToken = options.agentToken ?? this.userAgent.split('/')[0]
    this.log = options.logger ?? loggers.robots
  }

  async canFetch(url: string): Promise<boolean> {
    const origin = originOf(url)
    if (!origin) {
      // Unparseable URLs are the blocklist's concern
      return true
    }

    const policy = await this.getPolicy(origin)
    if (policy.rules === null) {
      return true
    }

    const parsed = new URL(url)
    return isPathAllowed(policy.rules, parsed.pathname + parsed.search)
  }

  /** Number of origins with a cached (or in-flight) policy. */
  get size(): number {
    return this.cache.size
  }

  private getPolicy(origin: string): Promise<OriginPolicy> {
    let pending = this.cache.get(origin)
    if (!pending) {
      pending = this.fetchPolicy(origin)
      this.cache.set(origin, pending)
    }
    return pending
  }

  private async fetchPolicy(origin: string): Promise<OriginPolicy> {
    const robotsUrl = `${origin}/robots.txt`
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.fetchTimeoutMs)

    try {
      const response = await fetch(robotsUrl, {
        method: 'GET',
        headers: { 'User-Agent': this.userAgent },
        signal: controller.signal,
        redirect: 'follow',
      })

      if (!response.ok) {
        this.log.debug('robots.txt unavailable, allowing all', { origin, statusCode: response.status })
        return UNAVAILABLE
      }

      const rules = parseRobotsTxt(await response.text(), this.agentToken)
      this.log.debug('robots.txt cached', { origin, rules: rules.length })
      return { rules }
    } catch (error) {
      this.log.debug('robots.txt fetch failed, allowing all', {
        origin,
        reason: error instanceof Error ? error.message : String(error),
      })
      return UNAVAILABLE
    } finally {
      clearTimeout(timeoutId)
    }
  }
}
