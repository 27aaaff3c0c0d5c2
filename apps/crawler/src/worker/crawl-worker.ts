/**
 * Crawl Worker
 *
 * Drives one dequeued URL through
 *   Fetching -> Extracting -> Persisting -> LinkDiscovery -> Done
 * with early exits for already-crawled, blocked, failed and interrupted URLs.
 *
 * Policy checks (dedup, blocklist, robots) and the politeness delay run in
 * Fetching before any network access to the page itself. Nothing here throws:
 * every failure is reported as an outcome and the URL is abandoned.
 */

import type { ILogger } from '@sirat/logger'
import type { Tier1Blocklist } from '../blocklist/tier1.js'
import type { Fetcher, FetchResult, RobotsPolicy } from '../fetch/types.js'
import type { FrontierManager } from '../frontier/manager.js'
import type { CrawlRepository } from '../persist/crawl-repository.js'
import { extractPage, type ExtractedPage } from '../extract/html.js'
import { canonicalize, hostOf } from '../utils/url.js'
import { sleep as defaultSleep } from '../utils/sleep.js'
import {
  classifyError,
  CrawlError,
  ERROR_CODES,
  formatErrorForLog,
  policyExclusion,
  type ClassifiedError,
  type PolicyCode,
} from '../lib/errors.js'
import { recordCrawlBlocked } from './metrics.js'
import { loggers } from '../config/logger.js'

export type CrawlState = 'Fetching' | 'Extracting' | 'Persisting' | 'LinkDiscovery' | 'Done'

export type CrawlOutcome =
  | { kind: 'done'; url: string; pageId: number; linksFound: number; queued: number }
  | { kind: 'skipped'; url: string; state: CrawlState; reason: string }
  | { kind: 'blocked'; url: string; state: CrawlState; reason: string; code: PolicyCode }
  | { kind: 'failed'; url: string; state: CrawlState; error: ClassifiedError }
  | { kind: 'interrupted'; url: string; state: CrawlState }

export interface CrawlWorkerDeps {
  repository: CrawlRepository
  frontier: FrontierManager
  blocklist: Tier1Blocklist
  robots: RobotsPolicy
  fetcher: Fetcher
  /** Fixed per-request delay before each page fetch (default: 1000) */
  politenessDelayMs?: number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  now?: () => Date
  logger?: ILogger
}

export class CrawlWorker {
  private readonly deps: CrawlWorkerDeps
  private readonly politenessDelayMs: number
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly now: () => Date
  private readonly log: ILogger

  constructor(deps: CrawlWorkerDeps) {
    this.deps = deps
    this.politenessDelayMs = deps.politenessDelayMs ?? 1000
    this.sleep = deps.sleep ?? defaultSleep
    this.now = deps.now ?? (() => new Date())
    this.log = deps.logger ?? loggers.worker
  }

  async crawl(rawUrl: string, signal?: AbortSignal): Promise<CrawlOutcome> {
    const { normalized: url, hash } = canonicalize(rawUrl)
    const log = this.log.child({ url })
    let state: CrawlState = 'Fetching'

    const fail = (error: unknown): CrawlOutcome => {
      const classified = classifyError(error)
      if (classified.category === 'db') {
        log.error('Crawl failed', { state, ...formatErrorForLog(classified) })
      } else {
        log.warn('Crawl failed', { state, ...formatErrorForLog(classified) })
      }
      return { kind: 'failed', url, state, error: classified }
    }

    const blocked = (reason: string, source: 'blocklist' | 'robots' | 'redirect'): CrawlOutcome => {
      const code = source === 'robots' ? ERROR_CODES.ROBOTS_DISALLOWED : ERROR_CODES.BLOCKED
      recordCrawlBlocked({ url, source, exclusion: policyExclusion(code, reason) })
      return { kind: 'blocked', url, state, reason, code }
    }

    // --- Fetching -------------------------------------------------------
    try {
      if (await this.deps.repository.pageExists(hash)) {
        log.debug('Already crawled')
        return { kind: 'skipped', url, state, reason: 'already_crawled' }
      }
    } catch (error) {
      return fail(error)
    }

    const decision = this.deps.blocklist.isBlocked(url)
    if (decision.blocked) {
      return blocked(decision.reason, 'blocklist')
    }

    if (!(await this.deps.robots.canFetch(url))) {
      return blocked('Disallowed by robots.txt', 'robots')
    }

    await this.sleep(this.politenessDelayMs, signal)
    if (signal?.aborted) {
      return { kind: 'interrupted', url, state }
    }

    log.info('Crawling')
    let result: FetchResult
    try {
      result = await this.deps.fetcher.fetch(url)
    } catch (error) {
      return fail(error)
    }
    if (result.status === 'timeout') {
      return fail(new CrawlError('timeout', ERROR_CODES.FETCH_TIMEOUT, result.error))
    }
    if (result.status === 'error') {
      return fail(new CrawlError('transport', ERROR_CODES.NETWORK_ERROR, result.error))
    }
    if (result.status !== 'ok') {
      const code =
        result.status === 'not_html'
          ? ERROR_CODES.NOT_HTML
          : result.status === 'too_large'
            ? ERROR_CODES.TOO_LARGE
            : ERROR_CODES.HTTP_ERROR
      return fail(new CrawlError('transport', code, result.error))
    }

    // Redirect-based evasion guard
    if (result.finalUrl !== url) {
      const redirected = this.deps.blocklist.isBlocked(result.finalUrl)
      if (redirected.blocked) {
        return blocked(`Redirected to ${result.finalUrl}: ${redirected.reason}`, 'redirect')
      }
    }

    if (signal?.aborted) {
      return { kind: 'interrupted', url, state }
    }

    // --- Extracting -----------------------------------------------------
    state = 'Extracting'
    let page: ExtractedPage
    try {
      page = extractPage(result.html, result.finalUrl)
    } catch (error) {
      return fail(new CrawlError('parse', ERROR_CODES.PARSE_FAILED, 'HTML extraction failed', { cause: error }))
    }

    if (signal?.aborted) {
      return { kind: 'interrupted', url, state }
    }

    // --- Persisting -----------------------------------------------------
    state = 'Persisting'
    // Stored under the post-redirect URL so domain-keyed scoring sees the host that served the content
    const landed = canonicalize(result.finalUrl)
    let pageId: number
    try {
      pageId = await this.deps.repository.savePage(
        {
          url: landed.normalized,
          urlHash: landed.hash,
          domain: hostOf(landed.normalized) ?? '',
          title: page.title,
          content: page.content,
          crawledAt: this.now(),
        },
        page.links.map((link) => ({ targetUrl: link.url, linkText: link.text }))
      )
    } catch (error) {
      return fail(error)
    }

    if (signal?.aborted) {
      return { kind: 'interrupted', url, state }
    }

    // --- LinkDiscovery --------------------------------------------------
    state = 'LinkDiscovery'
    let queued = 0
    for (const link of page.links) {
      try {
        if (await this.deps.frontier.enqueue(link.url)) {
          queued++
        }
      } catch (error) {
        log.warn('Could not enqueue discovered link', { link: link.url, ...formatErrorForLog(classifyError(error)) })
      }
    }

    state = 'Done'
    log.info('Crawled', { pageId, title: page.title, linksFound: page.links.length, queued })
    return { kind: 'done', url, pageId, linksFound: page.links.length, queued }
  }
}
