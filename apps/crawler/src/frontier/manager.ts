import type { ILogger } from '@sirat/logger'
import type { Tier1Blocklist } from '../blocklist/tier1.js'
import type { FrontierStats, FrontierStore } from './store.js'
import { canonicalize } from '../utils/url.js'
import { loggers } from '../config/logger.js'

/** The one store read admission needs: has this URL hash already been crawled? */
export interface PageLookup {
  pageExists(urlHash: string): Promise<boolean>
}

export type AdmissionResult =
  | { admitted: true; url: string }
  | { admitted: false; url: string; reason: 'blocked' | 'already_crawled' | 'already_queued'; detail?: string }

export interface FrontierManagerDeps {
  store: FrontierStore
  blocklist: Tier1Blocklist
  pages: PageLookup
  logger?: ILogger
}

/**
 * Admission policy in front of the frontier store.
 * A URL is queued only when it passes the Tier-1 blocklist, has no persisted page,
 * and is not already a member of the store.
 */
export class FrontierManager {
  private readonly store: FrontierStore
  private readonly blocklist: Tier1Blocklist
  private readonly pages: PageLookup
  private readonly log: ILogger

  constructor(deps: FrontierManagerDeps) {
    this.store = deps.store
    this.blocklist = deps.blocklist
    this.pages = deps.pages
    this.log = deps.logger ?? loggers.frontier
  }

  async admit(rawUrl: string): Promise<AdmissionResult> {
    const { normalized, hash } = canonicalize(rawUrl)

    const decision = this.blocklist.isBlocked(normalized)
    if (decision.blocked) {
      this.log.debug('Not queuing blocked URL', { url: normalized, reason: decision.reason })
      return { admitted: false, url: normalized, reason: 'blocked', detail: decision.reason }
    }

    if (await this.pages.pageExists(hash)) {
      return { admitted: false, url: normalized, reason: 'already_crawled' }
    }

    if (!(await this.store.push(normalized))) {
      return { admitted: false, url: normalized, reason: 'already_queued' }
    }

    return { admitted: true, url: normalized }
  }

  async enqueue(rawUrl: string): Promise<boolean> {
    return (await this.admit(rawUrl)).admitted
  }

  dequeue(): Promise<string | null> {
    return this.store.pop()
  }

  size(): Promise<number> {
    return this.store.size()
  }

  isQueued(rawUrl: string): Promise<boolean> {
    return this.store.isQueued(canonicalize(rawUrl).normalized)
  }

  clear(): Promise<void> {
    return this.store.clear()
  }

  stats(): Promise<FrontierStats> {
    return this.store.stats()
  }
}
