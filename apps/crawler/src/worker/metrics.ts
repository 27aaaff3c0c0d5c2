/**
 * Crawler metrics
 *
 * Structured log events only; there is no metrics backend.
 */

import type { ILogger } from '@sirat/logger'
import { loggers } from '../config/logger.js'
import { formatErrorForLog, type ClassifiedError } from '../lib/errors.js'

const log = loggers.worker

export interface CrawlStats {
  crawled: number
  blocked: number
  failed: number
  linksFound: number
  queued: number
}

export function emptyStats(): CrawlStats {
  return { crawled: 0, blocked: 0, failed: 0, linksFound: 0, queued: 0 }
}

export function recordCrawlBlocked(payload: {
  url: string
  source: 'blocklist' | 'robots' | 'redirect'
  exclusion: ClassifiedError
}): void {
  log.info('CRAWL_BLOCKED', {
    event_name: 'CRAWL_BLOCKED',
    url: payload.url,
    source: payload.source,
    reason: payload.exclusion.message,
    ...formatErrorForLog(payload.exclusion),
  })
}

export function recordCrawlStats(
  stats: CrawlStats,
  payload: { processed: number; final: boolean },
  logger: ILogger = log
): void {
  logger.info('CRAWL_STATS', {
    event_name: 'CRAWL_STATS',
    ...stats,
    ...payload,
  })
}
