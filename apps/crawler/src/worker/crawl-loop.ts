import type { ILogger } from '@sirat/logger'
import type { FrontierManager } from '../frontier/manager.js'
import type { CrawlOutcome, CrawlWorker } from './crawl-worker.js'
import { emptyStats, recordCrawlStats, type CrawlStats } from './metrics.js'
import { loggers } from '../config/logger.js'

export type StopReason = 'max_pages' | 'frontier_empty' | 'interrupted'

export interface CrawlLoopOptions {
  /** Stop after this many dequeued URLs (unlimited when absent) */
  maxPages?: number
  /** Emit CRAWL_STATS every N dequeued URLs (default: 10) */
  statsInterval?: number
  signal?: AbortSignal
  logger?: ILogger
}

export interface CrawlRunResult {
  stats: CrawlStats
  processed: number
  stopReason: StopReason
}

function tally(stats: CrawlStats, outcome: CrawlOutcome): void {
  switch (outcome.kind) {
    case 'done':
      stats.crawled++
      stats.linksFound += outcome.linksFound
      stats.queued += outcome.queued
      break
    case 'blocked':
      stats.blocked++
      break
    case 'failed':
      stats.failed++
      break
    case 'skipped':
    case 'interrupted':
      break
  }
}

/**
 * Drain the frontier through one worker, sequentially.
 *
 * Stops on the page limit, an empty frontier, or the abort signal. An abort lets
 * the in-flight URL finish its current step; final statistics are always emitted.
 */
export async function runCrawlLoop(
  frontier: FrontierManager,
  worker: CrawlWorker,
  options: CrawlLoopOptions = {}
): Promise<CrawlRunResult> {
  const log = options.logger ?? loggers.worker
  const statsInterval = options.statsInterval ?? 10
  const stats = emptyStats()
  let processed = 0
  let stopReason: StopReason = 'frontier_empty'

  log.info('Crawl started', { maxPages: options.maxPages ?? null })

  try {
    while (true) {
      if (options.signal?.aborted) {
        stopReason = 'interrupted'
        break
      }
      if (options.maxPages !== undefined && processed >= options.maxPages) {
        stopReason = 'max_pages'
        break
      }

      // A frontier store failure ends the run; it propagates after the final stats
      const url = await frontier.dequeue()
      if (url === null) {
        stopReason = 'frontier_empty'
        break
      }

      const outcome = await worker.crawl(url, options.signal)
      processed++
      tally(stats, outcome)

      if (outcome.kind === 'interrupted') {
        stopReason = 'interrupted'
        break
      }

      if (processed % statsInterval === 0) {
        recordCrawlStats(stats, { processed, final: false }, log)
      }
    }
  } finally {
    recordCrawlStats(stats, { processed, final: true }, log)
  }

  log.info('Crawl finished', { stopReason, processed })

  return { stats, processed, stopReason }
}
