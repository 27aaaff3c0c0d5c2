import type { ILogger } from '@sirat/logger'
import type { CompositeScorer, ScoringResult } from '../../composite/composite-scorer.js'
import type { ScoringRepository } from '../../repository/scoring-repository.js'
import { loggers } from '../../config/logger.js'

const PROGRESS_INTERVAL = 100

export type ScoreTarget = { kind: 'page'; pageId: number } | { kind: 'all'; limit?: number } | { kind: 'unscored'; limit?: number }

export interface ScoreRunSummary {
  total: number
  scored: number
  failed: number
  indexable: number
}

/**
 * Score one stored page.
 * @throws Error when the page does not exist
 */
export async function scorePageById(
  scorer: CompositeScorer,
  repository: Pick<ScoringRepository, 'findPage'>,
  pageId: number
): Promise<ScoringResult> {
  const page = await repository.findPage(pageId)
  if (!page) {
    throw new Error(`Page ${pageId} not found`)
  }
  return scorer.score({
    pageId: page.id,
    url: page.url,
    title: page.title,
    content: page.content ?? '',
    domain: page.domain,
    crawledAt: page.crawledAt,
  })
}

/**
 * Score every selected page, continuing past individual failures.
 */
export async function runScoreCommand(
  target: ScoreTarget,
  scorer: CompositeScorer,
  repository: Pick<ScoringRepository, 'findPage' | 'listPageIds'>,
  log: ILogger = loggers.cli
): Promise<ScoreRunSummary> {
  const ids =
    target.kind === 'page'
      ? [target.pageId]
      : await repository.listPageIds({ unscoredOnly: target.kind === 'unscored', limit: target.limit })

  const summary: ScoreRunSummary = { total: ids.length, scored: 0, failed: 0, indexable: 0 }
  log.info('Scoring pages', { target: target.kind, total: ids.length })

  for (const [i, pageId] of ids.entries()) {
    try {
      const result = await scorePageById(scorer, repository, pageId)
      summary.scored++
      if (result.indexable) summary.indexable++
    } catch (error) {
      summary.failed++
      log.error('Scoring failed', { pageId }, error)
    }

    if ((i + 1) % PROGRESS_INTERVAL === 0) {
      log.info('Progress', { done: i + 1, total: ids.length })
    }
  }

  log.info('Scoring complete', { ...summary })
  return summary
}
