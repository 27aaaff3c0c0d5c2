/**
 * Quality (0-100 before freshness)
 *
 *   readability        0-15
 *   content length     0-10
 *   structure          0-15
 *   grammar/uniqueness 0-15
 *   technical          0-30  (SSL 10, domain age 0-15, mobile 5)
 *
 * Freshness (0-15) is added by the composite from the crawl time.
 */

import type { ScoringRepository } from '../repository/scoring-repository.js'
import type { ReadabilityScorer } from './readability.js'
import { words } from './readability.js'
import { scored, type DimensionResult } from './result.js'

const DAY_MS = 24 * 60 * 60 * 1000
export const MIN_CONTENT_LENGTH = 50

/** Domain-age points when the domain has no recorded crawl. */
const UNKNOWN_DOMAIN_AGE_POINTS = 5

export interface QualityBreakdown {
  readability: number
  contentLength: number
  structuralQuality: number
  grammarUniqueness: number
  hasSsl: boolean
  domainAgeScore: number
  mobileOptimized: true
  total: number
}

export type QualityDetails = QualityBreakdown | { reason: 'content_too_short' }

export function ageInDays(from: Date, now: Date): number {
  return Math.floor((now.getTime() - from.getTime()) / DAY_MS)
}

export function contentLengthPoints(wordCount: number): number {
  if (wordCount < 100) return 0
  if (wordCount < 500) return 5
  if (wordCount <= 2000) return 10
  return 8
}

/** At least one cased character and none in lower case. */
function isUpperCaseLine(line: string): boolean {
  return line !== line.toLowerCase() && line === line.toUpperCase()
}

export function structuralPoints(content: string): number {
  let points = 0

  if (content.split('\n').some((line) => line.length < 100 && isUpperCaseLine(line))) {
    points += 5
  }

  if ((content.match(/\n/g) ?? []).length > 5) {
    points += 5
  }

  const lowered = words(content.toLowerCase())
  if (lowered.length > 50 && new Set(lowered).size / lowered.length > 0.4) {
    points += 5
  }

  return points
}

export function grammarPoints(content: string): number {
  const all = words(content)
  if (all.length <= 50) return 5
  return Math.min(15, Math.floor((new Set(all).size / all.length) * 20))
}

export function domainAgePoints(firstSeen: Date | null, now: Date): number {
  if (firstSeen === null) return UNKNOWN_DOMAIN_AGE_POINTS
  const days = ageInDays(firstSeen, now)
  if (days < 7) return 0
  if (days < 30) return 5
  if (days < 90) return 10
  return 15
}

export function freshnessPoints(crawledAt: Date, now: Date): number {
  const days = ageInDays(crawledAt, now)
  if (days < 30) return 15
  if (days < 90) return 10
  if (days < 365) return 5
  return 2
}

export interface QualityScorerDeps {
  repository: Pick<ScoringRepository, 'firstCrawledAt'>
  readability: ReadabilityScorer
  now?: () => Date
}

export class QualityScorer {
  private readonly now: () => Date

  constructor(private readonly deps: QualityScorerDeps) {
    this.now = deps.now ?? (() => new Date())
  }

  async score(page: { url: string; domain: string; content: string }): Promise<DimensionResult<QualityDetails>> {
    const { content } = page
    if (content.trim().length < MIN_CONTENT_LENGTH) {
      return scored(0, { reason: 'content_too_short' })
    }

    const readability = this.deps.readability.score(content)
    const contentLength = contentLengthPoints(words(content).length)
    const structuralQuality = structuralPoints(content)
    const grammarUniqueness = grammarPoints(content)

    const hasSsl = page.url.toLowerCase().startsWith('https://')
    const domainAgeScore = domainAgePoints(await this.deps.repository.firstCrawledAt(page.domain), this.now())
    const technical = (hasSsl ? 10 : 0) + domainAgeScore + 5

    const total = Math.min(100, readability + contentLength + structuralQuality + grammarUniqueness + technical)

    return scored(total, {
      readability,
      contentLength,
      structuralQuality,
      grammarUniqueness,
      hasSsl,
      domainAgeScore,
      mobileOptimized: true,
      total,
    })
  }
}
