/**
 * Composite Scoring Engine
 *
 * org blocklist override, then five weighted dimensions:
 *
 *   islamic alignment (normalized)  0.30
 *   quality (+ freshness)           0.25
 *   authority                       0.20
 *   media literacy                  0.15
 *   equity boost                    0.10
 *
 * Dimensions run one after another; a failing dimension degrades to its
 * fallback score and is listed in `components.degraded`.
 */

import type { ILogger } from '@sirat/logger'
import type { AuthorityDetails, AuthorityScorer } from '../dimensions/authority.js'
import type { EquityDetails, EquityScorer } from '../dimensions/equity.js'
import { normalizeAlignment, type AlignmentDetails, type IslamicAlignmentScorer } from '../dimensions/islamic-alignment.js'
import type { OrgBlocklistChecker, OrgDecision } from '../dimensions/org-blocklist.js'
import { freshnessPoints, type QualityDetails, type QualityScorer } from '../dimensions/quality.js'
import { guard, type DimensionResult } from '../dimensions/result.js'
import { NEUTRAL_SCORE, type MediaLiteracyDetails, type MediaLiteracyScorer } from '../media-literacy/gateway.js'
import type { ScoreRecord, ScoringRepository } from '../repository/scoring-repository.js'
import { isIndexable, rankTier, type RankTier } from './tiers.js'
import { loggers } from '../config/logger.js'

export const WEIGHTS = {
  islamicAlignment: 0.3,
  quality: 0.25,
  authority: 0.2,
  mediaLiteracy: 0.15,
  equityBoost: 0.1,
} as const

export interface ComponentScores {
  islamicNormalized: number
  quality: number
  authority: number
  mediaLiteracy: number
  equityBoost: number
}

/**
 * Nearest integer, ties to even. A tie is anything within 1e-9 of .5, since the
 * weighted sum carries binary float error.
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value)
  if (Math.abs(value - floor - 0.5) < 1e-9) {
    return floor % 2 === 0 ? floor : floor + 1
  }
  return Math.round(value)
}

export function combine(scores: ComponentScores): number {
  return roundHalfEven(
    scores.islamicNormalized * WEIGHTS.islamicAlignment +
      scores.quality * WEIGHTS.quality +
      scores.authority * WEIGHTS.authority +
      scores.mediaLiteracy * WEIGHTS.mediaLiteracy +
      scores.equityBoost * WEIGHTS.equityBoost
  )
}

export interface PageInput {
  pageId: number
  url: string
  title: string | null
  content: string
  domain: string
  crawledAt: Date | null
}

export type ScoreComponents =
  | { orgBlocked: true; reason: string; organizations: string[] }
  | {
      orgBlocked: false
      islamicAlignment: { rawScore: number; normalizedScore: number; result: DimensionResult<AlignmentDetails> }
      quality: { score: number; freshness: number | null; result: DimensionResult<QualityDetails> }
      authority: DimensionResult<AuthorityDetails>
      mediaLiteracy: { score: number; details: MediaLiteracyDetails | null; degraded: string | null }
      equityBoost: DimensionResult<EquityDetails>
      degraded: string[]
    }

export interface ScoringResult {
  pageId: number
  url: string
  scoredAt: Date
  islamicAlignmentScore: number | null
  qualityScore: number | null
  authorityScore: number | null
  mediaLiteracyScore: number | null
  equityBoost: number | null
  finalCompositeScore: number
  indexable: boolean
  rankTier: RankTier
  blocklistReason: string | null
  components: ScoreComponents
}

export interface CompositeScorerDeps {
  orgBlocklist: OrgBlocklistChecker
  alignment: IslamicAlignmentScorer
  quality: QualityScorer
  authority: AuthorityScorer
  media: MediaLiteracyScorer
  equity: EquityScorer
  repository: Pick<ScoringRepository, 'saveScore'>
  now?: () => Date
  logger?: ILogger
}

export class CompositeScorer {
  private readonly deps: CompositeScorerDeps
  private readonly now: () => Date
  private readonly log: ILogger

  constructor(deps: CompositeScorerDeps) {
    this.deps = deps
    this.now = deps.now ?? (() => new Date())
    this.log = deps.logger ?? loggers.composite
  }

  /**
   * Compute the composite without persisting it.
   */
  async evaluate(page: PageInput): Promise<ScoringResult> {
    const scoredAt = this.now()
    const log = this.log.child({ pageId: page.pageId })

    const org = await this.checkOrgBlocklist(page.domain, log)
    if (org.blocked) {
      log.warn('Blocked by org blocklist', { url: page.url, reason: org.reason })
      return {
        pageId: page.pageId,
        url: page.url,
        scoredAt,
        islamicAlignmentScore: null,
        qualityScore: null,
        authorityScore: null,
        mediaLiteracyScore: null,
        equityBoost: null,
        finalCompositeScore: 0,
        indexable: false,
        rankTier: rankTier(0),
        blocklistReason: org.reason,
        components: { orgBlocked: true, reason: org.reason, organizations: org.organizations },
      }
    }

    const alignment = await guard('islamic_alignment', 0, log, () =>
      this.deps.alignment.score(page.content, page.domain)
    )
    const islamicNormalized = normalizeAlignment(alignment.score)

    const quality = await guard('quality', 0, log, () =>
      this.deps.quality.score({ url: page.url, domain: page.domain, content: page.content })
    )
    const freshness = page.crawledAt ? freshnessPoints(page.crawledAt, scoredAt) : null
    const qualityScore = Math.min(100, quality.score + (freshness ?? 0))

    const authority = await guard('authority', 0, log, () => this.deps.authority.score(page.url, page.domain))

    const media = await this.scoreMedia(page, log)

    const equity = await guard('equity_boost', 0, log, () => this.deps.equity.score(page.domain))

    const finalCompositeScore = combine({
      islamicNormalized,
      quality: qualityScore,
      authority: authority.score,
      mediaLiteracy: media.score,
      equityBoost: equity.score,
    })
    const indexable = isIndexable(finalCompositeScore)

    const degraded: string[] = []
    if (!alignment.ok) degraded.push('islamic_alignment')
    if (!quality.ok) degraded.push('quality')
    if (!authority.ok) degraded.push('authority')
    if (media.degraded !== null) degraded.push('media_literacy')
    if (!equity.ok) degraded.push('equity_boost')

    log.info('Page scored', { url: page.url, composite: finalCompositeScore, indexable, degraded })

    return {
      pageId: page.pageId,
      url: page.url,
      scoredAt,
      islamicAlignmentScore: Math.trunc(alignment.score),
      qualityScore,
      authorityScore: authority.score,
      mediaLiteracyScore: media.score,
      equityBoost: equity.score,
      finalCompositeScore,
      indexable,
      rankTier: rankTier(finalCompositeScore),
      blocklistReason: null,
      components: {
        orgBlocked: false,
        islamicAlignment: { rawScore: alignment.score, normalizedScore: islamicNormalized, result: alignment },
        quality: { score: qualityScore, freshness, result: quality },
        authority,
        mediaLiteracy: media,
        equityBoost: equity,
        degraded,
      },
    }
  }

  /**
   * Evaluate and persist: current scores on the page plus an audit row.
   */
  async score(page: PageInput): Promise<ScoringResult> {
    const result = await this.evaluate(page)
    await this.deps.repository.saveScore(toScoreRecord(result))
    return result
  }

  private async checkOrgBlocklist(domain: string, log: ILogger): Promise<OrgDecision> {
    try {
      return await this.deps.orgBlocklist.check(domain)
    } catch (error) {
      log.warn('Org blocklist lookup failed, treating domain as not flagged', { domain }, error)
      return { blocked: false }
    }
  }

  private async scoreMedia(
    page: PageInput,
    log: ILogger
  ): Promise<{ score: number; details: MediaLiteracyDetails | null; degraded: string | null }> {
    try {
      const { score, details } = await this.deps.media.score(page.content, page.domain, page.title)
      return { score, details, degraded: null }
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      log.warn('Dimension degraded', { dimension: 'media_literacy', fallbackScore: NEUTRAL_SCORE, reason }, error)
      return { score: NEUTRAL_SCORE, details: null, degraded: reason }
    }
  }
}

export function toScoreRecord(result: ScoringResult): ScoreRecord {
  return {
    pageId: result.pageId,
    url: result.url,
    islamicAlignmentScore: result.islamicAlignmentScore,
    qualityScore: result.qualityScore,
    authorityScore: result.authorityScore,
    mediaLiteracyScore: result.mediaLiteracyScore,
    equityBoost: result.equityBoost,
    finalCompositeScore: result.finalCompositeScore,
    indexable: result.indexable,
    rankTier: result.rankTier,
    blocklistReason: result.blocklistReason,
    components: result.components,
    scoredAt: result.scoredAt,
  }
}
