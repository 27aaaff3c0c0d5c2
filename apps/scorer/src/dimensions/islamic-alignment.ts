/**
 * Islamic alignment: signed sum of matched keyword weights, clamped to [-100, 100].
 * The composite normalizes it to [0, 100] with (raw + 100) / 2.
 */

import { contextualWeight, detectContext, type ContentContext } from './context.js'
import type { KeywordIndexLoader } from './keywords.js'
import { scored, type DimensionResult } from './result.js'

export const MIN_CONTENT_LENGTH = 50
const TOP_MATCHES = 20

export interface CategoryTally {
  count: number
  total: number
}

export interface AlignmentBreakdown {
  rawScore: number
  clampedScore: number
  matchesCount: number
  categories: Record<string, CategoryTally>
  context: ContentContext
  topMatches: Array<{ keyword: string; theme: string; category: string; weight: number }>
}

export type AlignmentDetails = AlignmentBreakdown | { reason: 'content_too_short' | 'no_keywords_matched' }

export function normalizeAlignment(raw: number): number {
  return (raw + 100) / 2
}

export class IslamicAlignmentScorer {
  constructor(private readonly keywords: KeywordIndexLoader) {}

  async score(content: string, domain: string): Promise<DimensionResult<AlignmentDetails>> {
    if (content.trim().length < MIN_CONTENT_LENGTH) {
      return scored(0, { reason: 'content_too_short' })
    }

    const index = await this.keywords.load()
    const context = detectContext(content, domain)
    const matches = index.match(content)
    if (matches.length === 0) {
      return scored(0, { reason: 'no_keywords_matched' })
    }

    const categories: Record<string, CategoryTally> = {}
    const detail: AlignmentBreakdown['topMatches'] = []
    let raw = 0

    for (const { keyword, theme } of matches) {
      const weight = contextualWeight(theme.weight, context)
      const tally = categories[theme.category] ?? { count: 0, total: 0 }
      tally.count++
      tally.total += weight
      categories[theme.category] = tally
      raw += weight
      detail.push({ keyword, theme: theme.principle, category: theme.category, weight })
    }

    const clamped = Math.max(-100, Math.min(100, raw))
    return scored(clamped, {
      rawScore: raw,
      clampedScore: clamped,
      matchesCount: matches.length,
      categories,
      context,
      topMatches: detail.slice(0, TOP_MATCHES),
    })
  }
}
