import { describe, it, expect } from 'vitest'
import { TtlCache } from '../cache/ttl-cache.js'
import { IslamicAlignmentScorer, normalizeAlignment } from '../dimensions/islamic-alignment.js'
import { KeywordIndexLoader, type KeywordIndex } from '../dimensions/keywords.js'
import type { ThemeKeywordRow } from '../repository/scoring-repository.js'
import { FakeScoringRepository } from './fake-repository.js'

function scorerWith(rows: ThemeKeywordRow[]): IslamicAlignmentScorer {
  const repository = new FakeScoringRepository()
  repository.keywords = rows
  return new IslamicAlignmentScorer(new KeywordIndexLoader(repository, new TtlCache<KeywordIndex>({ ttlMs: null })))
}

const ROWS: ThemeKeywordRow[] = [
  { keyword: 'charity', themeId: 1, principle: 'Zakat', category: 'core_values' },
  { keyword: 'honesty', themeId: 2, principle: 'Sidq', category: 'core_values' },
  { keyword: 'gambling', themeId: 3, principle: 'Maysir', category: 'haram_prohibited' },
]

describe('normalizeAlignment', () => {
  it('maps [-100, 100] onto [0, 100]', () => {
    expect(normalizeAlignment(-100)).toBe(0)
    expect(normalizeAlignment(0)).toBe(50)
    expect(normalizeAlignment(100)).toBe(100)
  })
})

describe('IslamicAlignmentScorer', () => {
  it('scores short content as zero', async () => {
    expect(await scorerWith(ROWS).score('charity', 'example.com')).toEqual({
      ok: true,
      score: 0,
      details: { reason: 'content_too_short' },
    })
  })

  it('scores zero when nothing matches', async () => {
    const result = await scorerWith(ROWS).score('A plain page about weather patterns over the northern hills.', 'example.com')
    expect(result).toEqual({ ok: true, score: 0, details: { reason: 'no_keywords_matched' } })
  })

  it('sums matched category weights', async () => {
    const result = await scorerWith(ROWS).score(
      'We value charity and honesty in every part of our neighbourhood work today.',
      'example.com'
    )

    expect(result).toEqual({
      ok: true,
      score: 6,
      details: {
        rawScore: 6,
        clampedScore: 6,
        matchesCount: 2,
        categories: { core_values: { count: 2, total: 6 } },
        context: { isEducational: false, isNews: false, isResearch: false, isFalsePositive: false },
        topMatches: [
          { keyword: 'charity', theme: 'Zakat', category: 'core_values', weight: 3 },
          { keyword: 'honesty', theme: 'Sidq', category: 'core_values', weight: 3 },
        ],
      },
    })
  })

  it('dampens negative keywords on academic domains', async () => {
    const result = await scorerWith(ROWS).score(
      'Gambling ruins families; these lecture notes explain the harms in detail.',
      'www.example.edu'
    )
    expect(result.score).toBeCloseTo(-3)
  })

  it('ignores negative keywords inside a known false positive', async () => {
    const result = await scorerWith(ROWS).score(
      'Bitch Magazine ran a long piece on gambling culture across the industry.',
      'example.com'
    )
    expect(result.score).toBe(0)
    expect(result.ok && 'matchesCount' in result.details && result.details.matchesCount).toBe(1)
  })

  it('clamps the sum to -100', async () => {
    const rows = Array.from({ length: 11 }, (_, i) => ({
      keyword: `vice${i}`,
      themeId: i,
      principle: `Vice ${i}`,
      category: 'haram_prohibited',
    }))
    const content = `${rows.map((row) => row.keyword).join(' ')} all appear in this one sentence.`

    const result = await scorerWith(rows).score(content, 'example.com')

    expect(result.score).toBe(-100)
    expect(result.ok && 'rawScore' in result.details && result.details.rawScore).toBe(-110)
  })
})
