import { describe, it, expect, vi, beforeAll, afterAll } from 'vitest'
import { setLogLevel } from '@sirat/logger'
import { NoCache } from '../cache/ttl-cache.js'
import { buildCompositeScorer } from '../composite/build.js'
import { CompositeScorer, combine, roundHalfEven, toScoreRecord, type PageInput } from '../composite/composite-scorer.js'
import { isIndexable } from '../composite/tiers.js'
import { AuthorityScorer, type AuthorityDetails } from '../dimensions/authority.js'
import { EquityScorer, type EquityDetails } from '../dimensions/equity.js'
import { IslamicAlignmentScorer } from '../dimensions/islamic-alignment.js'
import { KeywordIndexLoader, type KeywordIndex } from '../dimensions/keywords.js'
import { OrgBlocklistChecker, type OrgDecision } from '../dimensions/org-blocklist.js'
import { QualityScorer } from '../dimensions/quality.js'
import { SentenceLengthReadability } from '../dimensions/readability.js'
import type { DimensionResult } from '../dimensions/result.js'
import type { MediaLiteracyResult } from '../media-literacy/gateway.js'
import { FakeScoringRepository, equityRecord, orgRecord } from './fake-repository.js'

const NOW = new Date('2026-06-01T00:00:00Z')
const DAY = 24 * 60 * 60 * 1000

/** Quality 65 on https with a domain first seen 100 days ago. */
const ARTICLE = `OVERVIEW\n${Array.from({ length: 120 }, (_, i) => `word${i}`).join(' ')}.`

const PAGE: PageInput = {
  pageId: 1,
  url: 'https://example.org/article',
  title: 'Article',
  content: ARTICLE,
  domain: 'example.org',
  crawledAt: new Date(NOW.getTime() - 10 * DAY),
}

const MEDIA_40: MediaLiteracyResult = {
  score: 40,
  details: {
    status: 'analyzed',
    modelUsed: 'vendor/primary',
    majorRedFlags: [],
    minorConcerns: ['statistical_manipulation'],
    explanation: 'Mixed sourcing.',
    contextBoxNeeded: false,
    contextBoxText: '',
    rawScore: 40,
    fallbackUsed: false,
    triggeredBy: ['hoax', 'cover up'],
  },
}

function setup() {
  const repository = new FakeScoringRepository()
  repository.firstSeen.set('example.org', new Date(NOW.getTime() - 100 * DAY))
  const media = { score: vi.fn(async (): Promise<MediaLiteracyResult> => MEDIA_40) }
  const scorer = new CompositeScorer({
    orgBlocklist: new OrgBlocklistChecker(repository, new NoCache<OrgDecision>()),
    alignment: new IslamicAlignmentScorer(new KeywordIndexLoader(repository, new NoCache<KeywordIndex>())),
    quality: new QualityScorer({ repository, readability: new SentenceLengthReadability(), now: () => NOW }),
    authority: new AuthorityScorer(repository, new NoCache<DimensionResult<AuthorityDetails>>()),
    media,
    equity: new EquityScorer(repository, new NoCache<DimensionResult<EquityDetails>>()),
    repository,
    now: () => NOW,
  })
  return { repository, media, scorer }
}

describe('combine', () => {
  it('weights the five dimensions', () => {
    expect(combine({ islamicNormalized: 50, quality: 50, authority: 50, mediaLiteracy: 50, equityBoost: 0 })).toBe(45)
    expect(combine({ islamicNormalized: 10, quality: 10, authority: 10, mediaLiteracy: 10, equityBoost: 0 })).toBe(9)
    expect(combine({ islamicNormalized: 100, quality: 100, authority: 100, mediaLiteracy: 100, equityBoost: 30 })).toBe(93)
  })

  it('rounds ties to even, so 24.5 stays below the index threshold', () => {
    // 13.5 + 3.5 + 0 + 7.5
    const composite = combine({ islamicNormalized: 45, quality: 14, authority: 0, mediaLiteracy: 50, equityBoost: 0 })
    expect(composite).toBe(24)
    expect(isIndexable(composite)).toBe(false)
  })

  it('rounds half to even', () => {
    expect([0.5, 1.5, 2.5, 25.5, 2.4, 2.6, -2.5].map(roundHalfEven)).toEqual([0, 2, 2, 26, 2, 3, -2])
  })
})

describe('CompositeScorer', () => {
  beforeAll(() => setLogLevel('fatal'))
  afterAll(() => setLogLevel(null))

  it('scores every dimension and persists the result', async () => {
    const { repository, scorer } = setup()

    const result = await scorer.score(PAGE)

    expect(result).toMatchObject({
      pageId: 1,
      url: 'https://example.org/article',
      scoredAt: NOW,
      islamicAlignmentScore: 0,
      qualityScore: 80,
      authorityScore: 30,
      mediaLiteracyScore: 40,
      equityBoost: 0,
      finalCompositeScore: 47,
      indexable: true,
      rankTier: 'medium',
      blocklistReason: null,
    })
    expect(result.components).toMatchObject({
      orgBlocked: false,
      islamicAlignment: { rawScore: 0, normalizedScore: 50 },
      quality: { score: 80, freshness: 15 },
      mediaLiteracy: { score: 40, degraded: null },
      degraded: [],
    })
    expect(repository.saved).toEqual([toScoreRecord(result)])
  })

  it('adds the equity boost', async () => {
    const { repository, scorer } = setup()
    repository.equity.set('example.org', equityRecord('example.org', { bCorp: true }))

    const result = await scorer.evaluate(PAGE)

    // 15 + 20 + 6 + 6 + 1
    expect(result.equityBoost).toBe(10)
    expect(result.finalCompositeScore).toBe(48)
  })

  it('short-circuits an org-blocklisted domain to zero', async () => {
    const { repository, media, scorer } = setup()
    repository.orgBlocklist.set('example.org', orgRecord('example.org', { splc: true, reason: 'Hate group' }))

    const result = await scorer.score({ ...PAGE, domain: 'www.example.org' })

    expect(result).toEqual({
      pageId: 1,
      url: 'https://example.org/article',
      scoredAt: NOW,
      islamicAlignmentScore: null,
      qualityScore: null,
      authorityScore: null,
      mediaLiteracyScore: null,
      equityBoost: null,
      finalCompositeScore: 0,
      indexable: false,
      rankTier: 'exclude',
      blocklistReason: 'Flagged by: SPLC - Hate group',
      components: { orgBlocked: true, reason: 'Flagged by: SPLC - Hate group', organizations: ['SPLC'] },
    })
    expect(media.score).not.toHaveBeenCalled()
    expect(repository.saved).toHaveLength(1)
  })

  it('treats a failed org lookup as not flagged', async () => {
    const { repository, scorer } = setup()
    vi.spyOn(repository, 'findOrgBlocklist').mockRejectedValue(new Error('connection reset'))

    const result = await scorer.evaluate(PAGE)

    expect(result.finalCompositeScore).toBe(47)
    expect(result.blocklistReason).toBeNull()
  })

  it('degrades a failing dimension to its fallback score', async () => {
    const { repository, scorer } = setup()
    vi.spyOn(repository, 'countBacklinks').mockRejectedValue(new Error('connection reset'))

    const result = await scorer.evaluate(PAGE)

    // 15 + 20 + 0 + 6
    expect(result.authorityScore).toBe(0)
    expect(result.finalCompositeScore).toBe(41)
    expect(result.components).toMatchObject({
      authority: { ok: false, score: 0, reason: 'connection reset' },
      degraded: ['authority'],
    })
  })

  it('uses a neutral media score when the media scorer throws', async () => {
    const { media, scorer } = setup()
    media.score.mockRejectedValue(new Error('boom'))

    const result = await scorer.evaluate(PAGE)

    expect(result.mediaLiteracyScore).toBe(50)
    expect(result.components).toMatchObject({
      mediaLiteracy: { score: 50, details: null, degraded: 'boom' },
      degraded: ['media_literacy'],
    })
  })

  it('omits freshness when the crawl time is unknown', async () => {
    const { scorer } = setup()
    const result = await scorer.evaluate({ ...PAGE, crawledAt: null })
    expect(result.qualityScore).toBe(65)
    expect(result.components).toMatchObject({ quality: { score: 65, freshness: null } })
  })

  it('stores the raw alignment score and normalizes it for the composite', async () => {
    const { repository, scorer } = setup()
    repository.keywords = [{ keyword: 'gambling', themeId: 1, principle: 'Maysir', category: 'haram_prohibited' }]

    const result = await scorer.evaluate({ ...PAGE, content: `${ARTICLE} A study of gambling.` })

    // -10 x 0.3 research dampening
    expect(result.islamicAlignmentScore).toBe(-3)
    expect(result.components).toMatchObject({ islamicAlignment: { normalizedScore: 48.5 } })
  })
})

describe('buildCompositeScorer', () => {
  beforeAll(() => setLogLevel('fatal'))
  afterAll(() => setLogLevel(null))

  it('wires a scorer whose gateway skips clean content', async () => {
    const repository = new FakeScoringRepository()
    repository.firstSeen.set('example.org', new Date(NOW.getTime() - 100 * DAY))
    const completionClient = { complete: vi.fn() }

    const { scorer, gateway } = buildCompositeScorer(
      {
        media: {
          apiKey: null,
          baseUrl: 'https://router.test/api/v1',
          primaryModel: 'vendor/primary',
          fallbackModel: 'vendor/fallback',
          deniedModels: [],
          timeoutMs: 1000,
          maxTokens: 500,
          temperature: 0.3,
        },
        authorityTtlMs: 1000,
        lookupTtlMs: null,
        readability: 'sentence-length',
      },
      repository,
      { completionClient, now: () => NOW }
    )

    const result = await scorer.score(PAGE)

    // 15 + 20 + 6 + 7.5, tie rounds to even
    expect(result.finalCompositeScore).toBe(48)
    expect(result.mediaLiteracyScore).toBe(50)
    expect(completionClient.complete).not.toHaveBeenCalled()
    expect(gateway.stats()).toMatchObject({ totalCalls: 1, skippedNeutral: 1 })
  })
})
