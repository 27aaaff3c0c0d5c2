/**
 * Wire a CompositeScorer from settings and a repository.
 */

import { NoCache, TtlCache, type Cache } from '../cache/ttl-cache.js'
import type { ScorerSettings } from '../config/settings.js'
import { AuthorityScorer } from '../dimensions/authority.js'
import { EquityScorer } from '../dimensions/equity.js'
import { IslamicAlignmentScorer } from '../dimensions/islamic-alignment.js'
import { KeywordIndexLoader } from '../dimensions/keywords.js'
import { OrgBlocklistChecker } from '../dimensions/org-blocklist.js'
import { QualityScorer } from '../dimensions/quality.js'
import { createReadabilityScorer } from '../dimensions/readability.js'
import { OpenRouterClient, type CompletionClient } from '../media-literacy/completion-client.js'
import { MediaLiteracyGateway } from '../media-literacy/gateway.js'
import type { ScoringRepository } from '../repository/scoring-repository.js'
import { CompositeScorer } from './composite-scorer.js'

export interface BuildOptions {
  /** Replace every cache with a no-op cache */
  disableCaches?: boolean
  completionClient?: CompletionClient
  now?: () => Date
}

export interface ScorerBundle {
  scorer: CompositeScorer
  gateway: MediaLiteracyGateway
}

export function buildCompositeScorer(
  settings: Pick<ScorerSettings, 'media' | 'authorityTtlMs' | 'lookupTtlMs' | 'readability'>,
  repository: ScoringRepository,
  options: BuildOptions = {}
): ScorerBundle {
  const now = options.now
  const clock = now ? () => now().getTime() : Date.now
  const cache = <V>(ttlMs: number | null): Cache<V> =>
    options.disableCaches ? new NoCache<V>() : new TtlCache<V>({ ttlMs, now: clock })

  const gateway = new MediaLiteracyGateway({
    client:
      options.completionClient ??
      new OpenRouterClient({
        apiKey: settings.media.apiKey,
        baseUrl: settings.media.baseUrl,
        timeoutMs: settings.media.timeoutMs,
      }),
    primaryModel: settings.media.primaryModel,
    fallbackModel: settings.media.fallbackModel,
    deniedModels: settings.media.deniedModels,
    maxTokens: settings.media.maxTokens,
    temperature: settings.media.temperature,
  })

  const scorer = new CompositeScorer({
    orgBlocklist: new OrgBlocklistChecker(repository, cache(settings.lookupTtlMs)),
    alignment: new IslamicAlignmentScorer(new KeywordIndexLoader(repository, cache(settings.lookupTtlMs))),
    quality: new QualityScorer({ repository, readability: createReadabilityScorer(settings.readability), now: options.now }),
    authority: new AuthorityScorer(repository, cache(settings.authorityTtlMs)),
    media: gateway,
    equity: new EquityScorer(repository, cache(settings.lookupTtlMs)),
    repository,
    now: options.now,
  })

  return { scorer, gateway }
}
