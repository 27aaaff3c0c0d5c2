/**
 * Authority (0-100): TLD prestige + backlinks + .edu/.gov referrers.
 * Results are cached per domain (7 days by default).
 */

import { cached, type Cache } from '../cache/ttl-cache.js'
import type { ReferrerCounts, ScoringRepository } from '../repository/scoring-repository.js'
import { bareDomain, hasSuffix } from './domain.js'
import { scored, type DimensionResult } from './result.js'

const ACADEMIC_SUFFIXES = ['.edu', '.ac.uk', '.ac.in', '.edu.au'] as const

export interface AuthorityDetails {
  tldScore: number
  backlinkScore: number
  externalAuthorityScore: number
  backlinks: number
  referrers: ReferrerCounts
  total: number
}

export function tldPoints(domain: string): number {
  const host = bareDomain(domain)
  if (host.endsWith('.gov')) return 50
  if (hasSuffix(host, ACADEMIC_SUFFIXES)) return 45
  if (host.endsWith('.org')) return 30
  if (hasSuffix(host, ['.com', '.net'])) return 20
  return 10
}

export function backlinkPoints(count: number): number {
  if (count === 0) return 0
  if (count <= 5) return 10
  if (count <= 20) return 20
  return 30
}

export function externalAuthorityPoints(referrers: ReferrerCounts): number {
  return Math.min(20, (referrers.edu > 0 ? 10 : 0) + (referrers.gov > 0 ? 10 : 0))
}

export class AuthorityScorer {
  constructor(
    private readonly repository: Pick<ScoringRepository, 'countBacklinks' | 'countReferrers'>,
    private readonly cache: Cache<DimensionResult<AuthorityDetails>>
  ) {}

  score(url: string, domain: string): Promise<DimensionResult<AuthorityDetails>> {
    return cached(this.cache, domain, () => this.compute(url, domain))
  }

  private async compute(url: string, domain: string): Promise<DimensionResult<AuthorityDetails>> {
    const tldScore = tldPoints(domain)
    const backlinks = await this.repository.countBacklinks(url)
    const referrers = await this.repository.countReferrers(url)
    const backlinkScore = backlinkPoints(backlinks)
    const externalAuthorityScore = externalAuthorityPoints(referrers)
    const total = tldScore + backlinkScore + externalAuthorityScore

    return scored(total, { tldScore, backlinkScore, externalAuthorityScore, backlinks, referrers, total })
  }
}
