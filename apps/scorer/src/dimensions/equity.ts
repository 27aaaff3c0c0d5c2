import { cached, type Cache } from '../cache/ttl-cache.js'
import type { EquityRecord, ScoringRepository } from '../repository/scoring-repository.js'
import { bareDomain } from './domain.js'
import { scored, type DimensionResult } from './result.js'

export const EQUITY_CAP = 30

const BONUSES: ReadonlyArray<[keyof Omit<EquityRecord, 'domain'>, number]> = [
  ['minorityOwned', 15],
  ['womenOwned', 15],
  ['veteranOwned', 15],
  ['bCorp', 10],
  ['lgbtqOwned', 15],
  ['disabilityOwned', 15],
]

export type EquityDetails = { reason: 'not_in_equity_list' } | { certifications: string[]; rawBoost: number; totalBoost: number }

export function equityBoost(record: EquityRecord): { certifications: string[]; rawBoost: number; totalBoost: number } {
  const certifications: string[] = []
  let rawBoost = 0
  for (const [flag, bonus] of BONUSES) {
    if (record[flag]) {
      certifications.push(flag)
      rawBoost += bonus
    }
  }
  return { certifications, rawBoost, totalBoost: Math.min(EQUITY_CAP, rawBoost) }
}

/**
 * Ownership/certification bonus, 0-30, cached per bare domain.
 */
export class EquityScorer {
  constructor(
    private readonly repository: Pick<ScoringRepository, 'findEquity'>,
    private readonly cache: Cache<DimensionResult<EquityDetails>>
  ) {}

  score(domain: string): Promise<DimensionResult<EquityDetails>> {
    const key = bareDomain(domain)
    return cached(this.cache, key, async (): Promise<DimensionResult<EquityDetails>> => {
      const record = await this.repository.findEquity(key)
      if (record === null) {
        return scored(0, { reason: 'not_in_equity_list' })
      }
      const boost = equityBoost(record)
      return scored(boost.totalBoost, boost)
    })
  }
}
