/**
 * Org Blocklist Override
 *
 * Domains flagged by a civil-rights organization are never indexed;
 * the composite short-circuits to 0 before any other dimension runs.
 */

import { cached, type Cache } from '../cache/ttl-cache.js'
import type { OrgBlocklistRecord, ScoringRepository } from '../repository/scoring-repository.js'
import { bareDomain } from './domain.js'

export type OrgDecision = { blocked: false } | { blocked: true; reason: string; organizations: string[] }

const ORG_FLAGS: ReadonlyArray<[keyof OrgBlocklistRecord, string]> = [
  ['splc', 'SPLC'],
  ['aclu', 'ACLU'],
  ['cair', 'CAIR'],
  ['adl', 'ADL'],
  ['other', 'Other'],
]

export function orgDecision(record: OrgBlocklistRecord | null): OrgDecision {
  if (record === null) return { blocked: false }

  const organizations = ORG_FLAGS.filter(([flag]) => record[flag] === true).map(([, name]) => name)
  if (organizations.length === 0) return { blocked: false }

  let reason = `Flagged by: ${organizations.join(', ')}`
  if (record.reason) {
    reason += ` - ${record.reason}`
  }
  return { blocked: true, reason, organizations }
}

export class OrgBlocklistChecker {
  constructor(
    private readonly repository: Pick<ScoringRepository, 'findOrgBlocklist'>,
    private readonly cache: Cache<OrgDecision>
  ) {}

  check(domain: string): Promise<OrgDecision> {
    const key = bareDomain(domain)
    return cached(this.cache, key, async () => orgDecision(await this.repository.findOrgBlocklist(key)))
  }
}
