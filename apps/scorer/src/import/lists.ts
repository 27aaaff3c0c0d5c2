/**
 * Curated list files for the org blocklist and equity tables.
 *
 * Both are JSON arrays of per-domain entries; omitted flags default to false.
 */

import { readFile } from 'fs/promises'
import { z } from 'zod'
import type { EquityRecord, OrgBlocklistRecord } from '../repository/scoring-repository.js'

export function normalizeListDomain(domain: string): string {
  const lowered = domain.trim().toLowerCase()
  return lowered.startsWith('www.') ? lowered.slice(4) : lowered
}

const domainField = z
  .string()
  .transform(normalizeListDomain)
  .pipe(z.string().min(1, 'domain is empty').regex(/^[a-z0-9.-]+$/, 'domain must be a bare host name'))

const flag = z.boolean().default(false)

const orgEntrySchema = z.object({
  domain: domainField,
  splc: flag,
  aclu: flag,
  cair: flag,
  adl: flag,
  other: flag,
  reason: z.string().min(1).nullable().default(null),
})

const equityEntrySchema = z.object({
  domain: domainField,
  minorityOwned: flag,
  womenOwned: flag,
  veteranOwned: flag,
  bCorp: flag,
  lgbtqOwned: flag,
  disabilityOwned: flag,
})

export const orgListSchema = z.array(orgEntrySchema)
export const equityListSchema = z.array(equityEntrySchema)

/** Later entries for the same domain replace earlier ones. */
function lastPerDomain<T extends { domain: string }>(entries: T[]): T[] {
  return [...new Map(entries.map((entry) => [entry.domain, entry])).values()]
}

export function parseOrgList(raw: unknown): OrgBlocklistRecord[] {
  return lastPerDomain(orgListSchema.parse(raw))
}

export function parseEquityList(raw: unknown): EquityRecord[] {
  return lastPerDomain(equityListSchema.parse(raw))
}

export async function readJsonFile(path: string): Promise<unknown> {
  return JSON.parse(await readFile(path, 'utf-8'))
}
