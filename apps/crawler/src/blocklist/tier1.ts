/**
 * Tier-1 Blocklist
 *
 * Pre-fetch hard filter. Checks run in order and the first match wins:
 * 1. exact domain
 * 2. subdomain of a blocked domain
 * 3. blocked TLD suffix
 * 4. case-insensitive pattern search over the whole lower-cased URL
 *
 * A URL that does not parse is blocked (fail-closed).
 */

import { readFileSync } from 'fs'
import { z } from 'zod'

export interface BlockRules {
  domains: string[]
  tlds: string[]
  patterns: string[]
}

export type BlockDecision = { blocked: false; reason: null } | { blocked: true; reason: string }

export interface BlocklistStats {
  blockedDomains: number
  blockedTlds: number
  blockedPatterns: number
}

const blockRulesSchema = z.object({
  domains: z.array(z.string().min(1)),
  tlds: z.array(z.string().regex(/^\./, 'TLD must start with "."')),
  patterns: z.array(z.string().min(1)),
})

/**
 * Load and validate the rule set shipped beside this module.
 */
export function loadDefaultRules(): BlockRules {
  const raw: unknown = JSON.parse(readFileSync(new URL('./default-rules.json', import.meta.url), 'utf-8'))
  return blockRulesSchema.parse(raw)
}

/** Lower-case, trim and drop a leading `www.` so add/remove and lookup agree. */
export function normalizeDomain(domain: string): string {
  const lowered = domain.trim().toLowerCase()
  return lowered.startsWith('www.') ? lowered.slice(4) : lowered
}

const ALLOWED: BlockDecision = { blocked: false, reason: null }

interface CompiledPattern {
  source: string
  regex: RegExp
}

export class Tier1Blocklist {
  private readonly domains = new Set<string>()
  private readonly tlds = new Set<string>()
  private readonly patterns: CompiledPattern[] = []

  constructor(rules: BlockRules = loadDefaultRules()) {
    for (const domain of rules.domains) this.addDomain(domain)
    for (const tld of rules.tlds) this.tlds.add(tld.toLowerCase())
    for (const pattern of rules.patterns) this.addPattern(pattern)
  }

  isBlocked(url: string): BlockDecision {
    const lowered = url.toLowerCase()

    let host: string
    try {
      host = new URL(lowered).hostname
    } catch (error) {
      return { blocked: true, reason: `Invalid URL format: ${error instanceof Error ? error.message : String(error)}` }
    }
    if (!host) {
      return { blocked: true, reason: 'Invalid URL format: missing host' }
    }
    if (host.startsWith('www.')) {
      host = host.slice(4)
    }

    if (this.domains.has(host)) {
      return { blocked: true, reason: `Blocked domain: ${host}` }
    }

    for (const domain of this.domains) {
      if (host.endsWith(`.${domain}`)) {
        return { blocked: true, reason: `Blocked domain: ${domain}` }
      }
    }

    for (const tld of this.tlds) {
      if (host.endsWith(tld)) {
        return { blocked: true, reason: `Blocked TLD: ${tld}` }
      }
    }

    for (const { source, regex } of this.patterns) {
      if (regex.test(lowered)) {
        return { blocked: true, reason: `Blocked pattern: ${source}` }
      }
    }

    return ALLOWED
  }

  addDomain(domain: string): void {
    const normalized = normalizeDomain(domain)
    if (normalized) this.domains.add(normalized)
  }

  removeDomain(domain: string): void {
    this.domains.delete(normalizeDomain(domain))
  }

  /**
   * @throws SyntaxError when the pattern is not a valid regular expression
   */
  addPattern(pattern: string): void {
    // No `g` flag: RegExp.test would otherwise carry lastIndex between calls
    this.patterns.push({ source: pattern, regex: new RegExp(pattern, 'i') })
  }

  stats(): BlocklistStats {
    return {
      blockedDomains: this.domains.size,
      blockedTlds: this.tlds.size,
      blockedPatterns: this.patterns.length,
    }
  }
}
