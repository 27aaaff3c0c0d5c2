/**
 * Context Classifier
 *
 * Heuristic signals that soften negative keyword weights. None of these are
 * authenticated: any page can mention "research" or sit under a `.edu` host.
 */

import { bareDomain, hasSuffix } from './domain.js'

export const EDUCATIONAL_SUFFIXES = ['.edu', '.gov', '.ac.uk', '.ac.in', '.edu.au'] as const

export const NEWS_DOMAINS = [
  'bbc.com',
  'bbc.co.uk',
  'reuters.com',
  'apnews.com',
  'ap.org',
  'aljazeera.com',
  'npr.org',
  'pbs.org',
] as const

export const RESEARCH_TERMS = [
  'research',
  'study',
  'paper',
  'journal',
  'academic',
  'university',
  'scholar',
  'peer-reviewed',
  'abstract',
] as const

/** Publication names that collide with negative keywords */
export const FALSE_POSITIVE_PATTERNS: readonly RegExp[] = [/\bbitch\s+magazine\b/, /\bthe\s+intercept\b/]

export interface ContentContext {
  isEducational: boolean
  isNews: boolean
  isResearch: boolean
  isFalsePositive: boolean
}

export function isNewsDomain(host: string): boolean {
  return NEWS_DOMAINS.some((news) => host === news || host.endsWith(`.${news}`))
}

export function detectContext(content: string, domain: string): ContentContext {
  const lowered = content.toLowerCase()
  const host = bareDomain(domain)

  return {
    isEducational: hasSuffix(host, EDUCATIONAL_SUFFIXES),
    isNews: isNewsDomain(host),
    isResearch: RESEARCH_TERMS.some((term) => lowered.includes(term)),
    isFalsePositive: FALSE_POSITIVE_PATTERNS.some((pattern) => pattern.test(lowered)),
  }
}

/**
 * Negative weights are dampened for academic (x0.3) or news (x0.5) context
 * and zeroed for a known false positive. Positive weights pass through.
 */
export function contextualWeight(weight: number, context: ContentContext): number {
  if (weight >= 0) return weight
  if (context.isFalsePositive) return 0
  if (context.isEducational || context.isResearch) return weight * 0.3
  if (context.isNews) return weight * 0.5
  return weight
}
