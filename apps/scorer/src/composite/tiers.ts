export type RankTier = 'exclude' | 'low' | 'medium' | 'high'

/** Pages below this composite are not indexed. */
export const INDEX_THRESHOLD = 25

export function isIndexable(composite: number): boolean {
  return composite >= INDEX_THRESHOLD
}

/**
 * Informative rank band; only the index threshold gates anything.
 */
export function rankTier(composite: number): RankTier {
  if (composite < INDEX_THRESHOLD) return 'exclude'
  if (composite < 40) return 'low'
  if (composite < 50) return 'medium'
  return 'high'
}
