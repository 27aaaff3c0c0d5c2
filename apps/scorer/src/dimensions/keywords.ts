/**
 * Keyword/Theme Index
 *
 * keyword -> themes it belongs to, with each theme's signed category weight.
 * Built once from the theme tables and matched as whole words.
 */

import { cached, type Cache } from '../cache/ttl-cache.js'
import type { ScoringRepository, ThemeKeywordRow } from '../repository/scoring-repository.js'

export const CATEGORY_WEIGHTS: Readonly<Record<string, number>> = {
  haram_prohibited: -10,
  halal_encouraged: 5,
  core_values: 3,
  social_ethics: 3,
}

export interface ThemeRef {
  themeId: number
  principle: string
  category: string
  /** Category weight; 0 for an unknown category */
  weight: number
}

export interface KeywordMatch {
  keyword: string
  theme: ThemeRef
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

export class KeywordIndex {
  private readonly entries: Array<{ keyword: string; pattern: RegExp; themes: ThemeRef[] }>

  private constructor(map: Map<string, ThemeRef[]>) {
    this.entries = [...map].map(([keyword, themes]) => ({
      keyword,
      // Whole word in any script: no letter, digit or underscore on either side
      pattern: new RegExp(`(?<![\\p{L}\\p{N}_])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}_])`, 'u'),
      themes,
    }))
  }

  static fromRows(rows: ThemeKeywordRow[]): KeywordIndex {
    const map = new Map<string, ThemeRef[]>()
    for (const row of rows) {
      const keyword = row.keyword.trim().normalize('NFC').toLowerCase()
      if (!keyword) continue
      const themes = map.get(keyword) ?? []
      themes.push({
        themeId: row.themeId,
        principle: row.principle,
        category: row.category,
        weight: CATEGORY_WEIGHTS[row.category] ?? 0,
      })
      map.set(keyword, themes)
    }
    return new KeywordIndex(map)
  }

  get size(): number {
    return this.entries.length
  }

  /**
   * One match per (keyword, theme) for every keyword present as a whole word.
   */
  match(content: string): KeywordMatch[] {
    const lowered = content.normalize('NFC').toLowerCase()
    const matches: KeywordMatch[] = []
    for (const { keyword, pattern, themes } of this.entries) {
      if (!pattern.test(lowered)) continue
      for (const theme of themes) matches.push({ keyword, theme })
    }
    return matches
  }
}

const INDEX_KEY = 'keywords'

/**
 * Loads the index on first use and keeps it in `cache` (process lifetime unless a TTL is set).
 */
export class KeywordIndexLoader {
  constructor(
    private readonly repository: Pick<ScoringRepository, 'loadThemeKeywords'>,
    private readonly cache: Cache<KeywordIndex>
  ) {}

  load(): Promise<KeywordIndex> {
    return cached(this.cache, INDEX_KEY, async () => KeywordIndex.fromRows(await this.repository.loadThemeKeywords()))
  }
}
