/**
 * Scoring persistence
 *
 * Reads: keyword/theme table, org-blocklist and equity records by bare domain,
 * backlink and referrer counts by exact target URL, first crawl time per domain.
 * Writes: current score fields on `pages` plus one immutable audit row per run.
 */

import { withTransaction, type Pool } from '@sirat/db'

export interface PageToScore {
  id: number
  url: string
  domain: string
  title: string | null
  content: string | null
  crawledAt: Date | null
}

export interface ThemeKeywordRow {
  keyword: string
  themeId: number
  principle: string
  category: string
}

export interface OrgBlocklistRecord {
  domain: string
  splc: boolean
  aclu: boolean
  cair: boolean
  adl: boolean
  other: boolean
  reason: string | null
}

export interface EquityRecord {
  domain: string
  minorityOwned: boolean
  womenOwned: boolean
  veteranOwned: boolean
  bCorp: boolean
  lgbtqOwned: boolean
  disabilityOwned: boolean
}

/** Distinct referring domains ending in `.edu` / `.gov` */
export interface ReferrerCounts {
  edu: number
  gov: number
}

export interface ScoreRecord {
  pageId: number
  url: string
  /** Null for every component when the org blocklist short-circuited scoring */
  islamicAlignmentScore: number | null
  qualityScore: number | null
  authorityScore: number | null
  mediaLiteracyScore: number | null
  equityBoost: number | null
  finalCompositeScore: number
  indexable: boolean
  rankTier: string
  blocklistReason: string | null
  components: object
  scoredAt: Date
}

export interface PageListOptions {
  unscoredOnly: boolean
  limit?: number
}

export interface ScoringRepository {
  loadThemeKeywords(): Promise<ThemeKeywordRow[]>
  findOrgBlocklist(domain: string): Promise<OrgBlocklistRecord | null>
  findEquity(domain: string): Promise<EquityRecord | null>
  countBacklinks(url: string): Promise<number>
  countReferrers(url: string): Promise<ReferrerCounts>
  firstCrawledAt(domain: string): Promise<Date | null>
  saveScore(record: ScoreRecord): Promise<void>
  findPage(id: number): Promise<PageToScore | null>
  listPageIds(options: PageListOptions): Promise<number[]>
  upsertOrgBlocklist(records: OrgBlocklistRecord[]): Promise<number>
  upsertEquity(records: EquityRecord[]): Promise<number>
}

type PageRow = {
  id: string | number
  url: string
  domain: string
  title: string | null
  content: string | null
  crawled_at: Date | null
}

type OrgRow = {
  domain: string
  splc_flagged: boolean
  aclu_flagged: boolean
  cair_flagged: boolean
  adl_flagged: boolean
  other_org_flagged: boolean
  reason: string | null
}

type EquityRow = {
  domain: string
  minority_owned: boolean
  women_owned: boolean
  veteran_owned: boolean
  b_corp: boolean
  lgbtq_owned: boolean
  disability_owned: boolean
}

const UPDATE_PAGE_SCORES_SQL = `
  UPDATE pages
  SET islamic_alignment_score = $1,
      quality_score = $2,
      authority_score = $3,
      media_literacy_score = $4,
      equity_boost = $5,
      final_composite_score = $6,
      indexable = $7,
      scored_at = $8
  WHERE id = $9
`

const INSERT_SCORING_LOG_SQL = `
  INSERT INTO page_scoring_logs (
    page_id, url,
    islamic_alignment_score, quality_score, authority_score, media_literacy_score, equity_boost,
    final_composite_score, indexable, rank_tier, blocklist_reason, components, scored_at
  ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12::jsonb, $13)
`

const UPSERT_ORG_SQL = `
  INSERT INTO org_blocklist (domain, splc_flagged, aclu_flagged, cair_flagged, adl_flagged, other_org_flagged, reason)
  VALUES ($1, $2, $3, $4, $5, $6, $7)
  ON CONFLICT (domain) DO UPDATE SET
    splc_flagged = EXCLUDED.splc_flagged,
    aclu_flagged = EXCLUDED.aclu_flagged,
    cair_flagged = EXCLUDED.cair_flagged,
    adl_flagged = EXCLUDED.adl_flagged,
    other_org_flagged = EXCLUDED.other_org_flagged,
    reason = EXCLUDED.reason,
    updated_at = now()
`

const UPSERT_EQUITY_SQL = `
  INSERT INTO equity_domains (domain, minority_owned, women_owned, veteran_owned, b_corp, lgbtq_owned, disability_owned)
  VALUES ($1, $2, $3, $4, $5, $6, $7)
  ON CONFLICT (domain) DO UPDATE SET
    minority_owned = EXCLUDED.minority_owned,
    women_owned = EXCLUDED.women_owned,
    veteran_owned = EXCLUDED.veteran_owned,
    b_corp = EXCLUDED.b_corp,
    lgbtq_owned = EXCLUDED.lgbtq_owned,
    disability_owned = EXCLUDED.disability_owned,
    updated_at = now()
`

export class PgScoringRepository implements ScoringRepository {
  constructor(private readonly pool: Pool) {}

  async loadThemeKeywords(): Promise<ThemeKeywordRow[]> {
    const result = await this.pool.query<{ keyword: string; theme_id: number; principle: string; category: string }>(
      `SELECT tk.keyword, tk.theme_id, it.principle, it.category
       FROM theme_keywords tk
       JOIN islamic_themes it ON tk.theme_id = it.id
       ORDER BY tk.keyword`
    )
    return result.rows.map((row) => ({
      keyword: row.keyword,
      themeId: row.theme_id,
      principle: row.principle,
      category: row.category,
    }))
  }

  async findOrgBlocklist(domain: string): Promise<OrgBlocklistRecord | null> {
    const result = await this.pool.query<OrgRow>(
      `SELECT domain, splc_flagged, aclu_flagged, cair_flagged, adl_flagged, other_org_flagged, reason
       FROM org_blocklist WHERE domain = $1`,
      [domain]
    )
    const row = result.rows[0]
    if (!row) return null
    return {
      domain: row.domain,
      splc: row.splc_flagged,
      aclu: row.aclu_flagged,
      cair: row.cair_flagged,
      adl: row.adl_flagged,
      other: row.other_org_flagged,
      reason: row.reason,
    }
  }

  async findEquity(domain: string): Promise<EquityRecord | null> {
    const result = await this.pool.query<EquityRow>(
      `SELECT domain, minority_owned, women_owned, veteran_owned, b_corp, lgbtq_owned, disability_owned
       FROM equity_domains WHERE domain = $1`,
      [domain]
    )
    const row = result.rows[0]
    if (!row) return null
    return {
      domain: row.domain,
      minorityOwned: row.minority_owned,
      womenOwned: row.women_owned,
      veteranOwned: row.veteran_owned,
      bCorp: row.b_corp,
      lgbtqOwned: row.lgbtq_owned,
      disabilityOwned: row.disability_owned,
    }
  }

  async countBacklinks(url: string): Promise<number> {
    // COUNT arrives as a string (BIGINT)
    const result = await this.pool.query<{ backlinks: string }>(
      'SELECT COUNT(DISTINCT source_page_id) AS backlinks FROM links WHERE target_url = $1',
      [url]
    )
    return Number(result.rows[0]?.backlinks ?? 0)
  }

  async countReferrers(url: string): Promise<ReferrerCounts> {
    const result = await this.pool.query<{ edu: string; gov: string }>(
      `SELECT
         COUNT(DISTINCT p.domain) FILTER (WHERE p.domain LIKE '%.edu') AS edu,
         COUNT(DISTINCT p.domain) FILTER (WHERE p.domain LIKE '%.gov') AS gov
       FROM links l
       JOIN pages p ON l.source_page_id = p.id
       WHERE l.target_url = $1`,
      [url]
    )
    const row = result.rows[0]
    return { edu: Number(row?.edu ?? 0), gov: Number(row?.gov ?? 0) }
  }

  async firstCrawledAt(domain: string): Promise<Date | null> {
    const result = await this.pool.query<{ first_seen: Date | null }>(
      'SELECT MIN(crawled_at) AS first_seen FROM pages WHERE domain = $1',
      [domain]
    )
    return result.rows[0]?.first_seen ?? null
  }

  async saveScore(record: ScoreRecord): Promise<void> {
    await withTransaction(this.pool, async (client) => {
      await client.query(UPDATE_PAGE_SCORES_SQL, [
        record.islamicAlignmentScore,
        record.qualityScore,
        record.authorityScore,
        record.mediaLiteracyScore,
        record.equityBoost,
        record.finalCompositeScore,
        record.indexable,
        record.scoredAt,
        record.pageId,
      ])
      await client.query(INSERT_SCORING_LOG_SQL, [
        record.pageId,
        record.url,
        record.islamicAlignmentScore,
        record.qualityScore,
        record.authorityScore,
        record.mediaLiteracyScore,
        record.equityBoost,
        record.finalCompositeScore,
        record.indexable,
        record.rankTier,
        record.blocklistReason,
        JSON.stringify(record.components),
        record.scoredAt,
      ])
    })
  }

  async findPage(id: number): Promise<PageToScore | null> {
    const result = await this.pool.query<PageRow>(
      'SELECT id, url, domain, title, content, crawled_at FROM pages WHERE id = $1',
      [id]
    )
    const row = result.rows[0]
    if (!row) return null
    return {
      id: Number(row.id),
      url: row.url,
      domain: row.domain,
      title: row.title,
      content: row.content,
      crawledAt: row.crawled_at,
    }
  }

  async listPageIds(options: PageListOptions): Promise<number[]> {
    const params: number[] = []
    let sql = 'SELECT id FROM pages WHERE content IS NOT NULL'
    if (options.unscoredOnly) {
      sql += ' AND scored_at IS NULL'
    }
    sql += ' ORDER BY id'
    if (options.limit !== undefined) {
      params.push(options.limit)
      sql += ' LIMIT $1'
    }

    const result = await this.pool.query<{ id: string | number }>(sql, params)
    return result.rows.map((row) => Number(row.id))
  }

  async upsertOrgBlocklist(records: OrgBlocklistRecord[]): Promise<number> {
    return withTransaction(this.pool, async (client) => {
      for (const r of records) {
        await client.query(UPSERT_ORG_SQL, [r.domain, r.splc, r.aclu, r.cair, r.adl, r.other, r.reason])
      }
      return records.length
    })
  }

  async upsertEquity(records: EquityRecord[]): Promise<number> {
    return withTransaction(this.pool, async (client) => {
      for (const r of records) {
        await client.query(UPSERT_EQUITY_SQL, [
          r.domain,
          r.minorityOwned,
          r.womenOwned,
          r.veteranOwned,
          r.bCorp,
          r.lgbtqOwned,
          r.disabilityOwned,
        ])
      }
      return records.length
    })
  }
}
