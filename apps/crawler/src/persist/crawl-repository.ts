/**
 * Crawl persistence: page upsert keyed by URL hash, append-only links.
 *
 * Both writes are idempotent, which is what makes concurrent crawlers safe:
 * a re-crawl overwrites title/content/crawled_at and keeps the page id,
 * and a link already recorded for a page is skipped.
 */

import { withTransaction, type Pool, type PoolClient } from '@sirat/db'
import type { PageLookup } from '../frontier/manager.js'

export interface PageRecord {
  url: string
  urlHash: string
  domain: string
  title: string | null
  content: string
  crawledAt: Date
}

export interface LinkRecord {
  targetUrl: string
  linkText: string | null
}

export interface CrawlRepository extends PageLookup {
  /**
   * Upsert the page and insert its links in one transaction.
   * @returns the page id
   */
  savePage(page: PageRecord, links: LinkRecord[]): Promise<number>
}

/** Rows per multi-VALUES link insert. */
const LINK_BATCH_SIZE = 500

const UPSERT_PAGE_SQL = `
  INSERT INTO pages (url, url_hash, domain, title, content, crawled_at, created_at)
  VALUES ($1, $2, $3, $4, $5, $6, $6)
  ON CONFLICT (url_hash)
  DO UPDATE SET
    title = EXCLUDED.title,
    content = EXCLUDED.content,
    crawled_at = EXCLUDED.crawled_at
  RETURNING id
`

/**
 * Drop repeated targets so one INSERT never conflicts with itself.
 */
export function dedupeLinks(links: LinkRecord[]): LinkRecord[] {
  const seen = new Set<string>()
  const unique: LinkRecord[] = []
  for (const link of links) {
    if (seen.has(link.targetUrl)) continue
    seen.add(link.targetUrl)
    unique.push(link)
  }
  return unique
}

async function insertLinks(client: PoolClient, pageId: number, links: LinkRecord[]): Promise<void> {
  for (let start = 0; start < links.length; start += LINK_BATCH_SIZE) {
    const batch = links.slice(start, start + LINK_BATCH_SIZE)
    const params: Array<number | string | null> = []
    const tuples = batch.map((link, i) => {
      params.push(pageId, link.targetUrl, link.linkText)
      const base = i * 3
      return `($${base + 1}, $${base + 2}, $${base + 3})`
    })

    await client.query(
      `INSERT INTO links (source_page_id, target_url, link_text) VALUES ${tuples.join(', ')} ON CONFLICT DO NOTHING`,
      params
    )
  }
}

export class PgCrawlRepository implements CrawlRepository {
  constructor(private readonly pool: Pool) {}

  async pageExists(urlHash: string): Promise<boolean> {
    const result = await this.pool.query('SELECT 1 FROM pages WHERE url_hash = $1 LIMIT 1', [urlHash])
    return (result.rowCount ?? 0) > 0
  }

  async savePage(page: PageRecord, links: LinkRecord[]): Promise<number> {
    return withTransaction(this.pool, async (client) => {
      const result = await client.query<{ id: string | number }>(UPSERT_PAGE_SQL, [
        page.url,
        page.urlHash,
        page.domain,
        page.title,
        page.content,
        page.crawledAt,
      ])

      const row = result.rows[0]
      if (!row) {
        throw new Error(`Page upsert returned no id for ${page.url}`)
      }
      // BIGSERIAL arrives as a string
      const pageId = Number(row.id)

      await insertLinks(client, pageId, dedupeLinks(links))
      return pageId
    })
  }
}
