/**
 * Crawler settings, parsed once from the environment.
 */

import { z } from 'zod'
import { fileURLToPath } from 'url'

export class ConfigurationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigurationError'
  }
}

const DEFAULT_SEED_FILE = fileURLToPath(new URL('../../seeds/seed-urls.txt', import.meta.url))

const intFromEnv = (fallback: number) => z.coerce.number().int().positive().default(fallback)

const crawlerEnvSchema = z.object({
  DATABASE_URL: z.string({ required_error: 'DATABASE_URL is required' }).min(1, 'DATABASE_URL is required'),
  CRAWL_POLITENESS_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  CRAWL_FETCH_TIMEOUT_MS: intFromEnv(10000),
  CRAWL_MAX_BODY_BYTES: intFromEnv(10 * 1024 * 1024),
  CRAWL_USER_AGENT: z.string().min(1).default('SiratBot/1.0 (+https://sirat.example/bot)'),
  CRAWL_STATS_INTERVAL: intFromEnv(10),
  FRONTIER_KEY: z.string().min(1).default('crawler:queue'),
  CRAWL_SEED_FILE: z.string().min(1).default(DEFAULT_SEED_FILE),
})

export interface CrawlerSettings {
  databaseUrl: string
  politenessDelayMs: number
  fetchTimeoutMs: number
  maxBodyBytes: number
  userAgent: string
  statsInterval: number
  frontierKey: string
  seedFile: string
}

/**
 * @throws ConfigurationError listing every invalid or missing key
 */
export function loadCrawlerSettings(env: NodeJS.ProcessEnv = process.env): Readonly<CrawlerSettings> {
  const parsed = crawlerEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }

  const e = parsed.data
  return Object.freeze({
    databaseUrl: e.DATABASE_URL,
    politenessDelayMs: e.CRAWL_POLITENESS_DELAY_MS,
    fetchTimeoutMs: e.CRAWL_FETCH_TIMEOUT_MS,
    maxBodyBytes: e.CRAWL_MAX_BODY_BYTES,
    userAgent: e.CRAWL_USER_AGENT,
    statsInterval: e.CRAWL_STATS_INTERVAL,
    frontierKey: e.FRONTIER_KEY,
    seedFile: e.CRAWL_SEED_FILE,
  })
}
