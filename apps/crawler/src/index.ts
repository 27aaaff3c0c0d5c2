#!/usr/bin/env node

/**
 * Crawler CLI
 *
 *   crawl [--seed <file>] [--max-pages <n>] [--delay <seconds>]
 *   crawl --stats
 *   crawl --clear-queue
 */

// Load environment variables first, before any other imports
import 'dotenv/config'

import { createPool, warmupDatabase, type Pool } from '@sirat/db'
import { createRedisClient, warmupRedis, type Redis } from '@sirat/redis'
import { logger, loggers } from './config/logger.js'
import { ConfigurationError, loadCrawlerSettings, type CrawlerSettings } from './config/settings.js'
import { asNonNegativeNumber, asPositiveInt, asString, FlagError, parseFlags, type Flags } from './cli/parse-flags.js'
import { loadSeedFile, seedFrontier } from './cli/seeds.js'
import { Tier1Blocklist } from './blocklist/tier1.js'
import { RedisFrontierStore } from './frontier/redis-store.js'
import { FrontierManager } from './frontier/manager.js'
import { PgCrawlRepository } from './persist/crawl-repository.js'
import { RobotsCache } from './fetch/robots.js'
import { HttpFetcher } from './fetch/http-fetcher.js'
import { CrawlWorker } from './worker/crawl-worker.js'
import { runCrawlLoop } from './worker/crawl-loop.js'

const log = loggers.cli

function printHelp(): void {
  console.log('Crawler CLI')
  console.log('')
  console.log('Usage:')
  console.log('  crawl [--seed <file>] [--max-pages <n>] [--delay <seconds>]')
  console.log('  crawl --stats          Print frontier size and exit')
  console.log('  crawl --clear-queue    Empty the frontier and its dedup set, then exit')
}

async function connect(settings: CrawlerSettings): Promise<{ pool: Pool; redis: Redis }> {
  const pool = createPool(settings.databaseUrl)
  if (!(await warmupDatabase(pool))) {
    await pool.end()
    throw new Error('Database unavailable')
  }

  if (!(await warmupRedis())) {
    await pool.end()
    throw new Error('Redis unavailable')
  }

  return { pool, redis: createRedisClient() }
}

interface RunLimits {
  maxPages?: number
  delaySeconds?: number
}

function readRunLimits(flags: Flags): RunLimits {
  return {
    maxPages: asPositiveInt(flags['max-pages'], 'max-pages'),
    delaySeconds: asNonNegativeNumber(flags.delay, 'delay'),
  }
}

async function run(settings: CrawlerSettings, flags: Flags, limits: RunLimits, pool: Pool, redis: Redis): Promise<number> {
  const blocklist = new Tier1Blocklist()
  const repository = new PgCrawlRepository(pool)
  const frontier = new FrontierManager({
    store: new RedisFrontierStore(redis, settings.frontierKey),
    blocklist,
    pages: repository,
  })

  if (flags['clear-queue'] === true) {
    await frontier.clear()
    log.info('Frontier cleared', { key: settings.frontierKey })
    return 0
  }

  if (flags.stats === true) {
    log.info('Frontier stats', { ...(await frontier.stats()), ...blocklist.stats() })
    return 0
  }

  log.info('Blocklist loaded', { ...blocklist.stats() })

  const seedPath = asString(flags.seed)
  if (seedPath) {
    const seeds = await loadSeedFile(seedPath)
    const result = await seedFrontier(frontier, seeds)
    log.info('Seeds queued', { file: seedPath, ...result })
  } else if ((await frontier.size()) === 0) {
    try {
      const result = await seedFrontier(frontier, await loadSeedFile(settings.seedFile))
      log.info('Frontier empty, auto-seeded', { file: settings.seedFile, ...result })
    } catch (error) {
      log.warn('Could not auto-seed frontier', { file: settings.seedFile }, error)
    }
  }

  const worker = new CrawlWorker({
    repository,
    frontier,
    blocklist,
    robots: new RobotsCache({ fetchTimeoutMs: settings.fetchTimeoutMs, userAgent: settings.userAgent }),
    fetcher: new HttpFetcher({
      defaults: {
        timeoutMs: settings.fetchTimeoutMs,
        maxSizeBytes: settings.maxBodyBytes,
        headers: { 'User-Agent': settings.userAgent },
      },
    }),
    politenessDelayMs: limits.delaySeconds !== undefined ? limits.delaySeconds * 1000 : settings.politenessDelayMs,
  })

  const controller = new AbortController()
  const stop = (signal: string): void => {
    if (controller.signal.aborted) return
    log.info('Stop requested, finishing current step', { signal })
    controller.abort()
  }
  process.once('SIGINT', () => stop('SIGINT'))
  process.once('SIGTERM', () => stop('SIGTERM'))

  await runCrawlLoop(frontier, worker, {
    maxPages: limits.maxPages,
    statsInterval: settings.statsInterval,
    signal: controller.signal,
  })
  return 0
}

async function main(): Promise<number> {
  const { flags } = parseFlags(process.argv.slice(2))
  if (flags.help === true || flags.h === true) {
    printHelp()
    return 0
  }

  let limits: RunLimits
  try {
    limits = readRunLimits(flags)
  } catch (error) {
    if (error instanceof FlagError) {
      console.error(`Error: ${error.message}`)
      return 2
    }
    throw error
  }

  let settings: CrawlerSettings
  try {
    settings = loadCrawlerSettings()
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.fatal('Invalid configuration', { issues: error.issues })
      return 1
    }
    throw error
  }

  let connections: { pool: Pool; redis: Redis }
  try {
    connections = await connect(settings)
  } catch (error) {
    logger.fatal('Startup failed', {}, error)
    return 1
  }

  try {
    return await run(settings, flags, limits, connections.pool, connections.redis)
  } finally {
    await Promise.allSettled([connections.pool.end(), connections.redis.quit()])
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error: unknown) => {
    logger.fatal('Crawler crashed', {}, error)
    process.exit(1)
  })
