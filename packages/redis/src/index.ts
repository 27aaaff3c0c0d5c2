/**
 * @sirat/redis - Shared Redis connection utilities
 *
 * One place for connection settings so the crawler's frontier and any
 * other Redis user reconnect and back off the same way.
 */

import { Redis, type RedisOptions } from 'ioredis'
import { createLogger } from '@sirat/logger'

const log = createLogger('redis')

// =============================================================================
// Configuration Parsing
// =============================================================================

export interface RedisConfig {
  host: string
  port: number
  password: string | undefined
  redisUrl: string | undefined
}

/**
 * Read connection settings from the environment.
 *
 * REDIS_URL wins when it parses; otherwise REDIS_HOST / REDIS_PORT / REDIS_PASSWORD.
 * The URL is always split into components so `new Redis(options)` never
 * falls back to localhost.
 */
export function parseRedisConfig(env: NodeJS.ProcessEnv = process.env): RedisConfig {
  const redisUrl = env.REDIS_URL

  if (redisUrl) {
    try {
      const url = new URL(redisUrl)
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        password: url.password ? decodeURIComponent(url.password) : undefined,
        redisUrl,
      }
    } catch (error) {
      log.warn('Failed to parse REDIS_URL, falling back to REDIS_HOST/PORT', {}, error)
    }
  }

  return {
    host: env.REDIS_HOST || 'localhost',
    port: parseInt(env.REDIS_PORT || '6379', 10),
    password: env.REDIS_PASSWORD || undefined,
    redisUrl: undefined,
  }
}

/** Connection string safe for logs. */
export function maskRedisUrl(config: RedisConfig): string {
  return config.redisUrl ? config.redisUrl.replace(/\/\/([^:@/]*):[^@]+@/, '//$1:***@') : `${config.host}:${config.port}`
}

// =============================================================================
// Connection Options
// =============================================================================

const RECONNECT_ERRORS = ['READONLY', 'ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'EHOSTUNREACH', 'ENETUNREACH', 'ENOTFOUND']

/** Backoff in ms for the nth reconnect attempt. */
export function reconnectDelay(times: number): number {
  return Math.min(times * 500, 30000)
}

/**
 * Connection options with keepalive and capped backoff.
 * Past 20 attempts the outage is logged at most once a minute.
 */
export function buildRedisOptions(config: RedisConfig = parseRedisConfig()): RedisOptions {
  const target = maskRedisUrl(config)
  let consecutiveFailures = 0
  let lastCircuitBreakerLog = 0

  return {
    host: config.host,
    port: config.port,
    password: config.password,
    keepAlive: 10000,
    connectTimeout: 10000,
    commandTimeout: 30000,
    enableOfflineQueue: true,

    retryStrategy(times: number) {
      consecutiveFailures = times

      if (times > 20) {
        const now = Date.now()
        if (now - lastCircuitBreakerLog > 60000) {
          lastCircuitBreakerLog = now
          log.error('Circuit breaker: prolonged outage', { attempts: times, connection: target })
        }
        return 30000
      }

      const delay = reconnectDelay(times)
      log.info('Reconnecting', { attempt: times, delayMs: delay })
      return delay
    },

    reconnectOnError(err: Error) {
      if (RECONNECT_ERRORS.some((e) => err.message.includes(e))) {
        if (consecutiveFailures <= 20) {
          log.warn('Reconnecting due to error', { reason: err.message })
        }
        return true
      }
      return false
    },
  }
}

// =============================================================================
// Client Factory Functions
// =============================================================================

/**
 * Create a dedicated client with the shared options.
 * Callers own the connection and must `quit()` it on shutdown.
 */
export function createRedisClient(config: RedisConfig = parseRedisConfig()): Redis {
  const client = new Redis(buildRedisOptions(config))
  const target = maskRedisUrl(config)

  client.on('error', (err: Error) => {
    log.error('Connection error', { reason: err.message })
  })
  client.on('connect', () => {
    log.info('Connected', { connection: target })
  })

  return client
}

// =============================================================================
// Warmup / Health Check
// =============================================================================

/**
 * Ping Redis with exponential backoff between attempts.
 *
 * @returns true once a PING succeeds, false after `maxAttempts` failures
 */
export async function warmupRedis(maxAttempts = 5, config: RedisConfig = parseRedisConfig()): Promise<boolean> {
  const target = maskRedisUrl(config)

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const client = new Redis({
      host: config.host,
      port: config.port,
      password: config.password,
      maxRetriesPerRequest: 1,
      retryStrategy: () => null,
      connectTimeout: 5000,
      lazyConnect: true,
    })

    try {
      log.info('Warmup attempt', { attempt, maxAttempts, connection: target })
      await client.connect()
      await client.ping()
      log.info('Warmup successful')
      return true
    } catch (error) {
      log.error('Warmup failed', { attempt }, error)

      if (attempt < maxAttempts) {
        const delayMs = Math.min(2000 * Math.pow(2, attempt - 1), 30000)
        await new Promise((resolve) => setTimeout(resolve, delayMs))
      }
    } finally {
      client.disconnect()
    }
  }

  log.error('Warmup failed after all attempts', { maxAttempts })
  return false
}

export { Redis }
export type { RedisOptions }
