import pg from 'pg'
import type { Pool, PoolClient, PoolConfig } from 'pg'
import { createLogger } from '@sirat/logger'

const log = createLogger('db')

/**
 * Connection pool configuration
 *
 * Environment variables:
 * - DB_POOL_MAX: Maximum connections (default: 10)
 * - DB_POOL_MIN: Minimum idle connections (default: 0)
 * - DB_SERVICE_NAME: Application name for pg_stat_activity (default: sirat)
 */
export function getPoolConfig(connectionString: string, env: NodeJS.ProcessEnv = process.env): PoolConfig {
  return {
    connectionString,

    // === Pool Size ===
    max: parseInt(env.DB_POOL_MAX || '10', 10),
    min: parseInt(env.DB_POOL_MIN || '0', 10),

    // === Timeouts ===
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,

    // === Connection Recycling ===
    maxUses: 7500,

    // === Keep-Alive ===
    keepAlive: true,
    keepAliveInitialDelayMillis: 10000,

    application_name: env.DB_SERVICE_NAME || 'sirat',
  }
}

/**
 * Create a pool for DATABASE_URL. The caller owns it and ends it on shutdown.
 */
export function createPool(connectionString: string): Pool {
  const pool = new pg.Pool(getPoolConfig(connectionString))

  // Idle clients can fail on a server restart; an unhandled 'error' event would crash the process
  pool.on('error', (err: Error) => {
    log.error('Idle client error', {}, err)
  })

  return pool
}

/**
 * Run `SELECT 1` with exponential backoff between attempts.
 *
 * @returns true once the database answers, false after `maxAttempts` failures
 */
export async function warmupDatabase(
  pool: Pick<Pool, 'query'>,
  maxAttempts = 5,
  sleep: (ms: number) => Promise<void> = (ms) => new Promise((resolve) => setTimeout(resolve, ms))
): Promise<boolean> {
  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      log.info('Connection attempt', { attempt, maxAttempts })
      await pool.query('SELECT 1')
      log.info('Connection established')
      return true
    } catch (error) {
      log.error('Connection failed', { attempt }, error)

      if (attempt < maxAttempts) {
        await sleep(Math.min(2000 * Math.pow(2, attempt - 1), 30000))
      }
    }
  }

  log.error('Failed to establish connection after all attempts', { maxAttempts })
  return false
}

/**
 * Run `fn` between BEGIN and COMMIT on one pooled client. A throw rolls back and rethrows.
 */
export async function withTransaction<T>(
  pool: Pick<Pool, 'connect'>,
  fn: (client: PoolClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect()
  try {
    await client.query('BEGIN')
    const result = await fn(client)
    await client.query('COMMIT')
    return result
  } catch (error) {
    try {
      await client.query('ROLLBACK')
    } catch (rollbackError) {
      log.error('Rollback failed', {}, rollbackError)
    }
    throw error
  } finally {
    client.release()
  }
}
