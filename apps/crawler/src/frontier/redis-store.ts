/**
 * Redis-backed frontier store, shared by every crawler process.
 *
 * Keys:
 * - `<key>`      list, LPUSH on admit / RPOP on take (FIFO)
 * - `<key>:set`  membership set guarding against double-queueing
 */

import type { Redis } from '@sirat/redis'
import type { FrontierStats, FrontierStore } from './store.js'

export type FrontierRedisClient = Pick<Redis, 'eval' | 'rpop' | 'llen' | 'scard' | 'sismember' | 'del'>

/**
 * SADD and LPUSH in one atomic step so concurrent admitters never queue a URL twice.
 * Returns 1 when queued, 0 when already a member.
 */
const PUSH_SCRIPT = `
  local added = redis.call('SADD', KEYS[2], ARGV[1])
  if added == 1 then
    redis.call('LPUSH', KEYS[1], ARGV[1])
  end
  return added
`

export const DEFAULT_FRONTIER_KEY = 'crawler:queue'

export class RedisFrontierStore implements FrontierStore {
  private readonly setKey: string

  constructor(
    private readonly redis: FrontierRedisClient,
    private readonly queueKey: string = DEFAULT_FRONTIER_KEY
  ) {
    this.setKey = `${queueKey}:set`
  }

  async push(url: string): Promise<boolean> {
    const result = await this.redis.eval(PUSH_SCRIPT, 2, this.queueKey, this.setKey, url)
    return result === 1
  }

  async pop(): Promise<string | null> {
    return this.redis.rpop(this.queueKey)
  }

  async size(): Promise<number> {
    return this.redis.llen(this.queueKey)
  }

  async isQueued(url: string): Promise<boolean> {
    return (await this.redis.sismember(this.setKey, url)) === 1
  }

  async clear(): Promise<void> {
    await this.redis.del(this.queueKey, this.setKey)
  }

  async stats(): Promise<FrontierStats> {
    const [queueSize, setSize] = await Promise.all([this.redis.llen(this.queueKey), this.redis.scard(this.setKey)])
    return { queueSize, setSize }
  }
}
