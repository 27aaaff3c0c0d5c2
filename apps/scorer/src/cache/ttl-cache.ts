/**
 * Per-process lookup caches.
 *
 * Entries are stamped on write and checked on read; nothing is shared
 * across processes and nothing is invalidated except by expiry or restart.
 */

export interface Cache<V> {
  get(key: string): V | undefined
  set(key: string, value: V): void
  delete(key: string): void
  clear(): void
  readonly size: number
}

export interface TtlCacheOptions {
  /** Entry lifetime; null keeps entries until the process exits */
  ttlMs: number | null
  now?: () => number
}

interface Entry<V> {
  value: V
  storedAt: number
}

export class TtlCache<V> implements Cache<V> {
  private readonly entries = new Map<string, Entry<V>>()
  private readonly ttlMs: number | null
  private readonly now: () => number

  constructor(options: TtlCacheOptions) {
    this.ttlMs = options.ttlMs
    this.now = options.now ?? Date.now
  }

  get(key: string): V | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined

    if (this.ttlMs !== null && this.now() - entry.storedAt >= this.ttlMs) {
      this.entries.delete(key)
      return undefined
    }
    return entry.value
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, storedAt: this.now() })
  }

  delete(key: string): void {
    this.entries.delete(key)
  }

  clear(): void {
    this.entries.clear()
  }

  get size(): number {
    return this.entries.size
  }
}

/** Stores nothing; every read misses. */
export class NoCache<V> implements Cache<V> {
  get(_key: string): V | undefined {
    return undefined
  }

  set(_key: string, _value: V): void {}

  delete(_key: string): void {}

  clear(): void {}

  get size(): number {
    return 0
  }
}

/**
 * Read-through helper: cached value, or load and remember it.
 */
export async function cached<V>(cache: Cache<V>, key: string, load: () => Promise<V>): Promise<V> {
  const hit = cache.get(key)
  if (hit !== undefined) return hit
  const value = await load()
  cache.set(key, value)
  return value
}
