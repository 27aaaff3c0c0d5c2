import { describe, it, expect, vi } from 'vitest'
import { NoCache, TtlCache, cached } from '../cache/ttl-cache.js'

describe('TtlCache', () => {
  it('expires entries once the TTL has elapsed', () => {
    let t = 0
    const cache = new TtlCache<number>({ ttlMs: 1000, now: () => t })
    cache.set('a', 1)

    t = 999
    expect(cache.get('a')).toBe(1)

    t = 1000
    expect(cache.get('a')).toBeUndefined()
    expect(cache.size).toBe(0)
  })

  it('keeps entries forever without a TTL', () => {
    let t = 0
    const cache = new TtlCache<string>({ ttlMs: null, now: () => t })
    cache.set('k', 'v')
    t = Number.MAX_SAFE_INTEGER
    expect(cache.get('k')).toBe('v')
  })

  it('restamps an entry when it is overwritten', () => {
    let t = 0
    const cache = new TtlCache<number>({ ttlMs: 100, now: () => t })
    cache.set('a', 1)
    t = 90
    cache.set('a', 2)
    t = 150
    expect(cache.get('a')).toBe(2)
  })

  it('supports delete and clear', () => {
    const cache = new TtlCache<number>({ ttlMs: null })
    cache.set('a', 1)
    cache.set('b', 2)
    cache.delete('a')
    expect(cache.size).toBe(1)
    cache.clear()
    expect(cache.get('b')).toBeUndefined()
  })
})

describe('NoCache', () => {
  it('never returns a stored value', () => {
    const cache = new NoCache<number>()
    cache.set('a', 1)
    expect(cache.get('a')).toBeUndefined()
    expect(cache.size).toBe(0)
  })
})

describe('cached', () => {
  it('loads once and then serves from the cache', async () => {
    const cache = new TtlCache<number>({ ttlMs: null })
    const load = vi.fn(async () => 7)

    expect(await cached(cache, 'x', load)).toBe(7)
    expect(await cached(cache, 'x', load)).toBe(7)
    expect(load).toHaveBeenCalledTimes(1)
  })

  it('does not remember a failed load', async () => {
    const cache = new TtlCache<number>({ ttlMs: null })
    const load = vi.fn().mockRejectedValueOnce(new Error('db down')).mockResolvedValueOnce(3)

    await expect(cached(cache, 'x', load)).rejects.toThrow('db down')
    expect(await cached(cache, 'x', load)).toBe(3)
  })
})
