import { describe, it, expect, vi } from 'vitest'
import { mkdtemp, writeFile, rm } from 'fs/promises'
import { tmpdir } from 'os'
import { join } from 'path'
import { asNonNegativeNumber, asPositiveInt, asString, FlagError, parseFlags } from '../cli/parse-flags.js'
import { loadSeedFile, parseSeedList, seedFrontier } from '../cli/seeds.js'

describe('parseFlags', () => {
  it('parses switches, values and positionals', () => {
    expect(parseFlags(['run', '--seed', 'seeds.txt', '--stats', '--max-pages', '50'])).toEqual({
      positionals: ['run'],
      flags: { seed: 'seeds.txt', stats: true, 'max-pages': '50' },
    })
  })

  it('joins multi-word values', () => {
    expect(parseFlags(['--reason', 'hate', 'group']).flags).toEqual({ reason: 'hate group' })
  })
})

describe('flag coercion', () => {
  it('reads strings', () => {
    expect(asString('x')).toBe('x')
    expect(asString(true)).toBe('')
    expect(asString(undefined)).toBe('')
  })

  it('reads a page limit as a positive integer', () => {
    expect(asPositiveInt('50', 'max-pages')).toBe(50)
    expect(asPositiveInt(undefined, 'max-pages')).toBeUndefined()
  })

  it('rejects negative, fractional and missing page limits', () => {
    expect(() => asPositiveInt('-5', 'max-pages')).toThrow(FlagError)
    expect(() => asPositiveInt('2.5', 'max-pages')).toThrow('--max-pages expects a positive integer, got "2.5"')
    expect(() => asPositiveInt('0', 'max-pages')).toThrow(FlagError)
    expect(() => asPositiveInt(true, 'max-pages')).toThrow('--max-pages expects a positive integer, got no value')
  })

  it('reads a fractional delay but not a negative one', () => {
    expect(asNonNegativeNumber('0.5', 'delay')).toBe(0.5)
    expect(asNonNegativeNumber('0', 'delay')).toBe(0)
    expect(() => asNonNegativeNumber('-1', 'delay')).toThrow('--delay expects a number >= 0, got "-1"')
    expect(() => asNonNegativeNumber('abc', 'delay')).toThrow(FlagError)
  })
})

describe('seeds', () => {
  it('skips blank lines and comments', () => {
    expect(parseSeedList('# seeds\nhttps://a.test/\r\n\n  https://b.test/  \n#https://c.test/\n')).toEqual([
      'https://a.test/',
      'https://b.test/',
    ])
  })

  it('loads a seed file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'seeds-'))
    try {
      const file = join(dir, 'seeds.txt')
      await writeFile(file, 'https://a.test/\n# skip\nhttps://b.test/\n')

      expect(await loadSeedFile(file)).toEqual(['https://a.test/', 'https://b.test/'])
    } finally {
      await rm(dir, { recursive: true, force: true })
    }
  })

  it('counts admitted seeds', async () => {
    const enqueue = vi.fn(async (url: string) => url !== 'https://b.test/')

    expect(await seedFrontier({ enqueue }, ['https://a.test/', 'https://b.test/', 'https://c.test/'])).toEqual({
      total: 3,
      admitted: 2,
    })
  })
})
