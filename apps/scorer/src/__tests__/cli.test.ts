import { describe, it, expect } from 'vitest'
import { asPositiveInt, asString, FlagError, parseFlags, parseScoreTarget } from '../cli/parse-flags.js'

describe('parseFlags', () => {
  it('splits the command from its flags', () => {
    expect(parseFlags(['import-lists', '--org-blocklist', 'orgs.json', '--equity', 'equity.json'])).toEqual({
      positionals: ['import-lists'],
      flags: { 'org-blocklist': 'orgs.json', equity: 'equity.json' },
    })
  })

  it('treats a flag followed by another flag as a switch', () => {
    expect(parseFlags(['score', '--unscored', '--limit', '20']).flags).toEqual({ unscored: true, limit: '20' })
  })

  it('reads string values only', () => {
    expect(asString('orgs.json')).toBe('orgs.json')
    expect(asString(true)).toBe('')
  })
})

describe('asPositiveInt', () => {
  it('accepts whole numbers above zero', () => {
    expect(asPositiveInt('7', 'limit')).toBe(7)
    expect(asPositiveInt(undefined, 'limit')).toBeUndefined()
  })

  it('rejects anything else', () => {
    expect(() => asPositiveInt('-1', 'limit')).toThrow('--limit expects a positive integer, got "-1"')
    expect(() => asPositiveInt('12abc', 'page-id')).toThrow(FlagError)
    expect(() => asPositiveInt(true, 'page-id')).toThrow('--page-id expects a positive integer, got no value')
  })
})

describe('parseScoreTarget', () => {
  it('prefers a single page', () => {
    expect(parseScoreTarget({ 'page-id': '42', all: true })).toEqual({ kind: 'page', pageId: 42 })
  })

  it('carries the limit for batch runs', () => {
    expect(parseScoreTarget({ unscored: true, limit: '50' })).toEqual({ kind: 'unscored', limit: 50 })
    expect(parseScoreTarget({ all: true })).toEqual({ kind: 'all', limit: undefined })
  })

  it('returns null without a target', () => {
    expect(parseScoreTarget({ limit: '5' })).toBeNull()
  })
})
