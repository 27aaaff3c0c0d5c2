import { describe, it, expect } from 'vitest'
import { contextualWeight, detectContext, isNewsDomain, type ContentContext } from '../dimensions/context.js'

const NONE: ContentContext = { isEducational: false, isNews: false, isResearch: false, isFalsePositive: false }

describe('detectContext', () => {
  it('flags academic hosts and research vocabulary', () => {
    expect(detectContext('A peer-reviewed Paper on trade.', 'https://www.cs.example.edu')).toEqual({
      isEducational: true,
      isNews: false,
      isResearch: true,
      isFalsePositive: false,
    })
  })

  it('flags news domains and known false positives', () => {
    expect(detectContext('An essay in Bitch  Magazine.', 'www.reuters.com')).toEqual({
      isEducational: false,
      isNews: true,
      isResearch: false,
      isFalsePositive: true,
    })
  })
})

describe('isNewsDomain', () => {
  it('matches the domain or a subdomain', () => {
    expect(isNewsDomain('bbc.co.uk')).toBe(true)
    expect(isNewsDomain('news.bbc.co.uk')).toBe(true)
    expect(isNewsDomain('notbbc.com')).toBe(false)
  })
})

describe('contextualWeight', () => {
  it('passes positive weights through unchanged', () => {
    expect(contextualWeight(5, { ...NONE, isEducational: true })).toBe(5)
  })

  it('dampens negative weights by context', () => {
    expect(contextualWeight(-10, NONE)).toBe(-10)
    expect(contextualWeight(-10, { ...NONE, isEducational: true })).toBeCloseTo(-3)
    expect(contextualWeight(-10, { ...NONE, isResearch: true })).toBeCloseTo(-3)
    expect(contextualWeight(-10, { ...NONE, isNews: true })).toBe(-5)
  })

  it('prefers the academic factor over the news factor', () => {
    expect(contextualWeight(-10, { ...NONE, isNews: true, isResearch: true })).toBeCloseTo(-3)
  })

  it('zeroes a negative weight for a known false positive', () => {
    expect(contextualWeight(-10, { ...NONE, isFalsePositive: true, isEducational: true })).toBe(0)
  })
})
