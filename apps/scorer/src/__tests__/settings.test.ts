import { describe, it, expect } from 'vitest'
import { ConfigurationError, DEFAULT_DENIED_MODELS, SEVEN_DAYS_MS, loadScorerSettings } from '../config/settings.js'

const BASE = { DATABASE_URL: 'postgres://localhost:5432/sirat' }

function issuesOf(env: NodeJS.ProcessEnv): string[] {
  try {
    loadScorerSettings(env)
  } catch (error) {
    if (error instanceof ConfigurationError) return error.issues
    throw error
  }
  return []
}

describe('loadScorerSettings', () => {
  it('applies defaults', () => {
    expect(loadScorerSettings(BASE)).toEqual({
      databaseUrl: 'postgres://localhost:5432/sirat',
      media: {
        apiKey: null,
        baseUrl: 'https://openrouter.ai/api/v1',
        primaryModel: 'google/gemini-2.5-flash-lite',
        fallbackModel: 'openrouter/auto',
        deniedModels: DEFAULT_DENIED_MODELS,
        timeoutMs: 15000,
        maxTokens: 500,
        temperature: 0.3,
      },
      authorityTtlMs: SEVEN_DAYS_MS,
      lookupTtlMs: null,
      readability: 'flesch',
    })
  })

  it('reads overrides', () => {
    const settings = loadScorerSettings({
      ...BASE,
      OPENROUTER_API_KEY: 'test-secret',
      MEDIA_LITERACY_DENIED_MODELS: 'vendor/a, vendor/b,',
      MEDIA_LITERACY_TIMEOUT_MS: '2000',
      SCORER_LOOKUP_TTL_MS: '60000',
      SCORER_READABILITY: 'sentence-length',
    })

    expect(settings.media.apiKey).toBe('test-secret')
    expect(settings.media.deniedModels).toEqual(['vendor/a', 'vendor/b'])
    expect(settings.media.timeoutMs).toBe(2000)
    expect(settings.lookupTtlMs).toBe(60000)
    expect(settings.readability).toBe('sentence-length')
  })

  it('treats an empty API key as unset', () => {
    expect(loadScorerSettings({ ...BASE, OPENROUTER_API_KEY: '' }).media.apiKey).toBeNull()
  })

  it('requires DATABASE_URL', () => {
    expect(issuesOf({})).toContain('DATABASE_URL: DATABASE_URL is required')
  })

  it('refuses a denied primary or fallback model', () => {
    expect(issuesOf({ ...BASE, MEDIA_LITERACY_PRIMARY_MODEL: 'openai/gpt-4o' })).toEqual([
      'MEDIA_LITERACY_PRIMARY_MODEL: model openai/gpt-4o is on the deny list',
    ])
    expect(
      issuesOf({ ...BASE, MEDIA_LITERACY_DENIED_MODELS: 'openrouter/auto', MEDIA_LITERACY_FALLBACK_MODEL: 'openrouter/auto' })
    ).toEqual(['MEDIA_LITERACY_FALLBACK_MODEL: model openrouter/auto is on the deny list'])
  })

  it('rejects an unknown readability mode', () => {
    expect(() => loadScorerSettings({ ...BASE, SCORER_READABILITY: 'gunning-fog' })).toThrow(ConfigurationError)
  })
})
