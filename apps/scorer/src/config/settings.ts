/**
 * Scorer settings, parsed once from the environment.
 */

import { z } from 'zod'

export class ConfigurationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`)
    this.name = 'ConfigurationError'
  }
}

export const DEFAULT_DENIED_MODELS = ['openai/gpt-4o', 'openai/o1', 'openai/o1-mini']
export const SEVEN_DAYS_MS = 7 * 24 * 60 * 60 * 1000

const commaList = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter(Boolean)
  )

const scorerEnvSchema = z
  .object({
    DATABASE_URL: z.string({ required_error: 'DATABASE_URL is required' }).min(1, 'DATABASE_URL is required'),
    OPENROUTER_API_KEY: z.string().optional(),
    OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
    MEDIA_LITERACY_PRIMARY_MODEL: z.string().min(1).default('google/gemini-2.5-flash-lite'),
    MEDIA_LITERACY_FALLBACK_MODEL: z.string().min(1).default('openrouter/auto'),
    MEDIA_LITERACY_DENIED_MODELS: commaList.default(DEFAULT_DENIED_MODELS.join(',')),
    MEDIA_LITERACY_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    MEDIA_LITERACY_MAX_TOKENS: z.coerce.number().int().positive().default(500),
    MEDIA_LITERACY_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    SCORER_AUTHORITY_TTL_MS: z.coerce.number().int().positive().default(SEVEN_DAYS_MS),
    SCORER_LOOKUP_TTL_MS: z.coerce.number().int().positive().optional(),
    SCORER_READABILITY: z.enum(['flesch', 'sentence-length']).default('flesch'),
  })
  .superRefine((env, ctx) => {
    for (const key of ['MEDIA_LITERACY_PRIMARY_MODEL', 'MEDIA_LITERACY_FALLBACK_MODEL'] as const) {
      if (env.MEDIA_LITERACY_DENIED_MODELS.includes(env[key])) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: `model ${env[key]} is on the deny list` })
      }
    }
  })

export type ReadabilityMode = 'flesch' | 'sentence-length'

export interface MediaLiteracySettings {
  apiKey: string | null
  baseUrl: string
  primaryModel: string
  fallbackModel: string
  deniedModels: string[]
  timeoutMs: number
  maxTokens: number
  temperature: number
}

export interface ScorerSettings {
  databaseUrl: string
  media: MediaLiteracySettings
  authorityTtlMs: number
  /** Keyword, org-blocklist and equity caches; null keeps entries for the process lifetime */
  lookupTtlMs: number | null
  readability: ReadabilityMode
}

/**
 * @throws ConfigurationError listing every invalid or missing key
 */
export function loadScorerSettings(env: NodeJS.ProcessEnv = process.env): Readonly<ScorerSettings> {
  const parsed = scorerEnvSchema.safeParse(env)
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`))
  }

  const e = parsed.data
  return Object.freeze({
    databaseUrl: e.DATABASE_URL,
    media: Object.freeze({
      apiKey: e.OPENROUTER_API_KEY || null,
      baseUrl: e.OPENROUTER_BASE_URL,
      primaryModel: e.MEDIA_LITERACY_PRIMARY_MODEL,
      fallbackModel: e.MEDIA_LITERACY_FALLBACK_MODEL,
      deniedModels: e.MEDIA_LITERACY_DENIED_MODELS,
      timeoutMs: e.MEDIA_LITERACY_TIMEOUT_MS,
      maxTokens: e.MEDIA_LITERACY_MAX_TOKENS,
      temperature: e.MEDIA_LITERACY_TEMPERATURE,
    }),
    authorityTtlMs: e.SCORER_AUTHORITY_TTL_MS,
    lookupTtlMs: e.SCORER_LOOKUP_TTL_MS ?? null,
    readability: e.SCORER_READABILITY,
  })
}
