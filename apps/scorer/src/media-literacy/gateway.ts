/**
 * Media-Literacy Escalation Gateway
 *
 * Phrase screen first; only content with two or more distinct red-flag phrases
 * is sent to the model. Primary model, then one retry on the fallback model.
 * Every failure degrades to a neutral 50: nothing here throws.
 */

import type { ILogger } from '@sirat/logger'
import { z } from 'zod'
import { loggers } from '../config/logger.js'
import type { CompletionClient, CompletionResponse } from './completion-client.js'
import { buildAnalysisPrompt } from './prompt.js'
import { loadRedFlagPhrases, needsAnalysis } from './red-flags.js'

export const NEUTRAL_SCORE = 50
const TRIGGER_SAMPLE = 10
const RAW_RESPONSE_SAMPLE = 200

export type MediaLiteracyDetails =
  | { status: 'neutral'; reason: string; skippedAnalysis: true }
  | {
      status: 'analyzed'
      modelUsed: string
      majorRedFlags: string[]
      minorConcerns: string[]
      explanation: string
      contextBoxNeeded: boolean
      contextBoxText: string
      rawScore: number
      fallbackUsed: boolean
      triggeredBy: string[]
    }
  | { status: 'error'; error: string; rawResponse?: string; triggeredBy: string[] }

export interface MediaLiteracyResult {
  score: number
  details: MediaLiteracyDetails
}

export interface MediaLiteracyScorer {
  score(content: string, domain: string, title: string | null): Promise<MediaLiteracyResult>
}

export interface GatewayStats {
  totalCalls: number
  skippedNeutral: number
  analyzed: number
  errors: number
  fallbackUsed: number
  skipRatePercent: number
}

export interface GatewayOptions {
  client: CompletionClient
  primaryModel: string
  fallbackModel: string
  deniedModels: readonly string[]
  maxTokens?: number
  temperature?: number
  phrases?: readonly string[]
  logger?: ILogger
}

const analysisSchema = z.object({
  major_red_flags: z.array(z.string()).default([]),
  minor_concerns: z.array(z.string()).default([]),
  explanation: z.string().default(''),
  credibility_score: z.number().default(NEUTRAL_SCORE),
  context_box_needed: z.boolean().default(false),
  context_box_text: z.string().default(''),
})

/**
 * Unwrap a reply wrapped in a markdown code fence, with or without a `json` tag.
 */
export function stripCodeFence(text: string): string {
  let body = text.trim()
  if (body.startsWith('```')) {
    body = body.split('```')[1] ?? ''
    if (body.startsWith('json')) {
      body = body.slice(4)
    }
    body = body.trim()
  }
  return body
}

export class MediaLiteracyGateway implements MediaLiteracyScorer {
  private readonly options: GatewayOptions
  private readonly phrases: readonly string[]
  private readonly log: ILogger
  private readonly counters = { totalCalls: 0, skippedNeutral: 0, analyzed: 0, errors: 0, fallbackUsed: 0 }

  constructor(options: GatewayOptions) {
    this.options = options
    this.phrases = options.phrases ?? loadRedFlagPhrases()
    this.log = options.logger ?? loggers.media
  }

  async score(content: string, domain: string, title: string | null): Promise<MediaLiteracyResult> {
    this.counters.totalCalls++

    const check = needsAnalysis(content, this.phrases)
    if (!check.needed) {
      this.counters.skippedNeutral++
      return {
        score: NEUTRAL_SCORE,
        details: { status: 'neutral', reason: 'No red flag keywords detected', skippedAnalysis: true },
      }
    }

    const triggeredBy = check.matched.slice(0, TRIGGER_SAMPLE)
    this.log.info('Red flags detected, escalating', { domain, matched: check.matched.length })

    const prompt = buildAnalysisPrompt({ title, domain, content })
    const reply = await this.complete(prompt)
    if (reply.kind === 'failed') {
      this.counters.errors++
      this.log.error('Media literacy analysis failed', { domain, error: reply.error })
      return { score: NEUTRAL_SCORE, details: { status: 'error', error: reply.error, triggeredBy } }
    }

    const text = stripCodeFence(reply.response.content)
    let analysis: z.infer<typeof analysisSchema>
    try {
      analysis = analysisSchema.parse(JSON.parse(text))
    } catch (error) {
      this.counters.errors++
      this.log.error('Media literacy reply is not valid JSON', { domain, modelUsed: reply.response.modelUsed }, error)
      return {
        score: NEUTRAL_SCORE,
        details: {
          status: 'error',
          error: 'Invalid JSON response',
          rawResponse: text.slice(0, RAW_RESPONSE_SAMPLE),
          triggeredBy,
        },
      }
    }

    const score = Math.trunc(Math.max(0, Math.min(100, analysis.credibility_score)))
    this.counters.analyzed++
    if (score < 40) {
      this.log.warn('Low credibility score', { domain, score, majorRedFlags: analysis.major_red_flags })
    }

    return {
      score,
      details: {
        status: 'analyzed',
        modelUsed: reply.response.modelUsed,
        majorRedFlags: analysis.major_red_flags,
        minorConcerns: analysis.minor_concerns,
        explanation: analysis.explanation,
        contextBoxNeeded: analysis.context_box_needed,
        contextBoxText: analysis.context_box_text,
        rawScore: analysis.credibility_score,
        fallbackUsed: reply.fallbackUsed,
        triggeredBy,
      },
    }
  }

  stats(): GatewayStats {
    const { totalCalls, skippedNeutral } = this.counters
    const skipRate = totalCalls > 0 ? (skippedNeutral / totalCalls) * 100 : 0
    return { ...this.counters, skipRatePercent: Math.round(skipRate * 10) / 10 }
  }

  private async complete(
    prompt: string
  ): Promise<{ kind: 'ok'; response: CompletionResponse; fallbackUsed: boolean } | { kind: 'failed'; error: string }> {
    const { client, primaryModel, fallbackModel, deniedModels } = this.options
    const request = {
      prompt,
      maxTokens: this.options.maxTokens ?? 500,
      temperature: this.options.temperature ?? 0.3,
      deniedModels,
    }

    try {
      return { kind: 'ok', response: await client.complete({ ...request, model: primaryModel }), fallbackUsed: false }
    } catch (primaryError) {
      this.log.warn('Primary model failed, trying fallback', { primaryModel, fallbackModel }, primaryError)
    }

    this.counters.fallbackUsed++
    try {
      return { kind: 'ok', response: await client.complete({ ...request, model: fallbackModel }), fallbackUsed: true }
    } catch (fallbackError) {
      const detail = fallbackError instanceof Error ? fallbackError.message : String(fallbackError)
      return { kind: 'failed', error: `Both models failed: ${detail}` }
    }
  }
}
