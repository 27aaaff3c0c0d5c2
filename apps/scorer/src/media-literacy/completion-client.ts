/**
 * Chat-completion client for OpenRouter.
 *
 * One HTTP attempt per call with a hard timeout. Every failure surfaces as a
 * CompletionError; deciding what to do about it is the gateway's job.
 */

import { z } from 'zod'

export type CompletionErrorKind = 'timeout' | 'transport' | 'http' | 'invalid_response' | 'denied_model' | 'not_configured'

export class CompletionError extends Error {
  readonly status: number | undefined

  constructor(
    readonly kind: CompletionErrorKind,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(message, options)
    this.name = 'CompletionError'
    this.status = options?.status
  }
}

export interface CompletionRequest {
  model: string
  prompt: string
  maxTokens: number
  temperature: number
  deniedModels: readonly string[]
}

export interface CompletionResponse {
  modelUsed: string
  content: string
}

export interface CompletionClient {
  complete(request: CompletionRequest): Promise<CompletionResponse>
}

export interface OpenRouterClientOptions {
  apiKey: string | null
  baseUrl?: string
  timeoutMs?: number
  /** Sent as HTTP-Referer / X-Title for OpenRouter attribution */
  referer?: string
  title?: string
}

const completionResponseSchema = z.object({
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable() }),
      })
    )
    .min(1),
})

export class OpenRouterClient implements CompletionClient {
  private readonly apiKey: string | null
  private readonly baseUrl: string
  private readonly timeoutMs: number
  private readonly referer: string
  private readonly title: string

  constructor(options: OpenRouterClientOptions) {
    this.apiKey = options.apiKey
    this.baseUrl = (options.baseUrl ?? 'https://openrouter.ai/api/v1').replace(/\/+$/, '')
    this.timeoutMs = options.timeoutMs ?? 15000
    this.referer = options.referer ?? 'https://sirat.example'
    this.title = options.title ?? 'Sirat Media Literacy Scorer'
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    if (!this.apiKey) {
      throw new CompletionError('not_configured', 'OPENROUTER_API_KEY is not set')
    }
    if (request.deniedModels.includes(request.model)) {
      throw new CompletionError('denied_model', `Model ${request.model} is on the deny list`)
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    let response: Response
    try {
      response = await fetch(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          'Content-Type': 'application/json',
          'HTTP-Referer': this.referer,
          'X-Title': this.title,
        },
        body: JSON.stringify({
          model: request.model,
          messages: [{ role: 'user', content: request.prompt }],
          max_tokens: request.maxTokens,
          temperature: request.temperature,
          ...(request.deniedModels.length > 0 ? { models: { blacklist: [...request.deniedModels] } } : {}),
        }),
        signal: controller.signal,
      })
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new CompletionError('timeout', `Completion timed out after ${this.timeoutMs}ms`, { cause: error })
      }
      const detail = error instanceof Error ? error.message : String(error)
      throw new CompletionError('transport', `Completion request failed: ${detail}`, { cause: error })
    } finally {
      clearTimeout(timeoutId)
    }

    if (!response.ok) {
      await response.body?.cancel()
      throw new CompletionError('http', `HTTP ${response.status}: ${response.statusText}`, { status: response.status })
    }

    let body: unknown
    try {
      body = await response.json()
    } catch (error) {
      throw new CompletionError('invalid_response', 'Response body is not JSON', { cause: error })
    }

    const parsed = completionResponseSchema.safeParse(body)
    if (!parsed.success) {
      throw new CompletionError('invalid_response', 'Response has no completion choices', { cause: parsed.error })
    }

    const modelUsed = parsed.data.model ?? request.model
    // Auto-routing may pick any model; refuse the answer of a denied one
    if (request.deniedModels.includes(modelUsed)) {
      throw new CompletionError('denied_model', `Router selected denied model ${modelUsed}`)
    }

    return { modelUsed, content: parsed.data.choices[0].message.content ?? '' }
  }
}
