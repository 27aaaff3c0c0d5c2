import { describe, it, expect, vi, afterEach } from 'vitest'
import { CompletionError, OpenRouterClient, type CompletionRequest } from '../media-literacy/completion-client.js'

const REQUEST: CompletionRequest = {
  model: 'vendor/small',
  prompt: 'Rate this page.',
  maxTokens: 500,
  temperature: 0.3,
  deniedModels: ['openai/gpt-4o'],
}

function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), { status: 200, ...init })
}

function client(timeoutMs?: number): OpenRouterClient {
  return new OpenRouterClient({ apiKey: 'test-secret', baseUrl: 'https://router.test/api/v1/', timeoutMs })
}

async function failure(promise: Promise<unknown>): Promise<CompletionError> {
  try {
    await promise
  } catch (error) {
    if (error instanceof CompletionError) return error
    throw error
  }
  throw new Error('expected a CompletionError')
}

describe('OpenRouterClient', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('posts a chat completion and returns the reply', async () => {
    const fetchSpy = vi
      .fn()
      .mockResolvedValue(jsonResponse({ model: 'vendor/small', choices: [{ message: { content: '{"ok":true}' } }] }))
    vi.stubGlobal('fetch', fetchSpy)

    const response = await client().complete(REQUEST)

    expect(response).toEqual({ modelUsed: 'vendor/small', content: '{"ok":true}' })
    const [url, init] = fetchSpy.mock.calls[0]
    expect(url).toBe('https://router.test/api/v1/chat/completions')
    expect(init.method).toBe('POST')
    expect(init.headers.Authorization).toBe('Bearer test-secret')
    expect(JSON.parse(init.body)).toEqual({
      model: 'vendor/small',
      messages: [{ role: 'user', content: 'Rate this page.' }],
      max_tokens: 500,
      temperature: 0.3,
      models: { blacklist: ['openai/gpt-4o'] },
    })
  })

  it('leaves routing constraints out when nothing is denied', async () => {
    const fetchSpy = vi
      .fn()
      .mockResolvedValue(jsonResponse({ model: 'vendor/small', choices: [{ message: { content: 'ok' } }] }))
    vi.stubGlobal('fetch', fetchSpy)

    await client().complete({ ...REQUEST, deniedModels: [] })

    expect(JSON.parse(fetchSpy.mock.calls[0][1].body)).not.toHaveProperty('models')
  })

  it('falls back to the requested model name and empty content', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ choices: [{ message: { content: null } }] })))
    expect(await client().complete(REQUEST)).toEqual({ modelUsed: 'vendor/small', content: '' })
  })

  it('refuses to run without an API key', async () => {
    const fetchSpy = vi.fn()
    vi.stubGlobal('fetch', fetchSpy)

    const error = await failure(new OpenRouterClient({ apiKey: null }).complete(REQUEST))

    expect(error.kind).toBe('not_configured')
    expect(fetchSpy).not.toHaveBeenCalled()
  })

  it('refuses a denied model before sending', async () => {
    const fetchSpy = vi.fn()
    vi.stubGlobal('fetch', fetchSpy)

    const error = await failure(client().complete({ ...REQUEST, model: 'openai/gpt-4o' }))

    expect(error.kind).toBe('denied_model')
    expect(error.message).toBe('Model openai/gpt-4o is on the deny list')
    expect(fetchSpy).not.toHaveBeenCalled()
  })

  it('rejects a reply from a denied model picked by the router', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(jsonResponse({ model: 'openai/gpt-4o', choices: [{ message: { content: '{}' } }] }))
    )

    const error = await failure(client().complete({ ...REQUEST, model: 'openrouter/auto' }))

    expect(error.kind).toBe('denied_model')
    expect(error.message).toBe('Router selected denied model openai/gpt-4o')
  })

  it('reports HTTP errors with their status', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('busy', { status: 503, statusText: 'Service Unavailable' })))

    const error = await failure(client().complete(REQUEST))

    expect(error.kind).toBe('http')
    expect(error.status).toBe(503)
    expect(error.message).toBe('HTTP 503: Service Unavailable')
  })

  it('reports a body that is not JSON', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('<html>', { status: 200 })))
    const error = await failure(client().complete(REQUEST))
    expect([error.kind, error.message]).toEqual(['invalid_response', 'Response body is not JSON'])
  })

  it('reports a reply without choices', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(jsonResponse({ choices: [] })))
    const error = await failure(client().complete(REQUEST))
    expect([error.kind, error.message]).toEqual(['invalid_response', 'Response has no completion choices'])
  })

  it('reports transport failures', async () => {
    vi.stubGlobal('fetch', vi.fn().mockRejectedValue(new TypeError('fetch failed')))
    const error = await failure(client().complete(REQUEST))
    expect([error.kind, error.message]).toEqual(['transport', 'Completion request failed: fetch failed'])
  })

  it('aborts after the timeout', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(
        (_url: string, init?: RequestInit) =>
          new Promise<Response>((_resolve, reject) => {
            init?.signal?.addEventListener('abort', () => {
              const abort = new Error('This operation was aborted')
              abort.name = 'AbortError'
              reject(abort)
            })
          })
      )
    )

    const error = await failure(client(5).complete(REQUEST))

    expect([error.kind, error.message]).toEqual(['timeout', 'Completion timed out after 5ms'])
  })
})
