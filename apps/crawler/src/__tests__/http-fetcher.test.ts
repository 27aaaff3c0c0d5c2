import { describe, it, expect, vi, afterEach } from 'vitest'
import { HttpFetcher } from '../fetch/http-fetcher.js'
import { DEFAULT_USER_AGENT } from '../fetch/types.js'

function htmlResponse(body: string, init: ResponseInit = {}): Response {
  return new Response(body, {
    status: 200,
    ...init,
    headers: { 'content-type': 'text/html; charset=utf-8', ...init.headers },
  })
}

describe('HttpFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals()
  })

  it('returns the body of a 200 HTML response', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(htmlResponse('<html><title>x</title></html>'))
    vi.stubGlobal('fetch', fetchSpy)

    const result = await new HttpFetcher().fetch('https://example.com/page')

    expect(result).toMatchObject({
      status: 'ok',
      statusCode: 200,
      finalUrl: 'https://example.com/page',
      html: '<html><title>x</title></html>',
    })
    expect(fetchSpy.mock.calls[0][1].headers['User-Agent']).toBe(DEFAULT_USER_AGENT)
  })

  it('reports the normalized URL after redirects', async () => {
    const response = htmlResponse('<html></html>')
    Object.defineProperty(response, 'url', { value: 'https://example.com/final#top' })
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(response))

    const result = await new HttpFetcher().fetch('https://example.com/start')

    expect(result.status === 'ok' && result.finalUrl).toBe('https://example.com/final')
  })

  it('rejects non-200 responses', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('nope', { status: 404, statusText: 'Not Found' })))

    const result = await new HttpFetcher().fetch('https://example.com/missing')

    expect(result).toMatchObject({ status: 'http_error', statusCode: 404, error: 'HTTP 404: Not Found' })
  })

  it('rejects non-HTML content', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(new Response('{}', { status: 200, headers: { 'content-type': 'application/json' } }))
    )

    const result = await new HttpFetcher().fetch('https://example.com/api')

    expect(result).toMatchObject({ status: 'not_html', error: 'Unsupported content type: application/json' })
  })

  it('stops reading past the size limit', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(htmlResponse('x'.repeat(100))))

    const result = await new HttpFetcher().fetch('https://example.com/big', { maxSizeBytes: 10 })

    expect(result.status).toBe('too_large')
  })

  it('times out', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockImplementation(
        (_url: string, init: RequestInit) =>
          new Promise((_resolve, reject) => {
            init.signal?.addEventListener('abort', () => {
              reject(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }))
            })
          })
      )
    )

    const result = await new HttpFetcher().fetch('https://example.com/slow', { timeoutMs: 5 })

    expect(result).toMatchObject({ status: 'timeout', error: 'Request timed out after 5ms' })
  })

  it('reports network errors with their cause', async () => {
    vi.stubGlobal(
      'fetch',
      vi
        .fn()
        .mockRejectedValue(new TypeError('fetch failed', { cause: new Error('getaddrinfo ENOTFOUND nowhere.invalid') }))
    )

    const result = await new HttpFetcher().fetch('https://nowhere.invalid/')

    expect(result).toMatchObject({ status: 'error', error: 'fetch failed: getaddrinfo ENOTFOUND nowhere.invalid' })
  })

  it('applies constructor defaults under per-call options', async () => {
    const fetchSpy = vi.fn().mockResolvedValue(htmlResponse('<html></html>'))
    vi.stubGlobal('fetch', fetchSpy)

    const fetcher = new HttpFetcher({ defaults: { headers: { 'User-Agent': 'TestBot/1.0' } } })
    await fetcher.fetch('https://example.com/')

    expect(fetchSpy.mock.calls[0][1].headers['User-Agent']).toBe('TestBot/1.0')
  })
})
