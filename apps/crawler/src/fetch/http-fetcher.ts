/**
 * HTTP Fetcher
 *
 * Native fetch with a timeout and a body size limit. One attempt per URL:
 * failed fetches are abandoned for the run, never retried here.
 */

import type { Fetcher, FetchOptions, FetchResult } from './types.js'
import { DEFAULT_FETCH_HEADERS, DEFAULT_FETCH_OPTIONS } from './types.js'
import { normalizeUrl } from '../utils/url.js'

export interface HttpFetcherOptions {
  /** Defaults applied to every request; per-call options override them */
  defaults?: FetchOptions
}

export class HttpFetcher implements Fetcher {
  private readonly defaults: FetchOptions

  constructor(options: HttpFetcherOptions = {}) {
    this.defaults = options.defaults ?? {}
  }

  async fetch(url: string, options?: FetchOptions): Promise<FetchResult> {
    const startTime = Date.now()
    const timeoutMs = options?.timeoutMs ?? this.defaults.timeoutMs ?? DEFAULT_FETCH_OPTIONS.timeoutMs
    const maxSizeBytes = options?.maxSizeBytes ?? this.defaults.maxSizeBytes ?? DEFAULT_FETCH_OPTIONS.maxSizeBytes
    const headers = {
      ...DEFAULT_FETCH_HEADERS,
      ...this.defaults.headers,
      ...options?.headers,
    }

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers,
        signal: controller.signal,
        redirect: 'follow',
      })

      const finalUrl = normalizeUrl(response.url || url)

      if (response.status !== 200) {
        await response.body?.cancel()
        return {
          status: 'http_error',
          statusCode: response.status,
          finalUrl,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const contentType = response.headers.get('content-type') ?? ''
      if (!contentType.toLowerCase().includes('text/html')) {
        await response.body?.cancel()
        return {
          status: 'not_html',
          statusCode: response.status,
          finalUrl,
          durationMs: Date.now() - startTime,
          error: `Unsupported content type: ${contentType || 'none'}`,
        }
      }

      // Early size check from the header
      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > maxSizeBytes) {
        await response.body?.cancel()
        return {
          status: 'too_large',
          statusCode: response.status,
          finalUrl,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const html = await this.readBodyWithLimit(response, maxSizeBytes)
      if (html === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          finalUrl,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        finalUrl,
        html,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${timeoutMs}ms`,
        }
      }

      return {
        status: 'error',
        durationMs: Date.now() - startTime,
        error: describeFetchError(error),
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Read the body, giving up once it passes `maxBytes`.
   * Returns null if the limit was exceeded.
   */
  private async readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
    const reader = response.body?.getReader()
    if (!reader) {
      return ''
    }

    const chunks: Uint8Array[] = []
    let totalSize = 0

    try {
      while (true) {
        const { done, value } = await reader.read()
        if (done) break

        totalSize += value.length
        if (totalSize > maxBytes) {
          await reader.cancel()
          return null
        }

        chunks.push(value)
      }

      return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
    } finally {
      reader.releaseLock()
    }
  }
}

/**
 * fetch() reports socket failures as TypeError('fetch failed') with the real error as `cause`.
 */
function describeFetchError(error: unknown): string {
  if (error instanceof Error) {
    if (error.cause instanceof Error) {
      return `${error.message}: ${error.cause.message}`
    }
    return error.message
  }
  return String(error)
}
