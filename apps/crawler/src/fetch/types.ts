/**
 * Fetch layer types
 */

export interface FetchOptions {
  /** Request timeout in ms (default: 10000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  /** Custom headers (merged with defaults) */
  headers?: Record<string, string>
}

/**
 * Identifies the bot. Sites may refuse requests without a User-Agent.
 */
export const DEFAULT_USER_AGENT = 'SiratBot/1.0 (+https://sirat.example/bot)'

export const DEFAULT_FETCH_HEADERS: Record<string, string> = {
  'User-Agent': DEFAULT_USER_AGENT,
  Accept: 'text/html,application/xhtml+xml',
  'Accept-Language': 'en-US,en;q=0.9',
}

export const DEFAULT_FETCH_OPTIONS = {
  timeoutMs: 10000,
  maxSizeBytes: 10 * 1024 * 1024, // 10 MB
} as const

export type FetchResult =
  | {
      status: 'ok'
      statusCode: number
      /** Normalized URL after redirects */
      finalUrl: string
      html: string
      durationMs: number
    }
  | {
      status: 'http_error' | 'not_html' | 'too_large'
      statusCode: number
      finalUrl: string
      error: string
      durationMs: number
    }
  | {
      status: 'timeout' | 'error'
      error: string
      durationMs: number
    }

export type FetchStatus = FetchResult['status']

export interface Fetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>
}

export interface RobotsPolicy {
  /** True unless the origin's robots.txt disallows the URL for our agent. */
  canFetch(url: string): Promise<boolean>
}
