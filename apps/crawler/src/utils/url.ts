/**
 * URL canonicalization for frontier dedup and page identity.
 *
 * Rules:
 * 1. Trim surrounding whitespace
 * 2. Drop the fragment (everything from the first `#`)
 * 3. Prefix `https://` when the URL has no http(s) scheme
 *
 * Case, trailing slashes and query strings are left alone: two URLs that
 * differ only by query string are distinct pages.
 */

import { createHash } from 'crypto'

const HTTP_SCHEME = /^https?:\/\//

export interface CanonicalUrl {
  raw: string
  normalized: string
  hash: string
}

export function normalizeUrl(raw: string): string {
  let url = raw.trim()

  const hashIndex = url.indexOf('#')
  if (hashIndex !== -1) {
    url = url.slice(0, hashIndex)
  }

  if (!HTTP_SCHEME.test(url)) {
    url = `https://${url}`
  }

  return url
}

/**
 * SHA-256 hex digest of an already-normalized URL. Stored as `pages.url_hash`.
 */
export function hashUrl(normalized: string): string {
  return createHash('sha256').update(normalized).digest('hex')
}

export function canonicalize(raw: string): CanonicalUrl {
  const normalized = normalizeUrl(raw)
  return { raw, normalized, hash: hashUrl(normalized) }
}

/**
 * Host (with port, as stored in `pages.domain`) or null when the URL does not parse.
 */
export function hostOf(url: string): string | null {
  try {
    return new URL(url).host || null
  } catch {
    return null
  }
}

/**
 * `scheme://host[:port]`, the key robots.txt policies are cached under.
 */
export function originOf(url: string): string | null {
  try {
    const { origin } = new URL(url)
    return origin === 'null' ? null : origin
  } catch {
    return null
  }
}
