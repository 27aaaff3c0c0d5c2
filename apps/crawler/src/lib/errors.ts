/**
 * Error Classification
 *
 * Maps thrown values onto the crawl failure taxonomy. Used to label log
 * lines and failure counters; nothing is retried within a run.
 */

import { ZodError } from 'zod'

export type ErrorCategory =
  | 'transport' // connection failure, non-200 or non-HTML response
  | 'timeout' // fetch exceeded its deadline
  | 'policy' // blocklist or robots exclusion
  | 'parse' // extraction failure
  | 'db' // persistence failure (transaction rolled back)
  | 'internal' // anything else

export interface ClassifiedError {
  category: ErrorCategory
  code: string
  message: string
  isRetryable: boolean
}

export const ERROR_CODES = {
  NETWORK_ERROR: 'NETWORK_ERROR',
  HTTP_ERROR: 'HTTP_ERROR',
  NOT_HTML: 'NOT_HTML',
  TOO_LARGE: 'TOO_LARGE',
  FETCH_TIMEOUT: 'FETCH_TIMEOUT',
  BLOCKED: 'BLOCKED',
  ROBOTS_DISALLOWED: 'ROBOTS_DISALLOWED',
  PARSE_FAILED: 'PARSE_FAILED',
  VALIDATION_FAILED: 'VALIDATION_FAILED',
  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
  DB_CONSTRAINT_VIOLATION: 'DB_CONSTRAINT_VIOLATION',
  DB_QUERY_ERROR: 'DB_QUERY_ERROR',
  UNEXPECTED_ERROR: 'UNEXPECTED_ERROR',
} as const

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES]

/**
 * Error raised by crawler stages that already know their category.
 */
export class CrawlError extends Error {
  constructor(
    readonly category: ErrorCategory,
    readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = 'CrawlError'
  }
}

export type PolicyCode = typeof ERROR_CODES.BLOCKED | typeof ERROR_CODES.ROBOTS_DISALLOWED

/**
 * Blocklist and robots exclusions are outcomes, not thrown errors, but are
 * labelled with the same taxonomy in CRAWL_BLOCKED events.
 */
export function policyExclusion(code: PolicyCode, reason: string): ClassifiedError {
  return { category: 'policy', code, message: reason, isRetryable: false }
}

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EAI_AGAIN',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
])

function errorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code
  }
  // fetch() wraps the socket error: TypeError('fetch failed', { cause })
  if (error.cause instanceof Error) {
    return errorCode(error.cause)
  }
  return undefined
}

/** Postgres SQLSTATE: five characters, class in the first two. */
function isSqlState(code: string): boolean {
  return /^[0-9A-Z]{5}$/.test(code)
}

function classifyDbError(code: string, message: string): ClassifiedError {
  if (code.startsWith('08') || code === '57P01' || code === '53300') {
    return { category: 'db', code: ERROR_CODES.DB_CONNECTION_ERROR, message, isRetryable: true }
  }
  if (code.startsWith('23')) {
    return { category: 'db', code: ERROR_CODES.DB_CONSTRAINT_VIOLATION, message, isRetryable: false }
  }
  return { category: 'db', code: ERROR_CODES.DB_QUERY_ERROR, message, isRetryable: false }
}

export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof CrawlError) {
    return {
      category: error.category,
      code: error.code,
      message: error.message,
      isRetryable: error.category === 'transport' || error.category === 'timeout',
    }
  }

  if (error instanceof ZodError) {
    return {
      category: 'parse',
      code: ERROR_CODES.VALIDATION_FAILED,
      message: error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      isRetryable: false,
    }
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return { category: 'timeout', code: ERROR_CODES.FETCH_TIMEOUT, message: error.message, isRetryable: true }
    }

    const code = errorCode(error)
    if (code && NETWORK_ERROR_CODES.has(code)) {
      return { category: 'transport', code: ERROR_CODES.NETWORK_ERROR, message: `Network error: ${code}`, isRetryable: true }
    }
    if (code === 'ETIMEDOUT') {
      return { category: 'timeout', code: ERROR_CODES.FETCH_TIMEOUT, message: error.message, isRetryable: true }
    }
    if (code && isSqlState(code)) {
      return classifyDbError(code, error.message)
    }

    return { category: 'internal', code: ERROR_CODES.UNEXPECTED_ERROR, message: error.message, isRetryable: false }
  }

  return { category: 'internal', code: ERROR_CODES.UNEXPECTED_ERROR, message: String(error), isRetryable: false }
}

/**
 * Flatten a classified error into log metadata.
 */
export function formatErrorForLog(classified: ClassifiedError): Record<string, unknown> {
  return {
    error_category: classified.category,
    error_code: classified.code,
    error_message: classified.message,
    error_is_retryable: classified.isRetryable,
  }
}
