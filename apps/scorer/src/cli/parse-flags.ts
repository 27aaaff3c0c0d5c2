import { z } from 'zod'
import type { ScoreTarget } from './commands/score.js'

export type Flags = Record<string, string | boolean>

/**
 * `--key value --switch` → `{ key: 'value', switch: true }`.
 * Tokens before the first flag are returned as positionals.
 */
export function parseFlags(argv: string[]): { positionals: string[]; flags: Flags } {
  const flags: Flags = {}
  const positionals: string[] = []

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      positionals.push(token)
      continue
    }

    const key = token.slice(2)
    const next = argv[i + 1]
    if (next !== undefined && !next.startsWith('--')) {
      flags[key] = next
      i++
    } else {
      flags[key] = true
    }
  }

  return { positionals, flags }
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

export class FlagError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'FlagError'
  }
}

const positiveInt = z.coerce.number().int().positive()

/** Undefined when the flag is absent; FlagError when it is not a whole number above zero. */
export function asPositiveInt(value: string | boolean | undefined, flag: string): number | undefined {
  if (value === undefined) {
    return undefined
  }
  const parsed = positiveInt.safeParse(typeof value === 'string' ? value : Number.NaN)
  if (!parsed.success) {
    throw new FlagError(`--${flag} expects a positive integer, got ${typeof value === 'string' ? `"${value}"` : 'no value'}`)
  }
  return parsed.data
}

/**
 * `--page-id` wins over `--unscored`, which wins over `--all`. Null when none is given.
 */
export function parseScoreTarget(flags: Flags): ScoreTarget | null {
  const pageId = asPositiveInt(flags['page-id'], 'page-id')
  if (pageId !== undefined) return { kind: 'page', pageId }
  const limit = asPositiveInt(flags.limit, 'limit')
  if (flags.unscored === true) return { kind: 'unscored', limit }
  if (flags.all === true) return { kind: 'all', limit }
  return null
}
