import { z } from 'zod'

export type Flags = Record<string, string | boolean>

/**
 * `--key value words --switch` → `{ key: 'value words', switch: true }`.
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
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
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
const nonNegative = z.coerce.number().nonnegative()

function parseWith(schema: z.ZodNumber, value: string | boolean | undefined, flag: string, expected: string): number | undefined {
  if (value === undefined) {
    return undefined
  }
  const parsed = schema.safeParse(typeof value === 'string' ? value : Number.NaN)
  if (!parsed.success) {
    throw new FlagError(`--${flag} expects ${expected}, got ${typeof value === 'string' ? `"${value}"` : 'no value'}`)
  }
  return parsed.data
}

/** Undefined when the flag is absent; FlagError when it is not a whole number above zero. */
export function asPositiveInt(value: string | boolean | undefined, flag: string): number | undefined {
  return parseWith(positiveInt, value, flag, 'a positive integer')
}

export function asNonNegativeNumber(value: string | boolean | undefined, flag: string): number | undefined {
  return parseWith(nonNegative, value, flag, 'a number >= 0')
}
