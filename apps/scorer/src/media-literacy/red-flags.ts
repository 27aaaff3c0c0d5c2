/**
 * Red-flag phrase screen. Content reaches the AI model only when at least
 * two distinct phrases appear; everything else scores neutral at no cost.
 */

import { readFileSync } from 'fs'
import { z } from 'zod'

export const MIN_ANALYSIS_LENGTH = 100
export const ESCALATION_THRESHOLD = 2

const redFlagFileSchema = z.object({ phrases: z.array(z.string().min(1)) })

/** Lower-cased, de-duplicated phrase list shipped beside this module. */
export function loadRedFlagPhrases(): string[] {
  const raw: unknown = JSON.parse(readFileSync(new URL('./red-flags.json', import.meta.url), 'utf-8'))
  const { phrases } = redFlagFileSchema.parse(raw)
  return [...new Set(phrases.map((phrase) => phrase.toLowerCase()))]
}

export interface EscalationCheck {
  needed: boolean
  matched: string[]
}

export function needsAnalysis(content: string, phrases: readonly string[]): EscalationCheck {
  if (content.length < MIN_ANALYSIS_LENGTH) {
    return { needed: false, matched: [] }
  }

  const lowered = content.toLowerCase()
  const matched = phrases.filter((phrase) => lowered.includes(phrase))
  return { needed: matched.length >= ESCALATION_THRESHOLD, matched }
}
