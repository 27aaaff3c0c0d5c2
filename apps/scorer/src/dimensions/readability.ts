/**
 * Readability capability (0-15 points).
 *
 * Two interchangeable implementations, picked by configuration:
 * Flesch reading ease (syllable-aware) or average words per sentence.
 */

import { flesch } from 'flesch'
import { syllable } from 'syllable'
import type { ReadabilityMode } from '../config/settings.js'

export interface ReadabilityScorer {
  readonly name: ReadabilityMode
  score(content: string): number
}

/** Points when no sentence terminator is found. */
const NO_SENTENCES_POINTS = 5

export function words(content: string): string[] {
  return content.split(/\s+/).filter(Boolean)
}

export function countSentences(content: string): number {
  return (content.match(/[.!?]/g) ?? []).length
}

export class SentenceLengthReadability implements ReadabilityScorer {
  readonly name = 'sentence-length' as const

  score(content: string): number {
    const sentences = countSentences(content)
    if (sentences === 0) return NO_SENTENCES_POINTS

    const avgWords = words(content).length / sentences
    if (avgWords <= 15) return 15
    if (avgWords <= 25) return 10
    return 5
  }
}

export class FleschReadability implements ReadabilityScorer {
  readonly name = 'flesch' as const

  score(content: string): number {
    const sentence = countSentences(content)
    const word = words(content).length
    if (sentence === 0 || word === 0) return NO_SENTENCES_POINTS

    const ease = flesch({ sentence, word, syllable: syllable(content) })
    if (ease >= 60) return 15
    if (ease >= 30) return 10
    return 5
  }
}

export function createReadabilityScorer(mode: ReadabilityMode): ReadabilityScorer {
  return mode === 'flesch' ? new FleschReadability() : new SentenceLengthReadability()
}
