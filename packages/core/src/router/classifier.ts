/**
 * Intent classifier
 *
 * Pure functions over lower-cased text. `classify` has no state: the
 * same text and keyword configuration always yield the same result.
 */

import { InvalidInputError } from '../errors.js'
import type { TaskCategory } from '../tasks/types.js'
import type { KeywordConfig } from './keywords.js'

export type InteractionMode = 'chat' | 'autonomous'

export type AutonomousTrigger = 'keyword' | 'enumeration' | 'connective' | 'numbered-list' | 'length'

export interface Classification {
  mode: InteractionMode
  taskCategory: TaskCategory
  /** Every rule that fired; empty in chat mode */
  triggers: AutonomousTrigger[]
  matchedPhrase?: string
}

export const ENUMERATION_MIN_COMMAS = 2
export const ENUMERATION_MIN_LENGTH = 100
export const LONG_REQUEST_LENGTH = 300

const CATEGORY_ORDER = ['code', 'research', 'content', 'business'] as const

export function findAutonomousPhrase(text: string, phrases: readonly string[]): string | undefined {
  return phrases.find((phrase) => text.includes(phrase))
}

/** Two or more commas in a text longer than 100 characters */
export function isEnumeratedRequest(text: string): boolean {
  const commas = text.split(',').length - 1
  return commas >= ENUMERATION_MIN_COMMAS && text.length > ENUMERATION_MIN_LENGTH
}

export function hasSequencingConnective(text: string, connectives: readonly string[]): boolean {
  return connectives.some((connective) => text.includes(connective))
}

export function hasNumberedList(text: string): boolean {
  return /\d\. /.test(text)
}

export function isLongRequest(text: string): boolean {
  return text.length > LONG_REQUEST_LENGTH
}

/** First category (code, research, content, business) with a keyword hit */
export function detectCategory(text: string, keywords: KeywordConfig): TaskCategory {
  const lower = text.toLowerCase()
  for (const category of CATEGORY_ORDER) {
    if (keywords.categoryKeywords[category].some((keyword) => lower.includes(keyword))) {
      return category
    }
  }
  return 'general'
}

export function classify(userText: string, keywords: KeywordConfig): Classification {
  if (userText.trim().length === 0) {
    throw new InvalidInputError()
  }

  const text = userText.toLowerCase()
  const triggers: AutonomousTrigger[] = []

  const matchedPhrase = findAutonomousPhrase(text, keywords.autonomousPhrases)
  if (matchedPhrase) triggers.push('keyword')
  if (isEnumeratedRequest(text)) triggers.push('enumeration')
  if (hasSequencingConnective(text, keywords.connectives)) triggers.push('connective')
  if (hasNumberedList(text)) triggers.push('numbered-list')
  if (isLongRequest(text)) triggers.push('length')

  return {
    mode: triggers.length > 0 ? 'autonomous' : 'chat',
    taskCategory: detectCategory(text, keywords),
    triggers,
    ...(matchedPhrase ? { matchedPhrase } : {}),
  }
}
