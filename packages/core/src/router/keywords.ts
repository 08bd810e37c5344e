/**
 * Keyword configuration
 *
 * Phrase lists live in a versioned data file so they can be extended
 * without touching the classifier. A user file (JSON or YAML) replaces
 * the bundled one; `extraPhrases` from config.yaml are appended.
 */

import { readFileSync } from 'node:fs'
import { parse } from 'yaml'
import { z } from 'zod'
import { ConfigError, errorMessage } from '../errors.js'

const BUNDLED_KEYWORDS = new URL('./keywords.json', import.meta.url)

const phraseList = z.array(z.string().min(1))

const keywordConfigSchema = z.object({
  version: z.literal(1),
  autonomousPhrases: phraseList,
  connectives: phraseList,
  categoryKeywords: z.object({
    code: phraseList.default([]),
    research: phraseList.default([]),
    content: phraseList.default([]),
    business: phraseList.default([]),
  }),
})

export type KeywordConfig = z.infer<typeof keywordConfigSchema>

export interface KeywordLoadOptions {
  keywordsFile?: string
  extraPhrases?: string[]
}

const lower = (list: string[]): string[] => [...new Set(list.map((item) => item.toLowerCase()))]

/**
 * Validate a raw keyword document and normalize it to lower case.
 * Connectives keep their surrounding spaces.
 */
export function parseKeywordConfig(raw: unknown, source = 'keywords'): KeywordConfig {
  const parsed = keywordConfigSchema.safeParse(raw)
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ')
    throw new ConfigError(`Invalid keyword configuration in ${source}: ${problems}`)
  }

  const { categoryKeywords } = parsed.data
  return {
    version: parsed.data.version,
    autonomousPhrases: lower(parsed.data.autonomousPhrases),
    connectives: lower(parsed.data.connectives),
    categoryKeywords: {
      code: lower(categoryKeywords.code),
      research: lower(categoryKeywords.research),
      content: lower(categoryKeywords.content),
      business: lower(categoryKeywords.business),
    },
  }
}

export function loadKeywordConfig(options: KeywordLoadOptions = {}): KeywordConfig {
  const source = options.keywordsFile ?? BUNDLED_KEYWORDS
  let raw: unknown
  try {
    raw = parse(readFileSync(source, 'utf-8'))
  } catch (error) {
    throw new ConfigError(`Could not read keyword file ${String(source)}: ${errorMessage(error)}`, {
      cause: error,
    })
  }

  const config = parseKeywordConfig(raw, String(source))
  if (!options.extraPhrases?.length) return config
  return {
    ...config,
    autonomousPhrases: lower([...config.autonomousPhrases, ...options.extraPhrases]),
  }
}
