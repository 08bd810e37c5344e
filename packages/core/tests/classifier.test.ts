/**
 * Intent classifier and router
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import fs from 'node:fs'
import path from 'node:path'

import {
  classify,
  detectCategory,
  hasNumberedList,
  hasSequencingConnective,
  isEnumeratedRequest,
  isLongRequest,
} from '../src/router/classifier.js'
import { loadKeywordConfig, parseKeywordConfig } from '../src/router/keywords.js'
import { Router } from '../src/router/router.js'
import { ContextStore } from '../src/context/context-store.js'
import { MemoryStorage } from '../src/storage/memory-storage.js'
import { ConfigError, InvalidInputError } from '../src/errors.js'
import { cleanDir, createTempDir } from './helpers.js'

const keywords = loadKeywordConfig()

// -------------------------------------------------------------------
// 1. Structural predicates
// -------------------------------------------------------------------

describe('structural predicates', () => {
  it('enumeration needs two commas and more than 100 characters', () => {
    const base = 'alpha, beta, gamma '
    expect(isEnumeratedRequest(base + 'x'.repeat(100 - base.length))).toBe(false)
    expect(isEnumeratedRequest(base + 'x'.repeat(101 - base.length))).toBe(true)
    expect(isEnumeratedRequest('alpha, beta ' + 'x'.repeat(120))).toBe(false)
  })

  it('detects sequencing connectives only with surrounding spaces', () => {
    expect(hasSequencingConnective('draft it and then send it', keywords.connectives)).toBe(true)
    expect(hasSequencingConnective('review it after that ship it', keywords.connectives)).toBe(true)
    expect(hasSequencingConnective('and thence', keywords.connectives)).toBe(false)
  })

  it('detects numbered lists', () => {
    expect(hasNumberedList('steps: 1. plan 2. build')).toBe(true)
    expect(hasNumberedList('version 1.5 is out')).toBe(false)
  })

  it('long requests are strictly over 300 characters', () => {
    expect(isLongRequest('a'.repeat(300))).toBe(false)
    expect(isLongRequest('a'.repeat(301))).toBe(true)
  })
})

// -------------------------------------------------------------------
// 2. classify
// -------------------------------------------------------------------

describe('classify', () => {
  it('rejects empty and whitespace-only input', () => {
    expect(() => classify('', keywords)).toThrow(InvalidInputError)
    expect(() => classify('   \n\t', keywords)).toThrow(InvalidInputError)
  })

  it('keeps short questions in chat mode', () => {
    const result = classify("What's React?", keywords)
    expect(result.mode).toBe('chat')
    expect(result.triggers).toEqual([])
  })

  it('treats a build request as autonomous via keyword', () => {
    const result = classify(
      'Build me a todo app with React and FastAPI, write tests, and deploy it',
      keywords,
    )
    expect(result.mode).toBe('autonomous')
    expect(result.triggers).toEqual(['keyword'])
    expect(result.matchedPhrase).toBe('build me')
    expect(result.taskCategory).toBe('code')
  })

  it('fires on each structural rule independently', () => {
    expect(classify('alpha, beta, gamma ' + 'x'.repeat(90), keywords).triggers).toEqual([
      'enumeration',
    ])
    expect(classify('outline the post and then polish it', keywords).triggers).toEqual([
      'connective',
    ])
    expect(classify('please: 1. outline 2. polish', keywords).triggers).toEqual(['numbered-list'])
    expect(classify('z'.repeat(301), keywords).triggers).toEqual(['length'])
  })

  it('is deterministic across repeated calls', () => {
    const text = 'Research and summarize the top three note-taking apps'
    const first = classify(text, keywords)
    for (let i = 0; i < 5; i++) {
      expect(classify(text, keywords)).toEqual(first)
    }
    expect(first.mode).toBe('autonomous')
  })

  it('matches phrases case-insensitively', () => {
    expect(classify('LANDING PAGE for my bakery', keywords).matchedPhrase).toBe('landing page')
  })

  it('picks categories in code, research, content, business order', () => {
    expect(detectCategory('investigate churn', keywords)).toBe('research')
    expect(detectCategory('draft a newsletter', keywords)).toBe('content')
    expect(detectCategory('forecast revenue', keywords)).toBe('business')
    expect(detectCategory('hello there', keywords)).toBe('general')
  })
})

// -------------------------------------------------------------------
// 3. Keyword configuration
// -------------------------------------------------------------------

describe('keyword configuration', () => {
  let tempDir: string

  beforeEach(() => {
    tempDir = createTempDir('keywords-test-')
  })

  afterEach(() => {
    cleanDir(tempDir)
  })

  it('appends extra phrases lower-cased', () => {
    const extended = loadKeywordConfig({ extraPhrases: ['Ship It'] })
    expect(classify('please ship it today', extended).matchedPhrase).toBe('ship it')
    expect(classify('please ship it today', keywords).mode).toBe('chat')
  })

  it('loads a YAML keyword file in place of the bundled list', () => {
    const file = path.join(tempDir, 'keywords.yaml')
    fs.writeFileSync(
      file,
      [
        'version: 1',
        'autonomousPhrases: [launch sequence]',
        'connectives: [" then "]',
        'categoryKeywords:',
        '  research: [survey]',
      ].join('\n'),
    )

    const custom = loadKeywordConfig({ keywordsFile: file })
    expect(custom.categoryKeywords.code).toEqual([])
    expect(classify('start the launch sequence', custom).mode).toBe('autonomous')
    expect(classify('build me a site', custom).mode).toBe('chat')
    expect(classify('survey users then report', custom).triggers).toEqual(['connective'])
  })

  it('rejects documents of an unknown version', () => {
    expect(() =>
      parseKeywordConfig({ version: 2, autonomousPhrases: [], connectives: [], categoryKeywords: {} }),
    ).toThrow(ConfigError)
  })

  it('reports a missing keyword file as a config error', () => {
    expect(() => loadKeywordConfig({ keywordsFile: path.join(tempDir, 'missing.json') })).toThrow(
      ConfigError,
    )
  })
})

// -------------------------------------------------------------------
// 4. Router
// -------------------------------------------------------------------

describe('Router', () => {
  async function createRouter() {
    const contextStore = await ContextStore.open({
      storage: new MemoryStorage(),
      categories: ['decisions', 'research'],
      budget: 10000,
    })
    return { contextStore, router: new Router({ keywords, contextStore, snapshotTokens: 1000 }) }
  }

  it('records each decision and hands back a context snapshot', async () => {
    const { contextStore, router } = await createRouter()
    await contextStore.append('research', 'Competitors charge $12/month')

    const decision = await router.route('Build me a pricing page')

    expect(decision.classification.mode).toBe('autonomous')
    expect(decision.context.entries.map((e) => e.content)).toEqual(['Competitors charge $12/month'])

    const decisions = await contextStore.getEntries('decisions')
    expect(decisions).toHaveLength(1)
    expect(decisions[0].content).toBe('Routed "Build me a pricing page" to autonomous (code)')
    expect(decisions[0].metadata).toEqual({ mode: 'autonomous', triggers: ['keyword'] })
  })

  it('rejects empty input without touching the store', async () => {
    const { contextStore, router } = await createRouter()
    await expect(router.route('  ')).rejects.toThrow(InvalidInputError)
    expect(await contextStore.getEntries('decisions')).toEqual([])
  })
})
