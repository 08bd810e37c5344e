/**
 * Prune policies
 *
 * A policy receives every category's entries (oldest first) and returns
 * the entries to keep. Output must measure within `budget` whenever the
 * newest entry of each category can be truncated to fit, and each
 * category keeps at least one entry. Policies are pure.
 */

import { truncateToFit } from '../utils/text.js'
import type { Measure } from '../utils/text.js'
import type { ContextEntry } from './types.js'

export type EntriesByCategory = Map<string, ContextEntry[]>

export interface PruneInput {
  entries: ReadonlyMap<string, readonly ContextEntry[]>
  budget: number
  measure: Measure
}

export interface PrunePolicy {
  readonly name: string
  prune(input: PruneInput): EntriesByCategory
}

export function measureEntries(entries: Iterable<readonly ContextEntry[]>, measure: Measure): number {
  let total = 0
  for (const list of entries) {
    for (const entry of list) total += measure(entry.content)
  }
  return total
}

function copyEntries(entries: ReadonlyMap<string, readonly ContextEntry[]>): EntriesByCategory {
  const copy: EntriesByCategory = new Map()
  for (const [category, list] of entries) copy.set(category, [...list])
  return copy
}

/**
 * Remove globally-oldest entries until the budget holds, never emptying a
 * category. If the survivors still exceed it, truncate them oldest first.
 */
export class DropOldestPolicy implements PrunePolicy {
  readonly name = 'drop-oldest'

  prune({ entries, budget, measure }: PruneInput): EntriesByCategory {
    const result = copyEntries(entries)
    let total = measureEntries(result.values(), measure)

    while (total > budget) {
      let victim: ContextEntry[] | undefined
      for (const list of result.values()) {
        if (list.length > 1 && (!victim || list[0].id < victim[0].id)) victim = list
      }
      if (!victim) break
      const [removed] = victim.splice(0, 1)
      total -= measure(removed.content)
    }

    if (total > budget) truncateSurvivors(result, total, budget, measure)
    return result
  }
}

function truncateSurvivors(
  entries: EntriesByCategory,
  total: number,
  budget: number,
  measure: Measure,
): void {
  const survivors = Array.from(entries.values())
    .flat()
    .sort((a, b) => (a.id < b.id ? -1 : 1))

  for (const entry of survivors) {
    const excess = total - budget
    if (excess <= 0) return

    const size = measure(entry.content)
    const content = truncateToFit(entry.content, Math.max(0, size - excess), measure)
    const list = entries.get(entry.category)
    if (!list) continue
    const position = list.indexOf(entry)
    list[position] = { ...entry, content, metadata: { ...entry.metadata, truncated: true } }
    total += measure(content) - size
  }
}

const DIGEST_LINE_CHARS = 80

/**
 * Collapse everything but the newest entry of the largest categories into
 * one digest entry, then fall back to drop-oldest for whatever remains.
 */
export class SummarizeOldestPolicy implements PrunePolicy {
  readonly name = 'summarize-oldest'
  private readonly fallback = new DropOldestPolicy()

  prune({ entries, budget, measure }: PruneInput): EntriesByCategory {
    const result = copyEntries(entries)
    let total = measureEntries(result.values(), measure)

    const candidates = Array.from(result.entries())
      .filter(([, list]) => list.length > 2 || (list.length === 2 && !isDigest(list[0])))
      .map(([category, list]) => ({ category, size: measureEntries([list], measure) }))
      .sort((a, b) => b.size - a.size)

    for (const { category } of candidates) {
      if (total <= budget) break
      const list = result.get(category)
      if (!list) continue

      const older = list.slice(0, -1)
      const newest = list[list.length - 1]
      const digest = digestOf(category, older)
      const olderSize = measureEntries([older], measure)
      const digestSize = measure(digest.content)
      if (digestSize >= olderSize) continue

      result.set(category, [digest, newest])
      total += digestSize - olderSize
    }

    if (total <= budget) return result
    return this.fallback.prune({ entries: result, budget, measure })
  }
}

function isDigest(entry: ContextEntry): boolean {
  return typeof entry.metadata?.summaryOf === 'number'
}

function digestOf(category: string, older: ContextEntry[]): ContextEntry {
  const last = older[older.length - 1]
  const count = older.reduce(
    (sum, entry) => sum + (isDigest(entry) ? Number(entry.metadata?.summaryOf) : 1),
    0,
  )
  const lines = older.flatMap((entry) => {
    // Earlier digests carry their bullet lines forward
    if (isDigest(entry)) return entry.content.split('\n').slice(1)
    const firstLine = entry.content.split('\n', 1)[0].trim()
    return [`- ${firstLine.slice(0, DIGEST_LINE_CHARS)}`]
  })

  return {
    // Takes the newest collapsed id so ordering is preserved
    id: last.id,
    category,
    timestamp: last.timestamp,
    content: [`Summary of ${count} earlier ${category} entries:`, ...lines].join('\n'),
    metadata: { summaryOf: count },
  }
}

export function createPrunePolicy(name: 'drop-oldest' | 'summarize-oldest'): PrunePolicy {
  return name === 'summarize-oldest' ? new SummarizeOldestPolicy() : new DropOldestPolicy()
}
