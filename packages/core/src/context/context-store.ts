/**
 * Context Store
 *
 * Categorized, bounded memory shared by the router, the executor and the
 * capabilities. Each category is a JSONL log under `context/`. The summed
 * size of all entries never stays above the budget: every append that
 * crosses it triggers a prune before the append resolves.
 *
 * Concurrency: one readers-writer lock per category. Operations touching
 * several categories (prune, snapshot) take their locks in the configured
 * category order.
 */

import { monotonicFactory } from 'ulid'
import { z } from 'zod'
import { UnknownCategoryError } from '../errors.js'
import { createLogger } from '../logger.js'
import type { DurableStorage } from '../storage/types.js'
import { ReadWriteLock, acquireAll } from '../utils/rw-lock.js'
import { estimateTokens } from '../utils/text.js'
import type { Measure } from '../utils/text.js'
import { DropOldestPolicy, measureEntries } from './prune-policy.js'
import type { PrunePolicy } from './prune-policy.js'
import type {
  ContextEntry,
  ContextSnapshot,
  ContextStats,
  PruneReport,
  SnapshotOptions,
} from './types.js'

const log = createLogger('context')

const entrySchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  timestamp: z.string(),
  content: z.string(),
  metadata: z.record(z.unknown()).optional(),
})

export interface ContextStoreOptions {
  storage: DurableStorage
  categories: string[]
  budget: number
  measure?: Measure
  policy?: PrunePolicy
  /** Per-category cap; the oldest entries beyond it are dropped on append */
  maxEntriesPerCategory?: number
  /** Storage directory for the category logs */
  directory?: string
  now?: () => Date
}

export class ContextStore {
  readonly budget: number
  readonly categories: readonly string[]
  private readonly storage: DurableStorage
  private readonly measure: Measure
  private readonly policy: PrunePolicy
  private readonly maxEntries: number
  private readonly directory: string
  private readonly now: () => Date
  private readonly nextId = monotonicFactory()
  private readonly entries = new Map<string, ContextEntry[]>()
  private readonly locks = new Map<string, ReadWriteLock>()

  private constructor(options: ContextStoreOptions) {
    if (options.budget <= 0) throw new RangeError('Context budget must be positive')
    this.storage = options.storage
    this.categories = [...new Set(options.categories)]
    this.budget = options.budget
    this.measure = options.measure ?? estimateTokens
    this.policy = options.policy ?? new DropOldestPolicy()
    this.maxEntries = options.maxEntriesPerCategory ?? Number.POSITIVE_INFINITY
    this.directory = options.directory ?? 'context'
    this.now = options.now ?? (() => new Date())

    for (const category of this.categories) {
      this.entries.set(category, [])
      this.locks.set(category, new ReadWriteLock())
    }
  }

  /**
   * Open the store, loading every category log. Malformed lines are skipped.
   * A store that was left over budget (e.g. the budget was lowered) is pruned.
   */
  static async open(options: ContextStoreOptions): Promise<ContextStore> {
    const store = new ContextStore(options)
    for (const category of store.categories) {
      store.entries.set(category, await store.loadCategory(category))
    }
    if (store.totalSize() > store.budget) await store.prune()
    return store
  }

  has(category: string): boolean {
    return this.entries.has(category)
  }

  totalSize(): number {
    return measureEntries(this.entries.values(), this.measure)
  }

  async append(
    category: string,
    content: string,
    metadata?: Record<string, unknown>,
  ): Promise<ContextEntry> {
    const lock = this.lockFor(category)

    const entry = await lock.withWrite(async () => {
      const now = this.now()
      const created: ContextEntry = {
        id: this.nextId(now.getTime()),
        category,
        timestamp: now.toISOString(),
        content,
        ...(metadata ? { metadata } : {}),
      }

      const list = this.listFor(category)
      if (list.length + 1 > this.maxEntries) {
        const kept = [...list.slice(list.length + 1 - this.maxEntries), created]
        await this.persist(category, kept)
      } else {
        await this.storage.appendLine(this.keyFor(category), JSON.stringify(created))
        this.entries.set(category, [...list, created])
      }
      return created
    })

    if (this.totalSize() > this.budget) await this.prune()
    return entry
  }

  /**
   * Enforce the budget with the configured policy. Takes every category's
   * write lock, so it waits for in-flight appends and snapshots.
   */
  async prune(): Promise<PruneReport> {
    const release = await acquireAll(this.allLocks(), 'write')
    try {
      const sizeBefore = this.totalSize()
      const report: PruneReport = {
        removed: 0,
        truncated: 0,
        summarized: 0,
        sizeBefore,
        sizeAfter: sizeBefore,
      }
      if (sizeBefore <= this.budget) return report

      const pruned = this.policy.prune({
        entries: this.entries,
        budget: this.budget,
        measure: this.measure,
      })

      for (const category of this.categories) {
        const before = this.listFor(category)
        const after = pruned.get(category) ?? before
        if (sameEntries(before, after)) continue

        const keptIds = new Set(after.map((entry) => entry.id))
        report.removed += before.filter((entry) => !keptIds.has(entry.id)).length
        for (const entry of after) {
          if (entry.metadata?.truncated === true && !before.includes(entry)) report.truncated++
          if (typeof entry.metadata?.summaryOf === 'number' && !before.includes(entry)) {
            report.summarized++
          }
        }
        await this.persist(category, after)
      }

      report.sizeAfter = this.totalSize()
      log.info({ policy: this.policy.name, ...report }, 'Context pruned')
      return report
    } finally {
      release()
    }
  }

  /**
   * Budget-limited view for prompt assembly. The newest entry of every
   * category goes in first (when it fits), then remaining entries by recency.
   * The budget applies to the rendered text, headings and timestamps included.
   */
  async getSnapshot(maxTokens: number, options: SnapshotOptions = {}): Promise<ContextSnapshot> {
    const categories = options.categories ?? [...this.categories]
    for (const category of categories) this.lockFor(category)
    const ordered = this.categories.filter((category) => categories.includes(category))

    const release = await acquireAll(
      ordered.map((category) => this.lockFor(category)),
      'read',
    )
    try {
      const selected = new Set<ContextEntry>()
      let text = ''
      const take = (entry: ContextEntry): void => {
        if (selected.has(entry)) return
        const rendered = renderSnapshot(ordered, byId([...selected, entry]))
        if (this.measure(rendered) > maxTokens) return
        selected.add(entry)
        text = rendered
      }

      for (const category of ordered) {
        const list = this.listFor(category)
        if (list.length > 0) take(list[list.length - 1])
      }

      const byRecency = ordered
        .flatMap((category) => this.listFor(category))
        .sort((a, b) => (a.id < b.id ? 1 : -1))
      for (const entry of byRecency) take(entry)

      return { entries: byId([...selected]), totalTokens: this.measure(text), maxTokens, text }
    } finally {
      release()
    }
  }

  /** Entries of one category, oldest first */
  async getEntries(category: string): Promise<ContextEntry[]> {
    return this.lockFor(category).withRead(() => [...this.listFor(category)])
  }

  async stats(): Promise<ContextStats> {
    const release = await acquireAll(this.allLocks(), 'read')
    try {
      return {
        budget: this.budget,
        totalSize: this.totalSize(),
        categories: this.categories.map((category) => {
          const list = this.listFor(category)
          return {
            category,
            entries: list.length,
            size: measureEntries([list], this.measure),
            newest: list[list.length - 1]?.timestamp,
          }
        }),
      }
    } finally {
      release()
    }
  }

  async clear(category: string): Promise<number> {
    return this.lockFor(category).withWrite(async () => {
      const count = this.listFor(category).length
      await this.persist(category, [])
      return count
    })
  }

  private lockFor(category: string): ReadWriteLock {
    const lock = this.locks.get(category)
    if (!lock) throw new UnknownCategoryError(category)
    return lock
  }

  private allLocks(): ReadWriteLock[] {
    return this.categories.map((category) => this.lockFor(category))
  }

  private listFor(category: string): ContextEntry[] {
    return this.entries.get(category) ?? []
  }

  private keyFor(category: string): string {
    return `${this.directory}/${category}.jsonl`
  }

  /** Rewrite a category log atomically, then update memory */
  private async persist(category: string, entries: ContextEntry[]): Promise<void> {
    const data = entries.map((entry) => JSON.stringify(entry) + '\n').join('')
    await this.storage.writeAtomic(this.keyFor(category), data)
    this.entries.set(category, entries)
  }

  private async loadCategory(category: string): Promise<ContextEntry[]> {
    const raw = await this.storage.read(this.keyFor(category))
    if (!raw) return []

    const entries: ContextEntry[] = []
    for (const line of raw.split('\n')) {
      if (!line.trim()) continue
      try {
        const parsed = entrySchema.safeParse(JSON.parse(line))
        if (parsed.success && parsed.data.category === category) {
          entries.push(parsed.data)
        } else {
          log.warn({ category }, 'Skipping invalid context entry')
        }
      } catch {
        log.warn({ category }, 'Skipping malformed context line')
      }
    }
    return entries.sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0))
  }
}

function sameEntries(a: readonly ContextEntry[], b: readonly ContextEntry[]): boolean {
  return a.length === b.length && a.every((entry, i) => entry === b[i])
}

function byId(entries: ContextEntry[]): ContextEntry[] {
  return entries.sort((a, b) => (a.id < b.id ? -1 : 1))
}

export function renderSnapshot(categories: readonly string[], entries: ContextEntry[]): string {
  const sections: string[] = []
  for (const category of categories) {
    const items = entries.filter((entry) => entry.category === category)
    if (items.length === 0) continue
    const heading = category.toUpperCase().replace(/[-_]/g, ' ')
    sections.push(
      [`## ${heading}`, ...items.map((entry) => `[${entry.timestamp}] ${entry.content}`)].join('\n'),
    )
  }
  return sections.join('\n\n')
}
