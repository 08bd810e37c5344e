export interface ContextEntry {
  /** Monotonic ULID, so lexical order is insertion order */
  id: string
  category: string
  /** ISO-8601 */
  timestamp: string
  content: string
  metadata?: Record<string, unknown>
}

export interface ContextSnapshot {
  /** Selected entries, oldest first */
  entries: ContextEntry[]
  /** Measured size of `text`; never above `maxTokens` */
  totalTokens: number
  maxTokens: number
  /** Entries rendered as prompt text, grouped by category */
  text: string
}

export interface SnapshotOptions {
  /** Restrict to these categories; defaults to all */
  categories?: string[]
}

export interface CategoryStats {
  category: string
  entries: number
  size: number
  newest?: string
}

export interface ContextStats {
  budget: number
  totalSize: number
  categories: CategoryStats[]
}

export interface PruneReport {
  removed: number
  truncated: number
  summarized: number
  sizeBefore: number
  sizeAfter: number
}
