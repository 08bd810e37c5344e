export { ContextStore, renderSnapshot } from './context-store.js'
export type { ContextStoreOptions } from './context-store.js'
export {
  DropOldestPolicy,
  SummarizeOldestPolicy,
  createPrunePolicy,
  measureEntries,
} from './prune-policy.js'
export type { PrunePolicy, PruneInput, EntriesByCategory } from './prune-policy.js'
export type {
  ContextEntry,
  ContextSnapshot,
  SnapshotOptions,
  ContextStats,
  CategoryStats,
  PruneReport,
} from './types.js'
