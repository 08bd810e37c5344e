export { computeBackoff, sleep, DEFAULT_BACKOFF } from './backoff.js'
export type { BackoffPolicy } from './backoff.js'
export { withTimeout, withAbortableTimeout } from './timeout.js'
export { ReadWriteLock, acquireAll } from './rw-lock.js'
export {
  estimateTokens,
  countChars,
  truncateToFit,
  stripReasoning,
  TRUNCATION_MARKER,
} from './text.js'
export type { Measure } from './text.js'
