/**
 * Exponential Backoff Utility
 *
 * Computes delay between retries with jitter.
 */

export interface BackoffPolicy {
  initialMs: number
  maxMs: number
  factor: number
  /** Fraction of the delay applied as random +/- spread */
  jitter: number
}

/** Default retry policy */
export const DEFAULT_BACKOFF: BackoffPolicy = {
  initialMs: 1000,
  maxMs: 10000,
  factor: 2,
  jitter: 0.1,
}

/**
 * Compute backoff delay for a given retry number.
 *
 * @param attempt - Zero-based retry number
 * @returns Delay in milliseconds
 */
export function computeBackoff(policy: BackoffPolicy, attempt: number): number {
  const base = policy.initialMs * Math.pow(policy.factor, attempt)
  const capped = Math.min(base, policy.maxMs)

  // Apply jitter: ±jitter% of the computed delay
  const jitterRange = capped * policy.jitter
  const jitterOffset = (Math.random() * 2 - 1) * jitterRange

  return Math.max(0, Math.round(capped + jitterOffset))
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve()
  return new Promise((resolve) => setTimeout(resolve, ms))
}
