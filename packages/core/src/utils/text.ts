/** Size function used for budgets. Must be monotonic in string length. */
export type Measure = (text: string) => number

/** Rough token estimate: four characters per token */
export const estimateTokens: Measure = (text) => Math.ceil(text.length / 4)

export const countChars: Measure = (text) => text.length

export const TRUNCATION_MARKER = '…'

/**
 * Longest prefix of `text` (plus a marker) whose measured size fits `maxUnits`.
 * Returns '' when not even the marker fits.
 */
export function truncateToFit(
  text: string,
  maxUnits: number,
  measure: Measure,
  marker = TRUNCATION_MARKER,
): string {
  if (measure(text) <= maxUnits) return text
  if (measure(marker) > maxUnits) return ''

  let low = 0
  let high = text.length
  while (low < high) {
    const mid = Math.ceil((low + high) / 2)
    if (measure(text.slice(0, mid) + marker) <= maxUnits) {
      low = mid
    } else {
      high = mid - 1
    }
  }
  return text.slice(0, low) + marker
}

/** Remove `<think>…</think>` reasoning blocks some local models emit */
export function stripReasoning(text: string): string {
  return text.replace(/<think>[\s\S]*?<\/think>/gi, '').replace(/^[\s\S]*<\/think>/i, '')
}
