import { truncateToFit } from '../utils/text.js'
import type { Measure } from '../utils/text.js'
import type { ChatMessage } from './types.js'

/**
 * Trim a conversation to `maxTokens`. The oldest messages that are neither
 * system messages nor the final message go first. If the rest still
 * overflows, the final message is truncated; when the system messages alone
 * overflow, they are truncated too, leaving the final message up to half
 * the budget.
 */
export function fitMessagesToBudget(
  messages: readonly ChatMessage[],
  maxTokens: number,
  measure: Measure,
): ChatMessage[] {
  const result = [...messages]
  let total = result.reduce((sum, message) => sum + measure(message.content), 0)

  while (total > maxTokens) {
    const index = result.findIndex(
      (message, i) => message.role !== 'system' && i < result.length - 1,
    )
    if (index === -1) break
    const [removed] = result.splice(index, 1)
    total -= measure(removed.content)
  }

  const last = result.pop()
  if (total <= maxTokens || !last) return last ? [...result, last] : result

  const lastSize = measure(last.content)
  let leading = result
  if (total - lastSize > maxTokens) {
    const reserve = Math.min(lastSize, Math.floor(maxTokens / 2))
    leading = truncateInOrder(result, maxTokens - reserve, measure)
  }

  const used = leading.reduce((sum, message) => sum + measure(message.content), 0)
  const content = truncateToFit(last.content, Math.max(0, maxTokens - used), measure)
  return [...leading, { ...last, content }]
}

/** Truncate messages front to back into `maxTokens`; those left empty are dropped */
function truncateInOrder(
  messages: readonly ChatMessage[],
  maxTokens: number,
  measure: Measure,
): ChatMessage[] {
  const kept: ChatMessage[] = []
  let used = 0
  for (const message of messages) {
    const content = truncateToFit(message.content, Math.max(0, maxTokens - used), measure)
    if (content === '') continue
    kept.push({ ...message, content })
    used += measure(content)
  }
  return kept
}
