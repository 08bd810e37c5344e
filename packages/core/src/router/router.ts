import type { ContextStore } from '../context/context-store.js'
import type { ContextSnapshot } from '../context/types.js'
import { errorMessage } from '../errors.js'
import { createLogger } from '../logger.js'
import { classify } from './classifier.js'
import type { Classification } from './classifier.js'
import type { KeywordConfig } from './keywords.js'

const log = createLogger('router')

const DECISIONS_CATEGORY = 'decisions'

export interface RouterOptions {
  keywords: KeywordConfig
  contextStore: ContextStore
  /** Size of the context snapshot handed back with each decision */
  snapshotTokens: number
}

export interface RouteDecision {
  classification: Classification
  /** Recent context for whichever flow handles the request */
  context: ContextSnapshot
}

/**
 * Router
 *
 * Classifies a request and records the decision in the `decisions`
 * category. Classification never depends on stored context; the snapshot
 * is returned so the chat or task flow can use it.
 */
export class Router {
  private readonly keywords: KeywordConfig
  private readonly contextStore: ContextStore
  private readonly snapshotTokens: number

  constructor(options: RouterOptions) {
    this.keywords = options.keywords
    this.contextStore = options.contextStore
    this.snapshotTokens = options.snapshotTokens
  }

  classify(userText: string): Classification {
    return classify(userText, this.keywords)
  }

  async route(userText: string): Promise<RouteDecision> {
    const classification = this.classify(userText)
    const context = await this.contextStore.getSnapshot(this.snapshotTokens)

    log.info(
      {
        mode: classification.mode,
        category: classification.taskCategory,
        triggers: classification.triggers,
      },
      'Request routed',
    )

    if (this.contextStore.has(DECISIONS_CATEGORY)) {
      const preview = userText.trim().slice(0, 80)
      try {
        await this.contextStore.append(
          DECISIONS_CATEGORY,
          `Routed "${preview}" to ${classification.mode} (${classification.taskCategory})`,
          { mode: classification.mode, triggers: classification.triggers },
        )
      } catch (error) {
        log.warn({ err: errorMessage(error) }, 'Could not record routing decision')
      }
    }

    return { classification, context }
  }
}
