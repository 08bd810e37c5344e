/**
 * Cofounder
 *
 * Entry point for one user message: route it, then answer in chat mode
 * or run it as an autonomous task. Nothing here throws for a bad turn;
 * failures come back as a conversational reply.
 */

import { ContextStore } from './context/context-store.js'
import { createPrunePolicy } from './context/prune-policy.js'
import type { ContextSnapshot } from './context/types.js'
import { InvalidInputError, PlanGenerationError, CofounderError, errorMessage } from './errors.js'
import { createLogger } from './logger.js'
import { createModelClient } from './model/index.js'
import type { ModelClient } from './model/types.js'
import { NotificationService } from './notifications/service.js'
import { detectCategory } from './router/classifier.js'
import { loadKeywordConfig } from './router/keywords.js'
import type { KeywordConfig } from './router/keywords.js'
import { Router } from './router/router.js'
import type { RouteDecision } from './router/router.js'
import { FileStorage } from './storage/file-storage.js'
import type { DurableStorage } from './storage/types.js'
import { createDefaultCapabilities } from './tasks/capabilities.js'
import type { CapabilityRegistry } from './tasks/capabilities.js'
import { CheckpointManager } from './tasks/checkpoint-manager.js'
import { AutonomousExecutor } from './tasks/executor.js'
import { PlanGenerator } from './tasks/planner.js'
import type { TaskCategory, TaskOutcome } from './tasks/types.js'
import type { CofounderConfig } from './types.js'
import { countChars, estimateTokens } from './utils/text.js'

const log = createLogger('cofounder')

const PERSONA =
  'You are a pragmatic AI co-founder. You help plan, build and grow a small software business. ' +
  'Answer directly and concretely; say so when you are unsure.'

export const CLARIFY_PROMPT = 'What would you like me to help with?'

export type CofounderReply =
  | { kind: 'clarify'; text: string }
  | { kind: 'chat'; text: string; failed: boolean }
  | { kind: 'task'; text: string; outcome: TaskOutcome }

export type ChatReply = Extract<CofounderReply, { kind: 'chat' }>

export interface CofounderComponents {
  config: CofounderConfig
  model: ModelClient
  storage: DurableStorage
  contextStore: ContextStore
  router: Router
  checkpoints: CheckpointManager
  executor: AutonomousExecutor
  notifications: NotificationService
}

export class Cofounder {
  readonly config: CofounderConfig
  readonly model: ModelClient
  readonly storage: DurableStorage
  readonly contextStore: ContextStore
  readonly router: Router
  readonly checkpoints: CheckpointManager
  readonly executor: AutonomousExecutor
  readonly notifications: NotificationService

  constructor(components: CofounderComponents) {
    this.config = components.config
    this.model = components.model
    this.storage = components.storage
    this.contextStore = components.contextStore
    this.router = components.router
    this.checkpoints = components.checkpoints
    this.executor = components.executor
    this.notifications = components.notifications
  }

  async handle(text: string): Promise<CofounderReply> {
    let decision: RouteDecision
    try {
      decision = await this.router.route(text)
    } catch (error) {
      if (error instanceof InvalidInputError) return { kind: 'clarify', text: CLARIFY_PROMPT }
      log.error({ err: errorMessage(error) }, 'Routing failed')
      return { kind: 'chat', text: `Sorry, I couldn't process that: ${errorMessage(error)}`, failed: true }
    }

    if (decision.classification.mode === 'chat') {
      return this.chat(text, decision.context)
    }
    return this.runTask(text, decision.classification.taskCategory)
  }

  /** Single-turn answer grounded in recent context */
  async chat(text: string, context?: ContextSnapshot): Promise<ChatReply> {
    try {
      const snapshot = context ?? (await this.contextStore.getSnapshot(this.config.context.snapshotTokens))
      const system = snapshot.text ? `${PERSONA}\n\nRecent context:\n\n${snapshot.text}` : PERSONA
      const reply = await this.model.complete([
        { role: 'system', content: system },
        { role: 'user', content: text },
      ])
      return { kind: 'chat', text: reply, failed: false }
    } catch (error) {
      log.error({ err: errorMessage(error) }, 'Chat turn failed')
      return { kind: 'chat', text: `Sorry, I couldn't answer that: ${errorMessage(error)}`, failed: true }
    }
  }

  /** Plan and run `objective` to completion, failure or pause */
  async runTask(objective: string, category: TaskCategory = 'general'): Promise<CofounderReply> {
    const task = this.executor.createTask(objective, category)
    try {
      const outcome = await this.executor.execute(task)
      return { kind: 'task', text: describeOutcome(outcome), outcome }
    } catch (error) {
      if (error instanceof PlanGenerationError) {
        return { kind: 'chat', text: `I couldn't put together a plan for that: ${error.message}`, failed: true }
      }
      throw error
    }
  }

  async resume(checkpointId: string): Promise<CofounderReply> {
    try {
      const outcome = await this.executor.resume(checkpointId)
      return { kind: 'task', text: describeOutcome(outcome), outcome }
    } catch (error) {
      if (error instanceof CofounderError) {
        return { kind: 'chat', text: error.message, failed: true }
      }
      throw error
    }
  }
}

export function describeOutcome(outcome: TaskOutcome): string {
  if (outcome.status === 'completed' || !outcome.checkpointId) return outcome.summary
  return `${outcome.summary}\n\nResume with: /cofounder:resume ${outcome.checkpointId}`
}

export interface CofounderOverrides {
  model?: ModelClient
  storage?: DurableStorage
  keywords?: KeywordConfig
  capabilities?: CapabilityRegistry
  now?: () => Date
}

/**
 * Wire every component from configuration. Storage defaults to the agent
 * directory; overrides exist for tests and embedding.
 */
export async function createCofounder(
  config: CofounderConfig,
  overrides: CofounderOverrides = {},
): Promise<Cofounder> {
  const storage = overrides.storage ?? new FileStorage(config.agentDir)
  const model =
    overrides.model ?? createModelClient(config.model, { retryBackoff: config.executor.retryBackoff })

  const contextStore = await ContextStore.open({
    storage,
    categories: config.context.categories,
    budget: config.context.budget,
    measure: config.context.unit === 'chars' ? countChars : estimateTokens,
    policy: createPrunePolicy(config.context.policy),
    maxEntriesPerCategory: config.context.maxEntriesPerCategory,
    now: overrides.now,
  })

  const keywords = overrides.keywords ?? loadKeywordConfig(config.router)
  const router = new Router({
    keywords,
    contextStore,
    snapshotTokens: config.context.snapshotTokens,
  })

  const checkpoints = new CheckpointManager({
    storage,
    maxPerTask: config.executor.maxCheckpointsPerTask,
    ioTimeoutMs: config.executor.ioTimeoutMs,
    now: overrides.now,
  })

  const notifications = new NotificationService()
  const executor = new AutonomousExecutor({
    planner: new PlanGenerator({
      model,
      maxSteps: config.executor.maxSteps,
      categorize: (description) => detectCategory(description, keywords),
    }),
    capabilities: overrides.capabilities ?? createDefaultCapabilities(model),
    contextStore,
    checkpoints,
    policy: config.executor,
    snapshotTokens: config.context.snapshotTokens,
    sinks: [notifications],
    now: overrides.now,
  })

  return new Cofounder({
    config,
    model,
    storage,
    contextStore,
    router,
    checkpoints,
    executor,
    notifications,
  })
}
