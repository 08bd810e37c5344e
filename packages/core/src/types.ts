import type { BackoffPolicy } from './utils/backoff.js'

export type ModelProvider = 'ollama' | 'openai-compatible'

export interface ModelConfig {
  provider: ModelProvider
  host: string
  model: string
  /** Hard cap on the prompt size sent to the model, in estimated tokens */
  maxInputTokens: number
  maxOutputTokens: number
  temperature: number
  timeoutMs: number
}

export type ContextUnit = 'tokens' | 'chars'

export type PrunePolicyName = 'drop-oldest' | 'summarize-oldest'

export interface ContextConfig {
  /** Upper bound on the summed size of all stored entries */
  budget: number
  unit: ContextUnit
  categories: string[]
  maxEntriesPerCategory: number
  policy: PrunePolicyName
  /** Size of the snapshot handed to the router and capabilities */
  snapshotTokens: number
}

export interface ExecutorConfig {
  checkpointEvery: number
  maxAttempts: number
  retryBackoff: BackoffPolicy
  stepTimeoutMs: number
  ioTimeoutMs: number
  maxSteps: number
  deleteCheckpointsOnSuccess: boolean
  maxCheckpointsPerTask: number
  /** Finished tasks kept in memory; older ones are forgotten */
  maxRetainedTasks: number
}

export interface RouterConfig {
  keywordsFile?: string
  extraPhrases: string[]
}

export interface CofounderConfig {
  agentDir: string
  model: ModelConfig
  context: ContextConfig
  executor: ExecutorConfig
  router: RouterConfig
}
