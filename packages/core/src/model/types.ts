import type { ModelProvider } from '../types.js'

export type ChatRole = 'system' | 'user' | 'assistant'

export interface ChatMessage {
  role: ChatRole
  content: string
}

export interface CompletionOptions {
  maxTokens?: number
  temperature?: number
  /** Cancels the request, including any retry still to come */
  signal?: AbortSignal
}

export interface HealthResult {
  healthy: boolean
  message?: string
  resolution?: string
}

/**
 * Request/response language model. `complete` rejects with
 * ModelUnavailableError once its retry is exhausted.
 */
export interface ModelClient {
  readonly provider: ModelProvider
  readonly model: string
  complete(messages: ChatMessage[], options?: CompletionOptions): Promise<string>
  healthCheck(): Promise<HealthResult>
}
