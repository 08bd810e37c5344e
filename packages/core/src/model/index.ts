import type { ModelConfig } from '../types.js'
import type { ModelClientOptions } from './http-client.js'
import { OllamaModelClient } from './ollama.js'
import { OpenAICompatibleModelClient } from './openai-compatible.js'
import type { ModelClient } from './types.js'

export function createModelClient(config: ModelConfig, options?: ModelClientOptions): ModelClient {
  switch (config.provider) {
    case 'ollama':
      return new OllamaModelClient(config, options)
    case 'openai-compatible':
      return new OpenAICompatibleModelClient(config, options)
  }
}

export { HttpModelClient } from './http-client.js'
export type { ModelClientOptions, ChatRequest } from './http-client.js'
export { OllamaModelClient } from './ollama.js'
export { OpenAICompatibleModelClient } from './openai-compatible.js'
export { fitMessagesToBudget } from './budget.js'
export type { ChatMessage, ChatRole, CompletionOptions, HealthResult, ModelClient } from './types.js'
