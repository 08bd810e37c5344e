/**
 * Shared HTTP plumbing for model backends
 *
 * Trims the prompt to the input budget, applies the request timeout,
 * retries once with backoff and converts the final failure into
 * ModelUnavailableError.
 */

import { ModelUnavailableError, errorMessage } from '../errors.js'
import { createLogger } from '../logger.js'
import type { ModelConfig, ModelProvider } from '../types.js'
import { DEFAULT_BACKOFF, computeBackoff, sleep } from '../utils/backoff.js'
import type { BackoffPolicy } from '../utils/backoff.js'
import { estimateTokens, stripReasoning } from '../utils/text.js'
import { fitMessagesToBudget } from './budget.js'
import type { ChatMessage, CompletionOptions, HealthResult, ModelClient } from './types.js'

const log = createLogger('model')

const MAX_ATTEMPTS = 2
const HEALTH_TIMEOUT_MS = 5000

export interface ModelClientOptions {
  retryBackoff?: BackoffPolicy
}

export type HealthReply = { reachable: true; data: unknown } | { reachable: false; health: HealthResult }

export interface ChatRequest {
  url: string
  body: Record<string, unknown>
}

export abstract class HttpModelClient implements ModelClient {
  abstract readonly provider: ModelProvider
  protected readonly config: ModelConfig
  private readonly retryBackoff: BackoffPolicy

  constructor(config: ModelConfig, options: ModelClientOptions = {}) {
    this.config = config
    this.retryBackoff = options.retryBackoff ?? DEFAULT_BACKOFF
  }

  get model(): string {
    return this.config.model
  }

  get host(): string {
    return this.config.host.replace(/\/+$/, '')
  }

  protected abstract buildRequest(
    messages: ChatMessage[],
    maxTokens: number,
    temperature: number,
  ): ChatRequest

  /** Extract the reply text; throw when the body has an unexpected shape */
  protected abstract parseReply(data: unknown): string

  abstract healthCheck(): Promise<HealthResult>

  async complete(messages: ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const prompt = fitMessagesToBudget(messages, this.config.maxInputTokens, estimateTokens)
    const request = this.buildRequest(
      prompt,
      Math.min(options.maxTokens ?? this.config.maxOutputTokens, this.config.maxOutputTokens),
      options.temperature ?? this.config.temperature,
    )

    const { signal } = options
    let lastError: unknown
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      if (attempt > 0) await sleep(computeBackoff(this.retryBackoff, attempt - 1))
      signal?.throwIfAborted()
      try {
        return await this.send(request, signal)
      } catch (error) {
        // The caller gave up; no retry
        if (signal?.aborted) throw error
        lastError = error
        log.warn(
          { provider: this.provider, model: this.model, attempt: attempt + 1, err: errorMessage(error) },
          'Model request failed',
        )
      }
    }

    throw new ModelUnavailableError(
      `Model '${this.model}' at ${this.host} is unavailable: ${errorMessage(lastError)}`,
      { cause: lastError },
    )
  }

  /** GET a health endpoint; resolves with its JSON body or an unhealthy result */
  protected async fetchHealth(path: string): Promise<HealthReply> {
    try {
      const response = await fetch(`${this.host}${path}`, {
        method: 'GET',
        signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS),
      })
      if (!response.ok) {
        return {
          reachable: false,
          health: {
            healthy: false,
            message: `Model server returned HTTP ${response.status}`,
            resolution: 'Check that the model server is running correctly.',
          },
        }
      }
      return { reachable: true, data: await response.json().catch(() => null) }
    } catch {
      return {
        reachable: false,
        health: {
          healthy: false,
          message: `Cannot reach model server at ${this.host}`,
          resolution: 'Check that the server is running and the host is correct.',
        },
      }
    }
  }

  private async send(request: ChatRequest, signal?: AbortSignal): Promise<string> {
    const timeout = AbortSignal.timeout(this.config.timeoutMs)
    const response = await fetch(request.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(request.body),
      signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
    })

    if (!response.ok) {
      const detail = await response.text().catch(() => '')
      throw new Error(`HTTP ${response.status}${detail ? `: ${detail.slice(0, 200)}` : ''}`)
    }

    const reply = stripReasoning(this.parseReply(await response.json())).trim()
    if (!reply) throw new Error('Model returned an empty reply')
    return reply
  }
}
