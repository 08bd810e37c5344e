/**
 * Ollama chat backend (`/api/chat`, non-streaming).
 */

import { z } from 'zod'
import { HttpModelClient } from './http-client.js'
import type { ChatRequest } from './http-client.js'
import type { ChatMessage, HealthResult } from './types.js'

const chatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
})

const tagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() })),
})

export class OllamaModelClient extends HttpModelClient {
  readonly provider = 'ollama' as const

  protected buildRequest(
    messages: ChatMessage[],
    maxTokens: number,
    temperature: number,
  ): ChatRequest {
    return {
      url: `${this.host}/api/chat`,
      body: {
        model: this.model,
        messages,
        stream: false,
        options: { num_predict: maxTokens, temperature },
      },
    }
  }

  protected parseReply(data: unknown): string {
    return chatResponseSchema.parse(data).message.content
  }

  async healthCheck(): Promise<HealthResult> {
    const reply = await this.fetchHealth('/api/tags')
    if (!reply.reachable) return reply.health

    const tags = tagsResponseSchema.safeParse(reply.data)
    if (!tags.success) {
      return { healthy: false, message: 'Unexpected response from Ollama /api/tags' }
    }

    const found = tags.data.models.some(
      (m) => m.name === this.model || m.name === `${this.model}:latest`,
    )
    if (!found) {
      return {
        healthy: false,
        message: `Model '${this.model}' is not installed on the Ollama server`,
        resolution: `Run 'ollama pull ${this.model}' on the Ollama server.`,
      }
    }
    return { healthy: true }
  }
}
