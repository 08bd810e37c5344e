/**
 * OpenAI-compatible chat backend (`/v1/chat/completions`), as served by
 * LM Studio, llama.cpp server and vLLM.
 */

import { z } from 'zod'
import { HttpModelClient } from './http-client.js'
import type { ChatRequest } from './http-client.js'
import type { ChatMessage, HealthResult } from './types.js'

const completionSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string() }) })).min(1),
})

const modelsSchema = z.object({
  data: z.array(z.object({ id: z.string() })),
})

export class OpenAICompatibleModelClient extends HttpModelClient {
  readonly provider = 'openai-compatible' as const

  protected buildRequest(
    messages: ChatMessage[],
    maxTokens: number,
    temperature: number,
  ): ChatRequest {
    return {
      url: `${this.host}/v1/chat/completions`,
      body: {
        model: this.model,
        messages,
        max_tokens: maxTokens,
        temperature,
        stream: false,
      },
    }
  }

  protected parseReply(data: unknown): string {
    return completionSchema.parse(data).choices[0].message.content
  }

  async healthCheck(): Promise<HealthResult> {
    const reply = await this.fetchHealth('/v1/models')
    if (!reply.reachable) return reply.health

    const models = modelsSchema.safeParse(reply.data)
    if (!models.success) {
      return { healthy: false, message: 'Unexpected response from /v1/models' }
    }
    if (!models.data.data.some((m) => m.id === this.model)) {
      return {
        healthy: false,
        message: `Model '${this.model}' is not loaded on the server`,
        resolution: 'Load the model in the server before starting tasks.',
      }
    }
    return { healthy: true }
  }
}
