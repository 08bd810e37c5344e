/**
 * Model clients
 *
 * Uses a stubbed fetch, so no model server is needed.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import type { Mock } from 'vitest'
import {
  OllamaModelClient,
  OpenAICompatibleModelClient,
  createModelClient,
} from '../src/model/index.js'
import { ModelUnavailableError } from '../src/errors.js'
import type { ModelConfig } from '../src/types.js'

const NO_DELAY = { initialMs: 0, maxMs: 0, factor: 1, jitter: 0 }

function modelConfig(overrides: Partial<ModelConfig> = {}): ModelConfig {
  return {
    provider: 'ollama',
    host: 'http://model.test:11434/',
    model: 'qwen',
    maxInputTokens: 1000,
    maxOutputTokens: 50,
    temperature: 0.2,
    timeoutMs: 1000,
    ...overrides,
  }
}

function jsonResponse(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'Content-Type': 'application/json' },
  })
}

let mockFetch: Mock<typeof fetch>

beforeEach(() => {
  mockFetch = vi.fn<typeof fetch>()
  vi.stubGlobal('fetch', mockFetch)
})

afterEach(() => {
  vi.unstubAllGlobals()
})

function sentBody(call = 0): unknown {
  const init = mockFetch.mock.calls[call][1]
  return JSON.parse(String(init?.body))
}

// -------------------------------------------------------------------
// 1. Completions
// -------------------------------------------------------------------

describe('OllamaModelClient - complete', () => {
  it('posts to /api/chat and returns the reply without reasoning', async () => {
    const client = new OllamaModelClient(modelConfig(), { retryBackoff: NO_DELAY })
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ message: { content: '<think>let me see</think>\n Hello there ' } }),
    )

    const reply = await client.complete([{ role: 'user', content: 'hi' }], { maxTokens: 500 })

    expect(reply).toBe('Hello there')
    expect(mockFetch.mock.calls[0][0]).toBe('http://model.test:11434/api/chat')
    expect(sentBody()).toEqual({
      model: 'qwen',
      messages: [{ role: 'user', content: 'hi' }],
      stream: false,
      options: { num_predict: 50, temperature: 0.2 },
    })
  })

  it('retries once after a failed request', async () => {
    const client = new OllamaModelClient(modelConfig(), { retryBackoff: NO_DELAY })
    mockFetch
      .mockRejectedValueOnce(new TypeError('fetch failed'))
      .mockResolvedValueOnce(jsonResponse({ message: { content: 'second time lucky' } }))

    await expect(client.complete([{ role: 'user', content: 'hi' }])).resolves.toBe('second time lucky')
    expect(mockFetch).toHaveBeenCalledTimes(2)
  })

  it('raises ModelUnavailableError after the retry fails', async () => {
    const client = new OllamaModelClient(modelConfig(), { retryBackoff: NO_DELAY })
    mockFetch.mockImplementation(async () => new Response('boom', { status: 500 }))

    const error = await client.complete([{ role: 'user', content: 'hi' }]).catch((e: unknown) => e)

    expect(error).toBeInstanceOf(ModelUnavailableError)
    expect(error instanceof Error && error.message).toBe(
      "Model 'qwen' at http://model.test:11434 is unavailable: HTTP 500: boom",
    )
    expect(mockFetch).toHaveBeenCalledTimes(2)
  })

  it('treats a reply that is only reasoning as a failure', async () => {
    const client = new OllamaModelClient(modelConfig(), { retryBackoff: NO_DELAY })
    mockFetch.mockImplementation(async () =>
      jsonResponse({ message: { content: '<think>nothing to say</think>' } }),
    )

    await expect(client.complete([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      ModelUnavailableError,
    )
  })

  it('stops without retrying when the caller aborts', async () => {
    const client = new OllamaModelClient(modelConfig(), { retryBackoff: NO_DELAY })
    mockFetch.mockImplementation(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init.signal?.reason))
        }),
    )
    const controller = new AbortController()
    const reason = new Error('step timed out')

    const pending = client.complete([{ role: 'user', content: 'hi' }], { signal: controller.signal })
    controller.abort(reason)

    await expect(pending).rejects.toBe(reason)
    expect(mockFetch).toHaveBeenCalledTimes(1)
  })

  it('sends nothing when the signal is already aborted', async () => {
    const client = new OllamaModelClient(modelConfig(), { retryBackoff: NO_DELAY })
    const controller = new AbortController()
    controller.abort(new Error('too late'))

    await expect(
      client.complete([{ role: 'user', content: 'hi' }], { signal: controller.signal }),
    ).rejects.toThrow('too late')
    expect(mockFetch).not.toHaveBeenCalled()
  })

  it('rejects a body of the wrong shape', async () => {
    const client = new OllamaModelClient(modelConfig(), { retryBackoff: NO_DELAY })
    mockFetch.mockImplementation(async () => jsonResponse({ choices: [] }))

    await expect(client.complete([{ role: 'user', content: 'hi' }])).rejects.toThrow(
      ModelUnavailableError,
    )
  })
})

describe('OpenAICompatibleModelClient - complete', () => {
  it('posts to /v1/chat/completions', async () => {
    const client = new OpenAICompatibleModelClient(
      modelConfig({ provider: 'openai-compatible', host: 'http://lm.test:1234' }),
      { retryBackoff: NO_DELAY },
    )
    mockFetch.mockResolvedValueOnce(jsonResponse({ choices: [{ message: { content: 'Hi!' } }] }))

    await expect(client.complete([{ role: 'user', content: 'hi' }], { temperature: 0.7 })).resolves.toBe(
      'Hi!',
    )
    expect(mockFetch.mock.calls[0][0]).toBe('http://lm.test:1234/v1/chat/completions')
    expect(sentBody()).toMatchObject({ model: 'qwen', max_tokens: 50, temperature: 0.7, stream: false })
  })
})

// -------------------------------------------------------------------
// 2. Health checks
// -------------------------------------------------------------------

describe('healthCheck', () => {
  it('is healthy when the model is installed', async () => {
    const client = new OllamaModelClient(modelConfig())
    mockFetch.mockResolvedValueOnce(jsonResponse({ models: [{ name: 'qwen:latest' }] }))

    await expect(client.healthCheck()).resolves.toEqual({ healthy: true })
    expect(mockFetch.mock.calls[0][0]).toBe('http://model.test:11434/api/tags')
  })

  it('explains how to install a missing model', async () => {
    const client = new OllamaModelClient(modelConfig())
    mockFetch.mockResolvedValueOnce(jsonResponse({ models: [{ name: 'llama3:latest' }] }))

    const health = await client.healthCheck()
    expect(health.healthy).toBe(false)
    expect(health.resolution).toBe("Run 'ollama pull qwen' on the Ollama server.")
  })

  it('reports an unreachable server', async () => {
    const client = new OllamaModelClient(modelConfig())
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'))

    const health = await client.healthCheck()
    expect(health).toMatchObject({
      healthy: false,
      message: 'Cannot reach model server at http://model.test:11434',
    })
  })

  it('reports an error status', async () => {
    const client = new OpenAICompatibleModelClient(modelConfig({ provider: 'openai-compatible' }))
    mockFetch.mockResolvedValueOnce(new Response('nope', { status: 503 }))

    const health = await client.healthCheck()
    expect(health).toMatchObject({ healthy: false, message: 'Model server returned HTTP 503' })
  })

  it('checks the loaded models of an OpenAI-compatible server', async () => {
    const client = new OpenAICompatibleModelClient(modelConfig({ provider: 'openai-compatible' }))
    mockFetch.mockResolvedValueOnce(jsonResponse({ data: [{ id: 'qwen' }] }))

    await expect(client.healthCheck()).resolves.toEqual({ healthy: true })
  })
})

describe('createModelClient', () => {
  it('picks the backend from the provider', () => {
    expect(createModelClient(modelConfig())).toBeInstanceOf(OllamaModelClient)
    expect(createModelClient(modelConfig({ provider: 'openai-compatible' }))).toBeInstanceOf(
      OpenAICompatibleModelClient,
    )
  })
})
