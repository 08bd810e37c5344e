/**
 * Shared test doubles
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'
import type { ChatMessage, CompletionOptions, HealthResult, ModelClient } from '../src/model/types.js'
import type { ContextSnapshot } from '../src/context/types.js'
import type { Capability, CapabilityResult } from '../src/tasks/capabilities.js'
import type { TaskCategory } from '../src/tasks/types.js'
import { ModelUnavailableError } from '../src/errors.js'

export function createTempDir(prefix = 'cofounder-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function cleanDir(dir: string): void {
  if (fs.existsSync(dir)) {
    fs.rmSync(dir, { recursive: true, force: true })
  }
}

type Reply = string | Error | ((messages: ChatMessage[]) => string)

/**
 * Model that answers from a queue of scripted replies and records every call
 */
export class ScriptedModel implements ModelClient {
  readonly provider = 'ollama' as const
  readonly model = 'scripted'
  readonly calls: ChatMessage[][] = []
  private readonly replies: Reply[]

  constructor(replies: Reply[] = []) {
    this.replies = [...replies]
  }

  push(...replies: Reply[]): void {
    this.replies.push(...replies)
  }

  async complete(messages: ChatMessage[], _options?: CompletionOptions): Promise<string> {
    this.calls.push(messages)
    const reply = this.replies.shift()
    if (reply === undefined) throw new ModelUnavailableError('No scripted reply left')
    if (reply instanceof Error) throw reply
    return typeof reply === 'function' ? reply(messages) : reply
  }

  async healthCheck(): Promise<HealthResult> {
    return { healthy: true }
  }
}

type StepBehaviour = CapabilityResult | Error | ((signal?: AbortSignal) => Promise<CapabilityResult>)

/**
 * Capability that records each step it runs. Behaviour can be scripted
 * per step description: a list is consumed one entry per attempt.
 */
export class RecordingCapability implements Capability {
  readonly category: TaskCategory
  readonly executed: string[] = []
  readonly snapshots: ContextSnapshot[] = []
  readonly contextCategories?: readonly string[]
  private readonly behaviours = new Map<string, StepBehaviour[]>()
  onExecute?: (description: string) => void

  constructor(category: TaskCategory = 'general', contextCategories?: readonly string[]) {
    this.category = category
    this.contextCategories = contextCategories
  }

  script(description: string, ...behaviours: StepBehaviour[]): void {
    this.behaviours.set(description, behaviours)
  }

  async execute(
    description: string,
    context: ContextSnapshot,
    signal?: AbortSignal,
  ): Promise<CapabilityResult> {
    this.executed.push(description)
    this.snapshots.push(context)
    this.onExecute?.(description)

    const next = this.behaviours.get(description)?.shift()
    if (next === undefined) return { success: true, result: `done: ${description}` }
    if (next instanceof Error) throw next
    if (typeof next === 'function') return next(signal)
    return next
  }
}
