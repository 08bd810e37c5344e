/**
 * Step capabilities
 *
 * A capability turns one step description plus a context snapshot into a
 * result. The executor only sees the Capability interface; the default
 * implementations prompt the model with a category-specific role.
 */

import type { ContextSnapshot } from '../context/types.js'
import { errorMessage } from '../errors.js'
import type { ModelClient } from '../model/types.js'
import { TASK_CATEGORIES } from './types.js'
import type { StepPayload, TaskCategory } from './types.js'

export interface CapabilityResult {
  success: boolean
  result: StepPayload
  error?: string
}

export interface Capability {
  readonly category: TaskCategory
  /** Context categories worth including in this capability's snapshot */
  readonly contextCategories?: readonly string[]
  /** `signal` is aborted when the step times out; stop work promptly when it fires */
  execute(
    stepDescription: string,
    context: ContextSnapshot,
    signal?: AbortSignal,
  ): Promise<CapabilityResult>
}

export class CapabilityRegistry {
  private readonly capabilities = new Map<TaskCategory, Capability>()

  constructor(capabilities: Capability[] = []) {
    for (const capability of capabilities) this.register(capability)
  }

  register(capability: Capability): void {
    this.capabilities.set(capability.category, capability)
  }

  has(category: TaskCategory): boolean {
    return this.capabilities.has(category)
  }

  /** Capability for `category`, falling back to the general one */
  resolve(category: TaskCategory): Capability {
    const capability = this.capabilities.get(category) ?? this.capabilities.get('general')
    if (!capability) {
      throw new Error(`No capability registered for '${category}' and no general fallback`)
    }
    return capability
  }
}

export interface ModelCapabilityOptions {
  category: TaskCategory
  model: ModelClient
  role: string
  contextCategories?: readonly string[]
  maxTokens?: number
}

export class ModelCapability implements Capability {
  readonly category: TaskCategory
  readonly contextCategories?: readonly string[]
  private readonly model: ModelClient
  private readonly role: string
  private readonly maxTokens?: number

  constructor(options: ModelCapabilityOptions) {
    this.category = options.category
    this.model = options.model
    this.role = options.role
    this.contextCategories = options.contextCategories
    this.maxTokens = options.maxTokens
  }

  async execute(
    stepDescription: string,
    context: ContextSnapshot,
    signal?: AbortSignal,
  ): Promise<CapabilityResult> {
    const system = context.text
      ? `${this.role}\n\nWhat you know so far:\n\n${context.text}`
      : this.role

    try {
      const reply = await this.model.complete(
        [
          { role: 'system', content: system },
          {
            role: 'user',
            content: `Complete this step and report the result:\n\n${stepDescription}`,
          },
        ],
        { maxTokens: this.maxTokens, signal },
      )
      return { success: true, result: reply }
    } catch (error) {
      return { success: false, result: '', error: errorMessage(error) }
    }
  }
}

interface CapabilityProfile {
  role: string
  contextCategories: string[]
}

const PROFILES: Record<TaskCategory, CapabilityProfile> = {
  code: {
    role:
      'You are a senior software engineer. Produce working code and exact file contents. ' +
      'Follow earlier decisions and the existing codebase layout.',
    contextCategories: ['active-task', 'task-state', 'codebase-map', 'decisions'],
  },
  research: {
    role:
      'You are a research analyst. Give concise, sourced findings and state what remains uncertain.',
    contextCategories: ['active-task', 'task-state', 'research'],
  },
  content: {
    role: 'You are a content writer. Write clear, publishable copy in the tone the user prefers.',
    contextCategories: ['active-task', 'task-state', 'research', 'user-preferences'],
  },
  business: {
    role:
      'You are a business analyst for an early-stage startup. Be quantitative and name your assumptions.',
    contextCategories: ['active-task', 'task-state', 'research', 'decisions'],
  },
  general: {
    role: 'You are a capable co-founder. Complete the step thoroughly and report what you did.',
    contextCategories: ['active-task', 'task-state', 'decisions'],
  },
}

export function createDefaultCapabilities(model: ModelClient, maxTokens?: number): CapabilityRegistry {
  return new CapabilityRegistry(
    TASK_CATEGORIES.map(
      (category) =>
        new ModelCapability({
          category,
          model,
          role: PROFILES[category].role,
          contextCategories: PROFILES[category].contextCategories,
          maxTokens,
        }),
    ),
  )
}
