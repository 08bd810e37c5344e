/**
 * Plan Generator
 *
 * Asks the model to break an objective into numbered steps and parses the
 * reply. A reply without at least one usable step is a PlanGenerationError.
 */

import { PlanGenerationError, errorMessage } from '../errors.js'
import { createLogger } from '../logger.js'
import type { ChatMessage, ModelClient } from '../model/types.js'
import type { Step, TaskCategory } from './types.js'

const log = createLogger('planner')

const STEP_LINE = /^(?:\d+\s*[.):]|[-*•])\s+(.+)$/
const MAX_STEP_CHARS = 500

export interface PlanSource {
  generatePlan(objective: string, signal?: AbortSignal): Promise<Step[]>
}

export interface PlanGeneratorOptions {
  model: ModelClient
  maxSteps: number
  /** Category for a step description; 'general' means inherit the task's */
  categorize?: (description: string) => TaskCategory
}

export function buildPlanPrompt(objective: string, maxSteps: number): ChatMessage[] {
  const minSteps = Math.min(3, maxSteps)
  return [
    {
      role: 'system',
      content:
        'You are a planning assistant. You reply with a plan only: one step per line, ' +
        'numbered, with no preamble and no commentary.',
    },
    {
      role: 'user',
      content: [
        'Break down this objective into concrete steps:',
        '',
        `OBJECTIVE: ${objective}`,
        '',
        `Output a numbered list of ${minSteps}-${maxSteps} specific, actionable steps.`,
        'Each step must be completable on its own and build on the previous ones.',
      ].join('\n'),
    },
  ]
}

/**
 * Numbered (`1.`, `2)`) or bulleted (`-`, `*`) lines become steps, in order.
 * Markdown bold markers are removed.
 */
export function parsePlan(reply: string, maxSteps: number): string[] {
  const steps: string[] = []
  for (const rawLine of reply.split('\n')) {
    const match = STEP_LINE.exec(rawLine.trim())
    if (!match) continue
    const text = match[1].replace(/\*\*/g, '').trim().slice(0, MAX_STEP_CHARS)
    if (text) steps.push(text)
    if (steps.length >= maxSteps) break
  }
  return steps
}

export class PlanGenerator implements PlanSource {
  private readonly model: ModelClient
  private readonly maxSteps: number
  private readonly categorize: (description: string) => TaskCategory

  constructor(options: PlanGeneratorOptions) {
    this.model = options.model
    this.maxSteps = options.maxSteps
    this.categorize = options.categorize ?? (() => 'general')
  }

  async generatePlan(objective: string, signal?: AbortSignal): Promise<Step[]> {
    if (!objective.trim()) {
      throw new PlanGenerationError('Cannot plan an empty objective')
    }

    let reply: string
    try {
      reply = await this.model.complete(buildPlanPrompt(objective, this.maxSteps), { signal })
    } catch (error) {
      throw new PlanGenerationError(`Model could not produce a plan: ${errorMessage(error)}`, {
        cause: error,
      })
    }

    const descriptions = parsePlan(reply, this.maxSteps)
    if (descriptions.length === 0) {
      log.warn({ reply: reply.slice(0, 200) }, 'Plan reply had no step lines')
      throw new PlanGenerationError('Model reply contained no usable steps')
    }

    log.info({ steps: descriptions.length }, 'Plan generated')
    return descriptions.map((description, index): Step => ({
      index,
      description,
      category: this.categorize(description),
      status: 'pending',
      attempts: 0,
    }))
  }
}
