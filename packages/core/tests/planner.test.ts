/**
 * Plan Generator
 */

import { describe, it, expect } from 'vitest'

import { PlanGenerator, buildPlanPrompt, parsePlan } from '../src/tasks/planner.js'
import { ModelUnavailableError, PlanGenerationError } from '../src/errors.js'
import { ScriptedModel } from './helpers.js'

describe('parsePlan', () => {
  it('keeps numbered and bulleted lines in order', () => {
    const reply = [
      'Here is the plan:',
      '1. Research competitors',
      '2) Draft **pricing** tiers',
      '- Build landing page',
      '* Launch',
      'Good luck!',
    ].join('\n')

    expect(parsePlan(reply, 10)).toEqual([
      'Research competitors',
      'Draft pricing tiers',
      'Build landing page',
      'Launch',
    ])
  })

  it('stops at the step limit', () => {
    const reply = Array.from({ length: 12 }, (_, i) => `${i + 1}. step ${i + 1}`).join('\n')
    expect(parsePlan(reply, 10)).toHaveLength(10)
  })

  it('ignores prose and empty bullets', () => {
    expect(parsePlan('Sure thing.\n-   \nversion 2.0 ships soon', 10)).toEqual([])
  })
})

describe('buildPlanPrompt', () => {
  it('embeds the objective and step range', () => {
    const [, user] = buildPlanPrompt('Open a bakery', 8)
    expect(user.role).toBe('user')
    expect(user.content).toContain('OBJECTIVE: Open a bakery')
    expect(user.content).toContain('Output a numbered list of 3-8 specific, actionable steps.')
  })
})

describe('PlanGenerator', () => {
  it('turns the reply into pending steps', async () => {
    const model = new ScriptedModel(['1. Write tests\n2. Research users'])
    const planner = new PlanGenerator({
      model,
      maxSteps: 10,
      categorize: (d) => (d.startsWith('Research') ? 'research' : 'general'),
    })

    const steps = await planner.generatePlan('Improve onboarding')

    expect(steps).toEqual([
      { index: 0, description: 'Write tests', category: 'general', status: 'pending', attempts: 0 },
      { index: 1, description: 'Research users', category: 'research', status: 'pending', attempts: 0 },
    ])
    expect(model.calls[0][1].content).toContain('OBJECTIVE: Improve onboarding')
  })

  it('fails when the reply has no steps', async () => {
    const planner = new PlanGenerator({ model: new ScriptedModel(['I cannot help.']), maxSteps: 10 })
    await expect(planner.generatePlan('Anything')).rejects.toThrow(PlanGenerationError)
  })

  it('wraps model outages', async () => {
    const planner = new PlanGenerator({
      model: new ScriptedModel([new ModelUnavailableError('connection refused')]),
      maxSteps: 10,
    })
    const error = await planner.generatePlan('Anything').catch((e: unknown) => e)
    expect(error).toBeInstanceOf(PlanGenerationError)
    expect(error instanceof Error && error.cause).toBeInstanceOf(ModelUnavailableError)
  })

  it('refuses an empty objective without calling the model', async () => {
    const model = new ScriptedModel(['1. x'])
    const planner = new PlanGenerator({ model, maxSteps: 10 })
    await expect(planner.generatePlan('  ')).rejects.toThrow(PlanGenerationError)
    expect(model.calls).toHaveLength(0)
  })
})
