/**
 * Cofounder — end-to-end turns with a scripted model and in-memory storage
 */

import { describe, it, expect } from 'vitest'
import { CLARIFY_PROMPT, createCofounder, describeOutcome } from '../src/cofounder.js'
import { matchCommand, runCommand } from '../src/commands.js'
import { resolveConfig } from '../src/config.js'
import { loadKeywordConfig } from '../src/router/keywords.js'
import { MemoryStorage } from '../src/storage/memory-storage.js'
import { ScriptedModel } from './helpers.js'

async function setup(replies: ConstructorParameters<typeof ScriptedModel>[0] = []) {
  const model = new ScriptedModel(replies)
  const config = resolveConfig(
    { executor: { retryBackoff: { initialMs: 0, maxMs: 0, jitter: 0 } } },
    '/tmp/cofounder-unused',
  )
  const cofounder = await createCofounder(config, {
    model,
    storage: new MemoryStorage(),
    keywords: loadKeywordConfig(),
  })
  return { model, cofounder }
}

// -------------------------------------------------------------------
// 1. Turns
// -------------------------------------------------------------------

describe('Cofounder.handle', () => {
  it('asks for clarification on empty input', async () => {
    const { cofounder, model } = await setup()

    await expect(cofounder.handle('   ')).resolves.toEqual({ kind: 'clarify', text: CLARIFY_PROMPT })
    expect(model.calls).toEqual([])
  })

  it('answers questions in chat mode with recent context', async () => {
    const { cofounder, model } = await setup(['Try tiered pricing.', 'Start at $9.'])

    const first = await cofounder.handle('What is a good pricing model?')
    expect(first).toEqual({ kind: 'chat', text: 'Try tiered pricing.', failed: false })
    expect(model.calls[0][0].content).not.toContain('Recent context')

    await cofounder.handle('And the entry tier?')
    expect(model.calls[1][0].content).toContain(
      'Routed "What is a good pricing model?" to chat (research)',
    )
  })

  it('runs autonomous requests as tasks and notifies on completion', async () => {
    const { cofounder, model } = await setup([
      '1. Write the hero copy\n2. Lay out the page',
      'Hero copy written.',
      'Layout done.',
    ])

    const reply = await cofounder.handle('Build me a landing page for my bakery')

    expect(reply.kind).toBe('task')
    expect(reply.text).toBe(
      [
        'Completed: Build me a landing page for my bakery',
        '2/2 steps completed.',
        '[x] 1. Write the hero copy',
        '[x] 2. Lay out the page',
      ].join('\n'),
    )
    expect(model.calls).toHaveLength(3)
    expect(model.calls[1][1].content).toBe('Complete this step and report the result:\n\nWrite the hero copy')
    expect(cofounder.notifications.getAll()[0]).toMatchObject({
      type: 'notify',
      message: 'Completed: Build me a landing page for my bakery',
    })
    expect(await cofounder.checkpoints.list()).toEqual([])
  })

  it('replies conversationally when no plan can be made', async () => {
    const { cofounder } = await setup(['I am not sure what you mean.'])

    const reply = await cofounder.handle('Build me something')

    expect(reply).toEqual({
      kind: 'chat',
      text: "I couldn't put together a plan for that: Model reply contained no usable steps",
      failed: true,
    })
  })

  it('replies conversationally when the model is down', async () => {
    const { cofounder } = await setup()

    await expect(cofounder.handle('How are you?')).resolves.toEqual({
      kind: 'chat',
      text: "Sorry, I couldn't answer that: No scripted reply left",
      failed: true,
    })
  })

  it('tells the user how to resume a failed task', async () => {
    const { cofounder } = await setup([
      '1. Draft the plan\n2. Check the numbers',
      'Plan drafted.',
      new Error('out of memory'),
      new Error('out of memory'),
    ])

    const reply = await cofounder.handle('Write a business plan for a bakery')

    expect(reply.kind).toBe('task')
    if (reply.kind !== 'task') return
    expect(reply.outcome.status).toBe('failed')
    expect(reply.outcome.checkpointId).toBeDefined()
    expect(reply.text).toBe(
      `${reply.outcome.summary}\n\nResume with: /cofounder:resume ${reply.outcome.checkpointId}`,
    )
    expect(describeOutcome(reply.outcome)).toBe(reply.text)
  })

  it('reports an unknown checkpoint on resume', async () => {
    const { cofounder } = await setup()

    await expect(cofounder.resume('cp-missing')).resolves.toEqual({
      kind: 'chat',
      text: 'Checkpoint not found: cp-missing',
      failed: true,
    })
  })
})

// -------------------------------------------------------------------
// 2. Commands
// -------------------------------------------------------------------

describe('commands', () => {
  it('parses the command name and argument', () => {
    expect(matchCommand('  /cofounder:Resume cp-1  ')).toEqual({ name: 'resume', argument: 'cp-1' })
    expect(matchCommand('resume cp-1')).toBeNull()
  })

  it('lists checkpoints and context usage', async () => {
    const { cofounder } = await setup()

    await expect(runCommand(cofounder, { name: 'checkpoints', argument: '' })).resolves.toBe(
      'No checkpoints.',
    )
    const usage = await runCommand(cofounder, { name: 'context', argument: '' })
    expect(usage.split('\n')[0]).toBe('0/32000 tokens')
  })

  it('explains usage for missing arguments and unknown commands', async () => {
    const { cofounder } = await setup()

    await expect(runCommand(cofounder, { name: 'resume', argument: '' })).resolves.toBe(
      'Usage: /cofounder:resume <checkpoint-id>',
    )
    const help = await runCommand(cofounder, { name: 'nope', argument: '' })
    expect(help.split('\n').slice(0, 2)).toEqual(['Unknown command: /cofounder:nope', 'Available commands:'])
  })
})
