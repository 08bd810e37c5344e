#!/usr/bin/env node
import * as readline from 'node:readline/promises'
import { stdin as input, stdout as output } from 'node:process'
import { createCofounder } from './cofounder.js'
import type { Cofounder } from './cofounder.js'
import { matchCommand, runCommand } from './commands.js'
import { loadConfig } from './config.js'
import type { ProgressEvent } from './tasks/events.js'

function formatProgress(event: ProgressEvent): string | null {
  switch (event.type) {
    case 'task:planned':
      return `Plan:\n${event.steps.map((s, i) => `  ${i + 1}. ${s}`).join('\n')}`
    case 'step:started':
      return `→ Step ${event.stepIndex + 1}${event.attempt > 1 ? ` (attempt ${event.attempt})` : ''}: ${event.description}`
    case 'step:completed':
      return `✓ Step ${event.stepIndex + 1} done`
    case 'step:failed':
      return `✗ Step ${event.stepIndex + 1} failed: ${event.error}`
    case 'checkpoint:saved':
      return `  checkpoint ${event.checkpointId} (${event.iteration} steps)`
    default:
      return null
  }
}

async function singleShot(cofounder: Cofounder, message: string): Promise<void> {
  const reply = await cofounder.handle(message)
  console.log(reply.text)
  if (reply.kind === 'chat' && reply.failed) process.exit(1)
}

async function repl(cofounder: Cofounder): Promise<void> {
  const rl = readline.createInterface({ input, output })
  let runningTaskId: string | null = null

  cofounder.executor.onProgress((event) => {
    if (event.type === 'task:planning') runningTaskId = event.taskId
    if (event.type === 'task:resumed') runningTaskId = event.taskId
    const line = formatProgress(event)
    if (line) console.log(line)
  })

  // First Ctrl+C during a task pauses it; otherwise quit
  rl.on('SIGINT', () => {
    if (runningTaskId && cofounder.executor.cancel(runningTaskId)) {
      console.log('\nPausing after the current step…')
      return
    }
    rl.close()
    process.exit(0)
  })

  try {
    console.log('Cofounder REPL started. Type "exit" or Ctrl+C to quit.\n')

    while (true) {
      const userInput = await rl.question('> ')
      if (userInput.trim().toLowerCase() === 'exit') break
      if (!userInput.trim()) continue

      try {
        const command = matchCommand(userInput)
        const text = command
          ? await runCommand(cofounder, command)
          : (await cofounder.handle(userInput)).text
        console.log(`${text}\n`)
      } catch (err) {
        console.error('Error:', err instanceof Error ? err.message : String(err))
      } finally {
        runningTaskId = null
      }
    }
  } finally {
    rl.close()
  }
}

async function main(): Promise<void> {
  const config = loadConfig()
  const cofounder = await createCofounder(config)
  const args = process.argv.slice(2)

  if (args.length > 0) {
    await singleShot(cofounder, args.join(' '))
  } else {
    await repl(cofounder)
  }
}

main().catch((err) => {
  console.error('Fatal error:', err)
  process.exit(1)
})
