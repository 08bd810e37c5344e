/**
 * Slash commands for the REPL: `/cofounder:<name> [argument]`.
 */

import type { Cofounder } from './cofounder.js'

export interface ParsedCommand {
  name: string
  argument: string
}

export interface CommandDefinition {
  name: string
  usage: string
  description: string
  run(cofounder: Cofounder, argument: string): Promise<string>
}

export function matchCommand(input: string): ParsedCommand | null {
  const match = input.trim().match(/^\/cofounder:(\S+)\s*(.*)$/)
  return match ? { name: match[1].toLowerCase(), argument: match[2].trim() } : null
}

export const commands: CommandDefinition[] = [
  {
    name: 'checkpoints',
    usage: '/cofounder:checkpoints',
    description: 'List saved checkpoints, newest first',
    async run(cofounder) {
      const checkpoints = await cofounder.checkpoints.list()
      if (checkpoints.length === 0) return 'No checkpoints.'
      return checkpoints
        .map(
          (cp) =>
            `${cp.id}  ${cp.iteration}/${cp.totalSteps} steps  ${cp.reason.padEnd(8)}  ${cp.objective.slice(0, 60)}`,
        )
        .join('\n')
    },
  },
  {
    name: 'resume',
    usage: '/cofounder:resume <checkpoint-id>',
    description: 'Continue a task from a checkpoint',
    async run(cofounder, argument) {
      if (!argument) return 'Usage: /cofounder:resume <checkpoint-id>'
      return (await cofounder.resume(argument)).text
    },
  },
  {
    name: 'delete',
    usage: '/cofounder:delete <checkpoint-id>',
    description: 'Delete a checkpoint',
    async run(cofounder, argument) {
      if (!argument) return 'Usage: /cofounder:delete <checkpoint-id>'
      return (await cofounder.checkpoints.delete(argument))
        ? `Deleted ${argument}.`
        : `No checkpoint ${argument}.`
    },
  },
  {
    name: 'context',
    usage: '/cofounder:context',
    description: 'Show context store usage per category',
    async run(cofounder) {
      const stats = await cofounder.contextStore.stats()
      const unit = cofounder.config.context.unit
      return [
        `${stats.totalSize}/${stats.budget} ${unit}`,
        ...stats.categories.map(
          (c) => `  ${c.category.padEnd(18)} ${String(c.entries).padStart(4)} entries  ${c.size} ${unit}`,
        ),
      ].join('\n')
    },
  },
  {
    name: 'tasks',
    usage: '/cofounder:tasks',
    description: 'List tasks from this session',
    async run(cofounder) {
      const tasks = cofounder.executor.listTasks()
      if (tasks.length === 0) return 'No tasks in this session.'
      return tasks.map((task) => `${task.id}  ${task.status.padEnd(9)}  ${task.objective.slice(0, 60)}`).join('\n')
    },
  },
]

export async function runCommand(cofounder: Cofounder, parsed: ParsedCommand): Promise<string> {
  const command = commands.find((c) => c.name === parsed.name)
  if (!command) {
    return [
      `Unknown command: /cofounder:${parsed.name}`,
      'Available commands:',
      ...commands.map((c) => `  ${c.usage}  ${c.description}`),
    ].join('\n')
  }
  return command.run(cofounder, parsed.argument)
}

