/**
 * Checkpoint record format
 *
 * Current records are tagged `schema: "cofounder/checkpoint"` with an
 * integer `version`. Version 1 records (flat lists of step texts, string
 * version "1.0") are migrated on read, so they stay resumable.
 */

import { z } from 'zod'
import { CheckpointCorruptionError } from '../errors.js'
import { TASK_CATEGORIES } from './types.js'
import type { Checkpoint, Step } from './types.js'

export const CHECKPOINT_SCHEMA = 'cofounder/checkpoint'
export const CHECKPOINT_VERSION = 2

const artifactSchema = z.object({
  kind: z.literal('artifact'),
  uri: z.string().min(1),
  label: z.string().optional(),
})

const stepSchema = z.object({
  index: z.number().int().nonnegative(),
  description: z.string().min(1),
  category: z.enum(TASK_CATEGORIES),
  status: z.enum(['pending', 'completed', 'failed']),
  attempts: z.number().int().nonnegative(),
  result: z.union([z.string(), artifactSchema]).optional(),
  error: z.string().optional(),
})

export const checkpointRecordSchema = z
  .object({
    schema: z.literal(CHECKPOINT_SCHEMA),
    version: z.literal(CHECKPOINT_VERSION),
    id: z.string().min(1),
    taskId: z.string().min(1),
    objective: z.string(),
    category: z.enum(TASK_CATEGORIES),
    iteration: z.number().int().nonnegative(),
    reason: z.enum(['interval', 'pause', 'failure']),
    steps: z.array(stepSchema).min(1),
    created: z.string().datetime(),
  })
  .superRefine((record, ctx) => {
    if (record.steps.some((step, i) => step.index !== i)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['steps'], message: 'steps out of order' })
    }
    const completed = record.steps.filter((step) => step.status === 'completed').length
    if (record.steps.slice(0, completed).some((step) => step.status !== 'completed')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['steps'],
        message: 'completed steps must precede all others',
      })
    }
    if (completed !== record.iteration) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['iteration'],
        message: `iteration ${record.iteration} does not match ${completed} completed steps`,
      })
    }
  })

export type CheckpointRecord = z.infer<typeof checkpointRecordSchema>

const legacyRecordSchema = z.object({
  version: z.literal('1.0'),
  id: z.string().min(1),
  timestamp: z.string(),
  objective: z.string(),
  iteration: z.number().int().nonnegative(),
  completed_steps: z.array(z.string()),
  pending_steps: z.array(z.string()),
  project_path: z.string().nullish(),
  metadata: z.record(z.unknown()).nullish(),
})

export function toRecord(checkpoint: Checkpoint): CheckpointRecord {
  return {
    schema: CHECKPOINT_SCHEMA,
    version: CHECKPOINT_VERSION,
    id: checkpoint.id,
    taskId: checkpoint.taskId,
    objective: checkpoint.objective,
    category: checkpoint.category,
    iteration: checkpoint.iteration,
    reason: checkpoint.reason,
    steps: checkpoint.steps.map((step) => ({ ...step })),
    created: checkpoint.created.toISOString(),
  }
}

export function serializeCheckpoint(checkpoint: Checkpoint): string {
  return JSON.stringify(toRecord(checkpoint), null, 2) + '\n'
}

/**
 * Parse a stored checkpoint of any known version.
 * Throws CheckpointCorruptionError for invalid JSON or an unknown shape.
 */
export function deserializeCheckpoint(id: string, raw: string): Checkpoint {
  let data: unknown
  try {
    data = JSON.parse(raw)
  } catch (error) {
    throw new CheckpointCorruptionError(id, 'invalid JSON', { cause: error })
  }

  const current = checkpointRecordSchema.safeParse(data)
  if (current.success) {
    const record = current.data
    // The storage key is authoritative for identity
    return {
      id,
      taskId: record.taskId,
      objective: record.objective,
      category: record.category,
      iteration: record.iteration,
      reason: record.reason,
      steps: record.steps,
      created: new Date(record.created),
    }
  }

  const legacy = legacyRecordSchema.safeParse(data)
  if (legacy.success) return migrateLegacy(id, legacy.data)

  const problems = current.error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ')
  throw new CheckpointCorruptionError(id, problems)
}

function migrateLegacy(id: string, record: z.infer<typeof legacyRecordSchema>): Checkpoint {
  const created = new Date(record.timestamp)
  if (Number.isNaN(created.getTime())) {
    throw new CheckpointCorruptionError(id, `invalid timestamp '${record.timestamp}'`)
  }

  const descriptions = [...record.completed_steps, ...record.pending_steps]
  if (descriptions.length === 0) {
    throw new CheckpointCorruptionError(id, 'no steps to resume')
  }

  const steps = descriptions.map((description, index): Step => ({
    index,
    description,
    category: 'general',
    status: index < record.completed_steps.length ? 'completed' : 'pending',
    attempts: 0,
  }))

  const taskId = record.metadata?.taskId
  return {
    id,
    taskId: typeof taskId === 'string' ? taskId : `task-${record.id}`,
    objective: record.objective,
    category: 'general',
    iteration: record.completed_steps.length,
    reason: 'interval',
    steps,
    created,
  }
}
