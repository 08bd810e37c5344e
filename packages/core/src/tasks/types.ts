/**
 * Task System — Type Definitions
 *
 * Defines the core data structures for autonomous task execution:
 * tasks, their ordered steps, checkpoints and progress events.
 */

/**
 * Task execution status
 */
export type TaskStatus = 'pending' | 'running' | 'completed' | 'failed' | 'paused'

export type StepStatus = 'pending' | 'completed' | 'failed'

export const TASK_CATEGORIES = ['code', 'research', 'content', 'business', 'general'] as const

/**
 * Capability family a task or step belongs to
 */
export type TaskCategory = (typeof TASK_CATEGORIES)[number]

/**
 * Pointer to an artifact produced by a step (file, URL) instead of inline text
 */
export interface ArtifactRef {
  kind: 'artifact'
  uri: string
  label?: string
}

export type StepPayload = string | ArtifactRef

/**
 * One unit of plan execution. Owned by exactly one Task.
 */
export interface Step {
  /** Zero-based position in the plan; never changes */
  index: number
  description: string
  category: TaskCategory
  status: StepStatus
  /** Attempts made in the current run; reset when a task is resumed */
  attempts: number
  result?: StepPayload
  error?: string
}

/**
 * Task entity - a unit of autonomous work
 */
export interface Task {
  /** Unique identifier: task-{ulid} */
  id: string

  /** What the user asked for */
  objective: string

  category: TaskCategory

  /** Plan, fixed once generated */
  steps: Step[]

  status: TaskStatus

  /** Number of completed steps */
  iteration: number

  created: Date
  updated: Date
}

export type CheckpointReason = 'interval' | 'pause' | 'failure'

/**
 * Durable snapshot of a task, enough to rebuild it and continue
 */
export interface Checkpoint {
  /** Identifier: cp-{ulid} */
  id: string
  taskId: string
  objective: string
  category: TaskCategory
  /** Completed steps at the time of the snapshot */
  iteration: number
  steps: Step[]
  reason: CheckpointReason
  created: Date
}

export interface CheckpointSummary {
  id: string
  taskId: string
  objective: string
  iteration: number
  totalSteps: number
  reason: CheckpointReason
  created: Date
}

/**
 * Final state of one execute/resume call
 */
export interface TaskOutcome {
  task: Task
  status: 'completed' | 'failed' | 'paused'
  summary: string
  /** Checkpoint to resume from, when one exists */
  checkpointId?: string
  error?: Error
}

/**
 * Filters for listing tasks
 */
export interface ListTasksFilter {
  /** Filter by status */
  status?: TaskStatus | TaskStatus[]

  /** Maximum number of results */
  limit?: number

  /** Number of results to skip */
  offset?: number
}

/**
 * Options for reading execution logs
 */
export interface GetLogOptions {
  /** Maximum number of entries to return */
  limit?: number

  /** Number of entries to skip from the start */
  offset?: number
}
