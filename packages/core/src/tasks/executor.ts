/**
 * Autonomous Executor
 *
 * Drives a task through Planning -> Running -> Completed | Failed | Paused.
 * Steps run strictly in plan order on a single worker; chat traffic keeps
 * flowing because only task execution holds the worker lock.
 *
 * Each step attempt yields a Result instead of throwing. The retry count
 * lives on the Step itself (`attempts`), bounded by `maxAttempts`.
 */

import { EventEmitter } from 'node:events'
import { ulid } from 'ulid'
import type { ContextStore } from '../context/context-store.js'
import type { ContextSnapshot } from '../context/types.js'
import {
  CofounderError,
  PlanGenerationError,
  StepExecutionError,
  StepTimeoutError,
  TaskAlreadyRunningError,
  err,
  errorMessage,
  ok,
} from '../errors.js'
import type { Result } from '../errors.js'
import { createLogger } from '../logger.js'
import { DEFAULT_BACKOFF, computeBackoff, sleep } from '../utils/backoff.js'
import type { BackoffPolicy } from '../utils/backoff.js'
import { ReadWriteLock } from '../utils/rw-lock.js'
import { withAbortableTimeout, withTimeout } from '../utils/timeout.js'
import type { Capability, CapabilityRegistry } from './capabilities.js'
import type { CheckpointManager } from './checkpoint-manager.js'
import type { ProgressEvent, ProgressEventInput, ProgressSink } from './events.js'
import type { PlanSource } from './planner.js'
import type {
  Checkpoint,
  CheckpointReason,
  Step,
  StepPayload,
  Task,
  TaskCategory,
  TaskOutcome,
} from './types.js'

const log = createLogger('executor')

const ACTIVE_TASK = 'active-task'
const TASK_STATE = 'task-state'
const RESULT_PREVIEW_CHARS = 2000

export interface ExecutorPolicy {
  /** Save an interval checkpoint after every N completed steps */
  checkpointEvery: number
  /** Attempts per step, first try included */
  maxAttempts: number
  retryBackoff: BackoffPolicy
  stepTimeoutMs: number
  ioTimeoutMs: number
  deleteCheckpointsOnSuccess: boolean
  /** Finished tasks kept for `getTask`; the oldest are forgotten first */
  maxRetainedTasks: number
}

export const DEFAULT_EXECUTOR_POLICY: ExecutorPolicy = {
  checkpointEvery: 5,
  maxAttempts: 2,
  retryBackoff: DEFAULT_BACKOFF,
  stepTimeoutMs: 600000,
  ioTimeoutMs: 10000,
  deleteCheckpointsOnSuccess: true,
  maxRetainedTasks: 100,
}

const FINISHED: readonly Task['status'][] = ['completed', 'failed', 'paused']

export interface AutonomousExecutorOptions {
  planner: PlanSource
  capabilities: CapabilityRegistry
  contextStore: ContextStore
  checkpoints: CheckpointManager
  policy?: Partial<ExecutorPolicy>
  /** Token budget of the snapshot handed to each capability */
  snapshotTokens?: number
  sinks?: ProgressSink[]
  now?: () => Date
}

interface RunState {
  cancelRequested: boolean
}

export class AutonomousExecutor extends EventEmitter {
  private readonly planner: PlanSource
  private readonly capabilities: CapabilityRegistry
  private readonly contextStore: ContextStore
  private readonly checkpoints: CheckpointManager
  private readonly policy: ExecutorPolicy
  private readonly snapshotTokens: number
  private readonly sinks: ProgressSink[]
  private readonly now: () => Date
  private readonly worker = new ReadWriteLock()
  private readonly runs = new Map<string, RunState>()
  private readonly tasks = new Map<string, Task>()

  constructor(options: AutonomousExecutorOptions) {
    super()
    this.planner = options.planner
    this.capabilities = options.capabilities
    this.contextStore = options.contextStore
    this.checkpoints = options.checkpoints
    this.policy = { ...DEFAULT_EXECUTOR_POLICY, ...options.policy }
    this.snapshotTokens = options.snapshotTokens ?? 4000
    this.sinks = options.sinks ?? []
    this.now = options.now ?? (() => new Date())
  }

  createTask(objective: string, category: TaskCategory = 'general'): Task {
    const now = this.now()
    const task: Task = {
      id: `task-${ulid()}`,
      objective,
      category,
      steps: [],
      status: 'pending',
      iteration: 0,
      created: now,
      updated: now,
    }
    this.tasks.set(task.id, task)
    return task
  }

  getTask(id: string): Task | undefined {
    return this.tasks.get(id)
  }

  listTasks(): Task[] {
    return Array.from(this.tasks.values()).sort((a, b) => b.created.getTime() - a.created.getTime())
  }

  isRunning(taskId: string): boolean {
    return this.runs.has(taskId)
  }

  addSink(sink: ProgressSink): void {
    this.sinks.push(sink)
  }

  /** Subscribe to progress events; returns an unsubscribe function */
  onProgress(listener: (event: ProgressEvent) => void): () => void {
    this.on('progress', listener)
    return () => {
      this.off('progress', listener)
    }
  }

  /**
   * Plan and run a task. Queues behind any task already executing.
   *
   * @throws PlanGenerationError when no plan could be produced; the task is marked failed
   * @throws TaskAlreadyRunningError when this task is already queued or running
   */
  async execute(task: Task): Promise<TaskOutcome> {
    const run = this.claim(task.id)
    this.tasks.set(task.id, task)
    try {
      return await this.worker.withWrite(async () => {
        await this.plan(task)
        return this.runSteps(task, run, 0)
      })
    } finally {
      this.runs.delete(task.id)
      this.forgetFinishedTasks()
    }
  }

  /**
   * Rebuild a task from a checkpoint and continue from its first pending step.
   * Completed steps are never run again, so resuming the same checkpoint
   * twice repeats no completed work.
   *
   * @throws CheckpointNotFoundError | CheckpointCorruptionError before any state changes
   */
  async resume(checkpointId: string): Promise<TaskOutcome> {
    const checkpoint = await this.checkpoints.load(checkpointId)
    const run = this.claim(checkpoint.taskId)
    try {
      return await this.worker.withWrite(async () => {
        const task = this.rehydrate(checkpoint)
        // Move to the newest position
        this.tasks.delete(task.id)
        this.tasks.set(task.id, task)
        this.emitProgress({
          type: 'task:resumed',
          taskId: task.id,
          checkpointId: checkpoint.id,
          iteration: checkpoint.iteration,
        })
        await this.appendContext(
          ACTIVE_TASK,
          `Resumed: ${task.objective} (${checkpoint.iteration}/${task.steps.length} steps done)`,
          { taskId: task.id, checkpointId: checkpoint.id },
        )
        this.transition(task, 'running')
        return this.runSteps(task, run, checkpoint.iteration)
      })
    } finally {
      this.runs.delete(checkpoint.taskId)
      this.forgetFinishedTasks()
    }
  }

  /**
   * Request a pause. Takes effect before the next step starts, after the
   * current step's context append and checkpoint have completed.
   */
  cancel(taskId: string): boolean {
    const run = this.runs.get(taskId)
    if (!run) return false
    run.cancelRequested = true
    log.info({ taskId }, 'Cancellation requested')
    return true
  }

  private claim(taskId: string): RunState {
    if (this.runs.has(taskId)) throw new TaskAlreadyRunningError(taskId)
    const run: RunState = { cancelRequested: false }
    this.runs.set(taskId, run)
    return run
  }

  private async plan(task: Task): Promise<void> {
    this.emitProgress({ type: 'task:planning', taskId: task.id, objective: task.objective })

    let steps: Step[]
    try {
      steps = await withAbortableTimeout(
        (signal) => this.planner.generatePlan(task.objective, signal),
        this.policy.stepTimeoutMs,
        () => new PlanGenerationError(`Planning timed out after ${this.policy.stepTimeoutMs}ms`),
      )
    } catch (error) {
      const failure =
        error instanceof PlanGenerationError
          ? error
          : new PlanGenerationError(errorMessage(error), { cause: error })
      this.transition(task, 'failed')
      this.emitProgress({ type: 'task:failed', taskId: task.id, error: failure.message })
      throw failure
    }

    // Generic steps inherit the task's category
    task.steps = steps.map((step, index) => ({
      ...step,
      index,
      category: step.category === 'general' ? task.category : step.category,
    }))
    this.emitProgress({
      type: 'task:planned',
      taskId: task.id,
      steps: task.steps.map((step) => step.description),
    })

    await this.appendContext(
      ACTIVE_TASK,
      [
        `Objective: ${task.objective}`,
        'Plan:',
        ...task.steps.map((step) => `${step.index + 1}. ${step.description}`),
      ].join('\n'),
      { taskId: task.id },
    )
    this.transition(task, 'running')
  }

  private async runSteps(task: Task, run: RunState, checkpointedAt: number): Promise<TaskOutcome> {
    let lastCheckpointAt = checkpointedAt
    let lastCheckpointId: string | undefined

    for (const step of task.steps) {
      if (step.status === 'completed') continue

      if (run.cancelRequested) {
        const checkpoint =
          lastCheckpointId && lastCheckpointAt === task.iteration
            ? lastCheckpointId
            : (await this.trySave(task, 'pause'))?.id
        this.transition(task, 'paused')
        this.emitProgress({ type: 'task:paused', taskId: task.id, checkpointId: checkpoint })
        return { task, status: 'paused', summary: summarizeTask(task), checkpointId: checkpoint }
      }

      const outcome = await this.executeStep(task, step)

      if (!outcome.ok) {
        step.status = 'failed'
        step.error = outcome.error.message
        this.emitProgress({
          type: 'step:failed',
          taskId: task.id,
          stepIndex: step.index,
          error: outcome.error.message,
        })
        await this.appendContext(
          TASK_STATE,
          `Step ${step.index + 1} failed: ${step.description}\nError: ${outcome.error.message}`,
          { taskId: task.id, stepIndex: step.index, status: 'failed' },
        )

        // Leave a resumable checkpoint at the last completed step
        let checkpointId: string | undefined
        if (task.iteration > lastCheckpointAt) {
          checkpointId = (await this.trySave(task, 'failure'))?.id
        } else {
          checkpointId = lastCheckpointId ?? (await this.latestCheckpointId(task.id))
        }

        this.transition(task, 'failed')
        this.emitProgress({
          type: 'task:failed',
          taskId: task.id,
          error: outcome.error.message,
          checkpointId,
        })
        return {
          task,
          status: 'failed',
          summary: summarizeTask(task),
          checkpointId,
          error: outcome.error,
        }
      }

      step.status = 'completed'
      step.result = outcome.value
      delete step.error
      task.iteration++
      this.touch(task)
      this.emitProgress({
        type: 'step:completed',
        taskId: task.id,
        stepIndex: step.index,
        description: step.description,
      })
      await this.appendContext(
        TASK_STATE,
        `Step ${step.index + 1} done: ${step.description}\n${preview(outcome.value)}`,
        { taskId: task.id, stepIndex: step.index, status: 'completed' },
      )

      const remaining = task.steps.some((s) => s.status !== 'completed')
      if (remaining && task.iteration % this.policy.checkpointEvery === 0) {
        const checkpoint = await this.trySave(task, 'interval')
        if (checkpoint) {
          lastCheckpointAt = task.iteration
          lastCheckpointId = checkpoint.id
        }
      }
    }

    this.transition(task, 'completed')
    const summary = summarizeTask(task)
    await this.appendContext(TASK_STATE, summary, { taskId: task.id, status: 'completed' })
    if (this.policy.deleteCheckpointsOnSuccess) {
      try {
        await this.checkpoints.deleteForTask(task.id)
      } catch (error) {
        log.warn({ taskId: task.id, err: errorMessage(error) }, 'Could not delete checkpoints')
      }
    }
    this.emitProgress({ type: 'task:completed', taskId: task.id, summary })
    return { task, status: 'completed', summary }
  }

  private async executeStep(task: Task, step: Step): Promise<Result<StepPayload>> {
    const capability = this.capabilities.resolve(step.category)
    let lastError: CofounderError = new StepExecutionError('Step was not attempted', {
      stepIndex: step.index,
    })

    while (step.attempts < this.policy.maxAttempts) {
      if (step.attempts > 0) {
        this.emitProgress({
          type: 'step:retrying',
          taskId: task.id,
          stepIndex: step.index,
          attempt: step.attempts + 1,
          error: lastError.message,
        })
        await sleep(computeBackoff(this.policy.retryBackoff, step.attempts - 1))
      }

      step.attempts++
      this.emitProgress({
        type: 'step:started',
        taskId: task.id,
        stepIndex: step.index,
        description: step.description,
        attempt: step.attempts,
      })

      const result = await this.attempt(capability, step)
      if (result.ok) return result

      lastError = result.error
      log.warn(
        { taskId: task.id, step: step.index, attempt: step.attempts, err: lastError.message },
        'Step attempt failed',
      )
    }

    return err(lastError)
  }

  private async attempt(capability: Capability, step: Step): Promise<Result<StepPayload>> {
    try {
      const context = await this.snapshotFor(capability)
      // A timed-out attempt is stopped and settled before the next one starts
      const outcome = await withAbortableTimeout(
        (signal) => capability.execute(step.description, context, signal),
        this.policy.stepTimeoutMs,
        () => new StepTimeoutError(step.index, this.policy.stepTimeoutMs),
      )
      if (outcome.success) return ok(outcome.result)
      return err(
        new StepExecutionError(outcome.error ?? 'Capability reported failure', {
          stepIndex: step.index,
        }),
      )
    } catch (error) {
      if (error instanceof CofounderError) return err(error)
      return err(new StepExecutionError(errorMessage(error), { stepIndex: step.index, cause: error }))
    }
  }

  /** Forget the oldest finished tasks beyond `maxRetainedTasks` */
  private forgetFinishedTasks(): void {
    const finished = Array.from(this.tasks.values()).filter(
      (task) => FINISHED.includes(task.status) && !this.runs.has(task.id),
    )
    const excess = finished.length - this.policy.maxRetainedTasks
    for (const task of finished.slice(0, Math.max(0, excess))) {
      this.tasks.delete(task.id)
    }
  }

  private snapshotFor(capability: Capability): Promise<ContextSnapshot> {
    const categories = capability.contextCategories?.filter((category) =>
      this.contextStore.has(category),
    )
    return this.io(
      this.contextStore.getSnapshot(this.snapshotTokens, categories ? { categories } : {}),
      'context snapshot',
    )
  }

  private rehydrate(checkpoint: Checkpoint): Task {
    const previous = this.tasks.get(checkpoint.taskId)
    return {
      id: checkpoint.taskId,
      objective: checkpoint.objective,
      category: checkpoint.category,
      // Failed steps get a fresh retry budget; completed ones are kept as-is
      steps: checkpoint.steps.map((step): Step =>
        step.status === 'completed'
          ? { ...step }
          : { ...step, status: 'pending', attempts: 0 },
      ),
      status: 'paused',
      iteration: checkpoint.iteration,
      created: previous?.created ?? checkpoint.created,
      updated: this.now(),
    }
  }

  /** Checkpoint without letting a storage failure end the task */
  private async trySave(task: Task, reason: CheckpointReason): Promise<Checkpoint | undefined> {
    try {
      const checkpoint = await this.io(this.checkpoints.save(task, reason), 'checkpoint save')
      this.emitProgress({
        type: 'checkpoint:saved',
        taskId: task.id,
        checkpointId: checkpoint.id,
        iteration: checkpoint.iteration,
        reason,
      })
      return checkpoint
    } catch (error) {
      log.error({ taskId: task.id, reason, err: errorMessage(error) }, 'Checkpoint save failed')
      return undefined
    }
  }

  private async latestCheckpointId(taskId: string): Promise<string | undefined> {
    try {
      return (await this.checkpoints.latest(taskId))?.id
    } catch (error) {
      log.warn({ taskId, err: errorMessage(error) }, 'Could not look up latest checkpoint')
      return undefined
    }
  }

  /** Context writes never fail a task; problems are logged */
  private async appendContext(
    category: string,
    content: string,
    metadata: Record<string, unknown>,
  ): Promise<void> {
    if (!this.contextStore.has(category)) return
    try {
      await this.io(this.contextStore.append(category, content, metadata), 'context append')
    } catch (error) {
      log.warn({ category, err: errorMessage(error) }, 'Context append failed')
    }
  }

  private io<T>(work: Promise<T>, label: string): Promise<T> {
    return withTimeout(
      work,
      this.policy.ioTimeoutMs,
      () => new Error(`${label} timed out after ${this.policy.ioTimeoutMs}ms`),
    )
  }

  private transition(task: Task, status: Task['status']): void {
    task.status = status
    this.touch(task)
    if (status === 'running') this.emitProgress({ type: 'task:running', taskId: task.id })
  }

  private touch(task: Task): void {
    task.updated = this.now()
  }

  private emitProgress(input: ProgressEventInput): void {
    const event: ProgressEvent = { ...input, timestamp: this.now().toISOString() }
    log.debug({ event: event.type, taskId: event.taskId }, 'Progress')
    this.emit('progress', event)
    for (const sink of this.sinks) {
      try {
        sink.publish(event)
      } catch (error) {
        log.warn({ err: errorMessage(error) }, 'Progress sink failed')
      }
    }
  }
}

function preview(payload: StepPayload): string {
  if (typeof payload !== 'string') return `Artifact: ${payload.label ?? payload.uri} (${payload.uri})`
  return payload.length > RESULT_PREVIEW_CHARS
    ? `${payload.slice(0, RESULT_PREVIEW_CHARS)}…`
    : payload
}

/**
 * Plain-text report of a task: status line, progress count and one line per step.
 */
export function summarizeTask(task: Task): string {
  const completed = task.steps.filter((step) => step.status === 'completed').length
  const marks: Record<Step['status'], string> = { completed: '[x]', failed: '[!]', pending: '[ ]' }
  const label: Record<Task['status'], string> = {
    pending: 'Pending',
    running: 'In progress',
    completed: 'Completed',
    failed: 'Failed',
    paused: 'Paused',
  }

  return [
    `${label[task.status]}: ${task.objective}`,
    `${completed}/${task.steps.length} steps completed.`,
    ...task.steps.map((step) => {
      const line = `${marks[step.status]} ${step.index + 1}. ${step.description}`
      return step.status === 'failed' && step.error ? `${line} (${step.error})` : line
    }),
  ].join('\n')
}
