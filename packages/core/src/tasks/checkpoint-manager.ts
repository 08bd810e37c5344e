/**
 * Checkpoint Manager
 *
 * Saves, lists, loads and deletes task checkpoints. One JSON file per
 * checkpoint under `checkpoints/`, written atomically. Only the newest
 * `maxPerTask` checkpoints of a task are kept.
 */

import { monotonicFactory } from 'ulid'
import { CheckpointNotFoundError, errorMessage } from '../errors.js'
import { createLogger } from '../logger.js'
import type { DurableStorage } from '../storage/types.js'
import { withTimeout } from '../utils/timeout.js'
import { deserializeCheckpoint, serializeCheckpoint } from './checkpoint-schema.js'
import type { Checkpoint, CheckpointReason, CheckpointSummary, Task } from './types.js'

const log = createLogger('checkpoints')

const VALID_ID = /^[A-Za-z0-9_-]+$/
const FILE_SUFFIX = '.json'

const nextId = monotonicFactory()

export interface CheckpointManagerOptions {
  storage: DurableStorage
  directory?: string
  maxPerTask?: number
  /** Limit for a single storage call; 0 disables it */
  ioTimeoutMs?: number
  now?: () => Date
}

export class CheckpointManager {
  private readonly storage: DurableStorage
  private readonly directory: string
  private readonly maxPerTask: number
  private readonly ioTimeoutMs: number
  private readonly now: () => Date

  constructor(options: CheckpointManagerOptions) {
    this.storage = options.storage
    this.directory = options.directory ?? 'checkpoints'
    this.maxPerTask = options.maxPerTask ?? 10
    this.ioTimeoutMs = options.ioTimeoutMs ?? 0
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Snapshot `task` durably. Steps are copied, so later mutation of the
   * task does not leak into the saved record.
   */
  async save(task: Task, reason: CheckpointReason): Promise<Checkpoint> {
    const checkpoint: Checkpoint = {
      id: `cp-${nextId()}`,
      taskId: task.id,
      objective: task.objective,
      category: task.category,
      iteration: task.steps.filter((step) => step.status === 'completed').length,
      steps: task.steps.map((step) => ({ ...step })),
      reason,
      created: this.now(),
    }

    await this.io(this.storage.writeAtomic(this.keyFor(checkpoint.id), serializeCheckpoint(checkpoint)))
    log.info(
      { checkpointId: checkpoint.id, taskId: task.id, iteration: checkpoint.iteration, reason },
      'Checkpoint saved',
    )

    await this.enforceRetention(task.id)
    return checkpoint
  }

  /**
   * @throws CheckpointNotFoundError when no such checkpoint exists
   * @throws CheckpointCorruptionError when the record cannot be read back
   */
  async load(id: string): Promise<Checkpoint> {
    if (!VALID_ID.test(id)) throw new CheckpointNotFoundError(id)
    const raw = await this.io(this.storage.read(this.keyFor(id)))
    if (raw === null) throw new CheckpointNotFoundError(id)
    return deserializeCheckpoint(id, raw)
  }

  /** Readable checkpoints, newest first. Unreadable files are skipped. */
  async list(taskId?: string): Promise<CheckpointSummary[]> {
    const checkpoints = await this.readAll()
    return checkpoints
      .filter((checkpoint) => !taskId || checkpoint.taskId === taskId)
      .map((checkpoint) => ({
        id: checkpoint.id,
        taskId: checkpoint.taskId,
        objective: checkpoint.objective,
        iteration: checkpoint.iteration,
        totalSteps: checkpoint.steps.length,
        reason: checkpoint.reason,
        created: checkpoint.created,
      }))
  }

  async latest(taskId?: string): Promise<Checkpoint | null> {
    const checkpoints = await this.readAll()
    return checkpoints.find((checkpoint) => !taskId || checkpoint.taskId === taskId) ?? null
  }

  async delete(id: string): Promise<boolean> {
    if (!VALID_ID.test(id)) return false
    const removed = await this.io(this.storage.remove(this.keyFor(id)))
    if (removed) log.info({ checkpointId: id }, 'Checkpoint deleted')
    return removed
  }

  async deleteForTask(taskId: string): Promise<number> {
    const summaries = await this.list(taskId)
    let count = 0
    for (const summary of summaries) {
      if (await this.delete(summary.id)) count++
    }
    return count
  }

  async clear(): Promise<number> {
    const keys = await this.io(this.storage.list(this.directory))
    let count = 0
    for (const key of keys) {
      if (key.endsWith(FILE_SUFFIX) && (await this.io(this.storage.remove(key)))) count++
    }
    return count
  }

  private async readAll(): Promise<Checkpoint[]> {
    const keys = await this.io(this.storage.list(this.directory))
    const checkpoints: Checkpoint[] = []

    for (const key of keys) {
      if (!key.endsWith(FILE_SUFFIX)) continue
      const id = key.slice(this.directory.length + 1, -FILE_SUFFIX.length)
      try {
        checkpoints.push(await this.load(id))
      } catch (error) {
        log.warn({ checkpointId: id, err: errorMessage(error) }, 'Skipping unreadable checkpoint')
      }
    }

    return checkpoints.sort(
      (a, b) => b.created.getTime() - a.created.getTime() || (a.id < b.id ? 1 : -1),
    )
  }

  private async enforceRetention(taskId: string): Promise<void> {
    const summaries = await this.list(taskId)
    for (const stale of summaries.slice(this.maxPerTask)) {
      await this.delete(stale.id)
    }
  }

  private keyFor(id: string): string {
    return `${this.directory}/${id}${FILE_SUFFIX}`
  }

  private io<T>(work: Promise<T>): Promise<T> {
    return withTimeout(
      work,
      this.ioTimeoutMs,
      () => new Error(`Checkpoint storage did not respond within ${this.ioTimeoutMs}ms`),
    )
  }
}
