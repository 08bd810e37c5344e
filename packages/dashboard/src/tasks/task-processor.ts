/**
 * Task System — Task Processor
 *
 * Runs autonomous tasks in the background so API calls return at once.
 * Every progress event from the executor is fanned out to the task
 * registry, the execution log and connected WebSocket clients.
 */

import {
  CofounderError,
  TaskAlreadyRunningError,
  createLogger,
  errorMessage,
} from "@cofounder/core";
import type { Cofounder, ProgressEvent, Task, TaskCategory, TaskOutcome } from "@cofounder/core";
import type { ConnectionRegistry } from "../ws/connection-registry.js";
import { toTaskResponse } from "../responses.js";
import type { TaskLogStorage } from "./log-storage.js";
import type { TaskManager, TaskRecord } from "./task-manager.js";

const log = createLogger("task-processor");

export interface TaskProcessorConfig {
  cofounder: Cofounder;
  taskManager: TaskManager;
  logStorage: TaskLogStorage;
  connectionRegistry: ConnectionRegistry;
}

export interface SubmittedRun {
  taskId: string;
  /** Settles when the run ends; null when it ended without an outcome */
  completion: Promise<TaskOutcome | null>;
}

/**
 * TaskProcessor — executes tasks and records their progress
 */
export class TaskProcessor {
  private cofounder: Cofounder;
  private taskManager: TaskManager;
  private logStorage: TaskLogStorage;
  private connectionRegistry: ConnectionRegistry;
  private running = new Map<string, Promise<TaskOutcome | null>>();
  private unsubscribe: () => void;

  constructor(config: TaskProcessorConfig) {
    this.cofounder = config.cofounder;
    this.taskManager = config.taskManager;
    this.logStorage = config.logStorage;
    this.connectionRegistry = config.connectionRegistry;
    this.unsubscribe = this.cofounder.executor.onProgress((event) => this.onProgress(event));
  }

  /**
   * Create a task for `objective` and start it without waiting for it
   */
  submit(objective: string, category: TaskCategory = "general"): { record: TaskRecord; run: SubmittedRun } {
    const task = this.cofounder.executor.createTask(objective, category);
    const record = this.record(task);
    log.info({ taskId: task.id, category }, "Task submitted");

    const run = this.track(task.id, this.cofounder.executor.execute(task));
    return { record, run };
  }

  /**
   * Resume from a checkpoint in the background. The checkpoint is loaded
   * first, so a missing or corrupt one is reported to the caller.
   */
  async resume(checkpointId: string): Promise<SubmittedRun> {
    const checkpoint = await this.cofounder.checkpoints.load(checkpointId);
    if (this.cofounder.executor.isRunning(checkpoint.taskId)) {
      throw new TaskAlreadyRunningError(checkpoint.taskId);
    }
    log.info({ taskId: checkpoint.taskId, checkpointId }, "Resuming task");
    return this.track(checkpoint.taskId, this.cofounder.executor.resume(checkpointId));
  }

  /**
   * Request a pause at the next step boundary
   */
  cancel(taskId: string): boolean {
    return this.cofounder.executor.cancel(taskId);
  }

  /**
   * Pause every running task and wait for all runs to settle
   */
  async shutdown(): Promise<void> {
    for (const taskId of this.running.keys()) {
      this.cofounder.executor.cancel(taskId);
    }
    await this.drain();
    this.unsubscribe();
  }

  /**
   * Wait until no task is running
   */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all(this.running.values());
    }
  }

  private track(taskId: string, execution: Promise<TaskOutcome>): SubmittedRun {
    const completion = execution
      .then((outcome) => {
        this.taskManager.update(taskId, {
          checkpointId: outcome.checkpointId,
          summary: outcome.summary,
          error: outcome.error?.message,
        });
        this.publishTask(taskId);
        return outcome;
      })
      .catch((error: unknown) => {
        // Plan failures are already recorded through task:failed
        if (error instanceof CofounderError) {
          this.taskManager.update(taskId, { error: error.message });
          this.publishTask(taskId);
        } else {
          log.error({ taskId, err: errorMessage(error) }, "Task run crashed");
        }
        return null;
      })
      .finally(() => {
        this.running.delete(taskId);
      });

    this.running.set(taskId, completion);
    return { taskId, completion };
  }

  private onProgress(event: ProgressEvent): void {
    try {
      const task = this.cofounder.executor.getTask(event.taskId);
      if (task && (event.type.startsWith("task:") || event.type === "step:completed")) {
        this.record(task);
      }
      if (this.logStorage.exists(event.taskId)) {
        this.logStorage.appendEvent(event);
      }
    } catch (error) {
      log.warn({ taskId: event.taskId, err: errorMessage(error) }, "Could not record progress");
    }

    this.connectionRegistry.broadcastToAll({ type: "progress", event });
  }

  private record(task: Task): TaskRecord {
    const record = this.taskManager.sync(task);
    if (!this.logStorage.exists(task.id)) {
      this.logStorage.createLog(task.id, task.objective);
    }
    return record;
  }

  private publishTask(taskId: string): void {
    const record = this.taskManager.findById(taskId);
    if (record) {
      this.connectionRegistry.broadcastToAll({
        type: "task:updated",
        task: toTaskResponse(record, this.cofounder.executor.getTask(taskId)),
      });
    }
  }
}
