/**
 * Task System — Execution Log Storage
 *
 * One JSONL file per task: a metadata header followed by every progress
 * event the executor emitted for that task, in order.
 */

import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { createLogger } from "@cofounder/core";
import type { GetLogOptions, ProgressEvent } from "@cofounder/core";

const log = createLogger("task-log");

const TASK_ID_RE = /^[A-Za-z0-9_-]+$/;

/**
 * Execution log metadata header
 */
export interface TaskLogMeta {
  kind: "meta";
  taskId: string;
  objective: string;
  created: string;
}

export interface TaskLogEvent {
  kind: "event";
  event: ProgressEvent;
}

const logLineSchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("meta"),
    taskId: z.string(),
    objective: z.string(),
    created: z.string(),
  }),
  z.object({
    kind: z.literal("event"),
    event: z
      .object({ type: z.string(), taskId: z.string(), timestamp: z.string() })
      .passthrough(),
  }),
]);

/**
 * A log line as read back. Events keep every field they were written with.
 */
export type TaskLogLine = z.infer<typeof logLineSchema>;

export type LoggedEvent = Extract<TaskLogLine, { kind: "event" }>["event"];

/**
 * Manages JSONL execution logs for tasks
 */
export class TaskLogStorage {
  private logsDir: string;

  constructor(logsDir: string) {
    this.logsDir = logsDir;
    this.ensureLogsDir();
  }

  /**
   * Ensure the logs directory exists
   */
  private ensureLogsDir(): void {
    if (!fs.existsSync(this.logsDir)) {
      fs.mkdirSync(this.logsDir, { recursive: true });
    }
  }

  /**
   * Get the log file path for a task
   */
  getLogPath(taskId: string): string {
    if (!TASK_ID_RE.test(taskId)) {
      throw new Error(`Invalid task id: ${taskId}`);
    }
    return path.join(this.logsDir, `${taskId}.jsonl`);
  }

  /**
   * Create a new execution log file with metadata header
   */
  createLog(taskId: string, objective: string): void {
    const meta: TaskLogMeta = {
      kind: "meta",
      taskId,
      objective,
      created: new Date().toISOString(),
    };

    fs.writeFileSync(this.getLogPath(taskId), JSON.stringify(meta) + "\n", "utf-8");
  }

  /**
   * Append a progress event to the execution log
   */
  appendEvent(event: ProgressEvent): void {
    const line: TaskLogEvent = { kind: "event", event };
    fs.appendFileSync(this.getLogPath(event.taskId), JSON.stringify(line) + "\n", "utf-8");
  }

  /**
   * Read the full log including the header
   */
  readFullLog(taskId: string): TaskLogLine[] {
    if (!this.exists(taskId)) {
      return [];
    }

    const content = fs.readFileSync(this.getLogPath(taskId), "utf-8");
    const lines: TaskLogLine[] = [];

    for (const line of content.split("\n")) {
      if (!line.trim()) continue;
      try {
        const parsed = logLineSchema.safeParse(JSON.parse(line));
        if (parsed.success) {
          lines.push(parsed.data);
        } else {
          log.warn({ taskId }, "Skipping invalid log line");
        }
      } catch {
        log.warn({ taskId }, "Skipping malformed log line");
      }
    }

    return lines;
  }

  /**
   * Read events with pagination options
   */
  getEvents(taskId: string, options?: GetLogOptions): LoggedEvent[] {
    const events = this.readFullLog(taskId).flatMap((line) =>
      line.kind === "event" ? [line.event] : [],
    );
    const { offset = 0, limit } = options ?? {};
    const page = events.slice(offset);
    return limit !== undefined ? page.slice(0, limit) : page;
  }

  /**
   * Check if a log exists
   */
  exists(taskId: string): boolean {
    return fs.existsSync(this.getLogPath(taskId));
  }

  /**
   * Delete a log file
   */
  deleteLog(taskId: string): void {
    const logPath = this.getLogPath(taskId);
    if (fs.existsSync(logPath)) {
      fs.unlinkSync(logPath);
    }
  }
}
