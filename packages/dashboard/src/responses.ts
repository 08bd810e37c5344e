/**
 * API response shapes. Dates go out as ISO strings; filesystem paths never
 * leave the server.
 */

import type { AnyNotification, CheckpointSummary, Step, Task } from "@cofounder/core";
import type { TaskRecord } from "./tasks/task-manager.js";

export interface StepResponse {
  index: number;
  description: string;
  category: Step["category"];
  status: Step["status"];
  attempts: number;
  result?: Step["result"];
  error?: string;
}

export interface TaskResponse {
  id: string;
  objective: string;
  category: TaskRecord["category"];
  status: TaskRecord["status"];
  totalSteps: number;
  completedSteps: number;
  checkpointId?: string;
  summary?: string;
  error?: string;
  created: string;
  updated: string;
  /** Present while the task is known to the running executor */
  steps?: StepResponse[];
}

export type ChatResponse =
  | { kind: "clarify"; text: string }
  | { kind: "chat"; text: string; failed: boolean }
  | { kind: "task"; task: TaskResponse };

/**
 * Convert a task record to API response format, adding live steps when known
 */
export function toTaskResponse(record: TaskRecord, live?: Task): TaskResponse {
  return {
    id: record.id,
    objective: record.objective,
    category: record.category,
    status: record.status,
    totalSteps: record.totalSteps,
    completedSteps: record.completedSteps,
    checkpointId: record.checkpointId,
    summary: record.summary,
    error: record.error,
    created: record.created.toISOString(),
    updated: record.updated.toISOString(),
    ...(live ? { steps: live.steps.map((step) => ({ ...step })) } : {}),
  };
}

export function toCheckpointResponse(checkpoint: CheckpointSummary) {
  return {
    ...checkpoint,
    created: checkpoint.created.toISOString(),
  };
}

/**
 * Convert notification to API response format
 */
export function toNotificationResponse(notification: AnyNotification) {
  const base = {
    id: notification.id,
    type: notification.type,
    taskId: notification.taskId,
    checkpointId: notification.checkpointId,
    created: notification.created.toISOString(),
    status: notification.status,
    readAt: notification.readAt?.toISOString(),
  };

  if (notification.type === "notify") {
    return {
      ...base,
      message: notification.message,
      importance: notification.importance,
    };
  }

  return {
    ...base,
    problem: notification.problem,
    severity: notification.severity,
  };
}

export type NotificationResponse = ReturnType<typeof toNotificationResponse>;
