/**
 * Task System — Module Exports
 */

export { TaskManager } from "./task-manager.js";
export { TaskLogStorage } from "./log-storage.js";
export { TaskProcessor } from "./task-processor.js";
export type { TaskRecord, TaskRecordChanges } from "./task-manager.js";
export type { TaskLogMeta, TaskLogEvent, TaskLogLine, LoggedEvent } from "./log-storage.js";
export type { TaskProcessorConfig, SubmittedRun } from "./task-processor.js";
