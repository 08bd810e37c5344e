export { AutonomousExecutor, DEFAULT_EXECUTOR_POLICY, summarizeTask } from './executor.js'
export type { AutonomousExecutorOptions, ExecutorPolicy } from './executor.js'
export { PlanGenerator, buildPlanPrompt, parsePlan } from './planner.js'
export type { PlanSource, PlanGeneratorOptions } from './planner.js'
export {
  CapabilityRegistry,
  ModelCapability,
  createDefaultCapabilities,
} from './capabilities.js'
export type { Capability, CapabilityResult, ModelCapabilityOptions } from './capabilities.js'
export { CheckpointManager } from './checkpoint-manager.js'
export type { CheckpointManagerOptions } from './checkpoint-manager.js'
export {
  CHECKPOINT_SCHEMA,
  CHECKPOINT_VERSION,
  serializeCheckpoint,
  deserializeCheckpoint,
} from './checkpoint-schema.js'
export type { CheckpointRecord } from './checkpoint-schema.js'
export type { ProgressEvent, ProgressEventType, ProgressSink } from './events.js'
export { TASK_CATEGORIES } from './types.js'
export type {
  Task,
  TaskStatus,
  TaskCategory,
  Step,
  StepStatus,
  StepPayload,
  ArtifactRef,
  Checkpoint,
  CheckpointReason,
  CheckpointSummary,
  TaskOutcome,
  ListTasksFilter,
  GetLogOptions,
} from './types.js'
