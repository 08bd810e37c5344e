/**
 * Error taxonomy
 *
 * Every failure the core reports carries a stable `code` so callers
 * (CLI, dashboard routes) can map it without string matching.
 */

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'PLAN_GENERATION'
  | 'MODEL_UNAVAILABLE'
  | 'STEP_EXECUTION'
  | 'STEP_TIMEOUT'
  | 'UNKNOWN_CATEGORY'
  | 'CHECKPOINT_CORRUPTION'
  | 'CHECKPOINT_NOT_FOUND'
  | 'TASK_ALREADY_RUNNING'
  | 'CONFIG'

export class CofounderError extends Error {
  readonly code: ErrorCode

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = new.target.name
    this.code = code
  }
}

/** Empty or malformed user text */
export class InvalidInputError extends CofounderError {
  constructor(message = 'Input text is empty', options?: ErrorOptions) {
    super('INVALID_INPUT', message, options)
  }
}

export class PlanGenerationError extends CofounderError {
  constructor(message: string, options?: ErrorOptions) {
    super('PLAN_GENERATION', message, options)
  }
}

export class ModelUnavailableError extends CofounderError {
  constructor(message: string, options?: ErrorOptions) {
    super('MODEL_UNAVAILABLE', message, options)
  }
}

export class StepExecutionError extends CofounderError {
  readonly stepIndex?: number

  constructor(
    message: string,
    options?: ErrorOptions & { stepIndex?: number; code?: 'STEP_EXECUTION' | 'STEP_TIMEOUT' },
  ) {
    super(options?.code ?? 'STEP_EXECUTION', message, options)
    this.stepIndex = options?.stepIndex
  }
}

export class StepTimeoutError extends StepExecutionError {
  constructor(stepIndex: number, timeoutMs: number) {
    super(`Step ${stepIndex + 1} timed out after ${timeoutMs}ms`, { stepIndex, code: 'STEP_TIMEOUT' })
  }
}

export class UnknownCategoryError extends CofounderError {
  readonly category: string

  constructor(category: string) {
    super('UNKNOWN_CATEGORY', `Unknown context category: ${category}`)
    this.category = category
  }
}

export class CheckpointCorruptionError extends CofounderError {
  readonly checkpointId: string

  constructor(checkpointId: string, message: string, options?: ErrorOptions) {
    super('CHECKPOINT_CORRUPTION', `Checkpoint ${checkpointId} is unreadable: ${message}`, options)
    this.checkpointId = checkpointId
  }
}

export class CheckpointNotFoundError extends CofounderError {
  readonly checkpointId: string

  constructor(checkpointId: string) {
    super('CHECKPOINT_NOT_FOUND', `Checkpoint not found: ${checkpointId}`)
    this.checkpointId = checkpointId
  }
}

export class TaskAlreadyRunningError extends CofounderError {
  readonly taskId: string

  constructor(taskId: string) {
    super('TASK_ALREADY_RUNNING', `Task ${taskId} is already running`)
    this.taskId = taskId
  }
}

export class ConfigError extends CofounderError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG', message, options)
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

// ---------------------------------------------------------------------------
// Result
// ---------------------------------------------------------------------------

export type Result<T, E = CofounderError> = { ok: true; value: T } | { ok: false; error: E }

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value }
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error }
}
