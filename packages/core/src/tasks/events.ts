import type { CheckpointReason } from './types.js'

/**
 * Progress events emitted for every step invocation and task transition.
 */
export type ProgressEvent =
  | { type: 'task:planning'; taskId: string; timestamp: string; objective: string }
  | { type: 'task:planned'; taskId: string; timestamp: string; steps: string[] }
  | { type: 'task:running'; taskId: string; timestamp: string }
  | {
      type: 'task:resumed'
      taskId: string
      timestamp: string
      checkpointId: string
      iteration: number
    }
  | {
      type: 'step:started'
      taskId: string
      timestamp: string
      stepIndex: number
      description: string
      attempt: number
    }
  | {
      type: 'step:retrying'
      taskId: string
      timestamp: string
      stepIndex: number
      attempt: number
      error: string
    }
  | { type: 'step:completed'; taskId: string; timestamp: string; stepIndex: number; description: string }
  | { type: 'step:failed'; taskId: string; timestamp: string; stepIndex: number; error: string }
  | {
      type: 'checkpoint:saved'
      taskId: string
      timestamp: string
      checkpointId: string
      iteration: number
      reason: CheckpointReason
    }
  | { type: 'task:completed'; taskId: string; timestamp: string; summary: string }
  | { type: 'task:failed'; taskId: string; timestamp: string; error: string; checkpointId?: string }
  | { type: 'task:paused'; taskId: string; timestamp: string; checkpointId?: string }

export type ProgressEventType = ProgressEvent['type']

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never

/** Event as passed to `emit`, before the timestamp is stamped on */
export type ProgressEventInput = DistributiveOmit<ProgressEvent, 'timestamp'>

/**
 * Fire-and-forget observer of progress events (UI, notification service).
 * Errors thrown by a sink are logged and never reach the executor.
 */
export interface ProgressSink {
  publish(event: ProgressEvent): void
}
