/**
 * Notification Service
 *
 * Turns terminal task events into notifications for the user and keeps a
 * bounded history of them. State changes are emitted as events; the
 * dashboard pushes them to connected clients and reports delivery back.
 */

import { EventEmitter } from 'node:events'
import { monotonicFactory } from 'ulid'
import type { ProgressEvent, ProgressSink } from '../tasks/events.js'
import type {
  AnyNotification,
  Notification,
  Escalation,
  NotifyInput,
  EscalateInput,
  NotificationEvent,
  NotificationStatus,
} from './types.js'

export interface NotificationServiceConfig {
  /** History size; the oldest handled notification goes first */
  maxNotifications?: number
  now?: () => Date
}

const HANDLED: readonly NotificationStatus[] = ['read', 'dismissed']

export class NotificationService extends EventEmitter implements ProgressSink {
  // Insertion order is creation order
  private readonly notifications = new Map<string, AnyNotification>()
  private readonly maxNotifications: number
  private readonly now: () => Date
  private readonly nextId = monotonicFactory()

  constructor(config: NotificationServiceConfig = {}) {
    super()
    this.maxNotifications = Math.max(1, config.maxNotifications ?? 1000)
    this.now = config.now ?? (() => new Date())
  }

  notify(input: NotifyInput): Notification {
    const notification: Notification = {
      ...this.base(input),
      type: 'notify',
      message: input.message,
      importance: input.importance ?? 'info',
    }
    this.add(notification)
    return notification
  }

  /** Something the user has to act on, such as a failed task */
  escalate(input: EscalateInput): Escalation {
    const escalation: Escalation = {
      ...this.base(input),
      type: 'escalate',
      problem: input.problem,
      severity: input.severity ?? 'medium',
    }
    this.add(escalation)
    return escalation
  }

  /**
   * Terminal task events become notifications; everything else is ignored
   */
  publish(event: ProgressEvent): void {
    switch (event.type) {
      case 'task:completed':
        this.notify({
          message: event.summary.split('\n', 1)[0],
          importance: 'success',
          taskId: event.taskId,
        })
        break
      case 'task:paused':
        this.notify({
          message: event.checkpointId
            ? `Task paused. Resume with checkpoint ${event.checkpointId}.`
            : 'Task paused.',
          importance: 'warning',
          taskId: event.taskId,
          checkpointId: event.checkpointId,
        })
        break
      case 'task:failed':
        this.escalate({
          problem: event.checkpointId
            ? `Task failed: ${event.error}. Fix the cause and resume from checkpoint ${event.checkpointId}.`
            : `Task failed: ${event.error}`,
          severity: 'high',
          taskId: event.taskId,
          checkpointId: event.checkpointId,
        })
        break
      default:
        break
    }
  }

  /** A client has received the notification; only pending ones change */
  markDelivered(id: string): boolean {
    const notification = this.notifications.get(id)
    if (notification?.status !== 'pending') return false

    notification.status = 'delivered'
    this.emitEvent('notification:delivered', notification)
    return true
  }

  markRead(id: string): boolean {
    const notification = this.notifications.get(id)
    if (!notification) return false

    notification.status = 'read'
    notification.readAt = this.now()
    this.emitEvent('notification:read', notification)
    return true
  }

  dismiss(id: string): boolean {
    const notification = this.notifications.get(id)
    if (!notification) return false

    notification.status = 'dismissed'
    this.emitEvent('notification:read', notification)
    return true
  }

  get(id: string): AnyNotification | undefined {
    return this.notifications.get(id)
  }

  /** Not yet read or dismissed, newest first */
  getPending(): AnyNotification[] {
    return this.newestFirst((n) => !HANDLED.includes(n.status))
  }

  getAll(): AnyNotification[] {
    return this.newestFirst(() => true)
  }

  getForTask(taskId: string): AnyNotification[] {
    return this.newestFirst((n) => n.taskId === taskId)
  }

  private base(input: { taskId?: string; checkpointId?: string }) {
    const created = this.now()
    return {
      id: `notif-${this.nextId(created.getTime())}`,
      taskId: input.taskId,
      checkpointId: input.checkpointId,
      created,
      status: 'pending' as const,
    }
  }

  private add(notification: AnyNotification): void {
    while (this.notifications.size >= this.maxNotifications) {
      this.evictOne()
    }
    this.notifications.set(notification.id, notification)
    this.emitEvent('notification:created', notification)
  }

  /** Drop the oldest handled notification, or the oldest of all when none is handled */
  private evictOne(): void {
    let victim: string | undefined
    for (const [id, notification] of this.notifications) {
      victim ??= id
      if (HANDLED.includes(notification.status)) {
        victim = id
        break
      }
    }
    if (victim) this.notifications.delete(victim)
  }

  private newestFirst(keep: (notification: AnyNotification) => boolean): AnyNotification[] {
    return Array.from(this.notifications.values()).filter(keep).reverse()
  }

  private emitEvent(type: NotificationEvent['type'], notification: AnyNotification): void {
    const event: NotificationEvent = { type, notification }
    this.emit(type, event)
    this.emit('notification', event)
  }
}
