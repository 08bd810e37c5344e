/**
 * Notification System — Module Exports
 */

export { NotificationService } from './service.js'
export type { NotificationServiceConfig } from './service.js'

export type {
  NotificationImportance,
  EscalationSeverity,
  NotificationStatus,
  NotificationType,
  Notification,
  Escalation,
  AnyNotification,
  NotifyInput,
  EscalateInput,
  NotificationEvent,
} from './types.js'
