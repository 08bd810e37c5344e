/**
 * Notification System Types
 *
 * Types for telling the user about task outcomes and escalating
 * failures that need their attention.
 */

/**
 * Importance levels for notifications
 */
export type NotificationImportance = "info" | "warning" | "success" | "error";

/**
 * Severity levels for escalations
 */
export type EscalationSeverity = "low" | "medium" | "high" | "critical";

/**
 * Status of a notification
 */
export type NotificationStatus = "pending" | "delivered" | "read" | "dismissed";

/**
 * Type of notification
 */
export type NotificationType = "notify" | "escalate";

/**
 * Base notification fields
 */
interface BaseNotification {
  id: string;
  type: NotificationType;
  taskId?: string;
  /** Checkpoint the user can resume from, when relevant */
  checkpointId?: string;
  created: Date;
  status: NotificationStatus;
  readAt?: Date;
}

/**
 * Simple notification (fire-and-forget)
 */
export interface Notification extends BaseNotification {
  type: "notify";
  message: string;
  importance: NotificationImportance;
}

/**
 * Escalation (urgent notification)
 */
export interface Escalation extends BaseNotification {
  type: "escalate";
  problem: string;
  severity: EscalationSeverity;
}

/**
 * Union type for all notification types
 */
export type AnyNotification = Notification | Escalation;

/**
 * Input for creating a simple notification
 */
export interface NotifyInput {
  message: string;
  importance?: NotificationImportance;
  taskId?: string;
  checkpointId?: string;
}

/**
 * Input for creating an escalation
 */
export interface EscalateInput {
  problem: string;
  severity?: EscalationSeverity;
  taskId?: string;
  checkpointId?: string;
}

/**
 * Event emitted when notification state changes
 */
export interface NotificationEvent {
  type: "notification:created" | "notification:delivered" | "notification:read";
  notification: AnyNotification;
}
