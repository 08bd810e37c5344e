// Public API for consumption by other packages (dashboard)

export { Cofounder, createCofounder, describeOutcome, CLARIFY_PROMPT } from './cofounder.js'
export type { ChatReply, CofounderReply, CofounderComponents, CofounderOverrides } from './cofounder.js'
export { commands, matchCommand, runCommand } from './commands.js'
export type { CommandDefinition, ParsedCommand } from './commands.js'

export { loadConfig, resolveConfig, findAgentDir, DEFAULT_CATEGORIES } from './config.js'
export type { YamlConfig } from './config.js'
export type {
  CofounderConfig,
  ModelConfig,
  ModelProvider,
  ContextConfig,
  ContextUnit,
  PrunePolicyName,
  ExecutorConfig,
  RouterConfig,
} from './types.js'

export * from './errors.js'
export { createLogger } from './logger.js'
export type { Logger } from './logger.js'

export * from './context/index.js'
export * from './router/index.js'
export * from './model/index.js'
export * from './tasks/index.js'
export * from './storage/index.js'
export * from './utils/index.js'

export { NotificationService } from './notifications/index.js'
export type {
  NotificationServiceConfig,
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
} from './notifications/index.js'
