import { pino } from 'pino'
import type { Logger } from 'pino'

export type { Logger }

const rootLogger = pino({
  name: 'cofounder',
  level: process.env.COFOUNDER_LOG_LEVEL ?? 'info',
})

/**
 * Child logger tagged with the component name, e.g. `createLogger('executor')`.
 */
export function createLogger(component: string): Logger {
  return rootLogger.child({ component })
}
