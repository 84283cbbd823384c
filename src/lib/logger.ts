// Structured logging (pino)
// LOG_LEVEL overrides the default: debug in development, info in production

import pino from 'pino'
import type { Logger } from 'pino'

export type { Logger }

function createLogger(): Logger {
  const isDevelopment = process.env.NODE_ENV !== 'production'
  const level = process.env.LOG_LEVEL || (isDevelopment ? 'debug' : 'info')

  return pino({
    level,
    base: {
      env: process.env.NODE_ENV || 'development',
      service: 'patent-expiry-service',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  })
}

/**
 * Root logger instance
 */
export const logger = createLogger()

/**
 * Create a child logger bound to a module or request context
 */
export function createChildLogger(context: Record<string, unknown>): Logger {
  return logger.child(context)
}
