/**
 * Logger Utility
 *
 * Structured logger using pino with pretty-print in development.
 */

import pino from 'pino'

export type { Logger } from 'pino'

const env = process.env.NODE_ENV
const isProduction = env === 'production'
const isTest = env === 'test'

/**
 * Base logger instance
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug'),
  transport:
    !isProduction && !isTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:HH:MM:ss',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
})

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): pino.Logger {
  return baseLogger.child({ component })
}

/**
 * Get the base logger
 */
export function getLogger(): pino.Logger {
  return baseLogger
}
