/**
 * Logger Utility
 *
 * pino with pretty-print in development and JSON in production. Silent
 * under the test runner unless LOG_LEVEL asks otherwise.
 */

import pino from 'pino'

const isDev = process.env.NODE_ENV !== 'production'
const isTest = process.env.VITEST !== undefined || process.env.NODE_ENV === 'test'

function defaultLevel(): string {
  if (isTest) return 'silent'
  return isDev ? 'debug' : 'info'
}

/**
 * Base logger instance
 */
const baseLogger = pino({
  level: process.env.LOG_LEVEL ?? defaultLevel(),
  transport:
    isDev && !isTest
      ? {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
          },
        }
      : undefined,
})

export type Logger = pino.Logger

/**
 * Create a child logger with a component name
 */
export function createLogger(component: string): Logger {
  return baseLogger.child({ component })
}
