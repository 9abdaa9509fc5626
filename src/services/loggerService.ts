/**
 * Logger Service
 *
 * Structured logging over electron-log's Node entry:
 * - file transport at <dataDir>/logs/main.log (10MB)
 * - level from SERMON_CAPTURE_LOG_LEVEL, else from NODE_ENV (silent under test)
 * - messages prefixed with module, sermon and chunk when the context has them
 */

import log from 'electron-log/node'
import path from 'path'
import { getDataDir } from './dataPaths'

export const LOG_LEVEL_ENV = 'SERMON_CAPTURE_LOG_LEVEL'

type TransportLevel = 'error' | 'warn' | 'info' | 'debug' | false

const LEVELS: ReadonlyArray<Exclude<TransportLevel, false>> = ['error', 'warn', 'info', 'debug']

function resolveLevel(): TransportLevel {
  const requested = process.env[LOG_LEVEL_ENV]?.trim().toLowerCase()
  const match = LEVELS.find(level => level === requested)
  if (match) return match
  if (requested === 'off') return false

  switch (process.env.NODE_ENV) {
    case 'test':
      return false
    case 'development':
      return 'debug'
    default:
      return 'info'
  }
}

const setupLogger = () => {
  const logPath = path.join(getDataDir(), 'logs')
  const level = resolveLevel()

  log.transports.file.resolvePathFn = () => path.join(logPath, 'main.log')
  log.transports.file.format = '[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {text}'
  log.transports.file.maxSize = 10 * 1024 * 1024
  log.transports.file.level = level

  log.transports.console.format = '[{level}] {text}'
  log.transports.console.level = level

  return log
}

const logger = setupLogger()

export interface LogContext {
  module?: string
  sermonId?: string
  chunkIndex?: number
  [key: string]: unknown
}

/**
 * "[Module] <sermon 1a2b3c4d #2> "
 */
function formatContext(context?: LogContext): string {
  if (!context) return ''
  const parts: string[] = []
  if (context.module) parts.push(`[${context.module}]`)
  if (context.sermonId) {
    const chunk = context.chunkIndex === undefined ? '' : ` #${context.chunkIndex}`
    parts.push(`<sermon ${context.sermonId.slice(0, 8)}${chunk}>`)
  }
  return parts.length > 0 ? parts.join(' ') + ' ' : ''
}

export interface ScopedLogger {
  error: (message: string, errorOrContext?: Error | LogContext, context?: LogContext) => void
  warn: (message: string, context?: LogContext) => void
  info: (message: string, context?: LogContext) => void
  debug: (message: string, context?: LogContext) => void
  startOperation: (operation: string, context?: LogContext) => void
  endOperation: (operation: string, startTime: number, context?: LogContext) => void
}

export const loggerService = {
  /**
   * Error objects contribute their message and stack to the context
   */
  error: (message: string, errorOrContext?: Error | LogContext, context?: LogContext) => {
    if (errorOrContext instanceof Error) {
      logger.error(`${formatContext(context)}${message}`, {
        ...context,
        error: errorOrContext.message,
        stack: errorOrContext.stack
      })
    } else {
      logger.error(`${formatContext(errorOrContext)}${message}`, errorOrContext ?? {})
    }
  },

  warn: (message: string, context?: LogContext) => {
    logger.warn(`${formatContext(context)}${message}`, context ?? {})
  },

  info: (message: string, context?: LogContext) => {
    logger.info(`${formatContext(context)}${message}`, context ?? {})
  },

  debug: (message: string, context?: LogContext) => {
    logger.debug(`${formatContext(context)}${message}`, context ?? {})
  },

  startOperation: (operation: string, context?: LogContext) => {
    logger.info(`${formatContext(context)}Starting: ${operation}`, context ?? {})
  },

  endOperation: (operation: string, startTime: number, context?: LogContext) => {
    const duration = Date.now() - startTime
    logger.info(`${formatContext(context)}Completed: ${operation} (${duration}ms)`, { ...context, duration })
  },

  scope: (moduleName: string): ScopedLogger => ({
    error: (message, errorOrContext, context) => {
      if (errorOrContext instanceof Error) {
        loggerService.error(message, errorOrContext, { ...context, module: moduleName })
      } else {
        loggerService.error(message, { ...errorOrContext, ...context, module: moduleName })
      }
    },
    warn: (message, context) => loggerService.warn(message, { ...context, module: moduleName }),
    info: (message, context) => loggerService.info(message, { ...context, module: moduleName }),
    debug: (message, context) => loggerService.debug(message, { ...context, module: moduleName }),
    startOperation: (operation, context) => loggerService.startOperation(operation, { ...context, module: moduleName }),
    endOperation: (operation, startTime, context) =>
      loggerService.endOperation(operation, startTime, { ...context, module: moduleName })
  })
}
