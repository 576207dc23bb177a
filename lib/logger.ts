/**
 * Server-side logger for the growth tracker
 *
 * Provides structured console logging with:
 * - Categories for filtering (storage, records, reference, session, api)
 * - A minimum level taken from LOG_LEVEL (debug, info, warn, error)
 * - Timing utilities for blob round-trips
 * - Context (blob, container, event) for correlation
 */

// Log categories for filtering
export type LogCategory =
  | 'storage'
  | 'records'
  | 'reference'
  | 'session'
  | 'api'
  | 'general'

export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR'

// Context for log correlation
export interface LogContext {
  blob?: string
  container?: string
  event?: string
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARN: 30,
  ERROR: 40,
}

function minimumLevel(): LogLevel {
  switch ((process.env.LOG_LEVEL ?? '').toLowerCase()) {
    case 'debug':
      return 'DEBUG'
    case 'warn':
      return 'WARN'
    case 'error':
      return 'ERROR'
    default:
      return 'INFO'
  }
}

function formatContext(context?: LogContext): string {
  if (!context) return ''

  const parts: string[] = []
  if (context.blob) parts.push(`blob=${context.blob}`)
  if (context.container) parts.push(`container=${context.container}`)
  if (context.event) parts.push(`event=${context.event}`)

  return parts.length > 0 ? ' ' + parts.join(' ') : ''
}

// Truncates long strings so a CSV payload never floods the log
function formatData(data?: object): string {
  if (!data) return ''
  try {
    const truncated = JSON.stringify(data, (_key, value: unknown) => {
      if (value instanceof Error) {
        return value.message
      }
      if (typeof value === 'string' && value.length > 500) {
        return value.substring(0, 500) + '...[truncated]'
      }
      return value
    })
    return ` data=${truncated}`
  } catch {
    return ' data=[unserializable]'
  }
}

export function formatLogLine(
  level: LogLevel,
  category: LogCategory,
  message: string,
  context?: LogContext,
  data?: object,
  timestamp: string = new Date().toISOString()
): string {
  return `[${timestamp}] [${level}] [${category}] ${message}${formatContext(context)}${formatData(data)}`
}

function writeLog(
  level: LogLevel,
  category: LogCategory,
  message: string,
  context?: LogContext,
  data?: object
): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel()]) return

  const line = formatLogLine(level, category, message, context, data)
  if (level === 'ERROR') {
    console.error(line)
  } else if (level === 'WARN') {
    console.warn(line)
  } else {
    console.log(line)
  }
}

const timings: Map<string, number> = new Map()

export const logger = {
  debug(category: LogCategory, message: string, context?: LogContext, data?: object): void {
    writeLog('DEBUG', category, message, context, data)
  },

  info(category: LogCategory, message: string, context?: LogContext, data?: object): void {
    writeLog('INFO', category, message, context, data)
  },

  /**
   * Log warning message - for recovered conditions such as an unreadable records blob
   */
  warn(category: LogCategory, message: string, context?: LogContext, data?: object): void {
    writeLog('WARN', category, message, context, data)
  },

  error(category: LogCategory, message: string, context?: LogContext, data?: object): void {
    writeLog('ERROR', category, message, context, data)
  },

  /**
   * Start a timing measurement
   * @param label - Unique label for this timing
   */
  time(label: string): void {
    timings.set(label, Date.now())
  },

  /**
   * End a timing measurement and log it at debug level
   * @returns the elapsed milliseconds, or 0 when the timer was never started
   */
  timeEnd(label: string, category: LogCategory, message: string, context?: LogContext): number {
    const startTime = timings.get(label)
    if (startTime === undefined) {
      logger.warn(category, `Timer "${label}" not found`, context)
      return 0
    }

    const duration = Date.now() - startTime
    timings.delete(label)

    writeLog('DEBUG', category, `${message} (${duration}ms)`, context)
    return duration
  },
}
