import type { LoggingConfig, LogLevel } from '../types'

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
}

export interface Logger {
  error(message: string): void
  warn(message: string): void
  info(message: string): void
  debug(message: string): void
}

/**
 * Create a logger that forwards messages at or above the configured level
 * to the user supplied callback. Without a callback nothing is logged.
 */
export function createLogger(config?: LoggingConfig): Logger {
  const sink = config?.logger
  const threshold = LEVEL_ORDER[config?.level ?? 'info']

  const log = (level: LogLevel, message: string) => {
    if (sink && LEVEL_ORDER[level] <= threshold) {
      sink(level, message)
    }
  }

  return {
    error: (message) => log('error', message),
    warn: (message) => log('warn', message),
    info: (message) => log('info', message),
    debug: (message) => log('debug', message),
  }
}
