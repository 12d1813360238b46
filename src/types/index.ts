/**
 * Shared types
 */

// Auth token types
export interface AuthToken {
  scheme: 'basic' | 'bearer' | (string & {})
  principal?: string
  credentials?: string
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug'

// Logging configuration
export interface LoggingConfig {
  level: LogLevel
  logger?: (level: LogLevel, message: string) => void
}
