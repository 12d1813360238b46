/**
 * Connection configuration
 */

import { z } from 'zod'
import { auth } from '../auth'
import type { AuthToken, LoggingConfig } from '../types'

export const DEFAULT_ENDPOINT = 'http://localhost:5820'
export const DEFAULT_TIMEOUT = 30000

/**
 * Configuration for a Connection
 */
export interface ConnectionConfig {
  /** Database the connection is bound to */
  database: string
  /** Server URL (default http://localhost:5820) */
  endpoint?: string
  /** Credentials (default basic admin/admin) */
  auth?: AuthToken
  /** Custom fetch implementation (for environments without global fetch) */
  fetch?: typeof fetch
  /** Request timeout in milliseconds */
  timeout?: number
  /** Additional headers to send with each request */
  headers?: Record<string, string>
  logging?: LoggingConfig
}

export type ResolvedConnectionConfig = Required<
  Pick<ConnectionConfig, 'database' | 'endpoint' | 'auth' | 'timeout' | 'headers'>
> &
  Pick<ConnectionConfig, 'fetch' | 'logging'>

/**
 * Fill in defaults
 */
export function resolveConfig(config: ConnectionConfig): ResolvedConnectionConfig {
  return {
    database: config.database,
    endpoint: config.endpoint ?? DEFAULT_ENDPOINT,
    auth: config.auth ?? auth.basic('admin', 'admin'),
    timeout: config.timeout ?? DEFAULT_TIMEOUT,
    headers: config.headers ?? {},
    fetch: config.fetch,
    logging: config.logging,
  }
}

const envSchema = z.object({
  STARDOG_ENDPOINT: z.string().url().default(DEFAULT_ENDPOINT),
  STARDOG_DATABASE: z.string().min(1),
  STARDOG_USERNAME: z.string().default('admin'),
  STARDOG_PASSWORD: z.string().default('admin'),
  STARDOG_TIMEOUT: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT),
})

/**
 * Build a configuration from environment variables. Throws a ZodError
 * naming the offending variable when one is missing or malformed.
 */
export function configFromEnv(
  env: Record<string, string | undefined> = process.env
): ConnectionConfig {
  const parsed = envSchema.parse(env)
  return {
    database: parsed.STARDOG_DATABASE,
    endpoint: parsed.STARDOG_ENDPOINT,
    auth: auth.basic(parsed.STARDOG_USERNAME, parsed.STARDOG_PASSWORD),
    timeout: parsed.STARDOG_TIMEOUT,
  }
}
