/**
 * Transactional session client for the Stardog HTTP API
 *
 * @example
 * ```typescript
 * import { Connection, content, ContentTypes } from 'stardog-session'
 *
 * const conn = await Connection.open({ database: 'starwars' })
 * try {
 *   await conn.transaction(async (tx) => {
 *     await tx.add(content.file('data/starwars.ttl'))
 *   })
 *
 *   const luke = await conn.select('select * { ?s :name ?name }', {
 *     bindings: { name: '"Luke Skywalker"' },
 *   })
 * } finally {
 *   await conn.close()
 * }
 * ```
 */

// Session
export {
  Connection,
  type ExportOptions,
  type SessionState,
} from './session/connection'
export type { BodyOptions, SessionContext } from './session/context'

// Sub-resources
export { DocumentStore } from './resources/docs'
export { ICV, type ViolationRecord, type ValidationOptions } from './resources/icv'
export { VersionControl, versionIri, VERSION_IRI_PREFIX } from './resources/vcs'
export { GraphQL, SCHEMA_VARIABLE } from './resources/graphql'

// Queries
export { QueryDispatcher, encodeParameters, type PreparedQuery, type QueryTarget } from './query/dispatcher'
export type {
  BindingRow,
  GraphQueryOptions,
  QueryKind,
  QueryOptions,
  QueryResult,
  RdfTerm,
  ResultOf,
  SparqlBindings,
} from './query/types'

// Streaming
export { StreamedBody, withStream, DEFAULT_CHUNK_SIZE } from './stream/streamed-body'

// Content
export {
  content,
  resolveContent,
  ContentTypes,
  guessContentType,
  type Content,
  type ContentType,
  type FileContent,
  type RawContent,
  type ResolvedContent,
  type UrlContent,
} from './content'

// Configuration, auth and logging
export {
  configFromEnv,
  resolveConfig,
  DEFAULT_ENDPOINT,
  DEFAULT_TIMEOUT,
  type ConnectionConfig,
  type ResolvedConnectionConfig,
} from './config'
export { auth, authorizationHeader } from './auth'
export { createLogger, type Logger } from './logging/logger'
export type { AuthToken, LoggingConfig, LogLevel } from './types'

// Transport and errors
export * from './client'

export const VERSION = '0.1.0'
