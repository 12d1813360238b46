import type { HttpClient, RequestOptions } from '../client/http-client'
import type { Logger } from '../logging/logger'
import type { QueryDispatcher } from '../query/dispatcher'
import type { StreamedBody } from '../stream/streamed-body'

/**
 * What sub-resource facades need from the connection they are bound to
 */
export interface SessionContext {
  readonly http: HttpClient
  readonly dispatcher: QueryDispatcher
  readonly logger: Logger
  /** `/{database}`, URL encoded */
  readonly databasePath: string
  /** Id of the active transaction, undefined outside one */
  readonly activeTransactionId: string | undefined
  /** Throw a usage error unless the connection can take a request */
  ensureUsable(operation: string): void
  /** Open a streamed body, counted against the connection's single stream slot */
  openStream(path: string, options: RequestOptions, chunkSize?: number): Promise<StreamedBody>
}

/**
 * Buffered or streamed body retrieval
 */
export interface BodyOptions {
  stream?: boolean
  /** Chunk size in bytes for streamed bodies */
  chunkSize?: number
}
