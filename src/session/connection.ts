/**
 * Stardog Connection
 *
 * A Connection is a stateful session over the stateless HTTP API. It owns the
 * transaction id of the bound database and threads it through every request.
 */

import { HttpClient, type RequestOptions } from '../client/http-client'
import {
  ConnectionClosedError,
  IndeterminateTransactionError,
  StardogClientError,
  TransactionError,
  TransactionStateError,
  UsageError,
} from '../client/errors'
import { parseCount } from '../client/decode'
import { resolveConfig, type ConnectionConfig } from '../config'
import { resolveContent, ContentTypes, type Content } from '../content'
import { createLogger, type Logger } from '../logging/logger'
import { QueryDispatcher } from '../query/dispatcher'
import type {
  GraphQueryOptions,
  QueryKind,
  QueryOptions,
  ResultOf,
  SparqlBindings,
} from '../query/types'
import { DEFAULT_CHUNK_SIZE, StreamedBody } from '../stream/streamed-body'
import { DocumentStore } from '../resources/docs'
import { GraphQL } from '../resources/graphql'
import { ICV } from '../resources/icv'
import { VersionControl } from '../resources/vcs'
import type { BodyOptions, SessionContext } from './context'

export type SessionState = 'inactive' | 'active' | 'indeterminate' | 'closed'

type TransactionStatus =
  | { state: 'inactive' }
  | { state: 'active'; transactionId: string }
  | { state: 'indeterminate'; transactionId: string }
  | { state: 'closed' }

type Transition = 'begin' | 'commit' | 'rollback'

/**
 * Options for export()
 */
export interface ExportOptions extends BodyOptions {
  /** RDF serialization (default Turtle) */
  contentType?: string
  /** Export a single named graph */
  graphUri?: string
}

/**
 * Connection to a single database
 *
 * @example
 * ```typescript
 * const conn = await Connection.open({ database: 'music' })
 * try {
 *   await conn.begin()
 *   await conn.add(content.raw('<urn:s> <urn:p> <urn:o> .', ContentTypes.TURTLE))
 *   await conn.commit()
 *
 *   const rows = await conn.select('select * { ?s ?p ?o }')
 * } finally {
 *   await conn.close()
 * }
 * ```
 */
export class Connection implements SessionContext {
  readonly http: HttpClient
  readonly dispatcher: QueryDispatcher
  readonly logger: Logger
  readonly database: string
  readonly databasePath: string
  private status: TransactionStatus = { state: 'inactive' }
  private transition: Transition | null = null
  private activeStream: StreamedBody | null = null
  private openingStream = false
  private pendingMutations = 0

  /**
   * Create a connection without contacting the server. Prefer Connection.open().
   */
  constructor(config: ConnectionConfig) {
    const resolved = resolveConfig(config)
    if (!resolved.database) {
      throw new UsageError('A database name is required')
    }

    this.logger = createLogger(resolved.logging)
    this.http = new HttpClient({
      baseUrl: resolved.endpoint,
      auth: resolved.auth,
      fetch: resolved.fetch,
      timeout: resolved.timeout,
      headers: resolved.headers,
      logger: this.logger,
    })
    this.dispatcher = new QueryDispatcher(this.http)
    this.database = resolved.database
    this.databasePath = `/${encodeURIComponent(resolved.database)}`
  }

  /**
   * Create a connection and check that the server is alive
   */
  static async open(config: ConnectionConfig): Promise<Connection> {
    const connection = new Connection(config)
    await connection.verifyConnectivity()
    return connection
  }

  get state(): SessionState {
    return this.status.state
  }

  /**
   * Id of the active transaction, or of the one whose commit ended indeterminate
   */
  get transactionId(): string | undefined {
    return this.status.state === 'active' || this.status.state === 'indeterminate'
      ? this.status.transactionId
      : undefined
  }

  get activeTransactionId(): string | undefined {
    return this.status.state === 'active' ? this.status.transactionId : undefined
  }

  get isOpen(): boolean {
    return this.status.state !== 'closed'
  }

  /**
   * Liveness check against the server
   */
  async verifyConnectivity(): Promise<void> {
    this.ensureUsable('verify connectivity')
    await this.http.text('/admin/alive')
  }

  // ---------------------------------------------------------------------------
  // Transactions
  // ---------------------------------------------------------------------------

  /**
   * Start a transaction. Allowed when no transaction is active, including
   * after a commit ended indeterminate.
   *
   * @returns the server issued transaction id
   */
  async begin(): Promise<string> {
    this.ensureUsable('begin')
    if (this.status.state === 'active') {
      throw new TransactionError(this.status.transactionId)
    }

    this.transition = 'begin'
    try {
      const transactionId = (
        await this.http.text(`${this.databasePath}/transaction/begin`, {
          method: 'POST',
          accept: ContentTypes.TEXT,
        })
      ).trim()

      if (!transactionId) {
        throw new StardogClientError('Server returned an empty transaction id', 'UNEXPECTED_RESPONSE')
      }

      this.status = { state: 'active', transactionId }
      this.logger.debug(`Began transaction ${transactionId} on ${this.database}`)
      return transactionId
    } finally {
      this.transition = null
    }
  }

  /**
   * Commit the active transaction. If the commit request fails the session
   * becomes indeterminate and IndeterminateTransactionError is thrown: the
   * data may or may not have been persisted.
   */
  async commit(): Promise<void> {
    const transactionId = this.requireTransaction('commit')
    this.ensureNoMutations('commit')

    this.transition = 'commit'
    try {
      await this.http.text(
        `${this.databasePath}/transaction/commit/${encodeURIComponent(transactionId)}`,
        { method: 'POST' }
      )
      this.status = { state: 'inactive' }
      this.logger.debug(`Committed transaction ${transactionId}`)
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error))
      this.status = { state: 'indeterminate', transactionId }
      this.logger.error(`Commit of transaction ${transactionId} failed, outcome unknown: ${cause.message}`)
      throw new IndeterminateTransactionError(transactionId, cause)
    } finally {
      this.transition = null
    }
  }

  /**
   * Discard the active transaction. The local transaction is cleared even if
   * the server call fails; the failure is still thrown.
   */
  async rollback(): Promise<void> {
    const transactionId = this.requireTransaction('rollback')
    this.ensureNoMutations('rollback')

    this.transition = 'rollback'
    try {
      await this.http.text(
        `${this.databasePath}/transaction/rollback/${encodeURIComponent(transactionId)}`,
        { method: 'POST' }
      )
      this.logger.debug(`Rolled back transaction ${transactionId}`)
    } finally {
      this.status = { state: 'inactive' }
      this.transition = null
    }
  }

  /**
   * Run `work` inside a transaction: commit when it resolves, roll back when
   * it throws. Nothing is retried.
   */
  async transaction<T>(work: (connection: this) => Promise<T>): Promise<T> {
    await this.begin()

    let result: T
    try {
      result = await work(this)
    } catch (error) {
      if (this.status.state === 'active' && this.transition === null) {
        try {
          await this.rollback()
        } catch (rollbackError) {
          this.logger.warn(
            `Rollback after failed transaction work also failed: ${
              rollbackError instanceof Error ? rollbackError.message : String(rollbackError)
            }`
          )
        }
      }
      throw error
    }

    await this.commit()
    return result
  }

  // ---------------------------------------------------------------------------
  // Graph mutation
  // ---------------------------------------------------------------------------

  /**
   * Add RDF data. Requires an active transaction.
   */
  async add(source: Content): Promise<void> {
    await this.mutate('add', source)
  }

  /**
   * Remove RDF data. Requires an active transaction.
   */
  async remove(source: Content): Promise<void> {
    await this.mutate('remove', source)
  }

  /**
   * Remove every statement, or only those of one named graph. Requires an
   * active transaction.
   */
  async clear(graphUri?: string): Promise<void> {
    const transactionId = this.requireTransaction('clear')
    this.pendingMutations++
    try {
      await this.http.text(`${this.databasePath}/${encodeURIComponent(transactionId)}/clear`, {
        method: 'POST',
        params: { 'graph-uri': graphUri },
      })
    } finally {
      this.pendingMutations--
    }
  }

  private async mutate(operation: 'add' | 'remove', source: Content): Promise<void> {
    const transactionId = this.requireTransaction(operation)
    this.pendingMutations++
    try {
      const resolved = await resolveContent(source, this.http.fetchImplementation)
      await this.http.text(
        `${this.databasePath}/${encodeURIComponent(transactionId)}/${operation}`,
        {
          method: 'POST',
          body: resolved.body,
          contentType: resolved.contentType,
          contentEncoding: resolved.contentEncoding,
          params: { 'graph-uri': resolved.graphUri },
        }
      )
    } finally {
      this.pendingMutations--
    }
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /**
   * Number of statements in the database. Does not take part in transactions.
   */
  async size(options: { exact?: boolean } = {}): Promise<number> {
    this.ensureUsable('size')
    const text = await this.http.text(`${this.databasePath}/size`, {
      accept: ContentTypes.TEXT,
      params: { exact: options.exact },
    })
    return parseCount(text)
  }

  /**
   * Dump the database. Buffered by default; with `stream: true` the caller
   * gets a StreamedBody and must close it (or iterate it to the end).
   */
  export(options?: ExportOptions & { stream?: false }): Promise<string>
  export(options: ExportOptions & { stream: true }): Promise<StreamedBody>
  async export(options: ExportOptions = {}): Promise<string | StreamedBody> {
    this.ensureUsable('export')
    const path = `${this.databasePath}/export`
    const request: RequestOptions = {
      accept: options.contentType ?? ContentTypes.TURTLE,
      params: { 'graph-uri': options.graphUri },
    }

    if (options.stream) {
      return this.openStream(path, request, options.chunkSize)
    }
    return this.http.text(path, request)
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  /**
   * Run a query of the given kind and get the tagged result. Inside a
   * transaction the query sees the transaction's uncommitted changes.
   */
  async query<K extends QueryKind>(
    kind: K,
    query: string,
    options: GraphQueryOptions = {}
  ): Promise<ResultOf<K>> {
    this.ensureUsable(kind)
    return this.dispatcher.dispatch(kind, query, options, {
      basePath: this.databasePath,
      transactionId: this.activeTransactionId,
    })
  }

  async select(query: string, options: QueryOptions = {}): Promise<SparqlBindings> {
    return (await this.query('select', query, options)).bindings
  }

  async paths(query: string, options: QueryOptions = {}): Promise<SparqlBindings> {
    return (await this.query('paths', query, options)).bindings
  }

  async ask(query: string, options: QueryOptions = {}): Promise<boolean> {
    return (await this.query('ask', query, options)).boolean
  }

  /**
   * Run a construct/describe query
   *
   * @returns the RDF document in the requested serialization
   */
  async graph(query: string, options: GraphQueryOptions = {}): Promise<string> {
    return (await this.query('graph', query, options)).document
  }

  /**
   * Run a SPARQL update. Outside a transaction the server commits it on its own.
   */
  async update(query: string, options: QueryOptions = {}): Promise<void> {
    await this.query('update', query, options)
  }

  /**
   * Get the query plan
   */
  async explain(query: string, options: QueryOptions = {}): Promise<string> {
    return (await this.query('explain', query, options)).plan
  }

  // ---------------------------------------------------------------------------
  // Sub-resources
  // ---------------------------------------------------------------------------

  docs(): DocumentStore {
    this.ensureUsable('docs')
    return new DocumentStore(this)
  }

  icv(): ICV {
    this.ensureUsable('icv')
    return new ICV(this)
  }

  versioning(): VersionControl {
    this.ensureUsable('versioning')
    return new VersionControl(this)
  }

  graphql(): GraphQL {
    this.ensureUsable('graphql')
    return new GraphQL(this)
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  /**
   * Close the connection: close an open stream, roll back an open
   * transaction (a failure is logged, not thrown) and refuse further use.
   */
  async close(): Promise<void> {
    if (this.status.state === 'closed') {
      return
    }
    if (this.transition !== null) {
      throw new UsageError(`Cannot close while ${this.transition} is in progress`)
    }
    this.ensureNoMutations('close')

    try {
      if (this.activeStream) {
        await this.activeStream.close()
      }
      if (this.status.state === 'active') {
        const transactionId = this.status.transactionId
        try {
          await this.rollback()
        } catch (error) {
          this.logger.warn(
            `Rollback of transaction ${transactionId} on close failed: ${
              error instanceof Error ? error.message : String(error)
            }`
          )
        }
      }
    } finally {
      this.status = { state: 'closed' }
    }
  }

  // ---------------------------------------------------------------------------
  // Session context
  // ---------------------------------------------------------------------------

  ensureUsable(operation: string): void {
    if (this.status.state === 'closed') {
      throw new ConnectionClosedError(operation)
    }
    if (this.transition !== null) {
      throw new UsageError(`Cannot ${operation} while ${this.transition} is in progress`)
    }
  }

  async openStream(
    path: string,
    options: RequestOptions,
    chunkSize: number = DEFAULT_CHUNK_SIZE
  ): Promise<StreamedBody> {
    this.ensureUsable('open a stream')
    if (this.activeStream || this.openingStream) {
      throw new UsageError('Another streamed body is open on this connection; close it first')
    }
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new UsageError(`Chunk size must be a positive integer, got ${chunkSize}`)
    }

    this.openingStream = true
    try {
      const handle = await this.http.openStream(path, options)
      if (this.status.state === 'closed') {
        await handle.release()
        throw new ConnectionClosedError('open a stream')
      }
      const body = new StreamedBody(handle, chunkSize, () => {
        if (this.activeStream === body) {
          this.activeStream = null
        }
      })
      this.activeStream = body
      return body
    } finally {
      this.openingStream = false
    }
  }

  private ensureNoMutations(operation: string): void {
    if (this.pendingMutations > 0) {
      throw new UsageError(`Cannot ${operation} while a mutation is in progress`)
    }
  }

  /**
   * Check that a transaction is active and nothing else is in flight
   */
  private requireTransaction(operation: string): string {
    this.ensureUsable(operation)
    if (this.status.state !== 'active') {
      throw new TransactionStateError(operation, this.status.state, 'active')
    }
    return this.status.transactionId
  }
}

