/**
 * Integrity constraint validation
 */

import { resolveContent, type Content, type ResolvedContent } from '../content'
import { ContentTypes } from '../content/content-types'
import { boundaryOf, parseMultipart } from '../client/multipart'
import { decodeBoolean } from '../query/dispatcher'
import type { SessionContext } from '../session/context'

/**
 * One violation explanation as returned by the server
 */
export interface ViolationRecord {
  /** Media type of the explanation, usually an RDF serialization */
  contentType?: string
  body: string
}

export interface ValidationOptions {
  /** Validate a single named graph instead of the whole database */
  graphUri?: string
}

/**
 * Validation and conversion run inside the connection's active transaction
 * when there is one. The persisted constraint set (add/remove/clear) is
 * managed independently of transactions.
 */
export class ICV {
  private readonly session: SessionContext

  constructor(session: SessionContext) {
    this.session = session
  }

  /**
   * Check the data against the constraints
   */
  async isValid(constraints: Content, options: ValidationOptions = {}): Promise<boolean> {
    return this.post('validate', constraints, options, ContentTypes.TEXT, decodeBoolean)
  }

  /**
   * Explain every violation of the constraints
   */
  async explainViolations(
    constraints: Content,
    options: ValidationOptions = {}
  ): Promise<ViolationRecord[]> {
    return this.post('violations', constraints, options, undefined, decodeViolations)
  }

  /**
   * Convert the constraints to the SPARQL queries the server validates with
   */
  async convert(constraints: Content, options: ValidationOptions = {}): Promise<string> {
    return this.post('convert', constraints, options, ContentTypes.TEXT, (response) => response.text())
  }

  /**
   * Add constraints to the database's persisted constraint set
   */
  async add(constraints: Content): Promise<void> {
    await this.manage('add', constraints)
  }

  /**
   * Remove constraints from the persisted constraint set
   */
  async remove(constraints: Content): Promise<void> {
    await this.manage('remove', constraints)
  }

  /**
   * Drop every persisted constraint
   */
  async clear(): Promise<void> {
    this.session.ensureUsable('clear constraints')
    await this.session.http.text(`${this.session.databasePath}/icv/clear`, { method: 'POST' })
    this.session.logger.debug(`Cleared integrity constraints of ${this.session.databasePath}`)
  }

  private async post<T>(
    operation: 'validate' | 'violations' | 'convert',
    constraints: Content,
    options: ValidationOptions,
    accept: string | undefined,
    decode: (response: Response) => Promise<T>
  ): Promise<T> {
    this.session.ensureUsable(`icv ${operation}`)
    const resolved = await this.resolve(constraints)
    const transactionId = this.session.activeTransactionId
    const base = transactionId
      ? `${this.session.databasePath}/${encodeURIComponent(transactionId)}`
      : this.session.databasePath

    return this.session.http.request(
      `${base}/icv/${operation}`,
      {
        method: 'POST',
        body: resolved.body,
        contentType: resolved.contentType,
        contentEncoding: resolved.contentEncoding,
        accept,
        params: { 'graph-uri': options.graphUri },
      },
      decode
    )
  }

  private async manage(operation: 'add' | 'remove', constraints: Content): Promise<void> {
    this.session.ensureUsable(`${operation} constraints`)
    const resolved = await this.resolve(constraints)
    await this.session.http.text(`${this.session.databasePath}/icv/${operation}`, {
      method: 'POST',
      body: resolved.body,
      contentType: resolved.contentType,
      contentEncoding: resolved.contentEncoding,
    })
    this.session.logger.debug(
      `Constraints ${operation === 'add' ? 'added to' : 'removed from'} ${this.session.databasePath}`
    )
  }

  private resolve(constraints: Content): Promise<ResolvedContent> {
    return resolveContent(constraints, this.session.http.fetchImplementation)
  }
}

async function decodeViolations(response: Response): Promise<ViolationRecord[]> {
  const contentType = response.headers.get('content-type')
  const boundary = boundaryOf(contentType)
  const text = await response.text()

  if (!boundary) {
    return text.trim() ? [{ contentType: contentType ?? undefined, body: text }] : []
  }

  return parseMultipart(text, boundary).map((part) => ({
    contentType: part.headers['content-type'],
    body: part.body,
  }))
}
