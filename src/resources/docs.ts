/**
 * Document store (BITES) of a database. Documents are stored outside the RDF
 * transaction boundary, so none of these calls need a transaction.
 */

import { parseCount } from '../client/decode'
import { resolveContent, type Content } from '../content'
import { ContentTypes } from '../content/content-types'
import type { BodyOptions, SessionContext } from '../session/context'
import type { StreamedBody } from '../stream/streamed-body'

export class DocumentStore {
  private readonly session: SessionContext

  constructor(session: SessionContext) {
    this.session = session
  }

  private get path(): string {
    return `${this.session.databasePath}/docs`
  }

  private documentPath(name: string): string {
    return `${this.path}/${encodeURIComponent(name)}`
  }

  /**
   * Number of stored documents
   */
  async size(): Promise<number> {
    this.session.ensureUsable('count documents')
    return parseCount(await this.session.http.text(`${this.path}/size`, { accept: ContentTypes.TEXT }))
  }

  /**
   * Store a document under `name`, replacing any document of that name
   */
  async add(name: string, source: Content): Promise<void> {
    this.session.ensureUsable('add document')
    const resolved = await resolveContent(source, this.session.http.fetchImplementation)

    const form = new FormData()
    form.append('upload', new Blob([resolved.body], { type: resolved.contentType }), name)

    await this.session.http.text(this.path, { method: 'POST', body: form })
    this.session.logger.debug(`Stored document ${name}`)
  }

  /**
   * Fetch a document. Buffered by default; with `stream: true` a StreamedBody
   * that the caller must close (or read to the end).
   */
  get(name: string, options?: BodyOptions & { stream?: false }): Promise<string>
  get(name: string, options: BodyOptions & { stream: true }): Promise<StreamedBody>
  async get(name: string, options: BodyOptions = {}): Promise<string | StreamedBody> {
    this.session.ensureUsable('get document')
    if (options.stream) {
      return this.session.openStream(this.documentPath(name), {}, options.chunkSize)
    }
    return this.session.http.text(this.documentPath(name))
  }

  async delete(name: string): Promise<void> {
    this.session.ensureUsable('delete document')
    await this.session.http.text(this.documentPath(name), { method: 'DELETE' })
    this.session.logger.debug(`Deleted document ${name}`)
  }

  /**
   * Remove every document
   */
  async clear(): Promise<void> {
    this.session.ensureUsable('clear documents')
    await this.session.http.text(this.path, { method: 'DELETE' })
  }
}
