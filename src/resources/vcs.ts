/**
 * Version control: queries over the version history and tag/revert
 * operations. None of these take part in the connection's transaction.
 */

import { ContentTypes } from '../content/content-types'
import type { QueryTarget } from '../query/dispatcher'
import type { GraphQueryOptions, QueryOptions, SparqlBindings } from '../query/types'
import type { SessionContext } from '../session/context'

export const VERSION_IRI_PREFIX = 'tag:stardog:api:versioning:version:'

export class VersionControl {
  private readonly session: SessionContext

  constructor(session: SessionContext) {
    this.session = session
  }

  private get path(): string {
    return `${this.session.databasePath}/vcs`
  }

  private target(operation: string): QueryTarget {
    this.session.ensureUsable(`versioning ${operation}`)
    return { basePath: this.path }
  }

  async select(query: string, options: QueryOptions = {}): Promise<SparqlBindings> {
    const result = await this.session.dispatcher.dispatch('select', query, options, this.target('select'))
    return result.bindings
  }

  async paths(query: string, options: QueryOptions = {}): Promise<SparqlBindings> {
    const result = await this.session.dispatcher.dispatch('paths', query, options, this.target('paths'))
    return result.bindings
  }

  async ask(query: string, options: QueryOptions = {}): Promise<boolean> {
    const result = await this.session.dispatcher.dispatch('ask', query, options, this.target('ask'))
    return result.boolean
  }

  async graph(query: string, options: GraphQueryOptions = {}): Promise<string> {
    const result = await this.session.dispatcher.dispatch('graph', query, options, this.target('graph'))
    return result.document
  }

  /**
   * Tag a revision. `revision` is a version id or a full version IRI.
   */
  async createTag(revision: string, name: string): Promise<void> {
    await this.post('tags/create', [versionIri(revision), name])
  }

  async deleteTag(name: string): Promise<void> {
    await this.post('tags/delete', [name])
  }

  /**
   * Revert the changes between two revisions as a new commit
   */
  async revert(fromRevision: string, toRevision: string, message: string): Promise<void> {
    await this.post('revert', [versionIri(toRevision), versionIri(fromRevision), message])
  }

  private async post(operation: string, values: string[]): Promise<void> {
    this.session.ensureUsable(`versioning ${operation}`)
    await this.session.http.text(`${this.path}/${operation}`, {
      method: 'POST',
      contentType: ContentTypes.TEXT,
      body: values.map((value) => JSON.stringify(value)).join(', '),
    })
    this.session.logger.debug(`Versioning ${operation} on ${this.session.databasePath}`)
  }
}

/**
 * Expand a bare version id to its IRI
 */
export function versionIri(revision: string): string {
  return revision.startsWith(VERSION_IRI_PREFIX) ? revision : `${VERSION_IRI_PREFIX}${revision}`
}
