/**
 * GraphQL queries and schema management
 */

import { z } from 'zod'
import { StardogClientError, StardogError, UsageError } from '../client/errors'
import { resolveContent, type Content } from '../content'
import { ContentTypes } from '../content/content-types'
import type { SessionContext } from '../session/context'

/**
 * Variable that selects the schema a query runs against. It is stripped
 * from the variables before they are sent.
 */
export const SCHEMA_VARIABLE = '@schema'

const responseSchema = z.object({
  data: z.unknown().optional(),
  errors: z
    .array(z.object({ message: z.string() }).passthrough())
    .optional(),
})

const schemasSchema = z.object({
  schemas: z.array(z.string()),
})

export class GraphQL {
  private readonly session: SessionContext

  constructor(session: SessionContext) {
    this.session = session
  }

  private get path(): string {
    return `${this.session.databasePath}/graphql`
  }

  private schemaPath(name: string): string {
    return `${this.path}/schemas/${encodeURIComponent(name)}`
  }

  /**
   * Run a query and return its `data`. An `@schema` variable routes the
   * query to that named schema instead of the default one.
   *
   * @example
   * ```typescript
   * const humans = await gql.query('{ Human(id: $id) { name } }', { id: 1000, '@schema': 'characters' })
   * ```
   */
  async query(query: string, variables?: Record<string, unknown>): Promise<unknown> {
    this.session.ensureUsable('graphql query')

    const { [SCHEMA_VARIABLE]: selected, ...rest } = variables ?? {}
    let schema: string | undefined
    if (typeof selected === 'string') {
      schema = selected
    } else if (selected !== undefined) {
      throw new UsageError(`${SCHEMA_VARIABLE} must name a schema, got ${typeof selected}`)
    }

    const path = schema ? `${this.path}/${encodeURIComponent(schema)}` : this.path
    const body = variables ? { query, variables: rest } : { query }

    const parsed = responseSchema.safeParse(
      await this.session.http.json(path, {
        method: 'POST',
        contentType: ContentTypes.JSON,
        accept: ContentTypes.JSON,
        body: JSON.stringify(body),
      })
    )
    if (!parsed.success) {
      throw new StardogClientError(
        `Expected a GraphQL response from the server: ${parsed.error.message}`,
        'UNEXPECTED_RESPONSE'
      )
    }

    const { data, errors } = parsed.data
    if (errors && errors.length > 0 && data === undefined) {
      throw new StardogError(errors[0].message, 'GRAPHQL_ERROR', 200, errors)
    }
    return data
  }

  /**
   * Names of the installed schemas
   */
  async schemas(): Promise<string[]> {
    this.session.ensureUsable('list graphql schemas')
    const parsed = schemasSchema.safeParse(
      await this.session.http.json(`${this.path}/schemas`, { accept: ContentTypes.JSON })
    )
    if (!parsed.success) {
      throw new StardogClientError(
        `Expected a schema list from the server: ${parsed.error.message}`,
        'UNEXPECTED_RESPONSE'
      )
    }
    return parsed.data.schemas
  }

  /**
   * Source of a named schema
   */
  async schema(name: string): Promise<string> {
    this.session.ensureUsable('get graphql schema')
    return this.session.http.text(this.schemaPath(name), { accept: ContentTypes.GRAPHQL })
  }

  async addSchema(name: string, source: Content): Promise<void> {
    this.session.ensureUsable('add graphql schema')
    const resolved = await resolveContent(source, this.session.http.fetchImplementation)
    await this.session.http.text(this.schemaPath(name), {
      method: 'PUT',
      body: resolved.body,
      contentType: ContentTypes.GRAPHQL,
    })
    this.session.logger.debug(`Installed GraphQL schema ${name}`)
  }

  async removeSchema(name: string): Promise<void> {
    this.session.ensureUsable('remove graphql schema')
    await this.session.http.text(this.schemaPath(name), { method: 'DELETE' })
    this.session.logger.debug(`Removed GraphQL schema ${name}`)
  }

  async clearSchemas(): Promise<void> {
    this.session.ensureUsable('clear graphql schemas')
    await this.session.http.text(`${this.path}/schemas`, { method: 'DELETE' })
  }
}
