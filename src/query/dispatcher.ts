/**
 * Query dispatch: picks endpoint and Accept header from the query kind,
 * encodes the options that were given, and decodes the response by kind.
 */

import { z } from 'zod'
import type { HttpClient, RequestOptions } from '../client/http-client'
import { StardogClientError, UsageError } from '../client/errors'
import { ContentTypes } from '../content/content-types'
import type { GraphQueryOptions, QueryKind, ResultOf, SparqlBindings } from './types'

/**
 * Where a query is sent: the database (or version history) base path and the
 * transaction to run in, if any
 */
export interface QueryTarget {
  /** e.g. `/mydb` or `/mydb/vcs` */
  basePath: string
  transactionId?: string
}

/**
 * A fully built request, before it is sent
 */
export interface PreparedQuery {
  path: string
  accept: string
  options: RequestOptions
}

type Endpoint = 'query' | 'update' | 'explain'

const ENDPOINTS: Record<QueryKind, Endpoint> = {
  select: 'query',
  ask: 'query',
  graph: 'query',
  paths: 'query',
  update: 'update',
  explain: 'explain',
}

const termSchema = z.object({
  type: z.enum(['uri', 'literal', 'bnode']),
  value: z.string(),
  datatype: z.string().optional(),
  'xml:lang': z.string().optional(),
})

const bindingsSchema = z.object({
  head: z.object({
    vars: z.array(z.string()),
    link: z.array(z.string()).optional(),
  }),
  results: z.object({
    bindings: z.array(z.record(termSchema)),
  }),
})

const booleanSchema = z.object({ boolean: z.boolean() })

type Decoders = {
  [K in QueryKind]: (response: Response, accept: string) => Promise<ResultOf<K>>
}

const DECODERS: Decoders = {
  select: async (response) => ({ kind: 'select', bindings: await decodeBindings(response) }),
  paths: async (response) => ({ kind: 'paths', bindings: await decodeBindings(response) }),
  ask: async (response) => ({ kind: 'ask', boolean: await decodeBoolean(response) }),
  graph: async (response, accept) => ({
    kind: 'graph',
    document: await response.text(),
    contentType: response.headers.get('content-type') ?? accept,
  }),
  update: async (response) => ({ kind: 'update', text: await response.text() }),
  explain: async (response) => ({ kind: 'explain', plan: await response.text() }),
}

export class QueryDispatcher {
  private readonly http: HttpClient

  constructor(http: HttpClient) {
    this.http = http
  }

  /**
   * Send a query and decode the answer for its kind. Server rejections
   * surface as StardogError and are never retried.
   */
  async dispatch<K extends QueryKind>(
    kind: K,
    query: string,
    options: GraphQueryOptions,
    target: QueryTarget
  ): Promise<ResultOf<K>> {
    const prepared = this.prepare(kind, query, options, target)
    return this.http.request(prepared.path, prepared.options, (response) =>
      DECODERS[kind](response, prepared.accept)
    )
  }

  /**
   * Build the request for a query without sending it
   */
  prepare(
    kind: QueryKind,
    query: string,
    options: GraphQueryOptions,
    target: QueryTarget
  ): PreparedQuery {
    const endpoint = ENDPOINTS[kind]
    // Plans are computed outside of transactions
    const path =
      target.transactionId && endpoint !== 'explain'
        ? `${target.basePath}/${encodeURIComponent(target.transactionId)}/${endpoint}`
        : `${target.basePath}/${endpoint}`
    const accept = acceptFor(kind, options)

    return {
      path,
      accept,
      options: {
        method: 'POST',
        accept,
        contentType: ContentTypes.FORM,
        body: encodeParameters(query, options).toString(),
      },
    }
  }
}

function acceptFor(kind: QueryKind, options: GraphQueryOptions): string {
  switch (kind) {
    case 'select':
    case 'paths':
      return ContentTypes.SPARQL_RESULTS_JSON
    case 'ask':
      return ContentTypes.BOOLEAN
    case 'graph':
      return options.contentType ?? ContentTypes.TURTLE
    case 'update':
    case 'explain':
      return ContentTypes.TEXT
  }
}

/**
 * Encode the query and whichever options were supplied. Omitted options are
 * left to the server's defaults.
 */
export function encodeParameters(query: string, options: GraphQueryOptions): URLSearchParams {
  const params = new URLSearchParams()
  params.set('query', query)

  if (options.baseUri !== undefined) {
    params.set('baseURI', options.baseUri)
  }
  if (options.reasoning !== undefined) {
    params.set('reasoning', String(options.reasoning))
  }
  if (options.offset !== undefined) {
    params.set('offset', String(nonNegativeInteger('offset', options.offset)))
  }
  if (options.limit !== undefined) {
    params.set('limit', String(nonNegativeInteger('limit', options.limit)))
  }
  if (options.timeout !== undefined) {
    params.set('timeout', String(nonNegativeInteger('timeout', options.timeout)))
  }
  for (const [name, value] of Object.entries(options.bindings ?? {})) {
    params.set(`$${name}`, value)
  }

  return params
}

function nonNegativeInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new UsageError(`${name} must be a non-negative integer, got ${value}`)
  }
  return value
}

async function decodeBindings(response: Response): Promise<SparqlBindings> {
  const text = await response.text()
  const parsed = bindingsSchema.safeParse(parseJson(text))
  if (!parsed.success) {
    throw unexpectedResponse('SPARQL JSON results', parsed.error.message)
  }
  return parsed.data
}

export async function decodeBoolean(response: Response): Promise<boolean> {
  const text = (await response.text()).trim()
  if (text === 'true' || text === 'false') {
    return text === 'true'
  }

  const parsed = booleanSchema.safeParse(parseJson(text))
  if (!parsed.success) {
    throw unexpectedResponse('a boolean result', text)
  }
  return parsed.data.boolean
}

function parseJson(text: string): unknown {
  try {
    const value: unknown = JSON.parse(text)
    return value
  } catch {
    // Left to the schema to reject
    return undefined
  }
}

function unexpectedResponse(expected: string, detail: string): StardogClientError {
  return new StardogClientError(
    `Expected ${expected} from the server: ${detail}`,
    'UNEXPECTED_RESPONSE'
  )
}
