/**
 * Query request and result types
 */

export type QueryKind = 'select' | 'ask' | 'graph' | 'update' | 'paths' | 'explain'

/**
 * Options forwarded to the server. Only the options that are set are sent.
 */
export interface QueryOptions {
  /** Enable reasoning for this query */
  reasoning?: boolean
  /**
   * Pre-bound variables, keyed by variable name without `?`. Values are RDF
   * terms already in query syntax, e.g. `'"Luke Skywalker"'` or `'<urn:luke>'`.
   */
  bindings?: Record<string, string>
  offset?: number
  limit?: number
  /** Server side query timeout in milliseconds */
  timeout?: number
  baseUri?: string
}

export interface GraphQueryOptions extends QueryOptions {
  /** RDF serialization to ask for (default Turtle) */
  contentType?: string
}

/**
 * RDF term as found in SPARQL JSON results
 */
export interface RdfTerm {
  type: 'uri' | 'literal' | 'bnode'
  value: string
  datatype?: string
  'xml:lang'?: string
}

export type BindingRow = Record<string, RdfTerm>

/**
 * SPARQL JSON results for select and paths queries
 */
export interface SparqlBindings {
  head: {
    vars: string[]
    link?: string[]
  }
  results: {
    bindings: BindingRow[]
  }
}

export type QueryResult =
  | { kind: 'select'; bindings: SparqlBindings }
  | { kind: 'paths'; bindings: SparqlBindings }
  | { kind: 'ask'; boolean: boolean }
  | { kind: 'graph'; document: string; contentType: string }
  | { kind: 'update'; text: string }
  | { kind: 'explain'; plan: string }

export type ResultOf<K extends QueryKind> = Extract<QueryResult, { kind: K }>
