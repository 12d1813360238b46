/** Media types used by the Stardog HTTP API */
export const ContentTypes = {
  // RDF formats
  TURTLE: 'text/turtle',
  NTRIPLES: 'application/n-triples',
  NQUADS: 'application/n-quads',
  RDFXML: 'application/rdf+xml',
  JSONLD: 'application/ld+json',
  TRIG: 'application/trig',
  TRIX: 'application/trix',
  N3: 'text/n3',

  // Query results and requests
  SPARQL_RESULTS_JSON: 'application/sparql-results+json',
  BOOLEAN: 'text/boolean',
  FORM: 'application/x-www-form-urlencoded',

  // Generic
  JSON: 'application/json',
  TEXT: 'text/plain',
  GRAPHQL: 'application/graphql',
  OCTET_STREAM: 'application/octet-stream',
} as const

export type ContentType = (typeof ContentTypes)[keyof typeof ContentTypes]

const EXTENSION_TYPES: Record<string, string> = {
  ttl: ContentTypes.TURTLE,
  rdf: ContentTypes.RDFXML,
  owl: ContentTypes.RDFXML,
  xml: ContentTypes.RDFXML,
  nt: ContentTypes.NTRIPLES,
  nq: ContentTypes.NQUADS,
  trig: ContentTypes.TRIG,
  trix: ContentTypes.TRIX,
  jsonld: ContentTypes.JSONLD,
  n3: ContentTypes.N3,
  txt: ContentTypes.TEXT,
  json: ContentTypes.JSON,
  graphql: ContentTypes.GRAPHQL,
  gql: ContentTypes.GRAPHQL,
  csv: 'text/csv',
  pdf: 'application/pdf',
  html: 'text/html',
}

const EXTENSION_ENCODINGS: Record<string, string> = {
  gz: 'gzip',
  bz2: 'bzip2',
  zip: 'zip',
}

/**
 * Guess media type and content encoding from a file name, e.g.
 * `data.ttl.gz` gives `{ contentType: 'text/turtle', contentEncoding: 'gzip' }`.
 */
export function guessContentType(fileName: string): {
  contentType?: string
  contentEncoding?: string
} {
  const segments = fileName.toLowerCase().split('/').pop()?.split('.') ?? []
  if (segments.length < 2) {
    return {}
  }

  let extension = segments[segments.length - 1]
  let contentEncoding: string | undefined
  if (extension in EXTENSION_ENCODINGS && segments.length > 2) {
    contentEncoding = EXTENSION_ENCODINGS[extension]
    extension = segments[segments.length - 2]
  }

  return { contentType: EXTENSION_TYPES[extension], contentEncoding }
}
