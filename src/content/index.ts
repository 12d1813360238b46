/**
 * Content descriptors accepted by uploads (graph add/remove, documents,
 * constraints, GraphQL schemas)
 */

import { readFile } from 'node:fs/promises'
import { TransportError } from '../client/errors'
import { ContentTypes, guessContentType } from './content-types'

interface ContentBase {
  /** Media type; inferred from the file or URL name when omitted */
  contentType?: string
  contentEncoding?: string
  /** Target named graph for graph operations */
  graphUri?: string
}

export interface RawContent extends ContentBase {
  kind: 'raw'
  data: string
  contentType: string
}

export interface FileContent extends ContentBase {
  kind: 'file'
  path: string
}

export interface UrlContent extends ContentBase {
  kind: 'url'
  url: string
}

export type Content = RawContent | FileContent | UrlContent

/**
 * Bytes ready to be sent
 */
export interface ResolvedContent {
  body: string | ArrayBuffer
  contentType: string
  contentEncoding?: string
  graphUri?: string
}

type ContentOptions = Omit<ContentBase, 'contentType'>

function raw(data: string, contentType: string, options: ContentOptions = {}): RawContent {
  return { kind: 'raw', data, contentType, ...options }
}

function file(path: string, options: ContentBase = {}): FileContent {
  return { kind: 'file', path, ...options }
}

function url(location: string, options: ContentBase = {}): UrlContent {
  return { kind: 'url', url: location, ...options }
}

/**
 * Content descriptor factories
 *
 * @example
 * ```typescript
 * await conn.add(content.raw('<urn:s> <urn:p> <urn:o> .', ContentTypes.TURTLE))
 * await conn.add(content.file('data/people.ttl.gz', { graphUri: 'urn:people' }))
 * await conn.add(content.url('https://example.org/vocab.rdf'))
 * ```
 */
export const content = {
  raw,
  file,
  url,
}

/**
 * Turn a descriptor into bytes plus metadata. URL content is downloaded with
 * the given fetch implementation.
 */
export async function resolveContent(
  source: Content,
  fetchFn: typeof fetch = globalThis.fetch
): Promise<ResolvedContent> {
  switch (source.kind) {
    case 'raw':
      return {
        body: source.data,
        contentType: source.contentType,
        contentEncoding: source.contentEncoding,
        graphUri: source.graphUri,
      }
    case 'file': {
      const guessed = guessContentType(source.path)
      const data = await readFile(source.path)
      const body = new ArrayBuffer(data.byteLength)
      new Uint8Array(body).set(data)
      return {
        body,
        contentType: source.contentType ?? guessed.contentType ?? ContentTypes.OCTET_STREAM,
        contentEncoding: source.contentEncoding ?? guessed.contentEncoding,
        graphUri: source.graphUri,
      }
    }
    case 'url': {
      const response = await fetchFn(source.url)
      if (!response.ok) {
        throw new TransportError(
          `Failed to download ${source.url}: HTTP ${response.status}`,
          'CONTENT_FETCH_FAILED'
        )
      }
      const guessed = guessContentType(new URL(source.url).pathname)
      const served = response.headers.get('content-type')?.split(';')[0]?.trim()
      return {
        body: await response.arrayBuffer(),
        contentType:
          source.contentType ?? guessed.contentType ?? (served || ContentTypes.OCTET_STREAM),
        contentEncoding: source.contentEncoding ?? guessed.contentEncoding,
        graphUri: source.graphUri,
      }
    }
  }
}

export { ContentTypes, guessContentType, type ContentType } from './content-types'
