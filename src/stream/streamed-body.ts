/**
 * Scoped, forward-only view over an open response body.
 *
 * A StreamedBody yields fixed-size byte chunks (the last one may be shorter)
 * and gives its transport handle back exactly once: when iteration runs out,
 * when iteration stops early (break or throw), or when close() is called.
 */

import type { StreamHandle } from '../client/http-client'
import { StreamClosedError, UsageError } from '../client/errors'

export const DEFAULT_CHUNK_SIZE = 10240

export class StreamedBody implements AsyncIterable<Uint8Array> {
  readonly chunkSize: number
  private readonly handle: StreamHandle
  private readonly onClose?: () => void
  private _closed = false
  private started = false
  private exhausted = false
  private pending: Uint8Array = new Uint8Array(0)
  private offset = 0

  /**
   * @param onClose - invoked once after the handle has been released
   */
  constructor(handle: StreamHandle, chunkSize: number = DEFAULT_CHUNK_SIZE, onClose?: () => void) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new UsageError(`Chunk size must be a positive integer, got ${chunkSize}`)
    }
    this.handle = handle
    this.chunkSize = chunkSize
    this.onClose = onClose
  }

  get closed(): boolean {
    return this._closed
  }

  /**
   * Media type the server declared for the body
   */
  get contentType(): string | null {
    return this.handle.headers.get('content-type')
  }

  [Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    if (this._closed) {
      throw new StreamClosedError('iterate')
    }
    if (this.started) {
      throw new UsageError('A streamed body can only be iterated once')
    }
    this.started = true
    return this.chunks()
  }

  /**
   * Read the rest of the body as UTF-8 text and close the stream
   */
  async text(): Promise<string> {
    const decoder = new TextDecoder()
    let text = ''
    for await (const chunk of this) {
      text += decoder.decode(chunk, { stream: true })
    }
    return text + decoder.decode()
  }

  /**
   * Stop reading and release the underlying connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this._closed) {
      return
    }
    this._closed = true
    this.pending = new Uint8Array(0)
    this.offset = 0

    try {
      await this.handle.release()
    } finally {
      this.onClose?.()
    }
  }

  private async *chunks(): AsyncGenerator<Uint8Array, void, undefined> {
    try {
      while (true) {
        const chunk = await this.nextChunk()
        if (!chunk) {
          return
        }
        yield chunk
      }
    } finally {
      await this.close()
    }
  }

  private async nextChunk(): Promise<Uint8Array | undefined> {
    if (this._closed) {
      throw new StreamClosedError()
    }

    while (this.pending.length - this.offset < this.chunkSize && !this.exhausted) {
      const { done, value } = await this.handle.read()
      if (done) {
        this.exhausted = true
      } else {
        this.append(value)
      }
    }

    if (this.pending.length === this.offset) {
      return undefined
    }

    const end = Math.min(this.offset + this.chunkSize, this.pending.length)
    const chunk = this.pending.slice(this.offset, end)
    this.offset = end
    return chunk
  }

  private append(bytes: Uint8Array): void {
    const remaining = this.pending.subarray(this.offset)
    const merged = new Uint8Array(remaining.length + bytes.length)
    merged.set(remaining, 0)
    merged.set(bytes, remaining.length)
    this.pending = merged
    this.offset = 0
  }
}

/**
 * Run `scope` with the body and close it afterwards, whatever happens
 *
 * @example
 * ```typescript
 * const dump = await conn.export({ stream: true, chunkSize: 1024 })
 * await withStream(dump, async (body) => {
 *   for await (const chunk of body) {
 *     out.write(chunk)
 *   }
 * })
 * ```
 */
export async function withStream<T>(
  body: StreamedBody,
  scope: (body: StreamedBody) => Promise<T>
): Promise<T> {
  try {
    return await scope(body)
  } finally {
    await body.close()
  }
}
