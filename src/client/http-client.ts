/**
 * HTTP transport for the Stardog HTTP API
 * This is an internal module used by the connection and its facades
 */

import type { AuthToken } from '../types'
import { authorizationHeader } from '../auth'
import { createLogger, type Logger } from '../logging/logger'
import { createErrorFromResponse, NetworkError, StardogClientError, TimeoutError } from './errors'

/**
 * Network error codes from Node.js
 */
const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'ECONNRESET',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EPIPE',
  'ECONNABORTED',
])

/**
 * Check if an error is a network-related error
 */
function isNetworkError(error: Error): boolean {
  // AbortError is how timeouts surface
  if (error.name === 'AbortError') {
    return false
  }

  if (error instanceof DOMException && error.name === 'NetworkError') {
    return true
  }

  if ('code' in error && typeof error.code === 'string' && NETWORK_ERROR_CODES.has(error.code)) {
    return true
  }

  // All TypeErrors from fetch are network errors; engines disagree on the message
  return error.name === 'TypeError'
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'HEAD'

export type QueryParams = Record<string, string | number | boolean | undefined>

/**
 * HTTP client configuration
 */
export interface HttpClientConfig {
  baseUrl: string
  auth?: AuthToken
  fetch?: typeof fetch
  timeout?: number
  headers?: Record<string, string>
  logger?: Logger
}

/**
 * Request options
 */
export interface RequestOptions {
  method?: HttpMethod
  /** Query string parameters; undefined values are dropped */
  params?: QueryParams
  headers?: Record<string, string>
  body?: BodyInit
  contentType?: string
  contentEncoding?: string
  accept?: string
  timeout?: number
}

/**
 * An open response body. The transport counts handles until they are released.
 */
export interface StreamHandle {
  readonly headers: Headers
  read(): Promise<ReadableStreamReadResult<Uint8Array>>
  /** Cancel the body read and give the connection back. Idempotent. */
  release(): Promise<void>
}

/**
 * HTTP client for making requests to the Stardog HTTP API
 */
export class HttpClient {
  readonly baseUrl: string
  private readonly auth?: AuthToken
  private readonly fetchFn: typeof fetch
  private readonly timeout: number
  private readonly customHeaders: Record<string, string>
  private readonly logger: Logger
  private _activeStreams = 0

  constructor(config: HttpClientConfig) {
    // Remove trailing slash from base URL
    this.baseUrl = config.baseUrl.replace(/\/$/, '')
    this.auth = config.auth
    this.fetchFn = config.fetch ?? globalThis.fetch
    this.timeout = config.timeout ?? 30000
    this.customHeaders = config.headers ?? {}
    this.logger = config.logger ?? createLogger()

    if (!this.fetchFn) {
      throw new Error(
        'No fetch implementation available. ' +
        'Please provide a custom fetch function in the config.'
      )
    }
  }

  /**
   * Number of streamed bodies handed out and not yet released
   */
  get activeStreams(): number {
    return this._activeStreams
  }

  /**
   * The fetch implementation requests go through
   */
  get fetchImplementation(): typeof fetch {
    return this.fetchFn
  }

  /**
   * Make a request and decode the response with `consume`. The body is read
   * under the request timeout, and a body that breaks off surfaces as a
   * transport error.
   */
  async request<T>(
    path: string,
    options: RequestOptions,
    consume: (response: Response) => Promise<T>
  ): Promise<T> {
    return this.send(path, options, consume)
  }

  /**
   * Make a request and read the body as text
   */
  async text(path: string, options: RequestOptions = {}): Promise<string> {
    return this.request(path, options, (response) => response.text())
  }

  /**
   * Make a request and parse the body as JSON. Empty bodies parse to undefined.
   */
  async json(path: string, options: RequestOptions = {}): Promise<unknown> {
    return this.request(path, options, async (response) => {
      const text = await response.text()
      if (!text) {
        return undefined
      }
      try {
        const parsed: unknown = JSON.parse(text)
        return parsed
      } catch (error) {
        throw new StardogClientError(
          `Expected JSON from ${path}: ${error instanceof Error ? error.message : String(error)}`,
          'UNEXPECTED_RESPONSE'
        )
      }
    })
  }

  /**
   * Make a request and hand back its body as an open stream. The caller owns
   * the handle and must release it. Only the request itself runs under the
   * timeout; failed reads surface as transport errors.
   */
  async openStream(path: string, options: RequestOptions = {}): Promise<StreamHandle> {
    const response = await this.send(path, options, async (received) => received)
    const reader = (response.body ?? emptyBody()).getReader()
    const url = this.buildUrl(path, options.params)
    const timeout = options.timeout ?? this.timeout
    let released = false
    this._activeStreams++

    return {
      headers: response.headers,
      read: () =>
        reader.read().catch((error: unknown): never => {
          throw this.translateError(error, `Failed to read ${url}`, `read ${path}`, timeout)
        }),
      release: async () => {
        if (released) {
          return
        }
        released = true
        this._activeStreams--
        try {
          await reader.cancel()
        } catch (error) {
          this.logger.debug(
            `Cancelling stream for ${path} failed: ${error instanceof Error ? error.message : String(error)}`
          )
        }
      },
    }
  }

  private async send<T>(
    path: string,
    options: RequestOptions,
    consume: (response: Response) => Promise<T>
  ): Promise<T> {
    const url = this.buildUrl(path, options.params)
    const headers = this.buildHeaders(options)
    const timeout = options.timeout ?? this.timeout
    const method = options.method ?? 'GET'

    // Create abort controller for timeout
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeout)

    try {
      const response = await this.fetchFn(url, {
        method,
        headers,
        body: options.body,
        signal: controller.signal,
      })

      if (!response.ok) {
        throw await createErrorFromResponse(response)
      }

      return await consume(response)
    } catch (error) {
      throw this.translateError(error, `Failed to fetch ${url}`, `${method} ${path}`, timeout)
    } finally {
      clearTimeout(timeoutId)
    }
  }

  /**
   * Map aborts to TimeoutError and connection failures to NetworkError
   */
  private translateError(error: unknown, failure: string, operation: string, timeout: number): unknown {
    if (error instanceof Error) {
      if (error.name === 'AbortError') {
        return new TimeoutError(timeout, operation)
      }
      if (isNetworkError(error)) {
        return new NetworkError(failure, error)
      }
    }
    return error
  }

  /**
   * Build the full URL with query parameters
   */
  private buildUrl(path: string, params?: QueryParams): string {
    const url = `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`
    if (!params) {
      return url
    }

    const search = new URLSearchParams()
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        search.set(key, String(value))
      }
    }
    const query = search.toString()
    return query ? `${url}?${query}` : url
  }

  /**
   * Build headers for a request
   */
  private buildHeaders(options: RequestOptions): Record<string, string> {
    const headers: Record<string, string> = { ...this.customHeaders }

    if (this.auth) {
      headers['Authorization'] = authorizationHeader(this.auth)
    }
    if (options.accept) {
      headers['Accept'] = options.accept
    }
    if (options.contentType) {
      headers['Content-Type'] = options.contentType
    }
    if (options.contentEncoding) {
      headers['Content-Encoding'] = options.contentEncoding
    }

    return { ...headers, ...options.headers }
  }
}

function emptyBody(): ReadableStream<Uint8Array> {
  return new ReadableStream<Uint8Array>({
    start(controller) {
      controller.close()
    },
  })
}
