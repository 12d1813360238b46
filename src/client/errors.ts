/**
 * Stardog client errors
 * Every failure raised by this library is a StardogClientError subclass
 */

import { z } from 'zod'

/**
 * Base class for all client errors
 */
export class StardogClientError extends Error {
  readonly code: string
  readonly statusCode?: number
  readonly details?: unknown

  constructor(
    message: string,
    code: string = 'STARDOG_CLIENT_ERROR',
    statusCode?: number,
    details?: unknown
  ) {
    super(message)
    this.name = 'StardogClientError'
    this.code = code
    this.statusCode = statusCode
    this.details = details

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StardogClientError)
    }
  }
}

/**
 * Invalid local call sequence. Raised before anything is sent to the server.
 */
export class UsageError extends StardogClientError {
  constructor(message: string, code: string = 'USAGE_ERROR') {
    super(message, code)
    this.name = 'UsageError'
  }
}

/**
 * Error when a transaction is begun while another one is still active
 */
export class TransactionError extends UsageError {
  readonly transactionId: string

  constructor(transactionId: string) {
    super(
      `Transaction ${transactionId} is already active`,
      'TRANSACTION_ALREADY_ACTIVE'
    )
    this.name = 'TransactionError'
    this.transactionId = transactionId
  }
}

/**
 * Error when an operation needs a session state it is not in
 */
export class TransactionStateError extends UsageError {
  readonly currentState: string
  readonly expectedState: string

  constructor(operation: string, currentState: string, expectedState: string) {
    super(
      `Cannot ${operation}: session is ${currentState}, expected ${expectedState}`,
      'TRANSACTION_STATE_ERROR'
    )
    this.name = 'TransactionStateError'
    this.currentState = currentState
    this.expectedState = expectedState
  }
}

/**
 * Error when a streamed body is read after it was closed
 */
export class StreamClosedError extends UsageError {
  constructor(operation: string = 'read') {
    super(`Cannot ${operation} a closed stream`, 'STREAM_CLOSED')
    this.name = 'StreamClosedError'
  }
}

/**
 * Error when a connection is closed but an operation is attempted
 */
export class ConnectionClosedError extends UsageError {
  constructor(operation: string = 'operation') {
    super(`Cannot perform ${operation} on closed connection`, 'CONNECTION_CLOSED')
    this.name = 'ConnectionClosedError'
  }
}

/**
 * The request never produced a response
 */
export class TransportError extends StardogClientError {
  constructor(message: string, code: string = 'TRANSPORT_ERROR', cause?: Error) {
    super(message, code)
    this.name = 'TransportError'
    if (cause) {
      this.cause = cause
    }
  }
}

/**
 * Error when a network request fails
 */
export class NetworkError extends TransportError {
  constructor(message: string, cause?: Error) {
    super(message, 'NETWORK_ERROR', cause)
    this.name = 'NetworkError'
  }
}

/**
 * Error when a request times out
 */
export class TimeoutError extends TransportError {
  readonly timeout: number

  constructor(timeout: number, operation: string = 'request') {
    super(`${operation} timed out after ${timeout}ms`, 'TIMEOUT_ERROR')
    this.name = 'TimeoutError'
    this.timeout = timeout
  }
}

/**
 * The server rejected the request. `code` and `message` are the server's own.
 */
export class StardogError extends StardogClientError {
  constructor(message: string, code: string, statusCode: number, details?: unknown) {
    super(message, code, statusCode, details)
    this.name = 'StardogError'
  }
}

/**
 * Error when authentication fails
 */
export class AuthenticationError extends StardogError {
  constructor(message: string = 'Authentication failed', code: string = 'HTTP_401') {
    super(message, code, 401)
    this.name = 'AuthenticationError'
  }
}

/**
 * A commit failed after it was sent. Whether the data was persisted is unknown.
 */
export class IndeterminateTransactionError extends StardogClientError {
  readonly transactionId: string

  constructor(transactionId: string, cause: Error) {
    super(
      `Commit of transaction ${transactionId} failed, outcome unknown: ${cause.message}`,
      'TRANSACTION_INDETERMINATE',
      cause instanceof StardogClientError ? cause.statusCode : undefined
    )
    this.name = 'IndeterminateTransactionError'
    this.transactionId = transactionId
    this.cause = cause
  }
}

const errorBodySchema = z
  .object({
    message: z.string().optional(),
    code: z.string().optional(),
  })
  .passthrough()

/**
 * Create an error from an HTTP response
 */
export async function createErrorFromResponse(response: Response): Promise<StardogError> {
  const text = await response.text().catch(() => '')
  const body = parseErrorBody(text)
  const code = body?.code ?? response.headers.get('SD-Error-Code') ?? `HTTP_${response.status}`
  const message = body?.message ?? (text.trim() || response.statusText || 'Unknown error')

  if (response.status === 401) {
    return new AuthenticationError(message, code)
  }
  return new StardogError(message, code, response.status, body ?? text)
}

function parseErrorBody(text: string): z.infer<typeof errorBodySchema> | undefined {
  if (!text) {
    return undefined
  }
  try {
    const parsed = errorBodySchema.safeParse(JSON.parse(text))
    return parsed.success ? parsed.data : undefined
  } catch {
    // Response body is not JSON
    return undefined
  }
}
