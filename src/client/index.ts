// Low-level HTTP transport (for advanced use cases)
export {
  HttpClient,
  type HttpClientConfig,
  type HttpMethod,
  type QueryParams,
  type RequestOptions,
  type StreamHandle,
} from './http-client'

// Error classes
export {
  StardogClientError,
  UsageError,
  TransactionError,
  TransactionStateError,
  StreamClosedError,
  ConnectionClosedError,
  TransportError,
  NetworkError,
  TimeoutError,
  StardogError,
  AuthenticationError,
  IndeterminateTransactionError,
  createErrorFromResponse,
} from './errors'

export { boundaryOf, parseMultipart, type MultipartPart } from './multipart'
