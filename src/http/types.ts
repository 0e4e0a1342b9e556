/**
 * HTTP client types and interfaces
 */

export interface HttpClientConfig {
  baseUrl: string
  timeoutMs: number
}

export interface HttpRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE'
  headers?: Record<string, string>
  query?: Record<string, string | number | boolean | undefined>
  body?: string | object
  timeout?: number
  /** Aborts the request when the caller gives up on it. */
  signal?: AbortSignal
}

export interface HttpResponse {
  status: number
  statusText: string
  headers: Headers
  data: unknown
}

export enum HttpErrorType {
  UNAUTHENTICATED = 'UNAUTHENTICATED',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  NOT_FOUND = 'NOT_FOUND',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  RESOURCE_EXHAUSTED = 'RESOURCE_EXHAUSTED',
  UNAVAILABLE = 'UNAVAILABLE',
  UNKNOWN = 'UNKNOWN',
}

export class HttpError extends Error {
  constructor(
    public readonly type: HttpErrorType,
    public readonly status: number,
    public readonly statusText: string,
    message?: string,
    public readonly response?: unknown,
  ) {
    super(message ?? `HTTP ${status}: ${statusText}`)
    this.name = 'HttpError'
    Object.setPrototypeOf(this, HttpError.prototype)
  }
}

/**
 * The request never produced a response: network failure, timeout or
 * cancellation by the caller.
 */
export class HttpTransportError extends Error {
  constructor(
    message: string,
    public readonly reason: 'network' | 'timeout' | 'aborted',
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'HttpTransportError'
    Object.setPrototypeOf(this, HttpTransportError.prototype)
  }
}
