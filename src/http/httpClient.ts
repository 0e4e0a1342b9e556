/**
 * HTTP client wrapper over Node 20 fetch with timeout, cancellation and
 * header redaction
 */

import type { Logger } from '../logging/index.js'
import type { HttpClientConfig, HttpRequestOptions, HttpResponse } from './types.js'
import { createLogger } from '../logging/index.js'
import { createHttpError } from './errors.js'
import { HttpTransportError } from './types.js'

const USER_AGENT = 'google-calendar-photos-mcp/0.1.0'

/**
 * Sensitive headers that should be redacted in logs
 */
const SENSITIVE_HEADERS = new Set([
  'authorization',
  'cookie',
  'x-goog-api-key',
])

/**
 * Redacts sensitive headers for safe logging
 */
function redactHeaders(headers: Record<string, string>): Record<string, string> {
  const redacted: Record<string, string> = {}

  for (const [key, value] of Object.entries(headers)) {
    if (SENSITIVE_HEADERS.has(key.toLowerCase())) {
      redacted[key] = '[REDACTED]'
    }
    else {
      redacted[key] = value
    }
  }

  return redacted
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
}

/**
 * Appends query parameters, skipping undefined values
 */
function buildUrl(baseUrl: string, path: string, query?: HttpRequestOptions['query']): string {
  let url: URL
  try {
    url = new URL(path, baseUrl)
  }
  catch (urlError) {
    const cause = urlError instanceof Error ? urlError : new Error(String(urlError))
    throw new Error(`Invalid URL: ${cause.message}`, { cause })
  }

  if (query) {
    for (const [key, value] of Object.entries(query)) {
      if (value !== undefined)
        url.searchParams.set(key, String(value))
    }
  }
  return url.toString()
}

export class HttpClient {
  private readonly config: HttpClientConfig
  private authToken?: string
  private readonly logger: Logger

  constructor(config: HttpClientConfig, logger?: Logger) {
    this.config = config
    this.logger = logger ?? createLogger('HttpClient')
  }

  /**
   * Makes a single HTTP request. Non-2xx responses reject with HttpError,
   * requests that never got a response reject with HttpTransportError.
   */
  async request(path: string, options: HttpRequestOptions = {}): Promise<HttpResponse> {
    if (!path || path.trim() === '') {
      throw new Error('Path must be a non-empty string')
    }

    const {
      method = 'GET',
      headers = {},
      query,
      body,
      timeout = this.config.timeoutMs,
      signal,
    } = options

    if (!Number.isFinite(timeout) || timeout < 0) {
      throw new Error('Timeout must be a non-negative finite number')
    }

    const url = buildUrl(this.config.baseUrl, path, query)

    const requestHeaders: Record<string, string> = {
      'Accept': 'application/json',
      'User-Agent': USER_AGENT,
      ...(body !== undefined ? { 'Content-Type': 'application/json' } : {}),
      ...(this.authToken != null && this.authToken !== '' ? { Authorization: `Bearer ${this.authToken}` } : {}),
      ...headers,
    }

    const startTime = Date.now()
    this.logger.info(`HTTP ${method} ${path}`, {
      headers: redactHeaders(requestHeaders),
    })

    if (signal?.aborted === true) {
      throw new HttpTransportError(`${method} ${url} was cancelled`, 'aborted')
    }

    const controller = new AbortController()
    let timedOut = false
    const timeoutId = setTimeout(() => {
      timedOut = true
      controller.abort()
    }, timeout)
    const onCallerAbort = (): void => controller.abort()
    signal?.addEventListener('abort', onCallerAbort, { once: true })

    let response: Response
    try {
      response = await fetch(url, {
        method,
        headers: requestHeaders,
        body: body === undefined ? undefined : (typeof body === 'string' ? body : JSON.stringify(body)),
        signal: controller.signal,
      })
    }
    catch (error) {
      const duration = Date.now() - startTime
      if (isAbortError(error)) {
        if (timedOut) {
          this.logger.error(`HTTP ${method} ${path} → TIMEOUT (${duration}ms)`)
          throw new HttpTransportError(`${method} ${url} timed out after ${timeout}ms`, 'timeout', { cause: error })
        }
        this.logger.warn(`HTTP ${method} ${path} → CANCELLED (${duration}ms)`)
        throw new HttpTransportError(`${method} ${url} was cancelled`, 'aborted', { cause: error })
      }
      const message = error instanceof Error ? error.message : String(error)
      this.logger.error(`HTTP ${method} ${path} → NETWORK ERROR (${duration}ms)`, { message })
      throw new HttpTransportError(`${method} ${url} failed: ${message}`, 'network', { cause: error })
    }
    finally {
      clearTimeout(timeoutId)
      signal?.removeEventListener('abort', onCallerAbort)
    }

    const duration = Date.now() - startTime
    this.logger.info(`HTTP ${method} ${path} → ${response.status} ${response.statusText} (${duration}ms)`)

    if (!response.ok) {
      throw await createHttpError(response)
    }

    let data: unknown
    const contentType = response.headers.get('content-type') ?? ''
    if (response.status === 204) {
      data = undefined
    }
    else if (contentType.includes('application/json')) {
      data = await response.json() as unknown
    }
    else {
      data = await response.text()
    }

    return {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
      data,
    }
  }

  /**
   * Convenience method for GET requests
   */
  async get(path: string, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
    return this.request(path, { ...options, method: 'GET' })
  }

  /**
   * Convenience method for POST requests
   */
  async post(path: string, body?: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
    return this.request(path, { ...options, method: 'POST', body })
  }

  /**
   * Convenience method for PUT requests
   */
  async put(path: string, body?: string | object, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
    return this.request(path, { ...options, method: 'PUT', body })
  }

  /**
   * Convenience method for DELETE requests
   */
  async delete(path: string, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<HttpResponse> {
    return this.request(path, { ...options, method: 'DELETE' })
  }

  /**
   * Updates the authorization header for authenticated requests
   */
  setAuthorizationHeader(token: string): void {
    this.authToken = token
  }
}
