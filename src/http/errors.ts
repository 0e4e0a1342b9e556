/**
 * HTTP error mapping and utilities
 */

import { HttpError, HttpErrorType } from './types.js'

/**
 * Maps HTTP status codes to structured error types
 */
export function mapHttpStatusToErrorType(status: number): HttpErrorType {
  if (status === 401) {
    return HttpErrorType.UNAUTHENTICATED
  }

  if (status === 403) {
    return HttpErrorType.PERMISSION_DENIED
  }

  if (status === 404 || status === 410) {
    return HttpErrorType.NOT_FOUND
  }

  if (status === 400) {
    return HttpErrorType.INVALID_ARGUMENT
  }

  if (status === 429) {
    return HttpErrorType.RESOURCE_EXHAUSTED
  }

  if (status >= 500 && status < 600) {
    return HttpErrorType.UNAVAILABLE
  }

  return HttpErrorType.UNKNOWN
}

function field(value: unknown, key: string): unknown {
  if (value == null || typeof value !== 'object' || !(key in value))
    return undefined
  return Reflect.get(value, key)
}

function nonEmpty(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined
}

/**
 * Pulls the human-readable message out of a Google API error body
 * (`{ "error": { "code", "message", "status" } }`), if there is one.
 */
export function extractErrorMessage(body: unknown): string | undefined {
  const error = field(body, 'error')
  return nonEmpty(field(error, 'message'))
    ?? nonEmpty(error)
    ?? nonEmpty(field(body, 'message'))
}

/**
 * Pulls the canonical status string (e.g. "INVALID_ARGUMENT") out of a
 * Google API error body.
 */
export function extractErrorStatus(body: unknown): string | undefined {
  const status = field(field(body, 'error'), 'status')
  return typeof status === 'string' ? status : undefined
}

/**
 * Creates a structured HttpError from a fetch Response
 */
export async function createHttpError(response: Response): Promise<HttpError> {
  const errorType = mapHttpStatusToErrorType(response.status)

  let responseData: unknown
  const text = await response.text().catch(() => '')
  if (text.trim() !== '') {
    try {
      responseData = JSON.parse(text) as unknown
    }
    catch {
      responseData = { message: text.slice(0, 500) }
    }
  }

  const detail = extractErrorMessage(responseData)
  const message = detail === undefined
    ? `HTTP ${response.status}: ${response.statusText}`
    : `HTTP ${response.status}: ${detail}`

  return new HttpError(
    errorType,
    response.status,
    response.statusText,
    message,
    responseData,
  )
}

/**
 * Checks if an error is an HttpError with a specific type
 */
export function isHttpErrorOfType(error: unknown, type: HttpErrorType): boolean {
  return error instanceof HttpError && error.type === type
}
