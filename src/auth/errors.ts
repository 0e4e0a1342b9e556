export type AuthErrorCode
  = 'AUTH_CONFIG'
    | 'AUTH_FLOW'
    | 'TOKENS_NOT_FOUND'
    | 'TOKENS_FORMAT_UNSUPPORTED'
    | 'TOKENS_PATH_INVALID'
    | 'OAUTH_UNAUTHORIZED'
    | 'OAUTH_NETWORK'
    | 'INTERNAL'

export interface ErrorDetails {
  status?: number
  path?: string
  reason?: string
  [key: string]: unknown
}

export class AppError extends Error {
  readonly code: AuthErrorCode
  readonly details?: ErrorDetails
  readonly cause?: unknown

  constructor(code: AuthErrorCode, message: string, options?: { details?: ErrorDetails, cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
    this.code = code
    this.details = options?.details
    this.cause = options?.cause
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * The OAuth client-secret document is missing or malformed.
 */
export class AuthConfigError extends AppError {
  constructor(message: string, options?: { details?: ErrorDetails, cause?: unknown }) {
    super('AUTH_CONFIG', message, options)
  }
}

/**
 * Interactive consent could not complete (denied, timed out, or the code
 * exchange was rejected).
 */
export class AuthFlowError extends AppError {
  constructor(message: string, options?: { details?: ErrorDetails, cause?: unknown }) {
    super('AUTH_FLOW', message, options)
  }
}
