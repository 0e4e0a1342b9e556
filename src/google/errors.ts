/**
 * Errors raised by the Google API session
 */

/**
 * The remote API answered with a non-2xx status, or never answered
 * (status 0).
 */
export class RemoteApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'RemoteApiError'
    Object.setPrototypeOf(this, RemoteApiError.prototype)
  }
}

/**
 * The addressed event or media item does not exist.
 */
export class NotFoundError extends RemoteApiError {
  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(status, message, options)
    this.name = 'NotFoundError'
    Object.setPrototypeOf(this, NotFoundError.prototype)
  }
}

/**
 * An argument passed schema validation but could not be turned into a
 * remote request, such as an unparseable search date.
 */
export class InvalidArgumentError extends Error {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message)
    this.name = 'InvalidArgumentError'
    Object.setPrototypeOf(this, InvalidArgumentError.prototype)
  }
}

export class ServiceBuildError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ServiceBuildError'
    Object.setPrototypeOf(this, ServiceBuildError.prototype)
  }
}

export function isUnauthenticated(error: unknown): boolean {
  return error instanceof RemoteApiError && error.status === 401
}
