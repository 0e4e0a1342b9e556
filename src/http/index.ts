/**
 * HTTP client module exports
 */

export {
  createHttpError,
  extractErrorMessage,
  extractErrorStatus,
  isHttpErrorOfType,
  mapHttpStatusToErrorType,
} from './errors.js'
export { HttpClient } from './httpClient.js'
export type {
  HttpClientConfig,
  HttpRequestOptions,
  HttpResponse,
} from './types.js'
export { HttpError, HttpErrorType, HttpTransportError } from './types.js'
