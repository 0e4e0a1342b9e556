import { describe, expect, it } from 'vitest'
import {
  createHttpError,
  extractErrorMessage,
  extractErrorStatus,
  isHttpErrorOfType,
  mapHttpStatusToErrorType,
} from '../http/errors.js'
import { HttpError, HttpErrorType } from '../http/types.js'

describe('hTTP error mapping', () => {
  describe('mapHttpStatusToErrorType', () => {
    it('maps 401 to UNAUTHENTICATED and 403 to PERMISSION_DENIED', () => {
      expect(mapHttpStatusToErrorType(401)).toBe(HttpErrorType.UNAUTHENTICATED)
      expect(mapHttpStatusToErrorType(403)).toBe(HttpErrorType.PERMISSION_DENIED)
    })

    it('maps 404 and 410 to NOT_FOUND', () => {
      expect(mapHttpStatusToErrorType(404)).toBe(HttpErrorType.NOT_FOUND)
      expect(mapHttpStatusToErrorType(410)).toBe(HttpErrorType.NOT_FOUND)
    })

    it('maps 400 to INVALID_ARGUMENT and 429 to RESOURCE_EXHAUSTED', () => {
      expect(mapHttpStatusToErrorType(400)).toBe(HttpErrorType.INVALID_ARGUMENT)
      expect(mapHttpStatusToErrorType(429)).toBe(HttpErrorType.RESOURCE_EXHAUSTED)
    })

    it('maps 5xx errors to UNAVAILABLE', () => {
      expect(mapHttpStatusToErrorType(500)).toBe(HttpErrorType.UNAVAILABLE)
      expect(mapHttpStatusToErrorType(503)).toBe(HttpErrorType.UNAVAILABLE)
    })

    it('maps other status codes to UNKNOWN', () => {
      expect(mapHttpStatusToErrorType(418)).toBe(HttpErrorType.UNKNOWN)
      expect(mapHttpStatusToErrorType(600)).toBe(HttpErrorType.UNKNOWN)
    })
  })

  describe('google error bodies', () => {
    const body = { error: { code: 400, message: 'Invalid media item ID.', status: 'INVALID_ARGUMENT' } }

    it('extracts the nested message and status', () => {
      expect(extractErrorMessage(body)).toBe('Invalid media item ID.')
      expect(extractErrorStatus(body)).toBe('INVALID_ARGUMENT')
    })

    it('falls back to a string error or a top-level message', () => {
      expect(extractErrorMessage({ error: 'invalid_grant' })).toBe('invalid_grant')
      expect(extractErrorMessage({ message: 'Something broke' })).toBe('Something broke')
      expect(extractErrorMessage('not an object')).toBeUndefined()
      expect(extractErrorStatus({ error: 'invalid_grant' })).toBeUndefined()
    })
  })

  describe('createHttpError', () => {
    it('creates HttpError from a Google JSON error body', async () => {
      const error = await createHttpError(new Response(JSON.stringify({
        error: { code: 403, message: 'Insufficient Permission', status: 'PERMISSION_DENIED' },
      }), { status: 403, statusText: 'Forbidden' }))

      expect(error).toBeInstanceOf(HttpError)
      expect(error.type).toBe(HttpErrorType.PERMISSION_DENIED)
      expect(error.status).toBe(403)
      expect(error.statusText).toBe('Forbidden')
      expect(error.message).toBe('HTTP 403: Insufficient Permission')
    })

    it('keeps the start of a non-JSON body', async () => {
      const error = await createHttpError(new Response('upstream exploded', { status: 502, statusText: 'Bad Gateway' }))

      expect(error.message).toBe('HTTP 502: upstream exploded')
      expect(error.response).toEqual({ message: 'upstream exploded' })
    })

    it('falls back to the status text for an empty body', async () => {
      const error = await createHttpError(new Response(null, { status: 500, statusText: 'Internal Server Error' }))

      expect(error.message).toBe('HTTP 500: Internal Server Error')
      expect(error.response).toBeUndefined()
    })
  })

  describe('isHttpErrorOfType', () => {
    it('checks the error type', () => {
      const error = new HttpError(HttpErrorType.NOT_FOUND, 404, 'Not Found')

      expect(isHttpErrorOfType(error, HttpErrorType.NOT_FOUND)).toBe(true)
      expect(isHttpErrorOfType(error, HttpErrorType.UNAVAILABLE)).toBe(false)
      expect(isHttpErrorOfType(new Error('x'), HttpErrorType.NOT_FOUND)).toBe(false)
    })
  })
})
