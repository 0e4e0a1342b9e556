import type { CredentialProvider } from '../auth/credentialStore.js'
import type { Credentials } from '../auth/types.js'
import type { ApiSession, SessionConfig } from '../google/session.js'
import type { Logger } from '../logging/index.js'
import type { SessionFactory } from '../tools/toolRouter.js'
import type { Mock } from 'vitest'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { InvalidArgumentError, NotFoundError, RemoteApiError } from '../google/errors.js'
import { ToolRouter } from '../tools/toolRouter.js'

const config: SessionConfig = {
  calendarApiBaseUrl: 'https://calendar.test/v3/',
  photosApiBaseUrl: 'https://photos.test/v1/',
  requestTimeoutMs: 5000,
}

function silentLogger(): Logger {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), log: vi.fn() }
}

function credentialsFor(accessToken: string): Credentials {
  return { accessToken, refreshToken: 'test-refresh-token', expiresAt: Date.now() + 3600_000, scopes: [] }
}

function fakeSession(accessToken: string) {
  return {
    accessToken,
    createEvent: vi.fn<ApiSession['createEvent']>(async () => 'evt-new'),
    listEvents: vi.fn<ApiSession['listEvents']>(async () => []),
    getEvent: vi.fn<ApiSession['getEvent']>(async ref => ({ id: ref.eventId, summary: 'Event', start: {}, end: {} })),
    updateEvent: vi.fn<ApiSession['updateEvent']>(async () => {}),
    deleteEvent: vi.fn<ApiSession['deleteEvent']>(async () => {}),
    listPhotos: vi.fn<ApiSession['listPhotos']>(async () => []),
    searchPhotos: vi.fn<ApiSession['searchPhotos']>(async () => []),
    resolveDownloadUrl: vi.fn<ApiSession['resolveDownloadUrl']>(async () => 'https://example/x=d'),
  } satisfies ApiSession
}

type FakeSession = ReturnType<typeof fakeSession>

function textOf(response: { content: Array<{ text: string }> }): string {
  return response.content.map(item => item.text).join('\n')
}

const ALL_TOOLS = 'create_calendar_event, get_calendar_events, update_calendar_event, delete_calendar_event, get_photos, search_photos, get_photo_download_url'

describe('toolRouter', () => {
  let sessions: Map<string, FakeSession>
  let ensureValid: Mock<CredentialProvider['ensureValid']>
  let invalidate: Mock<CredentialProvider['invalidate']>
  let sessionFactory: Mock<SessionFactory>
  let router: ToolRouter

  function sessionFor(accessToken: string): FakeSession {
    const session = fakeSession(accessToken)
    sessions.set(accessToken, session)
    return session
  }

  beforeEach(() => {
    sessions = new Map()
    ensureValid = vi.fn<CredentialProvider['ensureValid']>(async () => credentialsFor('token-1'))
    invalidate = vi.fn<CredentialProvider['invalidate']>()
    sessionFactory = vi.fn<SessionFactory>((credentials) => {
      const session = sessions.get(credentials.accessToken)
      if (session === undefined)
        throw new Error(`No session prepared for ${credentials.accessToken}`)
      return session
    })
    router = new ToolRouter({
      credentials: { ensureValid, invalidate },
      config,
      sessionFactory,
      logger: silentLogger(),
    })
  })

  describe('dispatch', () => {
    it('lists every tool when the name is unknown', async () => {
      sessionFor('token-1')

      const response = await router.dispatch('nope', {})

      expect(response.isError).toBe(true)
      expect(textOf(response)).toBe(`❌ UnknownToolError (nope): Unknown tool: nope. Available tools: ${ALL_TOOLS}`)
    })

    it('rejects invalid arguments before any remote call', async () => {
      const session = sessionFor('token-1')

      const response = await router.dispatch('create_calendar_event', { summary: 'Standup' })

      expect(textOf(response)).toBe('❌ ValidationError (create_calendar_event): Invalid arguments: start_time is required')
      expect(session.createEvent).not.toHaveBeenCalled()
    })

    it('creates an event with defaults applied', async () => {
      const session = sessionFor('token-1')

      const response = await router.dispatch('create_calendar_event', {
        summary: 'Standup',
        start_time: '2024-06-03T09:00:00Z',
        end_time: '2024-06-03T09:15:00Z',
      })

      expect(response.isError).toBe(false)
      expect(session.createEvent).toHaveBeenCalledWith({
        summary: 'Standup',
        startTime: '2024-06-03T09:00:00Z',
        endTime: '2024-06-03T09:15:00Z',
        description: '',
        location: '',
        calendarId: 'primary',
      }, { signal: undefined })
      expect(textOf(response).split('\n')[1]).toBe('Event ID: evt-new')
    })

    it('clears a location with an empty string', async () => {
      const session = sessionFor('token-1')

      const response = await router.dispatch('update_calendar_event', { event_id: 'evt1', location: '' })

      expect(session.updateEvent).toHaveBeenCalledWith(
        expect.objectContaining({ eventId: 'evt1', calendarId: 'primary', location: '', summary: undefined }),
        { signal: undefined },
      )
      expect(textOf(response).split('\n').slice(2)).toEqual(['Updates made:', '  • Location cleared'])
    })

    it('reports an empty calendar as success', async () => {
      sessionFor('token-1')

      const response = await router.dispatch('get_calendar_events', {})

      expect(response).toEqual({
        content: [{ type: 'text', text: '✅ No upcoming events found in your calendar.' }],
        isError: false,
      })
    })

    it('passes search dates through', async () => {
      const session = sessionFor('token-1')

      await router.dispatch('search_photos', { start_date: '2024-01-01', end_date: '2024-01-31' })

      expect(session.searchPhotos).toHaveBeenCalledWith(
        { startDate: '2024-01-01', endDate: '2024-01-31', mediaType: undefined, pageSize: 25 },
        { signal: undefined },
      )
    })

    it('returns the download URL', async () => {
      const session = sessionFor('token-1')

      const response = await router.dispatch('get_photo_download_url', { photo_id: 'abc123' })

      expect(session.resolveDownloadUrl).toHaveBeenCalledWith('abc123', { signal: undefined })
      expect(textOf(response).split('\n')[2]).toBe('🔗 URL: https://example/x=d')
    })

    it('forwards the cancellation signal', async () => {
      const session = sessionFor('token-1')
      const controller = new AbortController()

      await router.dispatch('get_photos', undefined, { signal: controller.signal })

      expect(session.listPhotos).toHaveBeenCalledWith({ pageSize: 25 }, { signal: controller.signal })
    })

    it('classifies remote failures', async () => {
      const session = sessionFor('token-1')
      session.deleteEvent.mockRejectedValue(new NotFoundError(404, 'Deleting calendar event failed: event evt9 was not found'))
      session.searchPhotos.mockRejectedValue(new InvalidArgumentError('start_date must be an ISO 8601 date or date-time, got "soon"', 'start_date'))
      session.listEvents.mockRejectedValue(new RemoteApiError(503, 'Listing calendar events failed: HTTP 503: Backend Error'))
      session.listPhotos.mockRejectedValue(new Error('boom'))

      expect(textOf(await router.dispatch('delete_calendar_event', { event_id: 'evt9' })))
        .toBe('❌ NotFoundError (delete_calendar_event): Deleting calendar event failed: event evt9 was not found')
      expect(textOf(await router.dispatch('search_photos', { start_date: 'soon' })))
        .toBe('❌ InvalidArgumentError (search_photos): Invalid arguments: start_date must be an ISO 8601 date or date-time, got "soon"')
      expect(textOf(await router.dispatch('get_calendar_events', {})))
        .toBe('❌ RemoteApiError (get_calendar_events): Listing calendar events failed: HTTP 503: Backend Error')
      expect(textOf(await router.dispatch('get_photos', {})))
        .toBe('❌ InternalError (get_photos): get_photos failed unexpectedly: boom')
    })
  })

  describe('failure text', () => {
    it('names the failing tool for every kind of failure', async () => {
      const session = sessionFor('token-1')
      session.deleteEvent.mockRejectedValue(new NotFoundError(404, 'Deleting calendar event failed: event evt9 was not found'))
      session.listPhotos.mockRejectedValue(new RemoteApiError(500, 'Listing photos failed: HTTP 500: backend'))
      session.searchPhotos.mockRejectedValue(new InvalidArgumentError('end_date must be an ISO 8601 date or date-time, got "x"', 'end_date'))
      session.resolveDownloadUrl.mockRejectedValue(new TypeError('boom'))

      const cases: Array<[string, unknown, string]> = [
        ['delete_calendar_event', { event_id: 'evt9' }, '❌ NotFoundError (delete_calendar_event): '],
        ['get_photos', {}, '❌ RemoteApiError (get_photos): '],
        ['search_photos', { end_date: 'x' }, '❌ InvalidArgumentError (search_photos): '],
        ['get_photo_download_url', { photo_id: 'p1' }, '❌ InternalError (get_photo_download_url): '],
        ['get_calendar_events', { max_results: 0 }, '❌ ValidationError (get_calendar_events): '],
        ['list_albums', {}, '❌ UnknownToolError (list_albums): '],
      ]
      for (const [name, args, prefix] of cases) {
        const response = await router.dispatch(name, args)
        expect(response.isError).toBe(true)
        expect(textOf(response).startsWith(prefix)).toBe(true)
      }
    })

    it('names the tool when authentication fails', async () => {
      ensureValid.mockRejectedValue(new Error('boom'))

      const response = await router.dispatch('get_photos', {})

      expect(textOf(response)).toBe('❌ AuthError (get_photos): Could not authenticate with Google: boom')
    })
  })

  describe('authentication', () => {
    it('starts uninitialized and becomes ready after the first call', async () => {
      sessionFor('token-1')
      let release: (credentials: Credentials) => void = () => {}
      ensureValid.mockImplementation(async () => new Promise<Credentials>((resolve) => {
        release = resolve
      }))

      expect(router.state).toBe('uninitialized')
      const pending = router.dispatch('get_photos', {})
      expect(router.state).toBe('authenticating')

      release(credentialsFor('token-1'))
      await pending

      expect(router.state).toBe('ready')
    })

    it('shares one authentication between concurrent calls', async () => {
      sessionFor('token-1')
      let release: (credentials: Credentials) => void = () => {}
      ensureValid.mockImplementation(async () => new Promise<Credentials>((resolve) => {
        release = resolve
      }))

      const first = router.dispatch('get_photos', {})
      const second = router.dispatch('get_calendar_events', {})
      release(credentialsFor('token-1'))
      const responses = await Promise.all([first, second])

      expect(responses.map(response => response.isError)).toEqual([false, false])
      expect(ensureValid).toHaveBeenCalledTimes(1)
      expect(sessionFactory).toHaveBeenCalledTimes(1)
    })

    it('reuses the session while the access token is unchanged', async () => {
      sessionFor('token-1')

      await router.dispatch('get_photos', {})
      await router.dispatch('get_photos', {})

      expect(ensureValid).toHaveBeenCalledTimes(2)
      expect(sessionFactory).toHaveBeenCalledTimes(1)
    })

    it('reports authentication failures and tries again on the next call', async () => {
      sessionFor('token-1')
      ensureValid.mockRejectedValueOnce(new Error('Consent was not completed within 300000ms'))

      const failed = await router.dispatch('get_photos', {})

      expect(textOf(failed)).toBe('❌ AuthError (get_photos): Could not authenticate with Google: Consent was not completed within 300000ms')
      expect(router.state).toBe('failed')

      const recovered = await router.dispatch('get_photos', {})

      expect(recovered.isError).toBe(false)
      expect(router.state).toBe('ready')
    })

    it('authenticates before looking up the tool', async () => {
      ensureValid.mockRejectedValue(new Error('No OAuth client credentials'))

      const response = await router.dispatch('nope', {})

      expect(textOf(response)).toBe('❌ AuthError (nope): Could not authenticate with Google: No OAuth client credentials')
    })

    it('reports a session that cannot be built as an auth failure', async () => {
      const response = await router.dispatch('get_photos', {})

      expect(textOf(response)).toBe('❌ AuthError (get_photos): Could not authenticate with Google: No session prepared for token-1')
      expect(router.state).toBe('failed')
    })

    it('re-authenticates once and retries after a rejected token', async () => {
      const stale = sessionFor('token-1')
      const fresh = sessionFor('token-2')
      stale.listPhotos.mockRejectedValue(new RemoteApiError(401, 'Listing photos failed: HTTP 401: Invalid Credentials'))
      ensureValid
        .mockResolvedValueOnce(credentialsFor('token-1'))
        .mockResolvedValueOnce(credentialsFor('token-2'))

      const response = await router.dispatch('get_photos', {})

      expect(response).toEqual({
        content: [{ type: 'text', text: '✅ No photos found in your Google Photos library.' }],
        isError: false,
      })
      expect(invalidate).toHaveBeenCalledTimes(1)
      expect(invalidate).toHaveBeenCalledWith('token-1')
      expect(stale.listPhotos).toHaveBeenCalledTimes(1)
      expect(fresh.listPhotos).toHaveBeenCalledTimes(1)
    })

    it('surfaces the original error when re-authentication fails', async () => {
      const stale = sessionFor('token-1')
      stale.listPhotos.mockRejectedValue(new RemoteApiError(401, 'Listing photos failed: HTTP 401: Invalid Credentials'))
      ensureValid
        .mockResolvedValueOnce(credentialsFor('token-1'))
        .mockRejectedValueOnce(new Error('Consent was denied: access_denied'))

      const response = await router.dispatch('get_photos', {})

      expect(textOf(response)).toBe('❌ RemoteApiError (get_photos): Listing photos failed: HTTP 401: Invalid Credentials')
      expect(router.state).toBe('failed')
    })

    it('does not retry a second time', async () => {
      const stale = sessionFor('token-1')
      const fresh = sessionFor('token-2')
      stale.listPhotos.mockRejectedValue(new RemoteApiError(401, 'Listing photos failed: HTTP 401: Invalid Credentials'))
      fresh.listPhotos.mockRejectedValue(new RemoteApiError(401, 'Listing photos failed: HTTP 401: Token revoked'))
      ensureValid
        .mockResolvedValueOnce(credentialsFor('token-1'))
        .mockResolvedValueOnce(credentialsFor('token-2'))

      const response = await router.dispatch('get_photos', {})

      expect(textOf(response)).toBe('❌ RemoteApiError (get_photos): Listing photos failed: HTTP 401: Token revoked')
      expect(ensureValid).toHaveBeenCalledTimes(2)
      expect(fresh.listPhotos).toHaveBeenCalledTimes(1)
    })
  })
})
