import { OAuth2Client } from 'google-auth-library'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { AppError } from '../auth/errors.js'
import { OAuthClient, toCredentials } from '../auth/oauthClient.js'

const FIXED_TIME = new Date('2024-01-01T00:00:00Z').getTime()
const SCOPES = ['https://www.googleapis.com/auth/calendar', 'https://www.googleapis.com/auth/photoslibrary']

function gaxiosError(message: string, status: number): Error {
  return Object.assign(new Error(message), { response: { status } })
}

describe('oAuthClient', () => {
  const secrets = { clientId: 'test-client', clientSecret: 'test-secret' }

  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(FIXED_TIME)
  })

  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  describe('buildAuthUrl', () => {
    it('asks for offline access with forced consent and all scopes', () => {
      const url = new URL(new OAuthClient(secrets, SCOPES).buildAuthUrl('http://127.0.0.1:5555', 'state-123'))

      expect(url.searchParams.get('client_id')).toBe('test-client')
      expect(url.searchParams.get('redirect_uri')).toBe('http://127.0.0.1:5555')
      expect(url.searchParams.get('access_type')).toBe('offline')
      expect(url.searchParams.get('prompt')).toBe('consent')
      expect(url.searchParams.get('state')).toBe('state-123')
      expect(url.searchParams.get('scope')).toBe(SCOPES.join(' '))
    })
  })

  describe('exchangeCode', () => {
    it('exchanges the code with the loopback redirect URI', async () => {
      const getToken = vi.spyOn(OAuth2Client.prototype, 'getToken').mockImplementation(async () => ({
        tokens: {
          access_token: 'test-access',
          refresh_token: 'test-refresh',
          expiry_date: FIXED_TIME + 3599_000,
          scope: SCOPES.join(' '),
        },
        res: null,
      }))

      const credentials = await new OAuthClient(secrets, SCOPES).exchangeCode('auth-code', 'http://127.0.0.1:5555')

      expect(getToken).toHaveBeenCalledWith({ code: 'auth-code', redirect_uri: 'http://127.0.0.1:5555' })
      expect(credentials).toEqual({
        accessToken: 'test-access',
        refreshToken: 'test-refresh',
        expiresAt: FIXED_TIME + 3599_000,
        scopes: SCOPES,
      })
    })

    it('maps a rejected exchange to OAUTH_UNAUTHORIZED', async () => {
      vi.spyOn(OAuth2Client.prototype, 'getToken').mockImplementation(async () => {
        throw gaxiosError('invalid_grant', 400)
      })

      await expect(new OAuthClient(secrets, SCOPES).exchangeCode('bad', 'http://127.0.0.1:5555')).rejects.toMatchObject({
        code: 'OAUTH_UNAUTHORIZED',
        message: 'Authorization code exchange was rejected: invalid_grant',
      })
    })
  })

  describe('refresh', () => {
    it('keeps the existing refresh token when Google does not return one', async () => {
      vi.spyOn(OAuth2Client.prototype, 'refreshAccessToken').mockImplementation(async () => ({
        credentials: { access_token: 'fresh-access', expiry_date: FIXED_TIME + 3600_000 },
        res: null,
      }))

      const credentials = await new OAuthClient(secrets, SCOPES).refresh('test-refresh', SCOPES)

      expect(credentials).toEqual({
        accessToken: 'fresh-access',
        refreshToken: 'test-refresh',
        expiresAt: FIXED_TIME + 3600_000,
        scopes: SCOPES,
      })
    })

    it('maps server errors to OAUTH_NETWORK', async () => {
      vi.spyOn(OAuth2Client.prototype, 'refreshAccessToken').mockImplementation(async () => {
        throw gaxiosError('backend error', 503)
      })

      const error: unknown = await new OAuthClient(secrets, SCOPES).refresh('test-refresh', SCOPES).catch((err: unknown) => err)

      expect(error).toBeInstanceOf(AppError)
      expect(error).toMatchObject({ code: 'OAUTH_NETWORK', message: 'Token refresh failed (503)', details: { status: 503 } })
    })

    it('maps transport failures without a response to OAUTH_NETWORK', async () => {
      vi.spyOn(OAuth2Client.prototype, 'refreshAccessToken').mockImplementation(async () => {
        throw new Error('socket hang up')
      })

      await expect(new OAuthClient(secrets, SCOPES).refresh('test-refresh', SCOPES)).rejects.toMatchObject({
        code: 'OAUTH_NETWORK',
        message: 'Token refresh failed: socket hang up',
      })
    })
  })
})

describe('toCredentials', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(FIXED_TIME)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('defaults the expiry to one hour and the scopes to the requested ones', () => {
    expect(toCredentials({ access_token: 'a' }, { scopes: ['s1'] })).toEqual({
      accessToken: 'a',
      refreshToken: undefined,
      expiresAt: FIXED_TIME + 3600_000,
      scopes: ['s1'],
    })
  })

  it('throws when the response has no access token', () => {
    expect(() => toCredentials({ refresh_token: 'r' }, { scopes: [] })).toThrow('Token response did not include an access token')
  })
})
