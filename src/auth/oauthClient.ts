import type { Credentials as GoogleTokens } from 'google-auth-library'
import type { ClientSecrets, Credentials } from './types.js'
import { OAuth2Client } from 'google-auth-library'
import { AppError } from './errors.js'

const DEFAULT_TOKEN_LIFETIME_MS = 3600_000

function responseStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('response' in err))
    return undefined
  const { response } = err
  if (typeof response !== 'object' || response === null || !('status' in response))
    return undefined
  return typeof response.status === 'number' ? response.status : undefined
}

function mapOAuthError(err: unknown, operation: string): AppError {
  const status = responseStatus(err)
  const message = err instanceof Error ? err.message : String(err)
  if (status === 400 || status === 401) {
    return new AppError('OAUTH_UNAUTHORIZED', `${operation} was rejected: ${message}`, { details: { status }, cause: err })
  }
  return new AppError(
    'OAUTH_NETWORK',
    status === undefined ? `${operation} failed: ${message}` : `${operation} failed (${status})`,
    { details: { status }, cause: err },
  )
}

/**
 * Converts Google's token response into stored credentials. A refresh
 * response usually omits the refresh token, so the caller's is kept.
 */
export function toCredentials(tokens: GoogleTokens, fallback: { scopes: string[], refreshToken?: string }): Credentials {
  if (typeof tokens.access_token !== 'string' || tokens.access_token === '') {
    throw new AppError('OAUTH_NETWORK', 'Token response did not include an access token')
  }
  const scopes = typeof tokens.scope === 'string' && tokens.scope.trim() !== ''
    ? tokens.scope.trim().split(/\s+/)
    : fallback.scopes
  return {
    accessToken: tokens.access_token,
    refreshToken: typeof tokens.refresh_token === 'string' && tokens.refresh_token !== ''
      ? tokens.refresh_token
      : fallback.refreshToken,
    expiresAt: typeof tokens.expiry_date === 'number'
      ? tokens.expiry_date
      : Date.now() + DEFAULT_TOKEN_LIFETIME_MS,
    scopes,
  }
}

/**
 * Thin wrapper over google-auth-library for the three OAuth2 calls this
 * server makes: building the consent URL, exchanging the code, refreshing.
 */
export class OAuthClient {
  private readonly secrets: ClientSecrets
  private readonly scopes: string[]

  constructor(secrets: ClientSecrets, scopes: string[]) {
    this.secrets = secrets
    this.scopes = scopes
  }

  buildAuthUrl(redirectUri: string, state: string): string {
    return this.createClient(redirectUri).generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: this.scopes,
      state,
    })
  }

  async exchangeCode(code: string, redirectUri: string): Promise<Credentials> {
    const client = this.createClient(redirectUri)
    let tokens: GoogleTokens
    try {
      const response = await client.getToken({ code, redirect_uri: redirectUri })
      tokens = response.tokens
    }
    catch (err: unknown) {
      throw mapOAuthError(err, 'Authorization code exchange')
    }
    return toCredentials(tokens, { scopes: this.scopes })
  }

  async refresh(refreshToken: string, scopes: string[]): Promise<Credentials> {
    const client = this.createClient()
    client.setCredentials({ refresh_token: refreshToken })
    let tokens: GoogleTokens
    try {
      const response = await client.refreshAccessToken()
      tokens = response.credentials
    }
    catch (err: unknown) {
      throw mapOAuthError(err, 'Token refresh')
    }
    return toCredentials(tokens, { scopes, refreshToken })
  }

  private createClient(redirectUri?: string): OAuth2Client {
    return new OAuth2Client({
      clientId: this.secrets.clientId,
      clientSecret: this.secrets.clientSecret,
      redirectUri,
    })
  }
}
