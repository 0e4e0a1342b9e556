import type { AppConfig } from '../config/index.js'
import type { Logger } from '../logging/index.js'
import type { Credentials } from './types.js'
import { scopesFor } from '../config/index.js'
import { createLogger } from '../logging/index.js'
import { loadClientSecrets } from './clientSecrets.js'
import { runConsentFlow } from './consentFlow.js'
import { AppError, AuthConfigError } from './errors.js'
import { OAuthClient } from './oauthClient.js'
import { TokenStore } from './tokenStore.js'

/**
 * What the tool router needs from the credential lifecycle.
 */
export interface CredentialProvider {
  ensureValid: () => Promise<Credentials>
  invalidate: (rejectedToken: string) => void
}

export type ConsentRunner = (oauth: OAuthClient) => Promise<Credentials>

export interface CredentialStoreOptions {
  logger?: Logger
  /** Replaces the loopback consent flow (used by tests and alternative front ends). */
  consent?: ConsentRunner
  onAuthUrl?: (url: string) => void
}

export class CredentialStore implements CredentialProvider {
  private readonly config: AppConfig
  private readonly refreshBufferSec: number
  private readonly requiredScopes: string[]
  private readonly tokenStore: TokenStore
  private readonly logger: Logger
  private readonly consent: ConsentRunner

  private cached: Credentials | null = null
  private inFlight: Promise<Credentials> | null = null
  private oauthClient: OAuthClient | null = null

  constructor(config: AppConfig, options: CredentialStoreOptions = {}) {
    this.config = config
    this.refreshBufferSec = config.tokenRefreshBufferSec
    this.requiredScopes = scopesFor(config)
    this.tokenStore = new TokenStore(config)
    this.logger = options.logger ?? createLogger('CredentialStore')
    this.consent = options.consent ?? (async oauth => runConsentFlow(oauth, {
      port: config.oauthPort,
      timeoutMs: config.consentTimeoutMs,
      onAuthUrl: options.onAuthUrl,
      logger: this.logger,
    }))
  }

  /**
   * Returns usable credentials, refreshing or running consent when needed.
   * Cached credentials that are not about to expire are returned without
   * any I/O; concurrent callers share a single acquisition.
   */
  async ensureValid(): Promise<Credentials> {
    if (this.cached !== null && !this.isExpiringSoon(this.cached)) {
      return this.cached
    }
    if (this.inFlight === null) {
      this.inFlight = this.acquire().finally(() => {
        this.inFlight = null
      })
    }
    return this.inFlight
  }

  /**
   * Marks the cached access token unusable after the remote API rejected
   * it. A token that was already replaced is left alone. The refresh token
   * is kept for the next ensureValid().
   */
  invalidate(rejectedToken: string): void {
    if (this.cached !== null && this.cached.accessToken === rejectedToken) {
      this.cached = { ...this.cached, expiresAt: 0 }
    }
  }

  private async acquire(): Promise<Credentials> {
    const stored = this.cached ?? this.loadPersisted()

    if (stored !== null && !this.hasRequiredScopes(stored)) {
      this.logger.warn('Stored credentials lack required scopes, requesting consent again', {
        granted: stored.scopes,
        required: this.requiredScopes,
      })
      return this.runConsent()
    }

    if (stored !== null && !this.isExpiringSoon(stored)) {
      this.cached = stored
      return stored
    }

    if (stored?.refreshToken !== undefined) {
      try {
        const refreshed = await this.oauth().refresh(stored.refreshToken, stored.scopes)
        this.logger.info('Refreshed access token', { expiresAt: new Date(refreshed.expiresAt).toISOString() })
        this.persist(refreshed)
        return refreshed
      }
      catch (err: unknown) {
        if (err instanceof AuthConfigError)
          throw err
        this.logger.warn('Token refresh failed, falling back to consent', describeError(err))
      }
    }

    return this.runConsent()
  }

  private async runConsent(): Promise<Credentials> {
    this.logger.info('No usable credentials, starting OAuth consent flow')
    const created = await this.consent(this.oauth())
    this.logger.info('OAuth consent completed')
    this.persist(created)
    return created
  }

  private loadPersisted(): Credentials | null {
    try {
      return this.tokenStore.read()
    }
    catch (err: unknown) {
      if (!(err instanceof AppError))
        throw err
      if (err.code === 'TOKENS_NOT_FOUND') {
        this.logger.info('No stored credentials found', { path: this.tokenStore.location })
      }
      else {
        this.logger.warn('Ignoring unreadable stored credentials', describeError(err))
      }
      return null
    }
  }

  private persist(credentials: Credentials): void {
    this.cached = credentials
    try {
      this.tokenStore.write(credentials)
    }
    catch (err: unknown) {
      // The in-memory credentials stay usable for this process
      this.logger.error('Failed to persist credentials', describeError(err))
    }
  }

  private oauth(): OAuthClient {
    if (this.oauthClient === null) {
      const secrets = loadClientSecrets(this.config.credentialsPath)
      this.oauthClient = new OAuthClient(secrets, this.requiredScopes)
    }
    return this.oauthClient
  }

  private hasRequiredScopes(credentials: Credentials): boolean {
    return this.requiredScopes.every(scope => credentials.scopes.includes(scope))
  }

  private isExpiringSoon(credentials: Credentials): boolean {
    const nowMs = Date.now()
    const bufferMs = this.refreshBufferSec * 1000
    return credentials.expiresAt <= (nowMs + bufferMs)
  }
}

function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof AppError)
    return { errorCode: err.code, message: err.message }
  if (err instanceof Error)
    return { error: err.name, message: err.message }
  return { error: String(err) }
}
