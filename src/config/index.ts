import { mkdirSync } from 'node:fs'
import { homedir } from 'node:os'
import { dirname, isAbsolute, join, resolve } from 'node:path'
import process from 'node:process'

export type PhotosAccess = 'readonly' | 'readwrite'

export interface AppConfig {
  credentialsPath: string
  tokensPath: string
  encryptionKey?: string
  photosAccess: PhotosAccess
  oauthPort: number
  consentTimeoutMs: number
  requestTimeoutMs: number
  tokenRefreshBufferSec: number
  calendarApiBaseUrl: string
  photosApiBaseUrl: string
}

const CONFIG_DIR = '~/.config/google-calendar-photos-mcp'

export const CALENDAR_SCOPE = 'https://www.googleapis.com/auth/calendar'
export const PHOTOS_SCOPE = 'https://www.googleapis.com/auth/photoslibrary'
export const PHOTOS_READONLY_SCOPE = 'https://www.googleapis.com/auth/photoslibrary.readonly'

function expandHomePath(inputPath: string): string {
  if (inputPath === '~')
    return homedir()
  if (inputPath.startsWith('~/')) {
    return join(homedir(), inputPath.slice(2))
  }
  return inputPath
}

function toAbsolutePath(inputPath: string): string {
  const expanded = expandHomePath(inputPath)
  return isAbsolute(expanded) ? expanded : resolve(process.cwd(), expanded)
}

function parsePositiveInt(value: unknown, fallback: number): number {
  const num = Number(value)
  if (!Number.isFinite(num) || num < 0)
    return fallback
  return Math.floor(num)
}

function parsePhotosAccess(value: string | undefined): PhotosAccess {
  if (value === undefined || value.trim() === '')
    return 'readwrite'
  const normalized = value.trim().toLowerCase()
  if (normalized === 'readonly' || normalized === 'readwrite')
    return normalized
  throw new Error(`Invalid GOOGLE_PHOTOS_ACCESS value "${value}" (expected "readonly" or "readwrite")`)
}

function withTrailingSlash(url: string): string {
  return url.endsWith('/') ? url : `${url}/`
}

/**
 * OAuth scopes requested during consent: full calendar access plus the
 * configured level of Photos Library access.
 */
export function scopesFor(config: Pick<AppConfig, 'photosAccess'>): string[] {
  return [
    CALENDAR_SCOPE,
    config.photosAccess === 'readonly' ? PHOTOS_READONLY_SCOPE : PHOTOS_SCOPE,
  ]
}

export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  const credentialsPath = toAbsolutePath(env.GOOGLE_CREDENTIALS_PATH ?? `${CONFIG_DIR}/credentials.json`)
  const tokensPath = toAbsolutePath(env.GOOGLE_TOKENS_PATH ?? `${CONFIG_DIR}/tokens.json`)

  // Ensure the token directory exists (cross-platform)
  mkdirSync(dirname(tokensPath), { recursive: true })

  const encryptionKeyRaw = env.GOOGLE_TOKENS_ENCRYPTION_KEY
  const encryptionKey = typeof encryptionKeyRaw === 'string'
    && encryptionKeyRaw.trim().length > 0
    ? encryptionKeyRaw.trim()
    : undefined

  return {
    credentialsPath,
    tokensPath,
    encryptionKey,
    photosAccess: parsePhotosAccess(env.GOOGLE_PHOTOS_ACCESS),
    oauthPort: parsePositiveInt(env.GOOGLE_OAUTH_PORT ?? 0, 0),
    consentTimeoutMs: parsePositiveInt(env.GOOGLE_CONSENT_TIMEOUT_MS ?? 300_000, 300_000),
    requestTimeoutMs: parsePositiveInt(env.GOOGLE_REQUEST_TIMEOUT_MS ?? 10_000, 10_000),
    tokenRefreshBufferSec: parsePositiveInt(env.GOOGLE_TOKEN_REFRESH_BUFFER_SEC ?? 120, 120),
    calendarApiBaseUrl: withTrailingSlash(env.GOOGLE_CALENDAR_API_BASE ?? 'https://www.googleapis.com/calendar/v3/'),
    photosApiBaseUrl: withTrailingSlash(env.GOOGLE_PHOTOS_API_BASE ?? 'https://photoslibrary.googleapis.com/v1/'),
  }
}
