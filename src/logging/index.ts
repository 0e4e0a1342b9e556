/**
 * Centralized structured logging with automatic sensitive data redaction.
 *
 * Every level writes to stderr: stdout is reserved for the MCP stdio transport.
 */

export type LogLevel = 'info' | 'warn' | 'error'

export interface LogMetadata {
  [key: string]: unknown
}

export interface Logger {
  info: (message: string, meta?: LogMetadata) => void
  warn: (message: string, meta?: LogMetadata) => void
  error: (message: string, meta?: LogMetadata) => void
  log: (message: string, meta?: LogMetadata) => void
}

const SENSITIVE_HEADERS = new Set([
  'authorization',
  'cookie',
  'x-goog-api-key',
])

const SENSITIVE_KEYS = new Set([
  'password',
  'token',
  'accesstoken',
  'access_token',
  'refreshtoken',
  'refresh_token',
  'id_token',
  'client_secret',
  'clientsecret',
  'code',
  'secret',
  'authorization',
])

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase()
  return SENSITIVE_KEYS.has(lowerKey) || SENSITIVE_HEADERS.has(lowerKey)
}

export function redactSensitiveData(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value
  }

  if (Array.isArray(value)) {
    return value.map(item => redactSensitiveData(item))
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message }
  }

  if (typeof value === 'object') {
    const redacted: Record<string, unknown> = {}
    for (const [key, val] of Object.entries(value)) {
      if (isSensitiveKey(key)) {
        redacted[key] = '[REDACTED]'
      }
      else {
        redacted[key] = redactSensitiveData(val)
      }
    }
    return redacted
  }

  return value
}

function formatLogMessage(level: LogLevel, message: string, meta?: LogMetadata): string {
  const timestamp = new Date().toISOString()
  const prefix = `[${timestamp}] [${level.toUpperCase()}]`

  if (!meta || Object.keys(meta).length === 0) {
    return `${prefix} ${message}`
  }

  const redactedMeta = redactSensitiveData(meta)
  return `${prefix} ${message} ${JSON.stringify(redactedMeta)}`
}

export function createLogger(name?: string): Logger {
  const logPrefix = (name !== undefined && name !== '') ? `[${name}] ` : ''

  return {
    info(message: string, meta?: LogMetadata) {
      console.error(formatLogMessage('info', logPrefix + message, meta))
    },

    warn(message: string, meta?: LogMetadata) {
      console.error(formatLogMessage('warn', logPrefix + message, meta))
    },

    error(message: string, meta?: LogMetadata) {
      console.error(formatLogMessage('error', logPrefix + message, meta))
    },

    log(message: string, meta?: LogMetadata) {
      this.info(message, meta)
    },
  }
}
