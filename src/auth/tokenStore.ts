import type { AppConfig } from '../config/index.js'
import type { Credentials } from './types.js'
import { Buffer } from 'node:buffer'
import { createCipheriv, createDecipheriv, createHash, randomBytes } from 'node:crypto'
import { chmodSync, lstatSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from 'node:fs'
import { basename, dirname, join } from 'node:path'
import process from 'node:process'
import { AppError } from './errors.js'

interface EncryptedEnvelopeV1 {
  v: 1
  nonce: string
  tag: string
  ciphertext: string
}

function ensureParentDir(path: string): void {
  mkdirSync(dirname(path), { recursive: true })
}

function toBase64(input: Buffer): string {
  return input.toString('base64')
}

function fromBase64(input: string): Buffer {
  return Buffer.from(input, 'base64')
}

function deriveKeyBytesFromString(key: string): Buffer {
  // SHA-256 turns any passphrase into a 32-byte AES key
  return createHash('sha256').update(key, 'utf8').digest()
}

function encryptAesGcm(plaintext: Buffer, keyString: string): EncryptedEnvelopeV1 {
  const key = deriveKeyBytesFromString(keyString)
  const iv = randomBytes(12)
  const cipher = createCipheriv('aes-256-gcm', key, iv)
  const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()])
  const tag = cipher.getAuthTag()
  return {
    v: 1,
    nonce: toBase64(iv),
    tag: toBase64(tag),
    ciphertext: toBase64(ciphertext),
  }
}

function decryptAesGcm(envelope: EncryptedEnvelopeV1, keyString: string): Buffer {
  const key = deriveKeyBytesFromString(keyString)
  const iv = fromBase64(envelope.nonce)
  const tag = fromBase64(envelope.tag)
  const ciphertext = fromBase64(envelope.ciphertext)
  const decipher = createDecipheriv('aes-256-gcm', key, iv)
  decipher.setAuthTag(tag)
  return Buffer.concat([decipher.update(ciphertext), decipher.final()])
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === 'object' && !Array.isArray(value)
}

function isEncryptedEnvelope(value: unknown): value is EncryptedEnvelopeV1 {
  if (!isRecord(value))
    return false
  return value.v === 1
    && typeof value.nonce === 'string'
    && typeof value.tag === 'string'
    && typeof value.ciphertext === 'string'
}

export function isCredentials(value: unknown): value is Credentials {
  if (!isRecord(value))
    return false
  const { accessToken, expiresAt, refreshToken, scopes } = value
  return typeof accessToken === 'string'
    && accessToken.length > 0
    && typeof expiresAt === 'number'
    && Number.isFinite(expiresAt)
    && (refreshToken === undefined || typeof refreshToken === 'string')
    && Array.isArray(scopes)
    && scopes.every(scope => typeof scope === 'string')
}

/**
 * Durable storage for OAuth credentials. Writes go to a sibling temp file
 * that is renamed over the target, so an interrupted write leaves the
 * previous token file intact.
 */
export class TokenStore {
  private readonly path: string
  private readonly encryptionKey?: string

  constructor(config: Pick<AppConfig, 'tokensPath' | 'encryptionKey'>) {
    this.path = config.tokensPath
    this.encryptionKey = config.encryptionKey
  }

  get location(): string {
    return this.path
  }

  read(): Credentials {
    let text: string
    try {
      this.assertRegularFile()
      const data = readFileSync(this.path)
      text = typeof this.encryptionKey === 'string' && this.encryptionKey.length > 0
        ? this.decryptEnvelopeToJson(data, this.encryptionKey)
        : data.toString('utf8')
    }
    catch (err: unknown) {
      if (err instanceof AppError)
        throw err
      if (isNodeErrno(err) && err.code === 'ENOENT') {
        throw new AppError('TOKENS_NOT_FOUND', `Tokens file not found at ${this.path}`, { details: { path: this.path } })
      }
      throw new AppError('INTERNAL', 'Failed to read tokens', { cause: err, details: { path: this.path } })
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    }
    catch (err: unknown) {
      throw new AppError('INTERNAL', 'Failed to parse tokens', { cause: err, details: { path: this.path } })
    }

    if (!isCredentials(parsed)) {
      throw new AppError('TOKENS_FORMAT_UNSUPPORTED', 'Tokens file does not contain usable credentials', { details: { path: this.path } })
    }
    return parsed
  }

  write(credentials: Credentials): void {
    ensureParentDir(this.path)
    const jsonText = JSON.stringify(credentials, null, 2)
    const encryptionKey = this.encryptionKey
    const bytes = typeof encryptionKey === 'string' && encryptionKey.length > 0
      ? Buffer.from(JSON.stringify(encryptAesGcm(Buffer.from(jsonText, 'utf8'), encryptionKey)))
      : Buffer.from(jsonText, 'utf8')

    const tempPath = join(dirname(this.path), `.${basename(this.path)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`)
    try {
      writeFileSync(tempPath, bytes, { mode: 0o600 })
      // umask may have widened the mode
      chmodSync(tempPath, 0o600)
      renameSync(tempPath, this.path)
    }
    catch (err: unknown) {
      rmSync(tempPath, { force: true })
      throw new AppError('INTERNAL', 'Failed to write tokens', { cause: err, details: { path: this.path } })
    }
  }

  private decryptEnvelopeToJson(data: Buffer, encryptionKey: string): string {
    const envelope: unknown = JSON.parse(data.toString('utf8'))
    if (!isEncryptedEnvelope(envelope))
      throw new AppError('TOKENS_FORMAT_UNSUPPORTED', 'Unsupported tokens encryption format', { details: { path: this.path } })
    return decryptAesGcm(envelope, encryptionKey).toString('utf8')
  }

  private assertRegularFile(): void {
    const st = lstatSync(this.path)
    if (!st.isFile() || st.isSymbolicLink()) {
      throw new AppError('TOKENS_PATH_INVALID', 'Tokens path must be a regular file', { details: { path: this.path } })
    }
    if ((st.mode & 0o777) !== 0o600) {
      chmodSync(this.path, 0o600)
    }
  }
}

function isNodeErrno(value: unknown): value is NodeJS.ErrnoException {
  return typeof value === 'object' && value !== null && 'code' in value
}
