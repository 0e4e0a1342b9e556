import type { ClientSecrets } from './types.js'
import { readFileSync } from 'node:fs'
import { AuthConfigError } from './errors.js'

function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === 'object' && !Array.isArray(value)
}

function readSection(document: Record<string, unknown>): Record<string, unknown> | undefined {
  for (const key of ['installed', 'web']) {
    const section = document[key]
    if (isRecord(section))
      return section
  }
  return undefined
}

/**
 * Loads the OAuth client-secret document downloaded from the Google Cloud
 * console ("Desktop app" or "Web application" client).
 */
export function loadClientSecrets(path: string): ClientSecrets {
  let text: string
  try {
    text = readFileSync(path, 'utf8')
  }
  catch (err: unknown) {
    throw new AuthConfigError(
      `OAuth client credentials file not found at ${path}. Download it from the Google Cloud console.`,
      { cause: err, details: { path } },
    )
  }

  let document: unknown
  try {
    document = JSON.parse(text)
  }
  catch (err: unknown) {
    throw new AuthConfigError(`OAuth client credentials file at ${path} is not valid JSON`, { cause: err, details: { path } })
  }

  if (!isRecord(document)) {
    throw new AuthConfigError(`OAuth client credentials file at ${path} must contain a JSON object`, { details: { path } })
  }

  const section = readSection(document)
  if (section === undefined) {
    throw new AuthConfigError(
      `OAuth client credentials file at ${path} has neither an "installed" nor a "web" section`,
      { details: { path } },
    )
  }

  const { client_id: clientId, client_secret: clientSecret } = section
  if (typeof clientId !== 'string' || clientId.trim() === '' || typeof clientSecret !== 'string' || clientSecret.trim() === '') {
    throw new AuthConfigError(
      `OAuth client credentials file at ${path} is missing client_id or client_secret`,
      { details: { path } },
    )
  }

  return { clientId, clientSecret }
}
