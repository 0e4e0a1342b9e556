import type { IncomingMessage, Server, ServerResponse } from 'node:http'
import type { Logger } from '../logging/index.js'
import type { OAuthClient } from './oauthClient.js'
import type { Credentials } from './types.js'
import { randomBytes } from 'node:crypto'
import { createServer } from 'node:http'
import { createLogger } from '../logging/index.js'
import { AuthFlowError } from './errors.js'

export interface ConsentFlowOptions {
  /** Loopback port to listen on; 0 picks a free one. */
  port: number
  timeoutMs: number
  /** Receives the consent URL the user has to open. Defaults to logging it. */
  onAuthUrl?: (url: string) => void
  logger?: Logger
}

export type ConsentOAuthClient = Pick<OAuthClient, 'buildAuthUrl' | 'exchangeCode'>

const LOOPBACK_HOST = '127.0.0.1'

async function listen(server: Server, port: number): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject)
    server.listen(port, LOOPBACK_HOST, () => {
      server.off('error', reject)
      const address = server.address()
      if (address === null || typeof address === 'string') {
        reject(new AuthFlowError('Loopback listener has no TCP address'))
        return
      }
      resolve(address.port)
    })
  })
}

function respond(res: ServerResponse, status: number, message: string, onSent?: () => void): void {
  res.writeHead(status, { 'content-type': 'text/plain; charset=utf-8', 'connection': 'close' })
  res.end(message, onSent)
}

/**
 * Runs the installed-app OAuth consent flow: serves a loopback redirect
 * target, hands the consent URL to the user and exchanges the returned
 * authorization code for credentials.
 */
export async function runConsentFlow(oauth: ConsentOAuthClient, options: ConsentFlowOptions): Promise<Credentials> {
  const logger = options.logger ?? createLogger('ConsentFlow')
  const onAuthUrl = options.onAuthUrl ?? ((url: string) => {
    logger.info('Open this URL in a browser to grant Google Calendar and Photos access', { url })
  })
  const state = randomBytes(16).toString('hex')
  const server = createServer()

  let port: number
  try {
    port = await listen(server, options.port)
  }
  catch (err: unknown) {
    server.close()
    const message = err instanceof Error ? err.message : String(err)
    throw new AuthFlowError(`Could not start the OAuth redirect listener: ${message}`, { cause: err })
  }
  const redirectUri = `http://${LOOPBACK_HOST}:${port}`

  try {
    const code = await new Promise<string>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(new AuthFlowError(`Consent was not completed within ${options.timeoutMs}ms`))
      }, options.timeoutMs)

      const settle = (error: AuthFlowError | null, value?: string): void => {
        clearTimeout(timer)
        server.off('request', onRequest)
        if (error !== null)
          reject(error)
        else if (value !== undefined)
          resolve(value)
      }

      function onRequest(req: IncomingMessage, res: ServerResponse): void {
        const url = new URL(req.url ?? '/', redirectUri)
        if (url.pathname !== '/') {
          respond(res, 404, 'Not found')
          return
        }

        // Settle once the page is flushed; the listener is torn down right after
        const denied = url.searchParams.get('error')
        if (denied !== null) {
          respond(res, 400, 'Authorization was not granted. You can close this window.', () => {
            settle(new AuthFlowError(`Consent was denied: ${denied}`, { details: { reason: denied } }))
          })
          return
        }

        if (url.searchParams.get('state') !== state) {
          respond(res, 400, 'Authorization state did not match. Please retry.', () => {
            settle(new AuthFlowError('Consent response carried an unexpected state parameter'))
          })
          return
        }

        const received = url.searchParams.get('code')
        if (received === null || received === '') {
          respond(res, 400, 'Authorization code missing. Please retry.', () => {
            settle(new AuthFlowError('Consent response did not include an authorization code'))
          })
          return
        }

        respond(res, 200, 'Authorization complete. You can close this window.', () => {
          settle(null, received)
        })
      }

      server.on('request', onRequest)

      try {
        onAuthUrl(oauth.buildAuthUrl(redirectUri, state))
      }
      catch (err: unknown) {
        const message = err instanceof Error ? err.message : String(err)
        settle(new AuthFlowError(`Could not build the consent URL: ${message}`, { cause: err }))
      }
    })

    try {
      return await oauth.exchangeCode(code, redirectUri)
    }
    catch (err: unknown) {
      if (err instanceof AuthFlowError)
        throw err
      const message = err instanceof Error ? err.message : String(err)
      throw new AuthFlowError(`Authorization code could not be exchanged: ${message}`, { cause: err })
    }
  }
  finally {
    server.closeAllConnections()
    server.close()
  }
}
