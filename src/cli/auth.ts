import type { Credentials } from '../auth/types.js'
import type { AppConfig } from '../config/index.js'
import process from 'node:process'
import { Command } from 'commander'
import { loadClientSecrets } from '../auth/clientSecrets.js'
import { runConsentFlow } from '../auth/consentFlow.js'
import { AppError } from '../auth/errors.js'
import { OAuthClient } from '../auth/oauthClient.js'
import { TokenStore } from '../auth/tokenStore.js'
import { loadConfigFromEnv, scopesFor } from '../config/index.js'

/**
 * Summary lines for `auth status`
 */
export function describeCredentials(credentials: Credentials, config: AppConfig, now = Date.now()): string[] {
  const expiry = new Date(credentials.expiresAt).toISOString()
  const missing = scopesFor(config).filter(scope => !credentials.scopes.includes(scope))

  const lines = [
    `Tokens stored at: ${config.tokensPath}`,
    `Access token expires: ${expiry}${credentials.expiresAt <= now ? ' (expired)' : ''}`,
    `Refresh token: ${credentials.refreshToken === undefined ? 'missing' : 'present'}`,
    `Scopes: ${credentials.scopes.length > 0 ? credentials.scopes.join(', ') : '(none)'}`,
  ]
  if (missing.length > 0) {
    lines.push(`Missing scopes: ${missing.join(', ')} (run "auth login" again)`)
  }
  return lines
}

function reportError(error: unknown, action: string): void {
  if (error instanceof AppError) {
    switch (error.code) {
      case 'AUTH_CONFIG':
        console.error(`❌ ${error.message}`)
        break
      case 'AUTH_FLOW':
        console.error(`❌ Sign-in was not completed: ${error.message}`)
        break
      case 'OAUTH_UNAUTHORIZED':
        console.error('❌ Google rejected the authorization. Check the OAuth client credentials and try again.')
        break
      case 'OAUTH_NETWORK':
        console.error('❌ Network error while talking to Google. Please check your connection.')
        break
      case 'TOKENS_NOT_FOUND':
        console.error('❌ No stored tokens. Run "auth login" first.')
        break
      case 'TOKENS_FORMAT_UNSUPPORTED':
      case 'TOKENS_PATH_INVALID':
      case 'INTERNAL':
      default:
        console.error(`❌ ${action} error: ${error.message}`)
    }
  }
  else if (error instanceof Error) {
    console.error(`❌ Error: ${error.message}`)
  }
  else {
    console.error('❌ An unexpected error occurred')
  }
}

async function login(): Promise<void> {
  const config = loadConfigFromEnv()
  const oauth = new OAuthClient(loadClientSecrets(config.credentialsPath), scopesFor(config))

  const credentials = await runConsentFlow(oauth, {
    port: config.oauthPort,
    timeoutMs: config.consentTimeoutMs,
    onAuthUrl: (url) => {
      console.log('Open this URL in your browser to grant access to Google Calendar and Google Photos:\n')
      console.log(url)
      console.log('\nWaiting for the authorization to complete...')
    },
  })

  new TokenStore(config).write(credentials)
  console.log(`✅ Authentication successful! Tokens stored at: ${config.tokensPath}`)
}

function status(): void {
  const config = loadConfigFromEnv()
  const credentials = new TokenStore(config).read()
  for (const line of describeCredentials(credentials, config)) {
    console.log(line)
  }
}

export function createProgram(): Command {
  const program = new Command()
  program
    .name('google-calendar-photos-mcp-auth')
    .description('Manage the Google OAuth credentials used by the MCP server')

  program
    .command('login')
    .description('Sign in with Google in the browser and store tokens')
    .action(async () => {
      try {
        await login()
      }
      catch (error) {
        reportError(error, 'Login')
        process.exitCode = 1
      }
    })

  program
    .command('status')
    .description('Show whether tokens are stored, when they expire and which scopes they carry')
    .action(() => {
      try {
        status()
      }
      catch (error) {
        reportError(error, 'Status')
        process.exitCode = 1
      }
    })

  return program
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv)
}

// Check if this module is being run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  void main()
}
