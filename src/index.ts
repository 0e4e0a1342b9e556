import { existsSync } from 'node:fs'
import process from 'node:process'
import { Server } from '@modelcontextprotocol/sdk/server/index.js'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js'
import { CredentialStore } from './auth/credentialStore.js'
import { loadConfigFromEnv } from './config/index.js'
import { createLogger } from './logging/index.js'
import { allDefinitions } from './tools/registry.js'
import { ToolRouter } from './tools/toolRouter.js'

const logger = createLogger('google-calendar-photos-mcp')

async function start(): Promise<void> {
  try {
    // Load configuration
    const config = loadConfigFromEnv()

    if (!existsSync(config.credentialsPath)) {
      logger.warn('OAuth client credentials file not found; tool calls will fail until it is in place', {
        path: config.credentialsPath,
      })
    }

    // Credentials are acquired lazily, on the first tool call
    const credentialStore = new CredentialStore(config)
    const router = new ToolRouter({ credentials: credentialStore, config })

    // Create MCP server
    const server = new Server(
      {
        name: 'google-calendar-photos-mcp',
        version: '0.1.0',
      },
      {
        capabilities: {
          tools: {},
        },
      },
    )

    server.setRequestHandler(ListToolsRequestSchema, async () => {
      return { tools: allDefinitions() }
    })

    server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
      return router.dispatch(request.params.name, request.params.arguments ?? {}, { signal: extra.signal })
    })

    // Start the server
    const transport = new StdioServerTransport()
    await server.connect(transport)

    logger.info('Server started successfully')
  }
  catch (error) {
    logger.error('Fatal error during startup', { error })
    process.exitCode = 1
  }
}

start().catch((error: unknown) => {
  logger.error('Unexpected error', { error })
  process.exitCode = 1
})
