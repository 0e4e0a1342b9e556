/**
 * Routes MCP tool calls: makes sure credentials and the API session are
 * ready, validates arguments, runs the tool and turns every outcome into a
 * ToolResponse
 */

import type { CredentialProvider } from '../auth/credentialStore.js'
import type { Credentials } from '../auth/types.js'
import type { ApiSession, SessionConfig, SessionRequestOptions } from '../google/index.js'
import type { Logger } from '../logging/index.js'
import type { ToolFailure } from './errors.js'
import type { ToolResponse } from './formatters.js'
import type { ToolCall } from './registry.js'
import { GoogleSession, isUnauthenticated } from '../google/index.js'
import { createLogger } from '../logging/index.js'
import { CalendarTool } from './calendarTool.js'
import { authFailure, toToolFailure, UnknownToolError } from './errors.js'
import { failureResponse, successResponse } from './formatters.js'
import { PhotosTool } from './photosTool.js'
import { parseArguments, schemaFor, toolNames } from './registry.js'

export type RouterStatus = 'uninitialized' | 'authenticating' | 'ready' | 'failed'

export type SessionFactory = (credentials: Credentials, config: SessionConfig) => ApiSession

export interface ToolRouterOptions {
  credentials: CredentialProvider
  config: SessionConfig
  /** Defaults to GoogleSession.build */
  sessionFactory?: SessionFactory
  logger?: Logger
}

export interface DispatchOptions {
  signal?: AbortSignal
}

interface ReadyContext {
  session: ApiSession
  calendar: CalendarTool
  photos: PhotosTool
}

export class ToolRouter {
  private readonly credentials: CredentialProvider
  private readonly config: SessionConfig
  private readonly sessionFactory: SessionFactory
  private readonly logger: Logger

  private status: RouterStatus = 'uninitialized'
  private context: ReadyContext | null = null
  private pending: Promise<ReadyContext> | null = null

  constructor(options: ToolRouterOptions) {
    this.credentials = options.credentials
    this.config = options.config
    this.sessionFactory = options.sessionFactory ?? GoogleSession.build
    this.logger = options.logger ?? createLogger('ToolRouter')
  }

  get state(): RouterStatus {
    return this.status
  }

  /**
   * Handles one tools/call request. Never rejects: failures come back as
   * an error response.
   */
  async dispatch(name: string, rawArguments: unknown, options: DispatchOptions = {}): Promise<ToolResponse> {
    let context: ReadyContext
    try {
      context = await this.ensureReady()
    }
    catch (error) {
      return this.fail(authFailure(error, name))
    }

    if (schemaFor(name) === undefined) {
      this.logger.warn('Unknown tool requested', { name })
      return this.fail(toToolFailure(new UnknownToolError(name, toolNames()), name))
    }

    let call: ToolCall
    try {
      call = parseArguments(name, rawArguments)
    }
    catch (error) {
      return this.fail(toToolFailure(error, name))
    }

    const requestOptions: SessionRequestOptions = { signal: options.signal }
    this.logger.info('Running tool', { name })

    try {
      return successResponse(await run(context, call, requestOptions))
    }
    catch (error) {
      if (!isUnauthenticated(error)) {
        return this.fail(toToolFailure(error, name))
      }

      // The token was revoked or expired early: one re-authentication, one retry
      this.logger.warn('Remote API rejected the access token, re-authenticating', { name })
      this.credentials.invalidate(context.session.accessToken)
      let retryContext: ReadyContext
      try {
        retryContext = await this.ensureReady()
      }
      catch (authError) {
        this.logger.error('Re-authentication failed', { name, error: authError })
        return this.fail(toToolFailure(error, name))
      }

      try {
        return successResponse(await run(retryContext, call, requestOptions))
      }
      catch (retryError) {
        return this.fail(toToolFailure(retryError, name))
      }
    }
  }

  /**
   * Single-flight: concurrent dispatches share one authentication attempt
   */
  private async ensureReady(): Promise<ReadyContext> {
    if (this.pending === null) {
      this.pending = this.authenticate().finally(() => {
        this.pending = null
      })
    }
    return this.pending
  }

  private async authenticate(): Promise<ReadyContext> {
    if (this.status !== 'ready') {
      this.status = 'authenticating'
    }

    try {
      const credentials = await this.credentials.ensureValid()
      if (this.context === null || this.context.session.accessToken !== credentials.accessToken) {
        const session = this.sessionFactory(credentials, this.config)
        this.context = {
          session,
          calendar: new CalendarTool({ session }),
          photos: new PhotosTool({ session }),
        }
        this.logger.info('API session ready')
      }
      this.status = 'ready'
      return this.context
    }
    catch (error) {
      this.status = 'failed'
      this.context = null
      this.logger.error('Authentication failed', { error })
      throw error
    }
  }

  private fail(failure: ToolFailure): ToolResponse {
    this.logger.error('Tool call failed', { ...failure })
    return failureResponse(failure)
  }
}

async function run(context: ReadyContext, call: ToolCall, options: SessionRequestOptions): Promise<string> {
  switch (call.tool) {
    case 'create_calendar_event':
      return context.calendar.createEvent(call.args, options)
    case 'get_calendar_events':
      return context.calendar.listEvents(call.args, options)
    case 'update_calendar_event':
      return context.calendar.updateEvent(call.args, options)
    case 'delete_calendar_event':
      return context.calendar.deleteEvent(call.args, options)
    case 'get_photos':
      return context.photos.listPhotos(call.args, options)
    case 'search_photos':
      return context.photos.searchPhotos(call.args, options)
    case 'get_photo_download_url':
      return context.photos.getDownloadUrl(call.args.photoId, options)
  }
}
