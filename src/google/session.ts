/**
 * GoogleSession - typed access to the Calendar v3 and Photos Library v1
 * REST endpoints, bound to one access token
 */

import type { Credentials } from '../auth/types.js'
import type { AppConfig } from '../config/index.js'
import type { Logger } from '../logging/index.js'
import type {
  CalendarEvent,
  CreateEventInput,
  EventRef,
  GoogleApiEvent,
  ListEventsInput,
  ListPhotosInput,
  PhotoItem,
  SearchPhotosInput,
  UpdateEventInput,
} from './types.js'
import { extractErrorStatus, HttpClient, HttpError, HttpErrorType, HttpTransportError } from '../http/index.js'
import { createLogger } from '../logging/index.js'
import { toPhotosDate } from './dates.js'
import { InvalidArgumentError, NotFoundError, RemoteApiError, ServiceBuildError } from './errors.js'
import {
  isEventListResponse,
  isEventResponse,
  isMediaItemListResponse,
  isMediaItemResponse,
  mapEvent,
  mapEventList,
  mapPhoto,
  mapPhotoList,
} from './mappers.js'

export interface SessionRequestOptions {
  signal?: AbortSignal
}

/**
 * One method per remote operation. Failures reject with RemoteApiError
 * (NotFoundError for a missing event or media item) or InvalidArgumentError.
 */
export interface ApiSession {
  /** The access token every request of this session carries. */
  readonly accessToken: string
  createEvent: (input: CreateEventInput, options?: SessionRequestOptions) => Promise<string>
  listEvents: (input: ListEventsInput, options?: SessionRequestOptions) => Promise<CalendarEvent[]>
  getEvent: (ref: EventRef, options?: SessionRequestOptions) => Promise<CalendarEvent>
  updateEvent: (input: UpdateEventInput, options?: SessionRequestOptions) => Promise<void>
  deleteEvent: (ref: EventRef, options?: SessionRequestOptions) => Promise<void>
  listPhotos: (input: ListPhotosInput, options?: SessionRequestOptions) => Promise<PhotoItem[]>
  searchPhotos: (input: SearchPhotosInput, options?: SessionRequestOptions) => Promise<PhotoItem[]>
  resolveDownloadUrl: (photoId: string, options?: SessionRequestOptions) => Promise<string>
}

export type SessionConfig = Pick<AppConfig, 'calendarApiBaseUrl' | 'photosApiBaseUrl' | 'requestTimeoutMs'>

const EVENT_TIME_ZONE = 'UTC'
const DOWNLOAD_SUFFIX = '=d'

interface NotFoundPolicy {
  /** What was addressed, for the error message. */
  entity: string
  /** Photos answers 400 INVALID_ARGUMENT for a malformed media item id. */
  invalidIdMeansMissing?: boolean
}

/**
 * Translates HTTP-layer failures into the session's error types
 */
function toSessionError(error: unknown, operation: string, notFound?: NotFoundPolicy): unknown {
  if (error instanceof RemoteApiError || error instanceof InvalidArgumentError) {
    return error
  }

  if (error instanceof HttpError) {
    if (notFound !== undefined) {
      const missing = error.type === HttpErrorType.NOT_FOUND
        || (notFound.invalidIdMeansMissing === true
          && error.type === HttpErrorType.INVALID_ARGUMENT
          && extractErrorStatus(error.response) === 'INVALID_ARGUMENT')
      if (missing) {
        return new NotFoundError(error.status, `${operation} failed: ${notFound.entity} was not found`, { cause: error })
      }
    }
    return new RemoteApiError(error.status, `${operation} failed: ${error.message}`, { cause: error })
  }

  if (error instanceof HttpTransportError) {
    return new RemoteApiError(0, `${operation} failed: ${error.message}`, { cause: error })
  }

  return error
}

function unexpectedFormat(status: number, operation: string): RemoteApiError {
  return new RemoteApiError(status, `${operation} failed: unexpected response format`)
}

export class GoogleSession implements ApiSession {
  readonly accessToken: string
  private readonly calendar: HttpClient
  private readonly photos: HttpClient
  private readonly logger: Logger

  private constructor(accessToken: string, config: SessionConfig, logger: Logger) {
    this.accessToken = accessToken
    this.logger = logger
    this.calendar = new HttpClient({ baseUrl: config.calendarApiBaseUrl, timeoutMs: config.requestTimeoutMs }, logger)
    this.photos = new HttpClient({ baseUrl: config.photosApiBaseUrl, timeoutMs: config.requestTimeoutMs }, logger)
    this.calendar.setAuthorizationHeader(accessToken)
    this.photos.setAuthorizationHeader(accessToken)
  }

  /**
   * Binds Calendar and Photos handles to the given credentials
   */
  static build(credentials: Credentials, config: SessionConfig, logger?: Logger): ApiSession {
    if (credentials.accessToken.trim() === '') {
      throw new ServiceBuildError('Credentials carry no access token')
    }
    return new GoogleSession(credentials.accessToken, config, logger ?? createLogger('GoogleSession'))
  }

  async createEvent(input: CreateEventInput, options: SessionRequestOptions = {}): Promise<string> {
    const operation = 'Creating calendar event'
    try {
      const response = await this.calendar.post(eventsPath(input.calendarId), {
        summary: input.summary,
        location: input.location,
        description: input.description,
        start: { dateTime: input.startTime, timeZone: EVENT_TIME_ZONE },
        end: { dateTime: input.endTime, timeZone: EVENT_TIME_ZONE },
      }, { signal: options.signal })

      if (!isEventResponse(response.data)) {
        throw unexpectedFormat(response.status, operation)
      }
      this.logger.info('Created calendar event', { eventId: response.data.id, calendarId: input.calendarId })
      return response.data.id
    }
    catch (error) {
      throw toSessionError(error, operation)
    }
  }

  async listEvents(input: ListEventsInput, options: SessionRequestOptions = {}): Promise<CalendarEvent[]> {
    const operation = 'Listing calendar events'
    try {
      const response = await this.calendar.get(eventsPath(input.calendarId), {
        query: {
          timeMin: new Date().toISOString(),
          maxResults: input.maxResults,
          singleEvents: true,
          orderBy: 'startTime',
        },
        signal: options.signal,
      })

      if (!isEventListResponse(response.data)) {
        throw unexpectedFormat(response.status, operation)
      }
      return mapEventList(response.data)
    }
    catch (error) {
      throw toSessionError(error, operation)
    }
  }

  async getEvent(ref: EventRef, options: SessionRequestOptions = {}): Promise<CalendarEvent> {
    return mapEvent(await this.fetchEvent(ref, 'Fetching calendar event', options))
  }

  async updateEvent(input: UpdateEventInput, options: SessionRequestOptions = {}): Promise<void> {
    const operation = 'Updating calendar event'
    const current = await this.fetchEvent(input, operation, options)

    const merged: GoogleApiEvent = { ...current }
    if (input.summary !== undefined)
      merged.summary = input.summary
    if (input.description !== undefined)
      merged.description = input.description
    if (input.location !== undefined)
      merged.location = input.location
    if (input.startTime !== undefined)
      merged.start = { dateTime: input.startTime, timeZone: EVENT_TIME_ZONE }
    if (input.endTime !== undefined)
      merged.end = { dateTime: input.endTime, timeZone: EVENT_TIME_ZONE }

    try {
      await this.calendar.put(eventPath(input), merged, { signal: options.signal })
      this.logger.info('Updated calendar event', { eventId: input.eventId, calendarId: input.calendarId })
    }
    catch (error) {
      throw toSessionError(error, operation, { entity: `event ${input.eventId}` })
    }
  }

  async deleteEvent(ref: EventRef, options: SessionRequestOptions = {}): Promise<void> {
    try {
      await this.calendar.delete(eventPath(ref), { signal: options.signal })
      this.logger.info('Deleted calendar event', { eventId: ref.eventId, calendarId: ref.calendarId })
    }
    catch (error) {
      throw toSessionError(error, 'Deleting calendar event', { entity: `event ${ref.eventId}` })
    }
  }

  async listPhotos(input: ListPhotosInput, options: SessionRequestOptions = {}): Promise<PhotoItem[]> {
    const operation = 'Listing photos'
    try {
      const response = await this.photos.get('mediaItems', {
        query: { pageSize: input.pageSize },
        signal: options.signal,
      })

      if (!isMediaItemListResponse(response.data)) {
        throw unexpectedFormat(response.status, operation)
      }
      return mapPhotoList(response.data)
    }
    catch (error) {
      throw toSessionError(error, operation)
    }
  }

  async searchPhotos(input: SearchPhotosInput, options: SessionRequestOptions = {}): Promise<PhotoItem[]> {
    const operation = 'Searching photos'
    const filters: Record<string, unknown> = {}

    if (input.startDate !== undefined || input.endDate !== undefined) {
      const range: Record<string, unknown> = {}
      if (input.startDate !== undefined)
        range.startDate = toPhotosDate(input.startDate, 'start_date')
      if (input.endDate !== undefined)
        range.endDate = toPhotosDate(input.endDate, 'end_date')
      filters.dateFilter = { ranges: [range] }
    }
    if (input.mediaType !== undefined) {
      filters.mediaTypeFilter = { mediaTypes: [input.mediaType] }
    }

    try {
      const response = await this.photos.post('mediaItems:search', {
        pageSize: input.pageSize,
        ...(Object.keys(filters).length > 0 ? { filters } : {}),
      }, { signal: options.signal })

      if (!isMediaItemListResponse(response.data)) {
        throw unexpectedFormat(response.status, operation)
      }
      return mapPhotoList(response.data)
    }
    catch (error) {
      throw toSessionError(error, operation)
    }
  }

  async resolveDownloadUrl(photoId: string, options: SessionRequestOptions = {}): Promise<string> {
    const operation = 'Resolving photo download URL'
    try {
      const response = await this.photos.get(`mediaItems/${encodeURIComponent(photoId)}`, { signal: options.signal })

      if (!isMediaItemResponse(response.data)) {
        throw unexpectedFormat(response.status, operation)
      }
      const { baseUrl } = mapPhoto(response.data)
      if (baseUrl === '') {
        throw new RemoteApiError(response.status, `${operation} failed: media item ${photoId} has no base URL`)
      }
      return `${baseUrl}${DOWNLOAD_SUFFIX}`
    }
    catch (error) {
      throw toSessionError(error, operation, { entity: `photo ${photoId}`, invalidIdMeansMissing: true })
    }
  }

  private async fetchEvent(ref: EventRef, operation: string, options: SessionRequestOptions): Promise<GoogleApiEvent> {
    try {
      const response = await this.calendar.get(eventPath(ref), { signal: options.signal })
      if (!isEventResponse(response.data)) {
        throw unexpectedFormat(response.status, operation)
      }
      return response.data
    }
    catch (error) {
      throw toSessionError(error, operation, { entity: `event ${ref.eventId}` })
    }
  }
}

function eventsPath(calendarId: string): string {
  return `calendars/${encodeURIComponent(calendarId)}/events`
}

function eventPath(ref: EventRef): string {
  return `${eventsPath(ref.calendarId)}/${encodeURIComponent(ref.eventId)}`
}
