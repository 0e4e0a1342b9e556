/**
 * Google API module exports
 */

export { parseIsoTimestamp, toPhotosDate } from './dates.js'
export {
  InvalidArgumentError,
  isUnauthenticated,
  NotFoundError,
  RemoteApiError,
  ServiceBuildError,
} from './errors.js'
export { GoogleSession } from './session.js'
export type { ApiSession, SessionConfig, SessionRequestOptions } from './session.js'
export type {
  CalendarEvent,
  CreateEventInput,
  EventDateTime,
  EventRef,
  ListEventsInput,
  ListPhotosInput,
  MediaType,
  PhotoItem,
  SearchPhotosInput,
  UpdateEventInput,
} from './types.js'
