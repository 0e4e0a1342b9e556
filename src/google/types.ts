/**
 * Google Calendar and Photos types used by the API session
 */

export interface EventDateTime {
  dateTime?: string
  /** Set instead of `dateTime` for all-day events. */
  date?: string
  timeZone?: string
}

export interface CalendarEvent {
  id: string
  summary: string
  start: EventDateTime
  end: EventDateTime
  description?: string
  location?: string
}

export interface PhotoMetadata {
  cameraMake?: string
  cameraModel?: string
}

export interface MediaMetadata {
  creationTime?: string
  width?: string
  height?: string
  photo?: PhotoMetadata
}

export interface PhotoItem {
  id: string
  filename: string
  mimeType: string
  mediaMetadata: MediaMetadata
  baseUrl: string
}

export type MediaType = 'PHOTO' | 'VIDEO'

/**
 * Calendar date as the Photos Library API expects it in date filters
 */
export interface PhotosDate {
  year: number
  month: number
  day: number
}

export interface CreateEventInput {
  summary: string
  startTime: string
  endTime: string
  description: string
  location: string
  calendarId: string
}

export interface ListEventsInput {
  calendarId: string
  maxResults: number
}

export interface EventRef {
  eventId: string
  calendarId: string
}

/**
 * Fields left undefined keep their current value; an empty string clears
 * description or location.
 */
export interface UpdateEventInput extends EventRef {
  summary?: string
  startTime?: string
  endTime?: string
  description?: string
  location?: string
}

export interface ListPhotosInput {
  pageSize: number
}

export interface SearchPhotosInput {
  startDate?: string
  endDate?: string
  mediaType?: MediaType
  pageSize: number
}

/**
 * Raw Google API payloads
 */
export interface GoogleApiEvent {
  id: string
  summary?: string
  description?: string
  location?: string
  start?: EventDateTime
  end?: EventDateTime
  [key: string]: unknown
}

export interface GoogleApiEventList {
  items?: GoogleApiEvent[]
}

export interface GoogleApiMediaItem {
  id: string
  filename?: string
  mimeType?: string
  baseUrl?: string
  mediaMetadata?: MediaMetadata
}

export interface GoogleApiMediaItemList {
  mediaItems?: GoogleApiMediaItem[]
}
