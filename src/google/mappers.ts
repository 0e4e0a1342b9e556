/**
 * Mappers for transforming Google API responses to internal types
 */

import type {
  CalendarEvent,
  GoogleApiEvent,
  GoogleApiEventList,
  GoogleApiMediaItem,
  GoogleApiMediaItemList,
  PhotoItem,
} from './types.js'

const UNTITLED_EVENT = '(No title)'

function isObject(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === 'object' && !Array.isArray(value)
}

function hasStringId(value: unknown): boolean {
  return isObject(value) && typeof value.id === 'string' && value.id !== ''
}

/**
 * Type guard for a single event resource
 */
export function isEventResponse(response: unknown): response is GoogleApiEvent {
  return hasStringId(response)
}

/**
 * Type guard for an events.list response. Google omits `items` when the
 * list is empty.
 */
export function isEventListResponse(response: unknown): response is GoogleApiEventList {
  if (!isObject(response))
    return false
  const { items } = response
  return items === undefined || (Array.isArray(items) && items.every(hasStringId))
}

/**
 * Type guard for a single media item resource
 */
export function isMediaItemResponse(response: unknown): response is GoogleApiMediaItem {
  return hasStringId(response)
}

/**
 * Type guard for mediaItems.list and mediaItems.search responses
 */
export function isMediaItemListResponse(response: unknown): response is GoogleApiMediaItemList {
  if (!isObject(response))
    return false
  const { mediaItems } = response
  return mediaItems === undefined || (Array.isArray(mediaItems) && mediaItems.every(hasStringId))
}

export function mapEvent(apiEvent: GoogleApiEvent): CalendarEvent {
  return {
    id: apiEvent.id,
    summary: apiEvent.summary != null && apiEvent.summary !== '' ? apiEvent.summary : UNTITLED_EVENT,
    start: apiEvent.start ?? {},
    end: apiEvent.end ?? {},
    description: apiEvent.description,
    location: apiEvent.location,
  }
}

export function mapEventList(apiList: GoogleApiEventList): CalendarEvent[] {
  return (apiList.items ?? []).map(mapEvent)
}

export function mapPhoto(apiItem: GoogleApiMediaItem): PhotoItem {
  return {
    id: apiItem.id,
    filename: apiItem.filename ?? apiItem.id,
    mimeType: apiItem.mimeType ?? 'application/octet-stream',
    mediaMetadata: apiItem.mediaMetadata ?? {},
    baseUrl: apiItem.baseUrl ?? '',
  }
}

export function mapPhotoList(apiList: GoogleApiMediaItemList): PhotoItem[] {
  return (apiList.mediaItems ?? []).map(mapPhoto)
}
