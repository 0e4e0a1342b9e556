/**
 * Renders tool results and failures as MCP text content
 */

import type { CalendarEvent, EventDateTime, PhotoItem, SearchPhotosInput, UpdateEventInput } from '../google/index.js'
import type { ToolFailure } from './errors.js'
import { parseIsoTimestamp } from '../google/index.js'

export type ToolResponse = {
  content: Array<{ type: 'text', text: string }>
  isError: boolean
}

const SUCCESS = '✅'
const FAILURE = '❌'
const DESCRIPTION_LIMIT = 100

export function successResponse(text: string): ToolResponse {
  return { content: [{ type: 'text', text }], isError: false }
}

/**
 * `❌ Kind (tool): message`, or `❌ Kind: message` when no tool is known
 */
export function failureResponse(failure: ToolFailure): ToolResponse {
  const label = failure.toolName === undefined ? failure.kind : `${failure.kind} (${failure.toolName})`
  return { content: [{ type: 'text', text: `${FAILURE} ${label}: ${failure.message}` }], isError: true }
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * `YYYY-MM-DD HH:MM:SS UTC` for a strict ISO-8601 value, the raw value
 * otherwise
 */
export function formatTimestamp(value: string): string {
  const parsed = parseIsoTimestamp(value)
  if (parsed === null) {
    return value
  }
  const date = `${parsed.getUTCFullYear()}-${pad(parsed.getUTCMonth() + 1)}-${pad(parsed.getUTCDate())}`
  const time = `${pad(parsed.getUTCHours())}:${pad(parsed.getUTCMinutes())}:${pad(parsed.getUTCSeconds())}`
  return `${date} ${time} UTC`
}

/**
 * Cuts by code points so a surrogate pair is never split
 */
export function truncate(text: string, limit = DESCRIPTION_LIMIT): string {
  const chars = Array.from(text)
  return chars.length > limit ? `${chars.slice(0, limit).join('')}...` : text
}

function formatEventTime(time: EventDateTime): string {
  if (time.dateTime !== undefined) {
    return formatTimestamp(time.dateTime)
  }
  if (time.date !== undefined) {
    return `${time.date} (all day)`
  }
  return 'Unknown'
}

export function formatCreatedEvent(eventId: string, input: { summary: string, startTime: string, endTime: string }): string {
  return [
    `${SUCCESS} Calendar event created successfully!`,
    `Event ID: ${eventId}`,
    `Title: ${input.summary}`,
    `Start: ${input.startTime}`,
    `End: ${input.endTime}`,
  ].join('\n')
}

export function formatEventList(events: CalendarEvent[]): string {
  if (events.length === 0) {
    return `${SUCCESS} No upcoming events found in your calendar.`
  }

  const blocks = events.map((event, index) => {
    const lines = [
      `${index + 1}. **${event.summary}**`,
      `   🕒 Time: ${formatEventTime(event.start)}`,
      `   🆔 ID: ${event.id}`,
    ]
    if (event.location != null && event.location !== '') {
      lines.push(`   📍 Location: ${event.location}`)
    }
    if (event.description != null && event.description !== '') {
      lines.push(`   📝 Description: ${truncate(event.description)}`)
    }
    return lines.join('\n')
  })

  const noun = events.length === 1 ? 'event' : 'events'
  return `${SUCCESS} Found ${events.length} upcoming calendar ${noun}:\n\n${blocks.join('\n\n')}`
}

export function formatUpdatedEvent(input: UpdateEventInput): string {
  const updates: string[] = []
  if (input.summary !== undefined)
    updates.push(`Title: ${input.summary}`)
  if (input.startTime !== undefined)
    updates.push(`Start: ${input.startTime}`)
  if (input.endTime !== undefined)
    updates.push(`End: ${input.endTime}`)
  if (input.description !== undefined)
    updates.push(input.description === '' ? 'Description cleared' : 'Description updated')
  if (input.location !== undefined)
    updates.push(input.location === '' ? 'Location cleared' : `Location: ${input.location}`)
  if (updates.length === 0)
    updates.push('No fields changed')

  return [
    `${SUCCESS} Calendar event updated successfully!`,
    `Event ID: ${input.eventId}`,
    'Updates made:',
    ...updates.map(update => `  • ${update}`),
  ].join('\n')
}

export function formatDeletedEvent(eventId: string): string {
  return `${SUCCESS} Calendar event deleted successfully!\nEvent ID: ${eventId}`
}

function formatPhoto(photo: PhotoItem, index: number): string {
  const lines = [
    `${index + 1}. **${photo.filename}**`,
    `   🆔 ID: ${photo.id}`,
    `   📄 Type: ${photo.mimeType}`,
  ]
  const { creationTime, photo: camera } = photo.mediaMetadata
  if (creationTime != null && creationTime !== '') {
    lines.push(`   📅 Created: ${formatTimestamp(creationTime)}`)
  }
  if (camera?.cameraMake != null && camera.cameraMake !== '') {
    const model = camera.cameraModel != null && camera.cameraModel !== '' ? ` ${camera.cameraModel}` : ''
    lines.push(`   📷 Camera: ${camera.cameraMake}${model}`)
  }
  return lines.join('\n')
}

function photoCount(count: number): string {
  return `${count} ${count === 1 ? 'photo' : 'photos'}`
}

export function formatPhotoList(photos: PhotoItem[]): string {
  if (photos.length === 0) {
    return `${SUCCESS} No photos found in your Google Photos library.`
  }
  return `${SUCCESS} Found ${photoCount(photos.length)} in your Google Photos library:\n\n${photos.map(formatPhoto).join('\n\n')}`
}

/**
 * Human-readable summary of the filters a search ran with
 */
export function describeSearchCriteria(input: Omit<SearchPhotosInput, 'pageSize'>): string {
  const criteria: string[] = []
  if (input.startDate !== undefined)
    criteria.push(`after ${input.startDate}`)
  if (input.endDate !== undefined)
    criteria.push(`before ${input.endDate}`)
  if (input.mediaType !== undefined)
    criteria.push(`type: ${input.mediaType}`)
  return criteria.length > 0 ? criteria.join(' and ') : 'no filters'
}

export function formatPhotoSearch(photos: PhotoItem[], input: SearchPhotosInput): string {
  const criteria = describeSearchCriteria(input)
  if (photos.length === 0) {
    return `${SUCCESS} No photos found matching search criteria (${criteria}).`
  }
  return `${SUCCESS} Found ${photoCount(photos.length)} matching search criteria (${criteria}):\n\n${photos.map(formatPhoto).join('\n\n')}`
}

export function formatDownloadUrl(photoId: string, url: string): string {
  return [
    `${SUCCESS} Download URL for photo ${photoId}:`,
    '',
    `🔗 URL: ${url}`,
    '',
    '⚠️ Note: This URL expires in approximately 1 hour. Use it promptly to download the full-resolution photo.',
  ].join('\n')
}
