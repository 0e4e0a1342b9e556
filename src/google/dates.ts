import type { PhotosDate } from './types.js'
import { InvalidArgumentError } from './errors.js'

const ISO_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2})(?::(\d{2})(?:\.\d{1,9})?)?(Z|[+-]\d{2}:\d{2})?)?$/

interface IsoParts {
  year: number
  month: number
  day: number
  hasTime: boolean
  hasOffset: boolean
}

function splitIso(value: string): IsoParts | null {
  const match = ISO_TIMESTAMP.exec(value.trim())
  if (match === null)
    return null

  const [, year, month, day, hour, minute, second, offset] = match
  const parts = {
    year: Number(year),
    month: Number(month),
    day: Number(day),
    hasTime: hour !== undefined,
    hasOffset: offset !== undefined,
  }

  // Date.UTC rolls 2024-02-30 over to March, so compare the fields back
  const probe = new Date(Date.UTC(parts.year, parts.month - 1, parts.day))
  if (probe.getUTCFullYear() !== parts.year || probe.getUTCMonth() !== parts.month - 1 || probe.getUTCDate() !== parts.day)
    return null
  if (hour !== undefined && (Number(hour) > 23 || Number(minute) > 59 || Number(second ?? '0') > 59))
    return null

  return parts
}

/**
 * Parses a strict ISO-8601 date or date-time. Values without an offset are
 * read as UTC. Returns null for anything else.
 */
export function parseIsoTimestamp(value: string): Date | null {
  const parts = splitIso(value)
  if (parts === null)
    return null
  const trimmed = value.trim()
  const millis = Date.parse(parts.hasTime && !parts.hasOffset ? `${trimmed}Z` : trimmed)
  return Number.isNaN(millis) ? null : new Date(millis)
}

/**
 * Takes the calendar date of an ISO-8601 timestamp exactly as written, with
 * no time-zone conversion, for a Photos date filter.
 */
export function toPhotosDate(value: string, field: string): PhotosDate {
  const parts = splitIso(value)
  if (parts === null) {
    throw new InvalidArgumentError(`${field} must be an ISO 8601 date or date-time, got "${value}"`, field)
  }
  return { year: parts.year, month: parts.month, day: parts.day }
}
