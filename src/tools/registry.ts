/**
 * Tool registry: the fixed catalogue of tools, their input schemas and the
 * argument parsers that turn an untyped argument bag into typed input
 */

import type {
  CreateEventInput,
  EventRef,
  ListEventsInput,
  ListPhotosInput,
  MediaType,
  SearchPhotosInput,
  UpdateEventInput,
} from '../google/index.js'
import type { IntegerBounds, ToolArguments } from './validation.js'
import {
  readEnum,
  readInteger,
  readOptionalString,
  readRequiredString,
  readStringWithDefault,
  validateArguments,
  ValidationError,
} from './validation.js'

// Type aliases rather than interfaces: the MCP result types carry index signatures
type StringProperty = {
  type: 'string'
  description: string
  default?: string
  enum?: readonly string[]
}

type IntegerProperty = IntegerBounds & {
  type: 'integer'
  description: string
}

type PropertySchema = StringProperty | IntegerProperty

export type ToolDefinition = {
  name: string
  description: string
  inputSchema: {
    type: 'object'
    properties: Record<string, PropertySchema>
    required?: string[]
  }
}

export type ToolCall =
  | { tool: 'create_calendar_event', args: CreateEventInput }
  | { tool: 'get_calendar_events', args: ListEventsInput }
  | { tool: 'update_calendar_event', args: UpdateEventInput }
  | { tool: 'delete_calendar_event', args: EventRef }
  | { tool: 'get_photos', args: ListPhotosInput }
  | { tool: 'search_photos', args: SearchPhotosInput }
  | { tool: 'get_photo_download_url', args: { photoId: string } }

export type ToolName = ToolCall['tool']

interface RegisteredTool {
  definition: ToolDefinition
  parse: (args: ToolArguments) => ToolCall
}

const DEFAULT_CALENDAR_ID = 'primary'
const MEDIA_TYPES: readonly MediaType[] = ['PHOTO', 'VIDEO']

const MAX_RESULTS = {
  type: 'integer',
  description: 'Maximum number of events to return (1-2500)',
  default: 10,
  minimum: 1,
  maximum: 2500,
} as const satisfies IntegerProperty

const PAGE_SIZE = {
  type: 'integer',
  description: 'Number of photos to return (1-100)',
  default: 25,
  minimum: 1,
  maximum: 100,
} as const satisfies IntegerProperty

function calendarIdProperty(description: string): StringProperty {
  return { type: 'string', description, default: DEFAULT_CALENDAR_ID }
}

function defineTool(
  name: ToolName,
  description: string,
  properties: Record<string, PropertySchema>,
  required: string[] = [],
): ToolDefinition {
  return {
    name,
    description,
    inputSchema: {
      type: 'object',
      properties,
      ...(required.length > 0 ? { required } : {}),
    },
  }
}

// Calendar tools come first; allDefinitions() keeps this order
const TOOLS: readonly RegisteredTool[] = [
  {
    definition: defineTool(
      'create_calendar_event',
      'Create a new Google Calendar event with specified details',
      {
        summary: { type: 'string', description: 'Event title or name' },
        start_time: { type: 'string', description: 'Event start time in ISO 8601 format (e.g., \'2024-01-15T14:00:00Z\')' },
        end_time: { type: 'string', description: 'Event end time in ISO 8601 format (e.g., \'2024-01-15T15:00:00Z\')' },
        description: { type: 'string', description: 'Detailed event description', default: '' },
        location: { type: 'string', description: 'Event location or address', default: '' },
        calendar_id: calendarIdProperty('Target calendar ID (\'primary\' for the main calendar)'),
      },
      ['summary', 'start_time', 'end_time'],
    ),
    parse: args => ({
      tool: 'create_calendar_event',
      args: {
        summary: readRequiredString(args, 'summary'),
        startTime: readRequiredString(args, 'start_time'),
        endTime: readRequiredString(args, 'end_time'),
        description: readStringWithDefault(args, 'description', ''),
        location: readStringWithDefault(args, 'location', ''),
        calendarId: readStringWithDefault(args, 'calendar_id', DEFAULT_CALENDAR_ID),
      },
    }),
  },
  {
    definition: defineTool(
      'get_calendar_events',
      'Retrieve upcoming events from Google Calendar',
      {
        calendar_id: calendarIdProperty('Calendar ID to query (\'primary\' for the main calendar)'),
        max_results: MAX_RESULTS,
      },
    ),
    parse: args => ({
      tool: 'get_calendar_events',
      args: {
        calendarId: readStringWithDefault(args, 'calendar_id', DEFAULT_CALENDAR_ID),
        maxResults: readInteger(args, 'max_results', MAX_RESULTS),
      },
    }),
  },
  {
    definition: defineTool(
      'update_calendar_event',
      'Update an existing Google Calendar event. Only specified fields will be changed; an empty description or location clears it.',
      {
        event_id: { type: 'string', description: 'Unique ID of the event to update' },
        summary: { type: 'string', description: 'New event title' },
        start_time: { type: 'string', description: 'New start time in ISO 8601 format' },
        end_time: { type: 'string', description: 'New end time in ISO 8601 format' },
        description: { type: 'string', description: 'New event description' },
        location: { type: 'string', description: 'New event location' },
        calendar_id: calendarIdProperty('Calendar ID containing the event'),
      },
      ['event_id'],
    ),
    parse: args => ({
      tool: 'update_calendar_event',
      args: {
        eventId: readRequiredString(args, 'event_id'),
        calendarId: readStringWithDefault(args, 'calendar_id', DEFAULT_CALENDAR_ID),
        summary: readOptionalString(args, 'summary'),
        startTime: readOptionalString(args, 'start_time'),
        endTime: readOptionalString(args, 'end_time'),
        description: readOptionalString(args, 'description'),
        location: readOptionalString(args, 'location'),
      },
    }),
  },
  {
    definition: defineTool(
      'delete_calendar_event',
      'Delete a Google Calendar event permanently',
      {
        event_id: { type: 'string', description: 'Unique ID of the event to delete' },
        calendar_id: calendarIdProperty('Calendar ID containing the event'),
      },
      ['event_id'],
    ),
    parse: args => ({
      tool: 'delete_calendar_event',
      args: {
        eventId: readRequiredString(args, 'event_id'),
        calendarId: readStringWithDefault(args, 'calendar_id', DEFAULT_CALENDAR_ID),
      },
    }),
  },
  {
    definition: defineTool(
      'get_photos',
      'Retrieve recent photos from the Google Photos library',
      { page_size: PAGE_SIZE },
    ),
    parse: args => ({
      tool: 'get_photos',
      args: { pageSize: readInteger(args, 'page_size', PAGE_SIZE) },
    }),
  },
  {
    definition: defineTool(
      'search_photos',
      'Search photos in Google Photos with date and media type filters',
      {
        start_date: { type: 'string', description: 'Earliest date to include, in ISO 8601 format (e.g., \'2024-01-01T00:00:00Z\')' },
        end_date: { type: 'string', description: 'Latest date to include, in ISO 8601 format (e.g., \'2024-01-31T23:59:59Z\')' },
        media_type: { type: 'string', description: 'Filter by media type: \'PHOTO\' for images only, \'VIDEO\' for videos only', enum: MEDIA_TYPES },
        page_size: PAGE_SIZE,
      },
    ),
    parse: args => ({
      tool: 'search_photos',
      args: {
        startDate: readOptionalString(args, 'start_date'),
        endDate: readOptionalString(args, 'end_date'),
        mediaType: readEnum(args, 'media_type', MEDIA_TYPES),
        pageSize: readInteger(args, 'page_size', PAGE_SIZE),
      },
    }),
  },
  {
    definition: defineTool(
      'get_photo_download_url',
      'Get a temporary download URL for a full-resolution photo',
      {
        photo_id: { type: 'string', description: 'Unique ID of the photo' },
      },
      ['photo_id'],
    ),
    parse: args => ({
      tool: 'get_photo_download_url',
      args: { photoId: readRequiredString(args, 'photo_id') },
    }),
  },
]

function lookup(name: string): RegisteredTool | undefined {
  return TOOLS.find(tool => tool.definition.name === name)
}

export function allDefinitions(): ToolDefinition[] {
  return TOOLS.map(tool => tool.definition)
}

export function schemaFor(name: string): ToolDefinition | undefined {
  return lookup(name)?.definition
}

export function toolNames(): string[] {
  return TOOLS.map(tool => tool.definition.name)
}

/**
 * Validates raw arguments against the named tool's declared fields.
 * Undeclared fields are ignored.
 */
export function parseArguments(name: string, rawArguments: unknown): ToolCall {
  const tool = lookup(name)
  if (tool === undefined) {
    throw new ValidationError(`Unknown tool: ${name}`, 'name', name)
  }
  return tool.parse(validateArguments(rawArguments))
}
