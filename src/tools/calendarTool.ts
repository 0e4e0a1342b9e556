/**
 * MCP tool for calendar event operations
 */

import type {
  ApiSession,
  CreateEventInput,
  EventRef,
  ListEventsInput,
  SessionRequestOptions,
  UpdateEventInput,
} from '../google/index.js'
import {
  formatCreatedEvent,
  formatDeletedEvent,
  formatEventList,
  formatUpdatedEvent,
} from './formatters.js'

export interface CalendarToolOptions {
  session: ApiSession
}

/**
 * Calendar event CRUD, returning the text block shown to the caller
 */
export class CalendarTool {
  private readonly session: ApiSession

  constructor(options: CalendarToolOptions) {
    this.session = options.session
  }

  async createEvent(input: CreateEventInput, options?: SessionRequestOptions): Promise<string> {
    const eventId = await this.session.createEvent(input, options)
    return formatCreatedEvent(eventId, input)
  }

  /**
   * Upcoming events from now on, ordered by start time
   */
  async listEvents(input: ListEventsInput, options?: SessionRequestOptions): Promise<string> {
    const events = await this.session.listEvents(input, options)
    return formatEventList(events)
  }

  async updateEvent(input: UpdateEventInput, options?: SessionRequestOptions): Promise<string> {
    await this.session.updateEvent(input, options)
    return formatUpdatedEvent(input)
  }

  async deleteEvent(ref: EventRef, options?: SessionRequestOptions): Promise<string> {
    await this.session.deleteEvent(ref, options)
    return formatDeletedEvent(ref.eventId)
  }
}
