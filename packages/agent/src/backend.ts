/**
 * Calendar backend capability.
 *
 * Implementations talk to a concrete calendar service using a caller-supplied
 * access token, and throw ClassifiedErrors from @app/proto on failure.
 */

import type { CalendarEvent } from "@app/proto";

export interface NewEvent {
  calendarId: string;
  /** Client-chosen event id; makes repeated creates idempotent */
  id?: string;
  summary: string;
  /** UTC ISO timestamps */
  start: string;
  end: string;
  description?: string;
  location?: string;
}

export interface EventChanges {
  summary?: string;
  start?: string;
  end?: string;
  description?: string;
  location?: string;
}

export interface EventQuery {
  calendarId: string;
  timeMin: string;
  timeMax: string;
  maxResults: number;
  /** Free-text search */
  query?: string;
}

export interface EventPage {
  /** Ordered by start time */
  events: CalendarEvent[];
  /** More events matched than were returned */
  truncated: boolean;
}

export interface CalendarBackend {
  createEvent(accessToken: string, event: NewEvent): Promise<CalendarEvent>;
  listEvents(accessToken: string, query: EventQuery): Promise<EventPage>;
  updateEvent(
    accessToken: string,
    calendarId: string,
    eventId: string,
    changes: EventChanges
  ): Promise<CalendarEvent>;
  /** Deleting an event that is already gone succeeds */
  deleteEvent(
    accessToken: string,
    calendarId: string,
    eventId: string
  ): Promise<void>;
}
