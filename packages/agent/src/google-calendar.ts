/**
 * Google Calendar backend (Calendar API v3 through googleapis).
 *
 * Each call builds an OAuth2 client around the caller's access token; refresh
 * is never done here, the TokenRefresher owns that.
 */

import debug from "debug";
import { z } from "zod";
import { google, type calendar_v3 } from "googleapis";
import {
  AuthError,
  InternalError,
  LogicError,
  NetworkError,
  classifyHttpError,
  classifyTransportError,
  parseRetryAfter,
  type CalendarEvent,
  type ClassifiedError,
} from "@app/proto";
import type {
  CalendarBackend,
  EventChanges,
  EventPage,
  EventQuery,
  NewEvent,
} from "./backend";

const debugGcal = debug("calbot:agent:gcal");

export const DEFAULT_BACKEND_TIMEOUT_MS = 15_000;

/** 403 reasons that are really rate limits */
const RATE_LIMIT_REASONS = new Set([
  "rateLimitExceeded",
  "userRateLimitExceeded",
]);

export interface GoogleCalendarBackendOptions {
  timeoutMs?: number;
}

export class GoogleCalendarBackend implements CalendarBackend {
  private readonly timeoutMs: number;

  constructor(options: GoogleCalendarBackendOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS;
  }

  async createEvent(
    accessToken: string,
    event: NewEvent
  ): Promise<CalendarEvent> {
    const calendar = this.client(accessToken);
    const requestBody: calendar_v3.Schema$Event = {
      summary: event.summary,
      start: { dateTime: event.start, timeZone: "UTC" },
      end: { dateTime: event.end, timeZone: "UTC" },
    };
    if (event.id !== undefined) requestBody.id = event.id;
    if (event.description !== undefined) {
      requestBody.description = event.description;
    }
    if (event.location !== undefined) requestBody.location = event.location;

    debugGcal("Inserting event into %s", event.calendarId);
    try {
      const res = await calendar.events.insert(
        { calendarId: event.calendarId, requestBody },
        { timeout: this.timeoutMs }
      );
      return toCalendarEvent(res.data, event.calendarId);
    } catch (err) {
      const classified = classifyGoogleApiError(
        err,
        "GoogleCalendar.createEvent"
      );
      if (
        event.id !== undefined &&
        classified instanceof LogicError &&
        classified.statusCode === 409
      ) {
        // Same id already created by an earlier attempt of this request
        debugGcal("Event %s already exists, returning it", event.id);
        return this.getEvent(accessToken, event.calendarId, event.id);
      }
      throw classified;
    }
  }

  async listEvents(accessToken: string, query: EventQuery): Promise<EventPage> {
    const calendar = this.client(accessToken);
    debugGcal(
      "Listing events in %s from %s to %s",
      query.calendarId,
      query.timeMin,
      query.timeMax
    );
    try {
      const res = await calendar.events.list(
        {
          calendarId: query.calendarId,
          timeMin: query.timeMin,
          timeMax: query.timeMax,
          maxResults: query.maxResults,
          q: query.query,
          singleEvents: true,
          orderBy: "startTime",
        },
        { timeout: this.timeoutMs }
      );
      const items = res.data.items ?? [];
      return {
        events: items.map((item) => toCalendarEvent(item, query.calendarId)),
        truncated: !!res.data.nextPageToken,
      };
    } catch (err) {
      throw classifyGoogleApiError(err, "GoogleCalendar.listEvents");
    }
  }

  async updateEvent(
    accessToken: string,
    calendarId: string,
    eventId: string,
    changes: EventChanges
  ): Promise<CalendarEvent> {
    const calendar = this.client(accessToken);
    const requestBody: calendar_v3.Schema$Event = {};
    if (changes.summary !== undefined) requestBody.summary = changes.summary;
    if (changes.description !== undefined) {
      requestBody.description = changes.description;
    }
    if (changes.location !== undefined) requestBody.location = changes.location;
    if (changes.start !== undefined) {
      requestBody.start = { dateTime: changes.start, timeZone: "UTC" };
    }
    if (changes.end !== undefined) {
      requestBody.end = { dateTime: changes.end, timeZone: "UTC" };
    }

    debugGcal("Patching event %s in %s", eventId, calendarId);
    try {
      const res = await calendar.events.patch(
        { calendarId, eventId, requestBody },
        { timeout: this.timeoutMs }
      );
      return toCalendarEvent(res.data, calendarId);
    } catch (err) {
      throw classifyGoogleApiError(err, "GoogleCalendar.updateEvent");
    }
  }

  async deleteEvent(
    accessToken: string,
    calendarId: string,
    eventId: string
  ): Promise<void> {
    const calendar = this.client(accessToken);
    debugGcal("Deleting event %s from %s", eventId, calendarId);
    try {
      await calendar.events.delete(
        { calendarId, eventId },
        { timeout: this.timeoutMs }
      );
    } catch (err) {
      const classified = classifyGoogleApiError(
        err,
        "GoogleCalendar.deleteEvent"
      );
      if (classified instanceof LogicError && classified.statusCode === 410) {
        debugGcal("Event %s was already deleted", eventId);
        return;
      }
      throw classified;
    }
  }

  private async getEvent(
    accessToken: string,
    calendarId: string,
    eventId: string
  ): Promise<CalendarEvent> {
    try {
      const res = await this.client(accessToken).events.get(
        { calendarId, eventId },
        { timeout: this.timeoutMs }
      );
      return toCalendarEvent(res.data, calendarId);
    } catch (err) {
      throw classifyGoogleApiError(err, "GoogleCalendar.getEvent");
    }
  }

  private client(accessToken: string): calendar_v3.Calendar {
    const auth = new google.auth.OAuth2();
    auth.setCredentials({ access_token: accessToken });
    return google.calendar({ version: "v3", auth });
  }
}

/**
 * Convert a Google event resource to the backend-independent shape.
 */
export function toCalendarEvent(
  event: calendar_v3.Schema$Event,
  calendarId: string
): CalendarEvent {
  if (!event.id) {
    throw new InternalError("Google Calendar returned an event without id", {
      source: "GoogleCalendar",
    });
  }
  const allDay = !event.start?.dateTime && !!event.start?.date;
  return {
    id: event.id,
    calendarId,
    summary: event.summary ?? "(no title)",
    start: eventTime(event.start),
    end: eventTime(event.end),
    allDay,
    description: event.description ?? undefined,
    location: event.location ?? undefined,
    htmlLink: event.htmlLink ?? undefined,
  };
}

function eventTime(
  time: calendar_v3.Schema$EventDateTime | undefined
): string {
  if (time?.dateTime) {
    const parsed = Date.parse(time.dateTime);
    return Number.isNaN(parsed)
      ? time.dateTime
      : new Date(parsed).toISOString();
  }
  return time?.date ?? "";
}

const googleErrorShape = z.object({
  message: z.string().optional(),
  code: z.union([z.string(), z.number()]).optional(),
  status: z.number().optional(),
  response: z
    .object({
      status: z.number(),
      headers: z.unknown().optional(),
      data: z.unknown().optional(),
    })
    .optional(),
});

const googleErrorBody = z.object({
  error: z.union([
    z.string(),
    z.object({
      message: z.string().optional(),
      errors: z.array(z.object({ reason: z.string().optional() })).optional(),
    }),
  ]),
  error_description: z.string().optional(),
});

/**
 * Classify a Google API error into a typed ClassifiedError.
 *
 * OAuth token errors (invalid_grant) come back as HTTP 400 and are checked
 * before the status, which would otherwise read as a LogicError.
 */
export function classifyGoogleApiError(
  err: unknown,
  source: string
): ClassifiedError {
  const cause = err instanceof Error ? err : undefined;
  const shape = googleErrorShape.safeParse(err);
  if (!shape.success) {
    return classifyTransportError(err, source);
  }

  const message = shape.data.message || String(err);
  const body = googleErrorBody.safeParse(shape.data.response?.data);
  const apiError =
    body.success && typeof body.data.error === "object"
      ? body.data.error
      : undefined;
  const oauthError =
    body.success && typeof body.data.error === "string"
      ? body.data.error
      : undefined;

  if (
    oauthError === "invalid_grant" ||
    message.includes("invalid_grant") ||
    message.includes("Token has been expired or revoked")
  ) {
    return new AuthError("Google authorization expired or was revoked.", {
      cause,
      source,
      errorCode: "invalid_grant",
      statusCode: shape.data.response?.status,
    });
  }

  const status =
    shape.data.response?.status ??
    shape.data.status ??
    (typeof shape.data.code === "number" ? shape.data.code : undefined);

  if (status === undefined) {
    if (/timed? ?out/i.test(message)) {
      return new NetworkError(`Request timed out: ${message}`, {
        cause,
        source,
        statusCode: 408,
      });
    }
    return classifyTransportError(err, source);
  }

  const statusMessage = apiError?.message || message;
  const retryAfterMs = parseRetryAfter(
    headerValue(shape.data.response?.headers, "retry-after")
  );

  if (status === 403) {
    const reasons = apiError?.errors?.map((e) => e.reason) ?? [];
    const rateLimited = reasons.some(
      (reason) => reason !== undefined && RATE_LIMIT_REASONS.has(reason)
    );
    if (rateLimited) {
      return new NetworkError(`Google Calendar rate limit: ${statusMessage}`, {
        cause,
        source,
        statusCode: 429,
        retryAfterMs,
      });
    }
  }

  return classifyHttpError(status, statusMessage, {
    cause,
    source,
    retryAfterMs,
  });
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (headers instanceof Headers) {
    return headers.get(name) ?? undefined;
  }
  if (typeof headers === "object" && headers !== null) {
    const value: unknown = Reflect.get(headers, name);
    return typeof value === "string" ? value : undefined;
  }
  return undefined;
}
