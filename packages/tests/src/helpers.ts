/**
 * Shared test doubles: an in-memory calendar backend, a fetch stub for the
 * OAuth endpoints and credential fixtures.
 */

import { vi } from "vitest";
import type {
  CalendarBackend,
  EventChanges,
  EventPage,
  EventQuery,
  NewEvent,
} from "@app/agent";
import type {
  Credential,
  OAuthAppCredentials,
  TokenStatus,
} from "@app/connectors";
import { LogicError, type CalendarEvent, type UserId } from "@app/proto";

export const TEST_APP: OAuthAppCredentials = {
  clientId: "test-client",
  clientSecret: "test-secret",
  redirectUri: "http://localhost:8080/callback",
};

export const TOKEN_URL = "https://oauth2.googleapis.com/token";
export const REVOKE_URL = "https://oauth2.googleapis.com/revoke";

export function makeCredential(
  userId: UserId,
  overrides: Partial<Credential> = {}
): Credential {
  return {
    userId,
    accessToken: "access-1",
    refreshToken: "refresh-1",
    accessTokenExpiresAt: Date.now() + 3600_000,
    scopes: ["https://www.googleapis.com/auth/calendar"],
    revoked: false,
    updatedAt: Date.now(),
    ...overrides,
  };
}

/** Token source that always hands out the same token */
export function validTokens(accessToken: string = "access-1") {
  return {
    ensureValid: vi.fn(
      async (): Promise<TokenStatus> => ({
        status: "valid",
        accessToken,
        expiresAt: Date.now() + 3600_000,
      })
    ),
  };
}

export function jsonResponse(
  body: unknown,
  status: number = 200,
  headers: Record<string, string> = {}
): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export interface FetchCall {
  url: string;
  body: URLSearchParams;
}

/**
 * Replace globalThis.fetch. Restore it in afterEach.
 */
export function stubFetch(
  handler: (url: string, body: URLSearchParams) => Response | Promise<Response>
) {
  const calls: FetchCall[] = [];
  const mock = vi.fn(
    async (
      input: string | URL | Request,
      init?: RequestInit
    ): Promise<Response> => {
      const url =
        typeof input === "string"
          ? input
          : input instanceof URL
            ? input.href
            : input.url;
      const body = new URLSearchParams(
        typeof init?.body === "string" ? init.body : ""
      );
      calls.push({ url, body });
      return handler(url, body);
    }
  );
  globalThis.fetch = mock;
  return {
    mock,
    calls,
    callsTo: (url: string) => calls.filter((call) => call.url === url),
  };
}

/** Google-like token endpoint: code exchange, refresh and revoke all succeed */
export function googleTokenEndpoint(
  tokens: Record<string, unknown> = {
    access_token: "access-1",
    refresh_token: "refresh-1",
    expires_in: 3600,
    scope: "https://www.googleapis.com/auth/calendar",
  }
) {
  return (url: string): Response => {
    if (url === REVOKE_URL) return new Response("", { status: 200 });
    return jsonResponse(tokens);
  };
}

/**
 * Calendar backend kept in memory. Creating an event with an id that already
 * exists returns the stored event, like the Google backend does.
 */
export class FakeCalendarBackend implements CalendarBackend {
  readonly events = new Map<string, CalendarEvent>();
  readonly calls: string[] = [];
  readonly accessTokens: string[] = [];
  lastQuery?: EventQuery;
  private deleted = new Set<string>();
  private failures: unknown[] = [];
  private counter = 0;

  /** Make the next backend call throw */
  failNext(error: unknown): void {
    this.failures.push(error);
  }

  async createEvent(
    accessToken: string,
    event: NewEvent
  ): Promise<CalendarEvent> {
    this.begin("createEvent", accessToken);
    const id = event.id ?? `evt-${++this.counter}`;
    const existing = this.events.get(key(event.calendarId, id));
    if (existing) return { ...existing };

    const created: CalendarEvent = {
      id,
      calendarId: event.calendarId,
      summary: event.summary,
      start: event.start,
      end: event.end,
      allDay: false,
      description: event.description,
      location: event.location,
    };
    this.events.set(key(event.calendarId, id), created);
    return { ...created };
  }

  async listEvents(accessToken: string, query: EventQuery): Promise<EventPage> {
    this.begin("listEvents", accessToken);
    this.lastQuery = query;
    const matches = [...this.events.values()].filter(
      (event) =>
        event.calendarId === query.calendarId &&
        event.start < query.timeMax &&
        event.end > query.timeMin &&
        (query.query === undefined || event.summary.includes(query.query))
    );
    return {
      events: matches.slice(0, query.maxResults).map((event) => ({ ...event })),
      truncated: matches.length > query.maxResults,
    };
  }

  async updateEvent(
    accessToken: string,
    calendarId: string,
    eventId: string,
    changes: EventChanges
  ): Promise<CalendarEvent> {
    this.begin("updateEvent", accessToken);
    const existing = this.events.get(key(calendarId, eventId));
    if (!existing) {
      throw new LogicError("Not Found", {
        statusCode: 404,
        source: "FakeCalendarBackend",
      });
    }
    const updated: CalendarEvent = {
      ...existing,
      summary: changes.summary ?? existing.summary,
      start: changes.start ?? existing.start,
      end: changes.end ?? existing.end,
      description: changes.description ?? existing.description,
      location: changes.location ?? existing.location,
    };
    this.events.set(key(calendarId, eventId), updated);
    return { ...updated };
  }

  async deleteEvent(
    accessToken: string,
    calendarId: string,
    eventId: string
  ): Promise<void> {
    this.begin("deleteEvent", accessToken);
    const k = key(calendarId, eventId);
    if (this.events.delete(k)) {
      this.deleted.add(k);
      return;
    }
    if (this.deleted.has(k)) return;
    throw new LogicError("Not Found", {
      statusCode: 404,
      source: "FakeCalendarBackend",
    });
  }

  private begin(operation: string, accessToken: string): void {
    this.calls.push(operation);
    this.accessTokens.push(accessToken);
    if (this.failures.length > 0) {
      throw this.failures.shift();
    }
  }
}

function key(calendarId: string, eventId: string): string {
  return `${calendarId}/${eventId}`;
}
