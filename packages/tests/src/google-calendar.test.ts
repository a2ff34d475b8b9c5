import { describe, it, expect } from "vitest";
import { classifyGoogleApiError, toCalendarEvent } from "@app/agent";
import { AuthError, InternalError, LogicError, NetworkError, PermissionError } from "@app/proto";

/** Error shaped like the ones googleapis (gaxios) throws */
function apiError(status: number, data: unknown, headers: Record<string, string> = {}): Error {
  return Object.assign(new Error(`Request failed with status code ${status}`), {
    status,
    response: { status, headers, data },
  });
}

describe("classifyGoogleApiError", () => {
  it("maps 404 to LogicError with the API message", () => {
    const error = classifyGoogleApiError(
      apiError(404, { error: { message: "Not Found", errors: [{ reason: "notFound" }] } }),
      "test"
    );

    expect(error).toBeInstanceOf(LogicError);
    expect(error).toMatchObject({ statusCode: 404, message: "Not Found", source: "test" });
  });

  it("maps a 403 rate limit to a 429 NetworkError", () => {
    const error = classifyGoogleApiError(
      apiError(403, { error: { message: "Rate Limit Exceeded", errors: [{ reason: "rateLimitExceeded" }] } }),
      "test"
    );

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ statusCode: 429, message: "Google Calendar rate limit: Rate Limit Exceeded" });
  });

  it("maps other 403s to PermissionError", () => {
    const error = classifyGoogleApiError(
      apiError(403, { error: { message: "Forbidden", errors: [{ reason: "forbidden" }] } }),
      "test"
    );

    expect(error).toBeInstanceOf(PermissionError);
  });

  it("reads Retry-After on 429", () => {
    const error = classifyGoogleApiError(apiError(429, { error: { message: "Too Many Requests" } }, { "retry-after": "5" }), "test");

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ statusCode: 429, retryAfterMs: 5000 });
  });

  it("maps invalid_grant to AuthError", () => {
    const error = classifyGoogleApiError(
      apiError(400, { error: "invalid_grant", error_description: "Token has been expired or revoked." }),
      "test"
    );

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ errorCode: "invalid_grant" });
  });

  it("maps 401 to AuthError and 5xx to NetworkError", () => {
    expect(classifyGoogleApiError(apiError(401, { error: { message: "Invalid Credentials" } }), "test")).toBeInstanceOf(
      AuthError
    );
    expect(classifyGoogleApiError(apiError(502, "Bad Gateway"), "test")).toBeInstanceOf(NetworkError);
  });

  it("maps a client-side timeout to a timed out NetworkError", () => {
    const error = classifyGoogleApiError(new Error("timeout of 15000ms exceeded"), "test");

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ statusCode: 408, message: "Request timed out: timeout of 15000ms exceeded" });
  });

  it("maps a connection reset to NetworkError", () => {
    const error = classifyGoogleApiError(Object.assign(new Error("socket hang up"), { code: "ECONNRESET" }), "test");

    expect(error).toBeInstanceOf(NetworkError);
    expect(error.message).toBe("Network error: socket hang up");
  });

  it("maps anything else to InternalError", () => {
    expect(classifyGoogleApiError("boom", "test")).toBeInstanceOf(InternalError);
  });
});

describe("toCalendarEvent", () => {
  it("normalizes timed events to UTC", () => {
    expect(
      toCalendarEvent(
        {
          id: "evt-1",
          summary: "Standup",
          start: { dateTime: "2025-03-14T16:00:00+01:00" },
          end: { dateTime: "2025-03-14T16:30:00+01:00" },
          description: null,
          htmlLink: "https://calendar.example/evt-1",
        },
        "primary"
      )
    ).toEqual({
      id: "evt-1",
      calendarId: "primary",
      summary: "Standup",
      start: "2025-03-14T15:00:00.000Z",
      end: "2025-03-14T15:30:00.000Z",
      allDay: false,
      htmlLink: "https://calendar.example/evt-1",
    });
  });

  it("keeps all-day dates and fills in a missing title", () => {
    expect(
      toCalendarEvent({ id: "evt-2", start: { date: "2025-03-14" }, end: { date: "2025-03-15" } }, "primary")
    ).toMatchObject({ summary: "(no title)", start: "2025-03-14", end: "2025-03-15", allDay: true });
  });

  it("rejects an event without id", () => {
    expect(() => toCalendarEvent({ summary: "Ghost" }, "primary")).toThrow(InternalError);
  });
});
