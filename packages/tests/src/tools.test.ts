import { describe, it, expect } from "vitest";
import {
  clampMaxResults,
  compareEvents,
  deriveEventId,
  makeToolset,
  toUtcIso,
  type RegisteredTool,
} from "@app/agent";
import type { CalendarEvent } from "@app/proto";
import { FakeCalendarBackend } from "./helpers";

function getTool(name: string): RegisteredTool {
  const tool = [...makeToolset().values()].find((candidate) => candidate.name === name);
  if (!tool) throw new Error(`no tool ${name}`);
  return tool;
}

function event(id: string, start: string): CalendarEvent {
  return { id, calendarId: "primary", summary: id, start, end: start, allDay: false };
}

describe("calendar tools", () => {
  it("offers exactly the four calendar operations", () => {
    expect([...makeToolset().keys()]).toEqual(["create_event", "list_events", "update_event", "delete_event"]);
  });

  it("passes normalized input to the backend", async () => {
    const backend = new FakeCalendarBackend();
    const prepared = getTool("create_event").prepare({
      summary: "  Lunch  ",
      start_time: "2025-03-14T12:00",
      end_time: "2025-03-14T13:00:00-05:00",
      calendar_id: "team",
    });
    if (!prepared.success) throw prepared.error;

    const payload = await prepared.call.run({ backend, accessToken: "access-1", userId: "alice", requestId: "req-1" });

    expect(payload.events[0]).toMatchObject({
      calendarId: "team",
      summary: "Lunch",
      start: "2025-03-14T12:00:00.000Z",
      end: "2025-03-14T18:00:00.000Z",
    });
  });

  it("rejects a list window longer than 366 days", () => {
    const result = getTool("list_events").prepare({
      start_time: "2025-01-01T00:00:00Z",
      end_time: "2026-01-03T00:00:00Z",
    });

    expect(result.success).toBe(false);
    expect(!result.success && result.error.issues.map((issue) => issue.message)).toEqual([
      "time window must not exceed 366 days",
    ]);
  });

  it("rejects an empty summary", () => {
    const result = getTool("create_event").prepare({
      summary: "   ",
      start_time: "2025-03-14T12:00:00Z",
      end_time: "2025-03-14T13:00:00Z",
    });

    expect(!result.success && result.error.issues[0].path).toEqual(["summary"]);
  });
});

describe("toUtcIso", () => {
  it("converts offsets to UTC", () => {
    expect(toUtcIso("2025-03-14T15:00:00+02:00")).toBe("2025-03-14T13:00:00.000Z");
    expect(toUtcIso("2025-03-14T15:00:00.250Z")).toBe("2025-03-14T15:00:00.250Z");
  });

  it("reads a time without offset as UTC", () => {
    expect(toUtcIso("2025-03-14T15:00")).toBe("2025-03-14T15:00:00.000Z");
  });

  it("rejects anything that is not a full ISO date-time", () => {
    expect(toUtcIso("2025-03-14")).toBeUndefined();
    expect(toUtcIso("March 14, 2025 3pm")).toBeUndefined();
    expect(toUtcIso("2025-03-14T15:00:00+0200")).toBeUndefined();
  });

  it("rejects days the month does not have", () => {
    expect(toUtcIso("2025-02-30T10:00:00Z")).toBeUndefined();
    expect(toUtcIso("2025-02-29T10:00:00Z")).toBeUndefined();
    expect(toUtcIso("2025-04-31T10:00:00Z")).toBeUndefined();
    expect(toUtcIso("2025-13-01T10:00:00Z")).toBeUndefined();
  });

  it("accepts the last day of each month, leap days included", () => {
    expect(toUtcIso("2024-02-29T10:00:00Z")).toBe("2024-02-29T10:00:00.000Z");
    expect(toUtcIso("2025-02-28T10:00:00Z")).toBe("2025-02-28T10:00:00.000Z");
    expect(toUtcIso("2025-12-31T23:30:00-01:00")).toBe("2026-01-01T00:30:00.000Z");
  });
});

describe("deriveEventId", () => {
  it("is stable per user and request", () => {
    const id = deriveEventId("alice", "req-1");

    expect(id).toMatch(/^[0-9a-f]{64}$/);
    expect(deriveEventId("alice", "req-1")).toBe(id);
    expect(deriveEventId("alice", "req-2")).not.toBe(id);
    expect(deriveEventId("bob", "req-1")).not.toBe(id);
  });
});

describe("clampMaxResults", () => {
  it("defaults to 10 and caps at 50", () => {
    expect(clampMaxResults(undefined)).toBe(10);
    expect(clampMaxResults(7)).toBe(7);
    expect(clampMaxResults(500)).toBe(50);
  });
});

describe("compareEvents", () => {
  it("orders by start, then by id", () => {
    const events = [
      event("b", "2025-03-14T10:00:00.000Z"),
      event("c", "2025-03-14T09:00:00.000Z"),
      event("a", "2025-03-14T10:00:00.000Z"),
    ];

    expect(events.sort(compareEvents).map((e) => e.id)).toEqual(["c", "a", "b"]);
  });
});
