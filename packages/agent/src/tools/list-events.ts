import { z } from "zod";
import type { CalendarEvent } from "@app/proto";
import { DEFAULT_CALENDAR_ID, calendarId, isoDateTime } from "./time";
import { defineTool, type Tool } from "./types";

export const DEFAULT_MAX_RESULTS = 10;
export const MAX_RESULTS_LIMIT = 50;

/** Longest window a single list may cover */
const MAX_WINDOW_MS = 366 * 24 * 60 * 60 * 1000;

const inputSchema = z
  .object({
    start_time: isoDateTime.describe("Window start, ISO 8601 date-time"),
    end_time: isoDateTime.describe("Window end, ISO 8601 date-time"),
    max_results: z
      .number()
      .int()
      .min(1)
      .optional()
      .describe(`Maximum number of events, at most ${MAX_RESULTS_LIMIT}`),
    query: z
      .string()
      .max(256)
      .optional()
      .describe("Free-text search within events"),
    calendar_id: calendarId,
  })
  .superRefine((input, ctx) => {
    const span = Date.parse(input.end_time) - Date.parse(input.start_time);
    if (span <= 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "must be after start_time",
        path: ["end_time"],
      });
    } else if (span > MAX_WINDOW_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "time window must not exceed 366 days",
        path: ["end_time"],
      });
    }
  });

type Input = z.infer<typeof inputSchema>;

export function clampMaxResults(value: number | undefined): number {
  if (value === undefined) return DEFAULT_MAX_RESULTS;
  return Math.min(Math.max(value, 1), MAX_RESULTS_LIMIT);
}

/** Start ascending, ties by id */
export function compareEvents(a: CalendarEvent, b: CalendarEvent): number {
  const byStart = Date.parse(a.start) - Date.parse(b.start);
  if (byStart !== 0) return byStart;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function makeListEventsTool(): Tool<Input> {
  return defineTool({
    name: "list_events",
    description:
      "List events in the user's calendar between two ISO 8601 date-times, " +
      "ordered by start time. Returns at most max_results events " +
      `(default ${DEFAULT_MAX_RESULTS}).`,
    inputSchema,
    execute: async ({ backend, accessToken }, input) => {
      const maxResults = clampMaxResults(input.max_results);
      const page = await backend.listEvents(accessToken, {
        calendarId: input.calendar_id ?? DEFAULT_CALENDAR_ID,
        timeMin: input.start_time,
        timeMax: input.end_time,
        maxResults,
        query: input.query,
      });
      const events = [...page.events].sort(compareEvents);
      return {
        operation: "list_events",
        events: events.slice(0, maxResults),
        truncated: page.truncated || events.length > maxResults,
      };
    },
  });
}
