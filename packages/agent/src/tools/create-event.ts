import { z } from "zod";
import { createHash } from "crypto";
import type { UserId } from "@app/proto";
import { DEFAULT_CALENDAR_ID, calendarId, isoDateTime } from "./time";
import { defineTool, type Tool } from "./types";

const inputSchema = z
  .object({
    summary: z.string().trim().min(1).max(1024).describe("Title of the event"),
    start_time: isoDateTime.describe("Start, ISO 8601 date-time"),
    end_time: isoDateTime.describe("End, ISO 8601 date-time"),
    description: z.string().max(8192).optional().describe("Event description"),
    location: z.string().max(1024).optional().describe("Event location"),
    calendar_id: calendarId,
  })
  .superRefine((input, ctx) => {
    if (Date.parse(input.end_time) <= Date.parse(input.start_time)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "must be after start_time",
        path: ["end_time"],
      });
    }
  });

type Input = z.infer<typeof inputSchema>;

/**
 * Event id derived from the request, so that replaying the same request
 * addresses the same event. Hex digits are valid Google event id characters.
 */
export function deriveEventId(userId: UserId, requestId: string): string {
  return createHash("sha256").update(`${userId}:${requestId}`).digest("hex");
}

export function makeCreateEventTool(): Tool<Input> {
  return defineTool({
    name: "create_event",
    description:
      "Create an event in the user's calendar. Times are ISO 8601 " +
      "date-times; use UTC when the user gives no time zone.",
    inputSchema,
    execute: async ({ backend, accessToken, userId, requestId }, input) => {
      const event = await backend.createEvent(accessToken, {
        calendarId: input.calendar_id ?? DEFAULT_CALENDAR_ID,
        id: deriveEventId(userId, requestId),
        summary: input.summary,
        start: input.start_time,
        end: input.end_time,
        description: input.description,
        location: input.location,
      });
      return { operation: "create_event", events: [event], truncated: false };
    },
  });
}
