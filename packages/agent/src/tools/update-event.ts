import { z } from "zod";
import { DEFAULT_CALENDAR_ID, calendarId, eventId, isoDateTime } from "./time";
import { defineTool, type Tool } from "./types";

const inputSchema = z
  .object({
    event_id: eventId,
    summary: z
      .string()
      .trim()
      .min(1)
      .max(1024)
      .optional()
      .describe("New title"),
    start_time: isoDateTime
      .optional()
      .describe("New start, ISO 8601 date-time; requires end_time"),
    end_time: isoDateTime
      .optional()
      .describe("New end, ISO 8601 date-time; requires start_time"),
    description: z.string().max(8192).optional().describe("New description"),
    location: z.string().max(1024).optional().describe("New location"),
    calendar_id: calendarId,
  })
  .superRefine((input, ctx) => {
    if ((input.start_time === undefined) !== (input.end_time === undefined)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "start_time and end_time must be given together",
        path: [input.start_time === undefined ? "start_time" : "end_time"],
      });
    } else if (
      input.start_time !== undefined &&
      input.end_time !== undefined &&
      Date.parse(input.end_time) <= Date.parse(input.start_time)
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "must be after start_time",
        path: ["end_time"],
      });
    }

    if (
      input.summary === undefined &&
      input.start_time === undefined &&
      input.end_time === undefined &&
      input.description === undefined &&
      input.location === undefined
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "nothing to update",
      });
    }
  });

type Input = z.infer<typeof inputSchema>;

export function makeUpdateEventTool(): Tool<Input> {
  return defineTool({
    name: "update_event",
    description:
      "Change an existing event: title, time (start_time and end_time " +
      "together), description or location.",
    inputSchema,
    execute: async ({ backend, accessToken }, input) => {
      const event = await backend.updateEvent(
        accessToken,
        input.calendar_id ?? DEFAULT_CALENDAR_ID,
        input.event_id,
        {
          summary: input.summary,
          start: input.start_time,
          end: input.end_time,
          description: input.description,
          location: input.location,
        }
      );
      return { operation: "update_event", events: [event], truncated: false };
    },
  });
}
