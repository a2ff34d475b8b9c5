import { z } from "zod";
import { DEFAULT_CALENDAR_ID, calendarId, eventId } from "./time";
import { defineTool, type Tool } from "./types";

const inputSchema = z.object({
  event_id: eventId,
  calendar_id: calendarId,
});

type Input = z.infer<typeof inputSchema>;

export function makeDeleteEventTool(): Tool<Input> {
  return defineTool({
    name: "delete_event",
    description: "Delete an event from the user's calendar by its id.",
    inputSchema,
    execute: async ({ backend, accessToken }, input) => {
      await backend.deleteEvent(
        accessToken,
        input.calendar_id ?? DEFAULT_CALENDAR_ID,
        input.event_id
      );
      return {
        operation: "delete_event",
        events: [],
        truncated: false,
        deletedEventId: input.event_id,
      };
    },
  });
}
