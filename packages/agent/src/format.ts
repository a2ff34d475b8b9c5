import {
  AUTH_REQUIRED_MESSAGE,
  type BackendErrorKind,
  type CalendarEvent,
  type DispatchPayload,
  type DispatchResult,
} from "@app/proto";

/** Events shown in one chat reply */
export const MAX_EVENTS_DISPLAYED = 10;

/** Messages for retryable failures, shown once the caller stopped retrying */
const TRANSIENT_ERROR_MESSAGES: Partial<Record<BackendErrorKind, string>> = {
  timeout: "Google Calendar took too long to respond. Please try again.",
  rate_limited:
    "Google Calendar is receiving too many requests right now. " +
    "Please try again in a minute.",
  unavailable:
    "Google Calendar is temporarily unavailable. Please try again later.",
};

/**
 * "2025-03-14T15:00:00.000Z" -> "2025-03-14 15:00 UTC"
 */
export function formatTime(iso: string): string {
  if (!iso.includes("T")) return iso;
  return `${iso.slice(0, 16).replace("T", " ")} UTC`;
}

export function formatEventTime(event: CalendarEvent): string {
  if (event.allDay) {
    return `${event.start} (all day)`;
  }
  return `${formatTime(event.start)} to ${formatTime(event.end)}`;
}

export function formatEvent(event: CalendarEvent): string {
  const lines = [`• ${event.summary}`, `  ${formatEventTime(event)}`];
  if (event.location) lines.push(`  📍 ${event.location}`);
  lines.push(`  id: ${event.id}`);
  return lines.join("\n");
}

function formatPayload(payload: DispatchPayload): string {
  switch (payload.operation) {
    case "create_event":
    case "update_event": {
      const [event] = payload.events;
      const title =
        payload.operation === "create_event"
          ? "✅ Event created"
          : "✏️ Event updated";
      if (!event) return `${title}.`;
      const lines = [`${title}:`, formatEvent(event)];
      if (event.htmlLink) lines.push(`  ${event.htmlLink}`);
      return lines.join("\n");
    }
    case "delete_event":
      return payload.deletedEventId
        ? `🗑️ Event ${payload.deletedEventId} deleted.`
        : "🗑️ Event deleted.";
    case "list_events": {
      if (payload.events.length === 0) {
        return "No events found in that time range.";
      }
      const shown = payload.events.slice(0, MAX_EVENTS_DISPLAYED);
      const lines = [
        `📅 Found ${payload.events.length} event(s):`,
        ...shown.map(formatEvent),
      ];
      if (payload.events.length > shown.length) {
        lines.push(`(showing first ${shown.length})`);
      }
      if (payload.truncated) {
        lines.push(
          "More events exist in this range; narrow the time window to see them."
        );
      }
      return lines.join("\n");
    }
  }
}

/**
 * Turn a dispatch result into a chat reply.
 */
export function formatDispatchResult(result: DispatchResult): string {
  switch (result.kind) {
    case "success":
      return formatPayload(result.payload);
    case "validation_error":
      return `I couldn't do that: ${result.reason}`;
    case "auth_required":
      return AUTH_REQUIRED_MESSAGE;
    case "backend_error": {
      const transient = result.retryable
        ? TRANSIENT_ERROR_MESSAGES[result.errorKind]
        : undefined;
      return transient ?? `Google Calendar error: ${result.message}`;
    }
  }
}
