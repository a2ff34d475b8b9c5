/**
 * Contracts between the classifier, the tool dispatch engine and the chat
 * layer.
 */

/** Opaque stable identifier of an end user in the chat system */
export type UserId = string;

export const TOOL_NAMES = [
  'create_event',
  'list_events',
  'update_event',
  'delete_event',
] as const;
export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return (TOOL_NAMES as readonly string[]).includes(name);
}

/** A single classifier-issued instruction */
export interface ToolCallRequest {
  /** Raw tool name as produced by the classifier; validated by dispatch */
  name: string;
  /** Raw arguments; validated against the tool's schema by dispatch */
  arguments: unknown;
  userId: UserId;
  /** For idempotency and logging; not persisted */
  requestId: string;
}

/** Calendar event in a backend-independent shape */
export interface CalendarEvent {
  id: string;
  calendarId: string;
  summary: string;
  /** UTC ISO timestamp, or YYYY-MM-DD for all-day events */
  start: string;
  end: string;
  allDay: boolean;
  description?: string;
  location?: string;
  htmlLink?: string;
}

/** Stable result schema, whichever operation ran */
export interface DispatchPayload {
  operation: ToolName;
  events: CalendarEvent[];
  /** list_events only: more events matched than were returned */
  truncated: boolean;
  /** delete_event only */
  deletedEventId?: string;
}

export type BackendErrorKind =
  | 'timeout'
  | 'unavailable'
  | 'rate_limited'
  | 'permission_denied'
  | 'not_found'
  | 'conflict'
  | 'invalid_request'
  | 'unknown';

export type DispatchResult =
  | { kind: 'success'; payload: DispatchPayload }
  | { kind: 'validation_error'; reason: string }
  | { kind: 'auth_required'; reason: 'missing' | 'revoked' }
  | {
      kind: 'backend_error';
      errorKind: BackendErrorKind;
      retryable: boolean;
      message: string;
      retryAfterMs?: number;
    };
