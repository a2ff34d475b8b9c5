import { z } from "zod";

/** Default calendar when the user names none */
export const DEFAULT_CALENDAR_ID = "primary";

const ISO_DATE_TIME =
  /^(\d{4})-(\d{2})-(\d{2})T\d{2}:\d{2}(:\d{2}(\.\d{1,3})?)?(Z|[+-]\d{2}:\d{2})?$/;
const HAS_OFFSET = /(Z|[+-]\d{2}:\d{2})$/;

/**
 * Normalize an ISO 8601 date-time to a UTC ISO string.
 * A value without an offset is read as UTC. Returns undefined if unparseable.
 */
export function toUtcIso(value: string): string | undefined {
  const trimmed = value.trim();
  const match = ISO_DATE_TIME.exec(trimmed);
  if (!match) return undefined;
  // Date.parse rolls "02-30" over into March
  if (!isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]))) {
    return undefined;
  }
  const time = Date.parse(HAS_OFFSET.test(trimmed) ? trimmed : `${trimmed}Z`);
  if (Number.isNaN(time)) return undefined;
  return new Date(time).toISOString();
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  // Day 0 of the next month is the last day of this one
  return day <= new Date(Date.UTC(year, month, 0)).getUTCDate();
}

/** ISO 8601 date-time, normalized to UTC */
export const isoDateTime = z.string().transform((value, ctx) => {
  const normalized = toUtcIso(value);
  if (!normalized) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "must be an ISO 8601 date-time, e.g. 2025-03-14T15:00:00Z",
    });
    return z.NEVER;
  }
  return normalized;
});

export const calendarId = z
  .string()
  .min(1)
  .optional()
  .describe("Calendar id, defaults to the user's primary calendar");

export const eventId = z.string().min(1).max(1024).describe("Id of the event");

/**
 * Human-readable summary of validation issues: "field: message; ...".
 */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0
        ? `${issue.path.join(".")}: ${issue.message}`
        : issue.message
    )
    .join("; ");
}
