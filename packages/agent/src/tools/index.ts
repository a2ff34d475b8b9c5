import type { ToolName } from "@app/proto";
import { makeCreateEventTool } from "./create-event";
import { makeListEventsTool } from "./list-events";
import { makeUpdateEventTool } from "./update-event";
import { makeDeleteEventTool } from "./delete-event";
import { registerTool, type RegisteredTool } from "./types";

export { deriveEventId } from "./create-event";
export {
  clampMaxResults,
  compareEvents,
  DEFAULT_MAX_RESULTS,
  MAX_RESULTS_LIMIT,
} from "./list-events";
export { DEFAULT_CALENDAR_ID, formatZodError, toUtcIso } from "./time";
export * from "./types";

export type Toolset = ReadonlyMap<ToolName, RegisteredTool>;

/**
 * The calendar tools offered to the classifier and accepted by dispatch.
 */
export function makeToolset(): Toolset {
  const tools = [
    registerTool(makeCreateEventTool()),
    registerTool(makeListEventsTool()),
    registerTool(makeUpdateEventTool()),
    registerTool(makeDeleteEventTool()),
  ];
  return new Map(tools.map((tool) => [tool.name, tool]));
}
