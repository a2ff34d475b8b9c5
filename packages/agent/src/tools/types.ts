import type { z } from "zod";
import type { DispatchPayload, ToolName, UserId } from "@app/proto";
import type { CalendarBackend } from "../backend";

/**
 * Everything a tool needs to run one call on behalf of one user.
 */
export interface ToolContext {
  backend: CalendarBackend;
  accessToken: string;
  userId: UserId;
  requestId: string;
}

/**
 * Calendar tool definition.
 * The input schema is shared by the classifier (as the tool's parameters)
 * and by dispatch (to validate what the classifier produced).
 */
export interface Tool<TInput = unknown> {
  name: ToolName;

  /** Human-readable description, shown to the classifier */
  description: string;

  /** Zod schema for input validation; output is the normalized input */
  inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;

  /** Execute the tool with validated input */
  execute: (context: ToolContext, input: TInput) => Promise<DispatchPayload>;
}

/**
 * Helper to create a tool definition with full metadata.
 */
export function defineTool<TInput>(config: Tool<TInput>): Tool<TInput> {
  return config;
}

/**
 * Input already validated against a tool's schema, ready to run.
 */
export interface PreparedCall {
  run: (context: ToolContext) => Promise<DispatchPayload>;
}

export type PrepareResult =
  | { success: true; call: PreparedCall }
  | { success: false; error: z.ZodError };

/**
 * Tool with its input type erased, so tools of different inputs can share
 * one registry.
 */
export interface RegisteredTool {
  name: ToolName;
  description: string;
  inputSchema: z.ZodType<unknown, z.ZodTypeDef, unknown>;
  prepare: (args: unknown) => PrepareResult;
}

export function registerTool<TInput>(tool: Tool<TInput>): RegisteredTool {
  return {
    name: tool.name,
    description: tool.description,
    inputSchema: tool.inputSchema,
    prepare: (args) => {
      const parsed = tool.inputSchema.safeParse(args);
      if (!parsed.success) {
        return { success: false, error: parsed.error };
      }
      const input = parsed.data;
      return {
        success: true,
        call: { run: (context) => tool.execute(context, input) },
      };
    },
  };
}
