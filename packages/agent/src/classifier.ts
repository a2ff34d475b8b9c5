/**
 * Intent classifier: turns one chat message into at most one tool call, or a
 * plain text answer.
 *
 * The model never executes anything; tools are offered without `execute`
 * and the first requested call is handed back to the caller for dispatch.
 */

import debug from "debug";
import {
  APICallError,
  generateText,
  tool,
  type LanguageModel,
  type ToolSet,
} from "ai";
import type { z } from "zod";
import {
  classifyHttpError,
  classifyTransportError,
  type ClassifiedError,
} from "@app/proto";
import { getEnv } from "./env";
import { getDefaultModel } from "./model";

const debugClassifier = debug("calbot:agent:classifier");

export const DEFAULT_CLASSIFIER_TIMEOUT_MS = 30_000;

export type Classification =
  | { kind: "tool_call"; name: string; arguments: unknown }
  | { kind: "text"; text: string };

/** What the classifier needs to know about a tool */
export interface ToolSpec {
  name: string;
  description: string;
  inputSchema: z.ZodType<unknown, z.ZodTypeDef, unknown>;
}

export interface Classifier {
  classify(text: string, tools: readonly ToolSpec[]): Promise<Classification>;
}

export interface OpenRouterClassifierOptions {
  /** Defaults to the OpenRouter model from env */
  model?: LanguageModel;
  timeoutMs?: number;
  now?: () => Date;
}

/**
 * System prompt for calendar intent classification.
 */
export function buildSystemPrompt(now: Date, extra?: string): string {
  const prompt = `You are a calendar assistant. The current date and time is \
${now.toISOString()} (UTC).

Use the provided tools to create, list, update or delete events in the user's Google Calendar.
- Call at most one tool per message.
- Use ISO 8601 date-times. Assume UTC when the user does not name a time zone.
- For questions like "what's on tomorrow", list events for that whole day.
- If the request is unclear or not about the calendar, answer briefly in text instead of calling a tool.`;
  return extra?.trim() ? `${prompt}\n\n${extra.trim()}` : prompt;
}

export class OpenRouterClassifier implements Classifier {
  private readonly model?: LanguageModel;
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: OpenRouterClassifierOptions = {}) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CLASSIFIER_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  async classify(
    text: string,
    tools: readonly ToolSpec[]
  ): Promise<Classification> {
    const toolSet: ToolSet = {};
    for (const spec of tools) {
      toolSet[spec.name] = tool({
        description: spec.description,
        inputSchema: spec.inputSchema,
      });
    }

    debugClassifier(
      "Classifying message (%d chars) with %d tools",
      text.length,
      tools.length
    );
    try {
      const result = await generateText({
        model: this.model ?? getDefaultModel(),
        system: buildSystemPrompt(this.now(), getEnv().EXTRA_SYSTEM_PROMPT),
        prompt: text,
        tools: toolSet,
        toolChoice: "auto",
        temperature: 0,
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      });

      const call = result.toolCalls[0];
      if (call) {
        if (result.toolCalls.length > 1) {
          debugClassifier(
            "Model requested %d tool calls, taking the first",
            result.toolCalls.length
          );
        }
        debugClassifier("Tool call: %s", call.toolName);
        return {
          kind: "tool_call",
          name: call.toolName,
          arguments: call.input,
        };
      }

      return {
        kind: "text",
        text: result.text.trim() || "I'm not sure how to help with that.",
      };
    } catch (error) {
      const classified = classifyModelError(error);
      debugClassifier(
        "Classification failed (%s): %s",
        classified.type,
        classified.message
      );
      throw classified;
    }
  }
}

function classifyModelError(error: unknown): ClassifiedError {
  if (APICallError.isInstance(error) && error.statusCode !== undefined) {
    return classifyHttpError(error.statusCode, error.message, {
      cause: error,
      source: "classifier",
    });
  }
  return classifyTransportError(error, "classifier");
}
