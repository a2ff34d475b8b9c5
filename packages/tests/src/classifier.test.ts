import { describe, it, expect } from "vitest";
import {
  APICallError,
  type LanguageModelV2,
  type LanguageModelV2CallOptions,
  type LanguageModelV2Content,
} from "@ai-sdk/provider";
import { OpenRouterClassifier, buildSystemPrompt, makeToolset } from "@app/agent";
import { AuthError, InternalError } from "@app/proto";

const NOW = new Date("2025-03-14T08:00:00.000Z");

/**
 * Language model answering every call with the given content.
 */
function fakeModel(
  respond: () => LanguageModelV2Content[],
  calls: LanguageModelV2CallOptions[] = []
): LanguageModelV2 {
  return {
    specificationVersion: "v2",
    provider: "test",
    modelId: "test-model",
    supportedUrls: {},
    async doGenerate(options) {
      calls.push(options);
      const content = respond();
      return {
        content,
        finishReason: content.some((part) => part.type === "tool-call") ? "tool-calls" : "stop",
        usage: { inputTokens: 10, outputTokens: 5, totalTokens: 15 },
        warnings: [],
      };
    },
    async doStream() {
      throw new Error("streaming is not used");
    },
  };
}

const tools = [...makeToolset().values()];

describe("OpenRouterClassifier", () => {
  it("returns the requested tool call", async () => {
    const model = fakeModel(() => [
      {
        type: "tool-call",
        toolCallId: "call-1",
        toolName: "list_events",
        input: JSON.stringify({ start_time: "2025-03-15T00:00:00.000Z", end_time: "2025-03-16T00:00:00.000Z" }),
      },
    ]);
    const classifier = new OpenRouterClassifier({ model, now: () => NOW });

    await expect(classifier.classify("what's on tomorrow?", tools)).resolves.toEqual({
      kind: "tool_call",
      name: "list_events",
      arguments: { start_time: "2025-03-15T00:00:00.000Z", end_time: "2025-03-16T00:00:00.000Z" },
    });
  });

  it("takes the first of several tool calls", async () => {
    const model = fakeModel(() => [
      {
        type: "tool-call",
        toolCallId: "call-1",
        toolName: "delete_event",
        input: JSON.stringify({ event_id: "evt-1" }),
      },
      {
        type: "tool-call",
        toolCallId: "call-2",
        toolName: "delete_event",
        input: JSON.stringify({ event_id: "evt-2" }),
      },
    ]);
    const classifier = new OpenRouterClassifier({ model, now: () => NOW });

    const result = await classifier.classify("delete both", tools);

    expect(result).toEqual({ kind: "tool_call", name: "delete_event", arguments: { event_id: "evt-1" } });
  });

  it("returns a text answer", async () => {
    const model = fakeModel(() => [{ type: "text", text: "  I can only help with your calendar.  " }]);
    const classifier = new OpenRouterClassifier({ model, now: () => NOW });

    await expect(classifier.classify("tell me a joke", tools)).resolves.toEqual({
      kind: "text",
      text: "I can only help with your calendar.",
    });
  });

  it("falls back to a default answer when the model says nothing", async () => {
    const classifier = new OpenRouterClassifier({ model: fakeModel(() => []), now: () => NOW });

    await expect(classifier.classify("hm", tools)).resolves.toEqual({
      kind: "text",
      text: "I'm not sure how to help with that.",
    });
  });

  it("offers the calendar tools and the current time to the model", async () => {
    const calls: LanguageModelV2CallOptions[] = [];
    const classifier = new OpenRouterClassifier({ model: fakeModel(() => [], calls), now: () => NOW });

    await classifier.classify("hello", tools);

    expect(calls).toHaveLength(1);
    expect(calls[0].prompt[0]).toMatchObject({ role: "system", content: buildSystemPrompt(NOW) });
    expect(calls[0].tools?.map((tool) => tool.name)).toEqual([
      "create_event",
      "list_events",
      "update_event",
      "delete_event",
    ]);
  });

  it("classifies API errors by status code", async () => {
    const model = fakeModel(() => {
      throw new APICallError({
        message: "Invalid API key",
        url: "https://openrouter.test/api/v1/chat/completions",
        requestBodyValues: {},
        statusCode: 401,
      });
    });
    const classifier = new OpenRouterClassifier({ model, now: () => NOW });

    const error = await classifier.classify("hello", tools).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toMatchObject({ statusCode: 401, source: "classifier" });
  });

  it("classifies unexpected failures as internal", async () => {
    const model = fakeModel(() => {
      throw new Error("model exploded");
    });
    const classifier = new OpenRouterClassifier({ model, now: () => NOW });

    await expect(classifier.classify("hello", tools)).rejects.toBeInstanceOf(InternalError);
  });
});

describe("buildSystemPrompt", () => {
  it("states the current time and appends extra instructions", () => {
    const prompt = buildSystemPrompt(NOW, "  Answer in French.  ");

    expect(prompt.split("\n")[0]).toBe(
      "You are a calendar assistant. The current date and time is 2025-03-14T08:00:00.000Z (UTC)."
    );
    expect(prompt.endsWith("\n\nAnswer in French.")).toBe(true);
  });
});
