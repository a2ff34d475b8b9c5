import {
  createOpenRouter,
  type OpenRouterProvider,
} from "@openrouter/ai-sdk-provider";
import type { LanguageModel } from "ai";
import { getEnv } from "./env";

let openRouter: OpenRouterProvider | undefined;

export const DEFAULT_AGENT_MODEL = "openai/gpt-4o-mini";

export function getOpenRouter() {
  if (!openRouter)
    openRouter = createOpenRouter({
      apiKey: getEnv().OPENROUTER_API_KEY,
      baseURL: getEnv().OPENROUTER_BASE_URL || "https://openrouter.ai/api/v1",
    });
  return openRouter;
}

/** Drop the cached provider, e.g. after setEnv changed the API key */
export function resetOpenRouter() {
  openRouter = undefined;
}

export function getModelName() {
  return getEnv().AGENT_MODEL || DEFAULT_AGENT_MODEL;
}

export function getDefaultModel(): LanguageModel {
  return getOpenRouter()(getModelName());
}
