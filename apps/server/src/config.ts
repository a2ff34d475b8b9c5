/**
 * Server configuration from environment variables (and an optional .env file).
 */

import debug from "debug";
import dotenv from "dotenv";
import { z } from "zod";
import { googleOAuthBase } from "@app/connectors";
import { ConfigError } from "./errors";

const debugConfig = debug("server:config");

const configSchema = z.object({
  GOOGLE_CLIENT_ID: z.string().min(1, "GOOGLE_CLIENT_ID is required"),
  GOOGLE_CLIENT_SECRET: z.string().min(1, "GOOGLE_CLIENT_SECRET is required"),
  GOOGLE_REDIRECT_URI: z
    .string()
    .url()
    .default("http://localhost:8080/callback"),
  GOOGLE_AUTH_URI: z.string().url().default(googleOAuthBase.authUrl),
  GOOGLE_TOKEN_URI: z.string().url().default(googleOAuthBase.tokenUrl),
  GOOGLE_REVOKE_URI: z.string().url().default(googleOAuthBase.revokeUrl),
  DATA_DIR: z.string().default("./data"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  CHAT_API_TOKEN: z
    .string()
    .min(16, "must be at least 16 characters")
    .optional(),
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_BASE_URL: z.string().url().optional(),
  AGENT_MODEL: z.string().optional(),
  EXTRA_SYSTEM_PROMPT: z.string().optional(),
  AUTH_SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(600),
  TOKEN_REFRESH_MARGIN_SECONDS: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(60),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  BACKEND_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  CLASSIFIER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
});

export interface AppConfig {
  google: {
    clientId: string;
    clientSecret: string;
    redirectUri: string;
    authUrl: string;
    tokenUrl: string;
    revokeUrl: string;
  };
  /** Path part of the redirect URI, served by the callback route */
  callbackPath: string;
  host: string;
  port: number;
  /** Bearer token required by POST /api/chat; unset disables the endpoint */
  chatApiToken?: string;
  dataDir: string;
  openRouter: {
    apiKey?: string;
    baseUrl?: string;
    model?: string;
    extraSystemPrompt?: string;
  };
  sessionTtlMs: number;
  refreshMarginMs: number;
  httpTimeoutMs: number;
  backendTimeoutMs: number;
  classifierTimeoutMs: number;
}

/**
 * Load a .env file into process.env. Variables already set win.
 */
export function loadEnvFile(path?: string): void {
  const result = dotenv.config(path ? { path } : undefined);
  if (result.error) {
    debugConfig("No .env file loaded: %s", result.error.message);
  } else {
    debugConfig("Loaded environment from %s", path ?? ".env");
  }
}

/**
 * Validate and convert environment variables into AppConfig.
 * Empty values count as unset.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): AppConfig {
  const input: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") input[key] = value.trim();
  }

  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(details);
  }
  const c = parsed.data;

  const redirect = new URL(c.GOOGLE_REDIRECT_URI);
  const redirectPort = redirect.port
    ? Number(redirect.port)
    : redirect.protocol === "https:"
      ? 443
      : 80;

  return {
    google: {
      clientId: c.GOOGLE_CLIENT_ID,
      clientSecret: c.GOOGLE_CLIENT_SECRET,
      redirectUri: c.GOOGLE_REDIRECT_URI,
      authUrl: c.GOOGLE_AUTH_URI,
      tokenUrl: c.GOOGLE_TOKEN_URI,
      revokeUrl: c.GOOGLE_REVOKE_URI,
    },
    callbackPath: redirect.pathname || "/",
    host: c.HOST,
    port: c.PORT ?? redirectPort,
    chatApiToken: c.CHAT_API_TOKEN,
    dataDir: c.DATA_DIR,
    openRouter: {
      apiKey: c.OPENROUTER_API_KEY,
      baseUrl: c.OPENROUTER_BASE_URL,
      model: c.AGENT_MODEL,
      extraSystemPrompt: c.EXTRA_SYSTEM_PROMPT,
    },
    sessionTtlMs: c.AUTH_SESSION_TTL_SECONDS * 1000,
    refreshMarginMs: c.TOKEN_REFRESH_MARGIN_SECONDS * 1000,
    httpTimeoutMs: c.HTTP_TIMEOUT_MS,
    backendTimeoutMs: c.BACKEND_TIMEOUT_MS,
    classifierTimeoutMs: c.CLASSIFIER_TIMEOUT_MS,
  };
}
