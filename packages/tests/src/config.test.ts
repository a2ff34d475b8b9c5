import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "@app/server";

const required = { GOOGLE_CLIENT_ID: "test-client", GOOGLE_CLIENT_SECRET: "test-secret" };

describe("loadConfig", () => {
  it("names every missing setting", () => {
    expect(() => loadConfig({})).toThrow(
      new ConfigError("GOOGLE_CLIENT_ID: Required; GOOGLE_CLIENT_SECRET: Required")
    );
  });

  it("treats blank values as unset", () => {
    expect(() => loadConfig({ ...required, GOOGLE_CLIENT_SECRET: "   " })).toThrow(
      "Configuration error: GOOGLE_CLIENT_SECRET: Required"
    );
  });

  it("fills in defaults", () => {
    const config = loadConfig(required);

    expect(config.google).toEqual({
      clientId: "test-client",
      clientSecret: "test-secret",
      redirectUri: "http://localhost:8080/callback",
      authUrl: "https://accounts.google.com/o/oauth2/v2/auth",
      tokenUrl: "https://oauth2.googleapis.com/token",
      revokeUrl: "https://oauth2.googleapis.com/revoke",
    });
    expect(config.callbackPath).toBe("/callback");
    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(8080);
    expect(config.dataDir).toBe("./data");
    expect(config.sessionTtlMs).toBe(600_000);
    expect(config.refreshMarginMs).toBe(60_000);
  });

  it("serves the path of the redirect URI on its port", () => {
    const config = loadConfig({ ...required, GOOGLE_REDIRECT_URI: "https://cal.example.com/oauth/google" });

    expect(config.callbackPath).toBe("/oauth/google");
    expect(config.port).toBe(443);
  });

  it("lets PORT override the redirect port", () => {
    expect(loadConfig({ ...required, PORT: "3000" }).port).toBe(3000);
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ ...required, PORT: "70000" })).toThrow(
      "Configuration error: PORT: Number must be less than or equal to 65535"
    );
  });

  it("takes a chat API token of at least 16 characters", () => {
    expect(loadConfig({ ...required, CHAT_API_TOKEN: "test-chat-token-0001" }).chatApiToken).toBe(
      "test-chat-token-0001"
    );
    expect(loadConfig(required).chatApiToken).toBeUndefined();
    expect(() => loadConfig({ ...required, CHAT_API_TOKEN: "short" })).toThrow(
      "Configuration error: CHAT_API_TOKEN: must be at least 16 characters"
    );
  });

  it("converts timeouts given in seconds", () => {
    const config = loadConfig({ ...required, AUTH_SESSION_TTL_SECONDS: "120", TOKEN_REFRESH_MARGIN_SECONDS: "0" });

    expect(config.sessionTtlMs).toBe(120_000);
    expect(config.refreshMarginMs).toBe(0);
  });
});
