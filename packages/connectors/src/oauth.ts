/**
 * OAuth2 authorization-code flow handler: authorization URL, code exchange,
 * refresh-token exchange and revocation against the provider's endpoints.
 *
 * Every outbound call carries a timeout. Failures are thrown as
 * ClassifiedErrors from @app/proto.
 */

import createDebug from "debug";
import { z } from "zod";
import {
  AuthError,
  InternalError,
  classifyHttpError,
  classifyTransportError,
  parseRetryAfter,
} from "@app/proto";
import type { OAuthAppCredentials, OAuthConfig, TokenResponse } from "./types";

const debug = createDebug("calbot:connectors:oauth");

/** Default timeout for token endpoint calls */
export const DEFAULT_TOKEN_TIMEOUT_MS = 10_000;

/**
 * Result of a token revocation attempt.
 */
export type RevokeResult = {
  success: boolean;
  reason: "revoked" | "not_supported" | "failed";
};

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.coerce.number().positive().optional(),
  token_type: z.string().optional(),
  scope: z.string().optional(),
  id_token: z.string().optional(),
});

/**
 * OAuth error codes that mean the grant itself is dead: the refresh token was
 * revoked or expired, or the authorization code was already used.
 */
const DEAD_GRANT_ERRORS = new Set(["invalid_grant"]);

export class OAuthHandler {
  private readonly timeoutMs: number;

  constructor(
    private config: OAuthConfig,
    private app: OAuthAppCredentials,
    options?: { timeoutMs?: number }
  ) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TOKEN_TIMEOUT_MS;
  }

  get scopes(): string[] {
    return [...this.config.scopes];
  }

  /**
   * Generate the OAuth authorization URL embedding the state token and the
   * single registered redirect URI.
   */
  getAuthUrl(state: string): string {
    const params = new URLSearchParams({
      client_id: this.app.clientId,
      redirect_uri: this.app.redirectUri,
      response_type: "code",
      state,
    });

    if (this.config.scopes.length > 0) {
      params.set("scope", this.config.scopes.join(" "));
    }

    // access_type=offline, prompt=consent etc.
    if (this.config.extraAuthParams) {
      for (const [key, value] of Object.entries(this.config.extraAuthParams)) {
        params.set(key, value);
      }
    }

    return `${this.config.authUrl}?${params.toString()}`;
  }

  /**
   * Exchange authorization code for tokens.
   */
  async exchangeCode(code: string): Promise<TokenResponse> {
    debug("Exchanging code for tokens");
    return this.postToken(
      new URLSearchParams({
        code,
        redirect_uri: this.app.redirectUri,
        grant_type: "authorization_code",
      }),
      "oauth.exchangeCode"
    );
  }

  /**
   * Exchange a refresh token for a new access token.
   * Throws AuthError with errorCode "invalid_grant" when the grant is dead.
   */
  async refreshToken(refreshToken: string): Promise<TokenResponse> {
    debug("Refreshing access token");
    return this.postToken(
      new URLSearchParams({
        refresh_token: refreshToken,
        grant_type: "refresh_token",
      }),
      "oauth.refreshToken"
    );
  }

  /**
   * Revoke a token at the OAuth provider.
   * Best-effort: failures don't throw, they return
   * { success: false, reason: "failed" }.
   */
  async revokeToken(token: string): Promise<RevokeResult> {
    if (!this.config.revokeUrl) {
      debug("No revoke URL configured, skipping token revocation");
      return { success: true, reason: "not_supported" };
    }

    try {
      const response = await fetch(this.config.revokeUrl, {
        method: "POST",
        headers: { "Content-Type": "application/x-www-form-urlencoded" },
        body: new URLSearchParams({ token }).toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });

      // Google returns 200 on success, even for already-revoked tokens
      if (response.ok) {
        debug("Token revocation successful");
        return { success: true, reason: "revoked" };
      }

      debug("Token revocation failed: %s", response.status);
      return { success: false, reason: "failed" };
    } catch (error) {
      debug("Token revocation error: %s", error);
      return { success: false, reason: "failed" };
    }
  }

  private async postToken(
    body: URLSearchParams,
    source: string
  ): Promise<TokenResponse> {
    body.set("client_id", this.app.clientId);
    body.set("client_secret", this.app.clientSecret);

    let response: Response;
    try {
      response = await fetch(this.config.tokenUrl, {
        method: "POST",
        headers: {
          "Content-Type": "application/x-www-form-urlencoded",
          Accept: "application/json",
        },
        body: body.toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      debug("Token endpoint unreachable (%s): %s", source, error);
      throw classifyTransportError(error, source);
    }

    if (!response.ok) {
      const errorText = await response.text();
      const errorCode = parseOAuthErrorCode(errorText);
      debug(
        "Token endpoint error (%s): %s %s",
        source,
        response.status,
        errorCode
      );

      const cause = new Error(
        `Token endpoint returned ${response.status}: ${errorText}`
      );
      if (errorCode && DEAD_GRANT_ERRORS.has(errorCode)) {
        // invalid_grant arrives as HTTP 400, which would read as a LogicError
        throw new AuthError(getOAuthUserMessage(errorCode), {
          cause,
          source,
          errorCode,
          statusCode: response.status,
        });
      }
      throw classifyHttpError(response.status, getOAuthUserMessage(errorCode), {
        cause,
        source,
        retryAfterMs: parseRetryAfter(response.headers.get("retry-after")),
      });
    }

    let data: unknown;
    try {
      data = await response.json();
    } catch (error) {
      throw new InternalError("Token endpoint returned invalid JSON", {
        cause: error instanceof Error ? error : undefined,
        source,
      });
    }

    const parsed = tokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new InternalError(
        `Unexpected token response: ${parsed.error.message}`,
        { source }
      );
    }

    debug("Token endpoint call successful (%s)", source);
    return parsed.data;
  }
}

/** Map of OAuth error codes to user-friendly messages */
const OAUTH_ERROR_MESSAGES: Record<string, string> = {
  invalid_grant: "Authorization expired or invalid. Please run /auth again.",
  invalid_client: "OAuth configuration error. Please contact the operator.",
  invalid_request: "Invalid authorization request. Please run /auth again.",
  unauthorized_client:
    "This app is not authorized. Please contact the operator.",
  unsupported_grant_type:
    "OAuth configuration error. Please contact the operator.",
  invalid_scope: "The requested calendar permissions are not available.",
  server_error: "Google is temporarily unavailable. Please try again later.",
  temporarily_unavailable:
    "Google is temporarily unavailable. Please try again later.",
};

/** Default message for unknown OAuth errors */
const DEFAULT_OAUTH_ERROR_MESSAGE =
  "An authentication error occurred. Please run /auth again.";

/**
 * Parse OAuth error code from response body.
 * @internal
 */
export function parseOAuthErrorCode(responseBody: string): string | undefined {
  try {
    const data: unknown = JSON.parse(responseBody);
    if (
      typeof data === "object" &&
      data !== null &&
      "error" in data &&
      typeof data.error === "string"
    ) {
      return data.error;
    }
    return undefined;
  } catch {
    return undefined;
  }
}

/**
 * Get user-friendly message for OAuth error code.
 * @internal
 */
function getOAuthUserMessage(errorCode: string | undefined): string {
  if (errorCode && OAUTH_ERROR_MESSAGES[errorCode]) {
    return OAUTH_ERROR_MESSAGES[errorCode];
  }
  return DEFAULT_OAUTH_ERROR_MESSAGE;
}
