/**
 * Tool Dispatch Engine.
 *
 * Takes one classifier-issued tool call, validates it, obtains a usable
 * access token for the requesting user and runs the call against the
 * calendar backend. Every outcome, including failures, comes back as a
 * DispatchResult; nothing is retried here.
 */

import debug from "debug";
import type { TokenStatus } from "@app/connectors";
import {
  AuthError,
  LogicError,
  NetworkError,
  PermissionError,
  isToolName,
  type DispatchResult,
  type ToolCallRequest,
  type UserId,
} from "@app/proto";
import type { CalendarBackend } from "./backend";
import { formatZodError, makeToolset, type Toolset } from "./tools";

const debugDispatch = debug("calbot:agent:dispatch");

/**
 * Source of usable access tokens, i.e. the TokenRefresher.
 */
export interface TokenSource {
  ensureValid(userId: UserId): Promise<TokenStatus>;
  /** Called when the backend rejected a token ensureValid handed out */
  invalidate?(userId: UserId, accessToken: string): Promise<void>;
}

export interface ToolDispatcherOptions {
  backend: CalendarBackend;
  tokens: TokenSource;
  tools?: Toolset;
}

export class ToolDispatcher {
  private readonly backend: CalendarBackend;
  private readonly tokens: TokenSource;
  readonly tools: Toolset;

  constructor(options: ToolDispatcherOptions) {
    this.backend = options.backend;
    this.tokens = options.tokens;
    this.tools = options.tools ?? makeToolset();
  }

  async dispatch(request: ToolCallRequest): Promise<DispatchResult> {
    const { name, userId, requestId } = request;

    const tool = isToolName(name) ? this.tools.get(name) : undefined;
    if (!tool) {
      debugDispatch("[%s] unknown tool %s", requestId, name);
      return { kind: "validation_error", reason: `unknown tool: ${name}` };
    }

    const prepared = tool.prepare(request.arguments);
    if (!prepared.success) {
      const reason = formatZodError(prepared.error);
      debugDispatch(
        "[%s] invalid arguments for %s: %s",
        requestId,
        name,
        reason
      );
      return { kind: "validation_error", reason };
    }

    const token = await this.tokens.ensureValid(userId);
    if (token.status !== "valid") {
      debugDispatch(
        "[%s] no usable token for %s: %s",
        requestId,
        userId,
        token.status
      );
      return tokenFailure(token);
    }

    debugDispatch("[%s] %s for %s", requestId, name, userId);
    try {
      const payload = await prepared.call.run({
        backend: this.backend,
        accessToken: token.accessToken,
        userId,
        requestId,
      });
      debugDispatch(
        "[%s] %s done, %d event(s)",
        requestId,
        name,
        payload.events.length
      );
      return { kind: "success", payload };
    } catch (error) {
      if (error instanceof AuthError && this.tokens.invalidate) {
        await this.tokens.invalidate(userId, token.accessToken);
      }
      const result = classifyBackendFailure(error);
      debugDispatch("[%s] %s failed: %o", requestId, name, result);
      return result;
    }
  }
}

function tokenFailure(
  token: Exclude<TokenStatus, { status: "valid" }>
): DispatchResult {
  switch (token.status) {
    case "auth_required":
      return { kind: "auth_required", reason: "missing" };
    case "revoked":
      return { kind: "auth_required", reason: "revoked" };
    case "unavailable":
      // A token endpoint rejecting our client is not a failing user credential
      return token.error instanceof AuthError
        ? {
            kind: "backend_error",
            errorKind: "unknown",
            retryable: false,
            message: token.error.message,
          }
        : classifyBackendFailure(token.error);
  }
}

/**
 * Map a failure from the backend (or the token endpoint) to a DispatchResult.
 */
export function classifyBackendFailure(error: unknown): DispatchResult {
  if (error instanceof NetworkError) {
    if (error.timedOut) {
      return {
        kind: "backend_error",
        errorKind: "timeout",
        retryable: true,
        message: error.message,
      };
    }
    if (error.statusCode === 429) {
      return error.retryAfterMs === undefined
        ? {
            kind: "backend_error",
            errorKind: "rate_limited",
            retryable: true,
            message: error.message,
          }
        : {
            kind: "backend_error",
            errorKind: "rate_limited",
            retryable: true,
            message: error.message,
            retryAfterMs: error.retryAfterMs,
          };
    }
    return {
      kind: "backend_error",
      errorKind: "unavailable",
      retryable: true,
      message: error.message,
    };
  }

  if (error instanceof AuthError) {
    // The backend rejected a token we believed valid
    return { kind: "auth_required", reason: "revoked" };
  }

  if (error instanceof PermissionError) {
    return {
      kind: "backend_error",
      errorKind: "permission_denied",
      retryable: false,
      message: error.message,
    };
  }

  if (error instanceof LogicError) {
    const errorKind =
      error.statusCode === 404
        ? "not_found"
        : error.statusCode === 409
          ? "conflict"
          : "invalid_request";
    return {
      kind: "backend_error",
      errorKind,
      retryable: false,
      message: error.message,
    };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    kind: "backend_error",
    errorKind: "unknown",
    retryable: false,
    message,
  };
}
