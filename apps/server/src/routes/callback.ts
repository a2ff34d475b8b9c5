/**
 * OAuth redirect callback.
 *
 * The single redirect URI registered with Google for every user. The state
 * token in the query string decides whose authorization completes; every
 * failure renders the same page so a caller learns nothing about state tokens.
 */

import type { FastifyInstance } from "fastify";
import createDebug from "debug";
import type { AuthorizationCoordinator } from "@app/connectors";
import {
  AUTH_FLOW_FAILED_MESSAGE,
  AUTH_FLOW_SUCCESS_MESSAGE,
  callbackQuerySchema,
  isAuthFlowError,
} from "@app/proto";

const debug = createDebug("server:callback");

export async function registerCallbackRoutes(
  fastify: FastifyInstance,
  coordinator: Pick<AuthorizationCoordinator, "handleCallback">,
  callbackPath: string
): Promise<void> {
  /**
   * GET {callbackPath}?state=...&code=... | ?state=...&error=...
   */
  fastify.get(callbackPath, async (request, reply) => {
    const query = callbackQuerySchema.safeParse(request.query);
    if (!query.success) {
      debug("Malformed callback query");
      return reply
        .status(400)
        .type("text/html")
        .send(renderPage("error", AUTH_FLOW_FAILED_MESSAGE));
    }

    try {
      const userId = await coordinator.handleCallback(query.data);
      debug("Authorization completed for %s", userId);
      return reply
        .type("text/html")
        .send(renderPage("success", AUTH_FLOW_SUCCESS_MESSAGE));
    } catch (err) {
      if (isAuthFlowError(err)) {
        debug("Authorization flow failed: %s", err.reason);
      } else {
        request.log.error({ err }, "Unexpected error in OAuth callback");
      }
      return reply
        .status(400)
        .type("text/html")
        .send(renderPage("error", AUTH_FLOW_FAILED_MESSAGE));
    }
  });
}

/**
 * Render the page shown in the browser after the redirect.
 */
export function renderPage(
  kind: "success" | "error",
  message: string
): string {
  const title =
    kind === "success" ? "Calendar connected" : "Connection failed";
  const color = kind === "success" ? "#28a745" : "#dc3545";
  return `<!DOCTYPE html>
<html>
  <head>
    <meta charset="utf-8">
    <title>${title}</title>
    <style>
      body { font-family: sans-serif; text-align: center; margin-top: 15vh; }
      h2 { color: ${color}; }
    </style>
  </head>
  <body>
    <h2>${title}</h2>
    <p>${escapeHtml(message)}</p>
  </body>
</html>`;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#039;");
}
