/**
 * JSON chat transport: one message in, one reply out.
 *
 * Every request carries the shared API token as `Authorization: Bearer ...`;
 * without a configured token the endpoint refuses all requests.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import createDebug from "debug";
import { createHash, timingSafeEqual } from "crypto";
import type { ChatRouter } from "@app/agent";
import { chatRequestSchema, type ChatReply } from "@app/proto";
import { ValidationError } from "../errors";
import type { NotificationOutbox } from "../outbox";

const debug = createDebug("server:chat");

export interface ChatRouteOptions {
  router: Pick<ChatRouter, "handleMessage">;
  outbox: NotificationOutbox;
  /** Shared bearer token; undefined disables the endpoint */
  apiToken?: string;
}

export async function registerChatRoutes(
  fastify: FastifyInstance,
  options: ChatRouteOptions
): Promise<void> {
  const { router, outbox, apiToken } = options;

  fastify.addHook(
    "preHandler",
    async (request: FastifyRequest, reply: FastifyReply) => {
      if (!apiToken || !hasToken(request.headers.authorization, apiToken)) {
        debug("Rejected unauthenticated request to %s", request.url);
        return reply.status(401).send({ error: "Authentication required" });
      }
    }
  );

  /**
   * POST /chat { userId, text } -> { reply, notifications? }
   */
  fastify.post("/chat", async (request): Promise<ChatReply> => {
    const body = chatRequestSchema.safeParse(request.body);
    if (!body.success) {
      throw new ValidationError(
        body.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")
      );
    }

    const { userId, text } = body.data;
    debug("Message from %s (%d chars)", userId, text.length);
    const reply = await router.handleMessage(userId, text);

    const notifications = outbox.drain(userId);
    return notifications.length > 0 ? { reply, notifications } : { reply };
  });
}

function hasToken(header: string | undefined, expected: string): boolean {
  const match = header?.match(/^Bearer\s+(.+)$/i);
  if (!match) return false;
  // Equal-length digests for timingSafeEqual
  const given = createHash("sha256").update(match[1].trim()).digest();
  const wanted = createHash("sha256").update(expected).digest();
  return timingSafeEqual(given, wanted);
}
