import fastify, { type FastifyServerOptions } from "fastify";
import debug from "debug";
import { AppError } from "./errors";
import { NotificationOutbox } from "./outbox";
import { registerCallbackRoutes } from "./routes/callback";
import { registerChatRoutes } from "./routes/chat";
import type { AppConfig } from "./config";
import type { Services } from "./services";

const debugServer = debug("server:server");

export interface ServerOptions {
  config: AppConfig;
  services: Pick<Services, "coordinator" | "router">;
  /** Where authorization notifications wait for the user's next chat request */
  outbox?: NotificationOutbox;
  logger?: FastifyServerOptions["logger"];
}

export async function createServer(options: ServerOptions) {
  const { config, services } = options;
  const outbox = options.outbox ?? new NotificationOutbox();
  const app = fastify({ logger: options.logger ?? true });

  app.setErrorHandler((err, request, reply) => {
    if (err instanceof AppError) {
      request.log.warn({ err }, "Request failed");
      return reply.status(err.statusCode).send({ error: err.message });
    }
    // fastify's own client errors (bad JSON, wrong content type)
    if (typeof err.statusCode === "number" && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }
    request.log.error({ err }, "Unhandled error");
    return reply.status(500).send({ error: "Internal server error" });
  });

  app.setNotFoundHandler((request, reply) => {
    reply.status(404).send({ error: "Not found" });
  });

  // Health check endpoint
  app.get("/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  await registerCallbackRoutes(app, services.coordinator, config.callbackPath);
  await app.register(
    async function (instance) {
      await registerChatRoutes(instance, {
        router: services.router,
        outbox,
        apiToken: config.chatApiToken,
      });
    },
    { prefix: "/api" }
  );

  return {
    app,
    outbox,
    async listen(listenOptions: { port?: number; host?: string } = {}) {
      const port = listenOptions.port ?? config.port;
      const host = listenOptions.host ?? config.host;

      await app.listen({ port, host });
      debugServer("Server listening on %s:%d", host, port);
      debugServer("OAuth callback at %s", config.callbackPath);
      return { port, host };
    },
    async close() {
      await app.close();
    },
  };
}

export type AppServer = Awaited<ReturnType<typeof createServer>>;
