import debug from "debug";
import { loadConfig, loadEnvFile } from "./config";
import { NotificationOutbox } from "./outbox";
import { createServer } from "./server";
import { createServices } from "./services";

const debugStart = debug("server:start");

export interface StartOptions {
  envFile?: string;
  port?: number;
  host?: string;
  dataDir?: string;
  ephemeral?: boolean;
  /** Overrides CHAT_API_TOKEN */
  chatApiToken?: string;
  /** fastify logger; on by default */
  logger?: boolean;
}

/**
 * Load configuration, wire services and start listening.
 * Resolves to a function that stops everything.
 */
export async function startServer(
  options: StartOptions = {}
): Promise<() => Promise<void>> {
  loadEnvFile(options.envFile);
  const config = loadConfig({
    ...process.env,
    CHAT_API_TOKEN: options.chatApiToken ?? process.env.CHAT_API_TOKEN,
  });
  if (!config.chatApiToken) {
    debugStart("CHAT_API_TOKEN unset, POST /api/chat rejects every request");
  }
  if (options.dataDir) config.dataDir = options.dataDir;

  const outbox = new NotificationOutbox();
  const services = await createServices(config, {
    ephemeral: options.ephemeral,
    notify: (userId, text) => {
      debugStart("Queued notification for %s", userId);
      outbox.push(userId, text);
    },
  });
  const server = await createServer({
    config,
    services,
    outbox,
    logger: options.logger,
  });
  await server.listen({ port: options.port, host: options.host });

  return async () => {
    services.shutdown();
    await server.close();
  };
}
