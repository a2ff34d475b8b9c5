import { Command } from "commander";
import debug from "debug";
import { ConfigError, startServer } from "@app/server";
import { envFileOption, parsePort } from "./options";

const debugServer = debug("cli:server");

interface ServerCommandOptions {
  port?: number;
  host?: string;
  dataDir?: string;
  ephemeral?: boolean;
  chatToken?: string;
}

export function registerServerCommand(program: Command): void {
  program
    .command("server")
    .description(
      "Run the HTTP server: OAuth callback and the JSON chat endpoint"
    )
    .option(
      "-p, --port <port>",
      "port to listen on (default: port of GOOGLE_REDIRECT_URI)",
      parsePort
    )
    .option("--host <host>", "interface to bind")
    .option("--data-dir <dir>", "directory for stored credentials")
    .option("--ephemeral", "keep credentials in memory only")
    .option(
      "--chat-token <token>",
      "bearer token for POST /api/chat (default: CHAT_API_TOKEN)"
    )
    .action(async (options: ServerCommandOptions, command: Command) => {
      await runServerCommand(options, envFileOption(command));
    });
}

async function runServerCommand(
  options: ServerCommandOptions,
  envFile?: string
): Promise<void> {
  const { chatToken, ...rest } = options;
  let stop: () => Promise<void>;
  try {
    stop = await startServer({ envFile, chatApiToken: chatToken, ...rest });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
  if (!chatToken && !process.env.CHAT_API_TOKEN) {
    console.warn(
      "⚠️  No chat token set (--chat-token or CHAT_API_TOKEN): " +
        "POST /api/chat rejects every request"
    );
  }

  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down...`);
    stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        debugServer("Error during shutdown:", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}
