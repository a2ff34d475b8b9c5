import { Command } from "commander";
import * as readline from "readline";
import debug from "debug";
import {
  ConfigError,
  createServer,
  createServices,
  loadConfig,
  loadEnvFile,
  type AppConfig,
} from "@app/server";
import { envFileOption } from "./options";

const debugChat = debug("cli:chat");

interface ChatCommandOptions {
  user: string;
  ephemeral?: boolean;
}

export function registerChatCommand(program: Command): void {
  program
    .command("chat")
    .description(
      "Chat with the assistant in the terminal (also serves the OAuth callback)"
    )
    .option("-u, --user <id>", "user id to chat as", "cli-user")
    .option("--ephemeral", "keep credentials in memory only")
    .action(async (options: ChatCommandOptions, command: Command) => {
      await runChatCommand(options, envFileOption(command));
    });
}

async function runChatCommand(
  options: ChatCommandOptions,
  envFile?: string
): Promise<void> {
  loadEnvFile(envFile);
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const services = await createServices(config, {
    ephemeral: options.ephemeral,
    notify: (_userId, text) => {
      console.log(`\nAssistant > ${text}\n`);
    },
  });
  // The browser returns to the redirect URI, so the callback is served here
  const server = await createServer({ config, services, logger: false });
  const { port } = await server.listen();
  debugChat("Callback server on port %d", port);

  console.log("\n📅 Calendar assistant");
  console.log(
    `Chatting as "${options.user}". Type /help for commands, "exit" to quit.\n`
  );

  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  // Ctrl+D / end of input ends the session like "exit"
  let onClose: (() => void) | undefined;
  rl.on("close", () => onClose?.());

  const askQuestion = (): Promise<string | null> => {
    return new Promise((resolve) => {
      onClose = () => resolve(null);
      rl.question("You > ", (answer) => {
        resolve(answer.trim());
      });
    });
  };

  while (true) {
    const input = await askQuestion();
    if (input === null || input.toLowerCase() === "exit") {
      console.log("Goodbye! 👋");
      break;
    }
    if (input === "") continue;

    try {
      const reply = await services.router.handleMessage(options.user, input);
      console.log(`Assistant > ${reply}\n`);
    } catch (error) {
      debugChat("Message failed:", error);
      console.error(
        "Error processing message:",
        error instanceof Error ? error.message : error
      );
    }
  }

  rl.close();
  services.shutdown();
  await server.close();
  debugChat("Chat session ended");
}
