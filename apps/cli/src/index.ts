#!/usr/bin/env tsx

import { Command } from "commander";
import debug from "debug";
import { registerServerCommand } from "./commands/server";
import { registerChatCommand } from "./commands/chat";

const debugCli = debug("cli:index");

const program = new Command();

program
  .name("calbot")
  .description("Chat-driven Google Calendar assistant")
  .version("0.1.0")
  .option(
    "--env-file <path>",
    "load environment variables from this file instead of ./.env"
  );

// Register all commands
registerServerCommand(program);
registerChatCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  debugCli("Command failed:", error);
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
