import { Command, InvalidArgumentError } from "commander";

/** --env-file from the root program */
export function envFileOption(command: Command): string | undefined {
  const root = command.parent ?? command;
  const value: unknown = root.opts().envFile;
  return typeof value === "string" ? value : undefined;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("must be a port number between 1 and 65535");
  }
  return port;
}
