/**
 * ChatRouter - maps one chat message of one user to one reply.
 *
 * Slash commands drive the authorization lifecycle; anything else goes to the
 * classifier and, if it asks for a tool, through dispatch. Messages of one
 * user are answered in the order they arrived; users never wait on each other.
 */

import debug from "debug";
import { randomUUID } from "crypto";
import {
  KeyedMutex,
  type AuthorizationCoordinator,
  type AuthState,
} from "@app/connectors";
import {
  AUTH_REQUIRED_MESSAGE,
  CHAT_COMMANDS,
  CLASSIFIER_FAILED_MESSAGE,
  type UserId,
} from "@app/proto";
import type { Classification, Classifier } from "./classifier";
import type { ToolDispatcher } from "./dispatch";
import { formatDispatchResult } from "./format";
import { withRetry, type RetryOptions } from "./retry";

const debugRouter = debug("calbot:agent:router");

export type AuthorizationService = Pick<
  AuthorizationCoordinator,
  "beginAuthorization" | "getState" | "deauthorize" | "forget"
>;

export interface ChatRouterOptions {
  authorization: AuthorizationService;
  dispatcher: Pick<ToolDispatcher, "dispatch" | "tools">;
  classifier: Classifier;
  retry?: RetryOptions;
  newRequestId?: () => string;
  now?: () => number;
}

const HELP_TEXT = `Available commands:
${CHAT_COMMANDS.AUTH} - connect your Google Calendar
${CHAT_COMMANDS.STATUS} - show whether your calendar is connected
${CHAT_COMMANDS.REVOKE} - revoke calendar access
${CHAT_COMMANDS.FORGET} - delete everything stored about your calendar connection
${CHAT_COMMANDS.HELP} - show this help

Once connected, just tell me what you need, e.g.
- "What's on my calendar tomorrow?"
- "Schedule a meeting with Bob at 3pm on Friday for one hour"
- "Move my dentist appointment to next Monday 10am"`;

const START_TEXT = `Hi! I can manage your Google Calendar from this chat.

First, connect your calendar with ${CHAT_COMMANDS.AUTH}. Then send me messages in plain language.

${HELP_TEXT}`;

export class ChatRouter {
  private readonly authorization: AuthorizationService;
  private readonly dispatcher: Pick<ToolDispatcher, "dispatch" | "tools">;
  private readonly classifier: Classifier;
  private readonly retry?: RetryOptions;
  private readonly newRequestId: () => string;
  private readonly now: () => number;
  private readonly queue = new KeyedMutex();

  constructor(options: ChatRouterOptions) {
    this.authorization = options.authorization;
    this.dispatcher = options.dispatcher;
    this.classifier = options.classifier;
    this.retry = options.retry;
    this.newRequestId = options.newRequestId ?? randomUUID;
    this.now = options.now ?? Date.now;
  }

  /**
   * Handle one incoming message and produce the reply text.
   */
  async handleMessage(userId: UserId, text: string): Promise<string> {
    return this.queue.run(userId, () => this.process(userId, text.trim()));
  }

  private async process(userId: UserId, text: string): Promise<string> {
    if (!text) {
      return (
        "Send me a message about your calendar, or " +
        `${CHAT_COMMANDS.HELP} for the list of commands.`
      );
    }

    if (text.startsWith("/")) {
      return this.handleCommand(userId, text);
    }

    const state = await this.authorization.getState(userId);
    if (!hasUsableCredential(state)) {
      debugRouter(
        "User %s has no usable credential (%s)",
        userId,
        state.status
      );
      return AUTH_REQUIRED_MESSAGE;
    }

    let classification: Classification;
    try {
      classification = await this.classifier.classify(text, [
        ...this.dispatcher.tools.values(),
      ]);
    } catch (error) {
      debugRouter("Classifier failed for %s: %s", userId, error);
      return CLASSIFIER_FAILED_MESSAGE;
    }

    if (classification.kind === "text") {
      return classification.text;
    }

    const { name, arguments: args } = classification;
    const requestId = this.newRequestId();
    debugRouter("[%s] %s requested %s", requestId, userId, name);
    const result = await withRetry(
      () =>
        this.dispatcher.dispatch({ name, arguments: args, userId, requestId }),
      this.retry
    );
    return formatDispatchResult(result);
  }

  private async handleCommand(userId: UserId, text: string): Promise<string> {
    // "/auth@SomeBot extra" -> "/auth"
    const command = text.split(/\s+/)[0].split("@")[0].toLowerCase();

    switch (command) {
      case CHAT_COMMANDS.START:
        return START_TEXT;

      case CHAT_COMMANDS.HELP:
        return HELP_TEXT;

      case CHAT_COMMANDS.AUTH: {
        const { authorizationUrl, expiresAt } =
          await this.authorization.beginAuthorization(userId);
        const minutes = Math.max(
          1,
          Math.round((expiresAt - this.now()) / 60_000)
        );
        return (
          "Please open this link to connect your Google Calendar:\n" +
          `${authorizationUrl}\n\n` +
          `The link is valid for ${minutes} minutes and can be used once.`
        );
      }

      case CHAT_COMMANDS.STATUS:
        return describeState(await this.authorization.getState(userId));

      case CHAT_COMMANDS.REVOKE: {
        const revoked = await this.authorization.deauthorize(userId);
        return revoked
          ? "Google Calendar access revoked. " +
              `Use ${CHAT_COMMANDS.AUTH} to connect again.`
          : "There is no active Google Calendar connection to revoke.";
      }

      case CHAT_COMMANDS.FORGET:
        await this.authorization.forget(userId);
        return (
          "All stored Google Calendar credentials for you have been deleted."
        );

      default:
        return `Unknown command ${command}.\n\n${HELP_TEXT}`;
    }
  }
}

/** Whether dispatch could run for this user without a new /auth */
export function hasUsableCredential(state: AuthState): boolean {
  switch (state.status) {
    case "authenticated":
      return true;
    case "pending":
      return !!state.credential && !state.credential.revoked;
    case "unauthenticated":
    case "revoked":
      return false;
  }
}

export function describeState(state: AuthState): string {
  switch (state.status) {
    case "unauthenticated":
      return (
        "Your Google Calendar is not connected. " +
        `Use ${CHAT_COMMANDS.AUTH} to connect it.`
      );
    case "pending":
      return hasUsableCredential(state)
        ? "Your Google Calendar is connected. " +
            "A new authorization link is waiting to be opened."
        : "Authorization in progress: " +
            `open the link from ${CHAT_COMMANDS.AUTH} to finish connecting.`;
    case "authenticated":
      return "Your Google Calendar is connected.";
    case "revoked":
      return (
        "Access to your Google Calendar was revoked. " +
        `Use ${CHAT_COMMANDS.AUTH} to connect again.`
      );
  }
}
