/**
 * Wires the credential lifecycle, the dispatch engine and the chat router
 * from an AppConfig.
 */

import debug from "debug";
import {
  AuthorizationCoordinator,
  FileCredentialStore,
  KeyedMutex,
  MemoryCredentialStore,
  TokenRefresher,
  createGoogleCalendarProvider,
  type CredentialStore,
} from "@app/connectors";
import {
  ChatRouter,
  GoogleCalendarBackend,
  OpenRouterClassifier,
  ToolDispatcher,
  resetOpenRouter,
  setEnv,
  type CalendarBackend,
  type Classifier,
  type RetryOptions,
} from "@app/agent";
import { AUTHORIZED_NOTIFICATION, type UserId } from "@app/proto";
import type { AppConfig } from "./config";

const debugServices = debug("server:services");

export interface ServiceOverrides {
  /** Keep credentials in memory only */
  ephemeral?: boolean;
  store?: CredentialStore;
  backend?: CalendarBackend;
  classifier?: Classifier;
  retry?: RetryOptions;
  /** Deliver "authorization complete" to the user's chat */
  notify?: (userId: UserId, text: string) => void | Promise<void>;
}

export interface Services {
  store: CredentialStore;
  coordinator: AuthorizationCoordinator;
  refresher: TokenRefresher;
  dispatcher: ToolDispatcher;
  router: ChatRouter;
  shutdown(): void;
}

export async function createServices(
  config: AppConfig,
  overrides: ServiceOverrides = {}
): Promise<Services> {
  setEnv({
    OPENROUTER_API_KEY: config.openRouter.apiKey,
    OPENROUTER_BASE_URL: config.openRouter.baseUrl,
    AGENT_MODEL: config.openRouter.model,
    EXTRA_SYSTEM_PROMPT: config.openRouter.extraSystemPrompt,
  });
  resetOpenRouter();

  const store =
    overrides.store ??
    (await createStore(config, overrides.ephemeral ?? false));
  const provider = createGoogleCalendarProvider({
    authUrl: config.google.authUrl,
    tokenUrl: config.google.tokenUrl,
    revokeUrl: config.google.revokeUrl,
  });
  const app = {
    clientId: config.google.clientId,
    clientSecret: config.google.clientSecret,
    redirectUri: config.google.redirectUri,
  };

  // One lock per user, shared by authorization completion and token refresh
  const locks = new KeyedMutex();

  const notify = overrides.notify;
  const coordinator = new AuthorizationCoordinator({
    store,
    provider,
    app,
    locks,
    sessionTtlMs: config.sessionTtlMs,
    tokenTimeoutMs: config.httpTimeoutMs,
    onAuthorized: notify
      ? (userId) => notify(userId, AUTHORIZED_NOTIFICATION)
      : undefined,
  });
  coordinator.startSweep();

  const refresher = new TokenRefresher({
    store,
    provider,
    app,
    locks,
    marginMs: config.refreshMarginMs,
    tokenTimeoutMs: config.httpTimeoutMs,
  });

  const dispatcher = new ToolDispatcher({
    backend:
      overrides.backend ??
      new GoogleCalendarBackend({ timeoutMs: config.backendTimeoutMs }),
    tokens: refresher,
  });

  const router = new ChatRouter({
    authorization: coordinator,
    dispatcher,
    classifier:
      overrides.classifier ??
      new OpenRouterClassifier({ timeoutMs: config.classifierTimeoutMs }),
    retry: overrides.retry,
  });

  return {
    store,
    coordinator,
    refresher,
    dispatcher,
    router,
    shutdown() {
      coordinator.shutdown();
    },
  };
}

async function createStore(
  config: AppConfig,
  ephemeral: boolean
): Promise<CredentialStore> {
  if (ephemeral) {
    debugServices("Using in-memory credential store");
    return new MemoryCredentialStore();
  }
  const store = new FileCredentialStore(config.dataDir);
  await store.auditPermissions();
  debugServices("Credential store at %s", config.dataDir);
  return store;
}
