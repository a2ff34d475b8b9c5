/**
 * @app/connectors - per-user OAuth credential lifecycle.
 *
 * This package provides:
 * - Credential storage (file-based with restricted permissions, or in-memory)
 * - The OAuth2 authorization-code flow handler (URL, exchange, refresh, revoke)
 * - AuthorizationCoordinator: pending sessions, callback, de-authorization
 * - TokenRefresher: single-flight token refresh per user
 *
 * Key design decisions:
 * - One redirect URI for all users; the single-use state token binds a
 *   callback to a user
 * - Credentials for one user are mutated under one per-user lock (KeyedMutex)
 * - Pending sessions are short-lived and kept in memory
 */

// Types
export * from "./types";

// Per-user lock
export { KeyedMutex } from "./mutex";

// OAuth handler
export {
  OAuthHandler,
  DEFAULT_TOKEN_TIMEOUT_MS,
  parseOAuthErrorCode,
  type RevokeResult,
} from "./oauth";

// Credential storage
export {
  type CredentialStore,
  BaseCredentialStore,
  MemoryCredentialStore,
  PendingSessionTable,
} from "./store";
export { FileCredentialStore } from "./file-store";

// Authorization flow and token refresh
export {
  AuthorizationCoordinator,
  DEFAULT_SESSION_TTL_MS,
  DEFAULT_MAX_PENDING_SESSIONS,
  type AuthorizationCoordinatorOptions,
  type AuthorizationStart,
  type CallbackParams,
} from "./authorization";
export {
  TokenRefresher,
  DEFAULT_REFRESH_MARGIN_MS,
  type TokenRefresherOptions,
} from "./refresher";

// Service definitions
export {
  GOOGLE_CALENDAR_SCOPES,
  googleOAuthBase,
  createGoogleCalendarProvider,
  googleCalendarProvider,
} from "./services/google";
